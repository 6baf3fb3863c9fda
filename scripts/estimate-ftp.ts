/*
  Estimate cycling FTP from stored ride power data.

  Usage: npx tsx scripts/estimate-ftp.ts [--days 60]
*/
import './load-env';
import { parseArgs } from 'util';
import { Database } from '../lib/db/Database';
import { estimateFtp, formatFtpReport, loadRides } from '../lib/ftpEstimator';

const DEFAULT_WINDOW_DAYS = 60;

function main() {
  const { values } = parseArgs({
    options: {
      days: { type: 'string' },
    },
  });

  const days = values.days === undefined ? DEFAULT_WINDOW_DAYS : Number(values.days);
  if (!Number.isInteger(days) || days < 1) {
    console.error('Usage: npx tsx scripts/estimate-ftp.ts [--days N]  (N a whole number of days, at least 1)');
    process.exitCode = 2;
    return;
  }

  try {
    const result = estimateFtp(loadRides(new Date(), days));
    for (const line of formatFtpReport(result, days)) console.log(line);
    process.exitCode = result.status === 'estimated' ? 0 : 1;
  } finally {
    Database.resetInstance();
  }
}

try {
  main();
} catch (e) {
  console.error('[estimate-ftp] Fatal:', e);
  process.exit(1);
}
