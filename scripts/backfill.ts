/*
  Backfill historical Garmin data for an inclusive date range.
  Dates run oldest first with a 2-5 s pause between vendor calls
  (VENDOR_DELAY_MIN_MS / VENDOR_DELAY_MAX_MS).

  Usage: npx tsx scripts/backfill.ts --start 2024-01-01 --end 2024-01-31
*/
import './load-env';
import { parseArgs } from 'util';
import { runBackfill, formatBackfillReport } from '../lib/backfill';
import { Database } from '../lib/db/Database';
import { InvalidRangeError } from '../lib/errors';
import { createIngestDeps } from '../lib/pipeline';

async function main() {
  const { values } = parseArgs({
    options: {
      start: { type: 'string' },
      end: { type: 'string' },
    },
  });

  if (!values.start || !values.end) {
    console.error('Usage: npx tsx scripts/backfill.ts --start YYYY-MM-DD --end YYYY-MM-DD');
    process.exitCode = 2;
    return;
  }

  try {
    const report = await runBackfill(
      { start: values.start, end: values.end },
      createIngestDeps({ paced: true })
    );
    for (const line of formatBackfillReport(report)) console.log(line);
    process.exitCode = report.failedDates.length > 0 ? 1 : 0;
  } catch (e) {
    if (e instanceof InvalidRangeError) {
      console.error(e.message);
      process.exitCode = 2;
      return;
    }
    throw e;
  } finally {
    Database.resetInstance();
  }
}

main().catch((e) => {
  console.error('[backfill] Fatal:', e);
  process.exit(1);
});
