/*
  Capture today's lactate threshold HR and VO2 max values.

  Usage: npx tsx scripts/fetch-user-metrics.ts
*/
import './load-env';
import { todayIso } from '../lib/dates';
import { Database } from '../lib/db/Database';
import { ingestUserMetrics } from '../lib/ingest';
import { createIngestDeps } from '../lib/pipeline';

async function main() {
  const date = todayIso();
  const outcome = await ingestUserMetrics(date, createIngestDeps());
  if (outcome.failure) {
    console.error(`User metrics for ${date} failed: ${outcome.failure.message}`);
    process.exitCode = 1;
  } else {
    console.log(`User metrics for ${date}: ${outcome.status}`);
  }
  Database.resetInstance();
}

main().catch((e) => {
  console.error('[fetch-user-metrics] Fatal:', e);
  process.exit(1);
});
