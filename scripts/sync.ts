/*
  Hourly Garmin sync.
  - Runs one cycle at startup, then every SYNC_INTERVAL_MINUTES
  - Each cycle pulls yesterday (unless SYNC_REFETCH_YESTERDAY=false) and today,
    then the athlete profile values

  Usage: npx tsx scripts/sync.ts [--once]
*/
import './load-env';
import { parseArgs } from 'util';
import { cfg } from '../lib/config';
import { registerShutdownHandlers } from '../lib/db/Database';
import { runSyncCycle } from '../lib/ingest';
import { createIngestDeps } from '../lib/pipeline';
import { SyncScheduler, cycleDates } from '../lib/scheduler';

async function main() {
  const { values } = parseArgs({ options: { once: { type: 'boolean', default: false } } });
  const config = cfg();
  const deps = createIngestDeps({ paced: true }, config);
  registerShutdownHandlers();

  if (values.once) {
    const dates = cycleDates(new Date(), config.sync.refetchYesterday);
    console.log(`==> Single sync for ${dates.join(', ')}`);
    const result = await runSyncCycle(dates, deps);
    console.log(`==> Done with ${result.failures.length} failure(s)`);
    process.exitCode = result.failures.length > 0 ? 1 : 0;
    return;
  }

  const scheduler = new SyncScheduler({
    intervalMs: config.sync.intervalMinutes * 60 * 1000,
    refetchYesterday: config.sync.refetchYesterday,
    runCycle: (dates) => runSyncCycle(dates, deps),
  });
  scheduler.start({ runImmediately: true });
}

main().catch((e) => {
  console.error('[sync] Fatal:', e);
  process.exit(1);
});
