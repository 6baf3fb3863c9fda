/**
 * Wires the production vendor client, SQLite store and configured retry
 * and pacing settings into IngestDeps.
 */

import { cfg, type AppConfig } from '@/lib/config';
import { getGarminClient } from '@/lib/GarminClient';
import { sqliteStore } from '@/lib/db/queries';
import { createPacer } from '@/lib/pacing';
import type { IngestDeps } from '@/lib/ingest';

export interface PipelineOptions {
  /** Pause between vendor calls using the configured delay window */
  paced?: boolean;
}

export function createIngestDeps(options: PipelineOptions = {}, config: AppConfig = cfg()): IngestDeps {
  const { sync } = config;
  return {
    vendor: getGarminClient(),
    store: sqliteStore,
    retry: {
      maxAttempts: sync.retryMaxAttempts,
      baseDelayMs: sync.retryBaseDelayMs,
      maxDelayMs: sync.retryMaxDelayMs,
    },
    ...(options.paced
      ? { pause: createPacer({ minDelayMs: sync.vendorDelayMinMs, maxDelayMs: sync.vendorDelayMaxMs }) }
      : {}),
  };
}
