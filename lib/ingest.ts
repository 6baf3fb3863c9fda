/**
 * Fetch → normalize → store for one calendar date
 *
 * Shared by the hourly scheduler, the backfill driver and the pull-data
 * route. Each metric category is isolated: a failure is recorded and the
 * next category still runs. Only AuthError escapes, because every later
 * call would fail the same way.
 */

import { AuthError, IngestError, NotFoundError, errorMessage, type IngestErrorKind } from '@/lib/errors';
import type { MetricsVendor } from '@/lib/GarminClient';
import type { MetricsStore } from '@/lib/db/types';
import {
  normalize,
  normalizeActivityList,
  type MetricCategory,
  type NormalizedRecord,
  type VendorPayload,
} from '@/lib/normalizer';
import { DEFAULT_RETRY, withRetry, type RetryOptions } from '@/lib/retry';

export interface IngestDeps {
  vendor: MetricsVendor;
  store: MetricsStore;
  retry?: RetryOptions;
  /** Waits between consecutive vendor calls. */
  pause?: () => Promise<number>;
  /** Activities requested per list page */
  activityPageSize?: number;
}

export const DEFAULT_ACTIVITY_PAGE_SIZE = 20;
const MAX_ACTIVITY_PAGES = 50;

export interface IngestFailure {
  date: string;
  /** `date` when the whole date failed outside any category */
  category: MetricCategory | 'date';
  /** Activity id when the failure concerns a single activity */
  reference?: string;
  kind: IngestErrorKind | 'unexpected';
  message: string;
}

export type CategoryCounts = Record<MetricCategory, number>;

export interface DateIngestResult {
  date: string;
  stored: CategoryCounts;
  /** Categories the vendor had no data for */
  missing: MetricCategory[];
  failures: IngestFailure[];
}

export interface SyncCycleResult {
  dates: DateIngestResult[];
  userMetrics: 'stored' | 'missing' | 'failed' | 'skipped';
  failures: IngestFailure[];
}

function emptyCounts(): CategoryCounts {
  return {
    daily_summary: 0,
    sleep: 0,
    hrv: 0,
    activity: 0,
    activity_detail: 0,
    user_metrics: 0,
  };
}

function toFailure(date: string, category: MetricCategory, error: unknown, reference?: string): IngestFailure {
  return {
    date,
    category,
    ...(reference ? { reference } : {}),
    kind: error instanceof IngestError ? error.kind : 'unexpected',
    message: errorMessage(error),
  };
}

function storeRecord(store: MetricsStore, normalized: NormalizedRecord): void {
  switch (normalized.category) {
    case 'daily_summary':
      return store.upsertDailySummary(normalized.record);
    case 'sleep':
      return store.upsertSleepSummary(normalized.record);
    case 'hrv':
      return store.upsertHrvSummary(normalized.record);
    case 'activity':
      return store.upsertActivity(normalized.record);
    case 'activity_detail':
      return store.upsertActivityDetail(normalized.record);
    case 'user_metrics':
      return store.upsertUserMetrics(normalized.record);
  }
}

/**
 * Per-date context that paces vendor calls and applies retries
 */
class DateRun {
  readonly result: DateIngestResult;
  private vendorCalls = 0;
  private readonly retry: RetryOptions;

  constructor(
    readonly date: string,
    private readonly deps: IngestDeps
  ) {
    this.result = { date, stored: emptyCounts(), missing: [], failures: [] };
    this.retry = deps.retry ?? DEFAULT_RETRY;
  }

  async callVendor<T>(label: string, fn: () => Promise<T>): Promise<T> {
    if (this.vendorCalls > 0 && this.deps.pause) {
      await this.deps.pause();
    }
    this.vendorCalls++;
    return withRetry(fn, { ...this.retry, label });
  }

  async persist(label: string, normalized: NormalizedRecord): Promise<void> {
    await withRetry(async () => storeRecord(this.deps.store, normalized), { ...this.retry, label });
  }

  recordFailure(category: MetricCategory, error: unknown, reference?: string): void {
    if (error instanceof AuthError) throw error;
    const failure = toFailure(this.date, category, error, reference);
    console.error(
      `[ingest] ${this.date} ${category}${reference ? ` ${reference}` : ''} failed (${failure.kind}): ${failure.message}`
    );
    this.result.failures.push(failure);
  }

  recordMissing(category: MetricCategory, reason: string): void {
    console.log(`[ingest] ${this.date} ${category}: no data (${reason})`);
    if (!this.result.missing.includes(category)) {
      this.result.missing.push(category);
    }
  }
}

/**
 * Fetch, normalize and store a single-record category. A null body or a
 * 404 counts as "no data" unless `acceptEmpty` lets the normalizer decide.
 */
async function ingestSingle(
  run: DateRun,
  category: MetricCategory,
  fetch: () => Promise<unknown>,
  toPayload: (body: unknown) => VendorPayload,
  acceptEmpty = false
): Promise<void> {
  try {
    const body = await run.callVendor(`${category} ${run.date}`, fetch);
    if (body === null && !acceptEmpty) {
      run.recordMissing(category, 'empty response');
      return;
    }
    await run.persist(`store ${category} ${run.date}`, normalize(toPayload(body)));
    run.result.stored[category]++;
  } catch (error) {
    if (error instanceof NotFoundError) {
      run.recordMissing(category, error.message);
      return;
    }
    run.recordFailure(category, error);
  }
}

/**
 * Page through the activity list. Each page is its own paced, retried
 * vendor call. A failed page ends paging; earlier pages are still stored.
 */
async function fetchActivityItems(run: DateRun, deps: IngestDeps): Promise<unknown[]> {
  const pageSize = deps.activityPageSize ?? DEFAULT_ACTIVITY_PAGE_SIZE;
  const items: unknown[] = [];

  for (let page = 0; page < MAX_ACTIVITY_PAGES; page++) {
    const start = page * pageSize;
    let body: unknown[];
    try {
      body = await run.callVendor(`activities ${run.date} from ${start}`, () =>
        deps.vendor.fetchActivities(run.date, start, pageSize)
      );
    } catch (error) {
      if (error instanceof NotFoundError && page === 0) {
        run.recordMissing('activity', error.message);
      } else {
        run.recordFailure('activity', error);
      }
      break;
    }

    items.push(...body);
    if (body.length < pageSize) break;
  }

  return items;
}

async function ingestActivities(run: DateRun, deps: IngestDeps): Promise<void> {
  const items = await fetchActivityItems(run, deps);

  const { activities, rejected } = normalizeActivityList(items);
  for (const error of rejected) {
    run.recordFailure('activity', error);
  }

  // The list endpoint filters by date already; keep only exact matches
  for (const activity of activities.filter((a) => a.date === run.date)) {
    const reference = String(activity.activity_id);

    try {
      await run.persist(`store activity ${reference}`, { category: 'activity', record: activity });
      run.result.stored.activity++;
    } catch (error) {
      run.recordFailure('activity', error, reference);
      continue;
    }

    try {
      const body = await run.callVendor(`activity_detail ${reference}`, () =>
        deps.vendor.fetchActivityDetail(activity.activity_id)
      );
      if (body === null) {
        run.recordMissing('activity_detail', `no details for ${reference}`);
        continue;
      }
      await run.persist(
        `store activity_detail ${reference}`,
        normalize({ category: 'activity_detail', activityId: activity.activity_id, body })
      );
      run.result.stored.activity_detail++;
    } catch (error) {
      if (error instanceof NotFoundError) {
        run.recordMissing('activity_detail', error.message);
        continue;
      }
      run.recordFailure('activity_detail', error, reference);
    }
  }
}

/**
 * Ingest every category for one date
 *
 * @throws {AuthError} when the vendor rejects the credentials
 */
export async function ingestDate(date: string, deps: IngestDeps): Promise<DateIngestResult> {
  const { vendor } = deps;
  const run = new DateRun(date, deps);

  await ingestSingle(
    run,
    'daily_summary',
    () => vendor.fetchDailySummary(date),
    (body) => ({ category: 'daily_summary', date, body })
  );
  await ingestSingle(
    run,
    'sleep',
    () => vendor.fetchSleep(date),
    (body) => ({ category: 'sleep', date, body })
  );
  await ingestSingle(
    run,
    'hrv',
    () => vendor.fetchHrv(date),
    (body) => ({ category: 'hrv', date, body }),
    true
  );
  await ingestActivities(run, deps);

  const { stored, failures } = run.result;
  console.log(
    `[ingest] ${date}: daily=${stored.daily_summary} sleep=${stored.sleep} hrv=${stored.hrv} ` +
      `activities=${stored.activity} details=${stored.activity_detail} failures=${failures.length}`
  );
  return run.result;
}

/**
 * Capture today's athlete profile values (lactate threshold, VO2 max)
 */
export async function ingestUserMetrics(
  date: string,
  deps: IngestDeps
): Promise<{ status: 'stored' | 'missing' | 'failed'; failure?: IngestFailure }> {
  const run = new DateRun(date, deps);
  await ingestSingle(
    run,
    'user_metrics',
    () => deps.vendor.fetchUserSettings(),
    (body) => ({ category: 'user_metrics', date, body })
  );

  if (run.result.stored.user_metrics > 0) return { status: 'stored' };
  const failure = run.result.failures[0];
  return failure ? { status: 'failed', failure } : { status: 'missing' };
}

/**
 * One scheduler cycle: every date in order, then the user profile values
 * as of the last date
 */
export async function runSyncCycle(dates: string[], deps: IngestDeps): Promise<SyncCycleResult> {
  const results: DateIngestResult[] = [];
  const failures: IngestFailure[] = [];

  for (const date of dates) {
    if (results.length > 0 && deps.pause) {
      await deps.pause();
    }
    const result = await ingestDate(date, deps);
    results.push(result);
    failures.push(...result.failures);
  }

  const latest = dates[dates.length - 1];
  if (latest === undefined) {
    return { dates: results, userMetrics: 'skipped', failures };
  }

  if (deps.pause) await deps.pause();
  const userMetrics = await ingestUserMetrics(latest, deps);
  if (userMetrics.failure) failures.push(userMetrics.failure);

  return { dates: results, userMetrics: userMetrics.status, failures };
}
