/**
 * Database Query Helpers
 *
 * Idempotent upserts (INSERT ... ON CONFLICT DO UPDATE) keyed on each
 * table's natural key, plus the read queries behind the API routes.
 * SQLite failures surface as StoreUnavailableError or InvalidRecordError.
 */

import { getDatabase } from './Database';
import { InvalidRecordError, StoreUnavailableError, errorMessage } from '../errors';
import type {
  Activity,
  ActivityDetail,
  ActivityDetailInput,
  ActivityInput,
  ActivityWithDetails,
  DailySummary,
  DailySummaryInput,
  DateRange,
  HrvSummary,
  HrvSummaryInput,
  MetricsStore,
  SleepSummary,
  SleepSummaryInput,
  UserMetrics,
  UserMetricsInput,
} from './types';

const UNAVAILABLE_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN', 'SQLITE_READONLY', 'SQLITE_FULL'];

function sqliteCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * Translate a better-sqlite3 failure into the pipeline's error taxonomy.
 * Errors that are already classified pass through unchanged.
 */
export function toStoreError(error: unknown, context: string): Error {
  if (error instanceof StoreUnavailableError || error instanceof InvalidRecordError) {
    return error;
  }
  const code = sqliteCode(error);
  const message = `${context}: ${errorMessage(error)}`;
  if (code?.startsWith('SQLITE_CONSTRAINT')) {
    return new InvalidRecordError(message, { cause: error });
  }
  if (code && (UNAVAILABLE_CODES.includes(code) || code.startsWith('SQLITE_IOERR'))) {
    return new StoreUnavailableError(message, { cause: error });
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(message);
}

function write(context: string, fn: () => void): void {
  try {
    const db = getDatabase();
    db.transaction(fn);
  } catch (error) {
    throw toStoreError(error, context);
  }
}

/**
 * Daily Summary - Upsert
 */
export function upsertDailySummary(record: DailySummaryInput): void {
  write(`daily_summary ${record.date}`, () => {
    getDatabase()
      .prepare(`
        INSERT INTO daily_summary (
          date, total_steps, total_distance_meters, active_kcal, bmr_kcal, total_kcal,
          resting_hr, min_hr, max_hr, avg_stress, max_stress,
          body_battery_current, body_battery_high, body_battery_low
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(date) DO UPDATE SET
          total_steps = excluded.total_steps,
          total_distance_meters = excluded.total_distance_meters,
          active_kcal = excluded.active_kcal,
          bmr_kcal = excluded.bmr_kcal,
          total_kcal = excluded.total_kcal,
          resting_hr = excluded.resting_hr,
          min_hr = excluded.min_hr,
          max_hr = excluded.max_hr,
          avg_stress = excluded.avg_stress,
          max_stress = excluded.max_stress,
          body_battery_current = excluded.body_battery_current,
          body_battery_high = excluded.body_battery_high,
          body_battery_low = excluded.body_battery_low,
          updated_at = strftime('%s', 'now')
      `)
      .run(
        record.date,
        record.total_steps,
        record.total_distance_meters,
        record.active_kcal,
        record.bmr_kcal,
        record.total_kcal,
        record.resting_hr,
        record.min_hr,
        record.max_hr,
        record.avg_stress,
        record.max_stress,
        record.body_battery_current,
        record.body_battery_high,
        record.body_battery_low
      );
  });
}

/**
 * Sleep Summary - Upsert
 */
export function upsertSleepSummary(record: SleepSummaryInput): void {
  write(`sleep_summary ${record.date}`, () => {
    getDatabase()
      .prepare(`
        INSERT INTO sleep_summary (
          date, total_sleep_seconds, deep_sleep_seconds, light_sleep_seconds,
          rem_sleep_seconds, awake_sleep_seconds, sleep_score, sleep_quality
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(date) DO UPDATE SET
          total_sleep_seconds = excluded.total_sleep_seconds,
          deep_sleep_seconds = excluded.deep_sleep_seconds,
          light_sleep_seconds = excluded.light_sleep_seconds,
          rem_sleep_seconds = excluded.rem_sleep_seconds,
          awake_sleep_seconds = excluded.awake_sleep_seconds,
          sleep_score = excluded.sleep_score,
          sleep_quality = excluded.sleep_quality,
          updated_at = strftime('%s', 'now')
      `)
      .run(
        record.date,
        record.total_sleep_seconds,
        record.deep_sleep_seconds,
        record.light_sleep_seconds,
        record.rem_sleep_seconds,
        record.awake_sleep_seconds,
        record.sleep_score,
        record.sleep_quality
      );
  });
}

/**
 * HRV Summary - Upsert
 */
export function upsertHrvSummary(record: HrvSummaryInput): void {
  write(`hrv_summary ${record.date}`, () => {
    getDatabase()
      .prepare(`
        INSERT INTO hrv_summary (date, last_night_avg, weekly_avg, status)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(date) DO UPDATE SET
          last_night_avg = excluded.last_night_avg,
          weekly_avg = excluded.weekly_avg,
          status = excluded.status,
          updated_at = strftime('%s', 'now')
      `)
      .run(record.date, record.last_night_avg, record.weekly_avg, record.status);
  });
}

/**
 * Activities - Upsert
 */
export function upsertActivity(record: ActivityInput): void {
  write(`activity ${record.activity_id}`, () => {
    getDatabase()
      .prepare(`
        INSERT INTO activities (
          activity_id, date, activity_name, activity_type, start_time,
          distance_meters, duration_seconds, avg_hr, max_hr, calories,
          avg_power, max_power, elevation_gain_meters, elevation_loss_meters,
          avg_cadence, max_cadence, steps
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(activity_id) DO UPDATE SET
          date = excluded.date,
          activity_name = excluded.activity_name,
          activity_type = excluded.activity_type,
          start_time = excluded.start_time,
          distance_meters = excluded.distance_meters,
          duration_seconds = excluded.duration_seconds,
          avg_hr = excluded.avg_hr,
          max_hr = excluded.max_hr,
          calories = excluded.calories,
          avg_power = excluded.avg_power,
          max_power = excluded.max_power,
          elevation_gain_meters = excluded.elevation_gain_meters,
          elevation_loss_meters = excluded.elevation_loss_meters,
          avg_cadence = excluded.avg_cadence,
          max_cadence = excluded.max_cadence,
          steps = excluded.steps,
          updated_at = strftime('%s', 'now')
      `)
      .run(
        record.activity_id,
        record.date,
        record.activity_name,
        record.activity_type,
        record.start_time,
        record.distance_meters,
        record.duration_seconds,
        record.avg_hr,
        record.max_hr,
        record.calories,
        record.avg_power,
        record.max_power,
        record.elevation_gain_meters,
        record.elevation_loss_meters,
        record.avg_cadence,
        record.max_cadence,
        record.steps
      );
  });
}

/**
 * Activity Details - Upsert (activity row must exist)
 */
export function upsertActivityDetail(record: ActivityDetailInput): void {
  write(`activity_details ${record.activity_id}`, () => {
    getDatabase()
      .prepare(`
        INSERT INTO activity_details (activity_id, details)
        VALUES (?, ?)
        ON CONFLICT(activity_id) DO UPDATE SET
          details = excluded.details,
          updated_at = strftime('%s', 'now')
      `)
      .run(record.activity_id, record.details);
  });
}

/**
 * User Metrics - Upsert
 */
export function upsertUserMetrics(record: UserMetricsInput): void {
  write(`user_metrics ${record.date}`, () => {
    getDatabase()
      .prepare(`
        INSERT INTO user_metrics (date, lthr_bpm, vo2_max_running, vo2_max_cycling)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(date) DO UPDATE SET
          lthr_bpm = excluded.lthr_bpm,
          vo2_max_running = excluded.vo2_max_running,
          vo2_max_cycling = excluded.vo2_max_cycling,
          updated_at = strftime('%s', 'now')
      `)
      .run(record.date, record.lthr_bpm, record.vo2_max_running, record.vo2_max_cycling);
  });
}

/**
 * Store backed by the SQLite singleton
 */
export const sqliteStore: MetricsStore = {
  upsertDailySummary,
  upsertSleepSummary,
  upsertHrvSummary,
  upsertActivity,
  upsertActivityDetail,
  upsertUserMetrics,
};

function read<T>(context: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toStoreError(error, context);
  }
}

/**
 * Daily summaries within an inclusive date range, newest first
 */
export function getDailySummaries(range: DateRange): DailySummary[] {
  return read('daily_summary range', () =>
    getDatabase()
      .prepare<DailySummary>('SELECT * FROM daily_summary WHERE date BETWEEN ? AND ? ORDER BY date DESC')
      .all(range.start, range.end)
  );
}

export function getSleepSummaries(range: DateRange): SleepSummary[] {
  return read('sleep_summary range', () =>
    getDatabase()
      .prepare<SleepSummary>('SELECT * FROM sleep_summary WHERE date BETWEEN ? AND ? ORDER BY date DESC')
      .all(range.start, range.end)
  );
}

export function getHrvSummaries(range: DateRange): HrvSummary[] {
  return read('hrv_summary range', () =>
    getDatabase()
      .prepare<HrvSummary>('SELECT * FROM hrv_summary WHERE date BETWEEN ? AND ? ORDER BY date DESC')
      .all(range.start, range.end)
  );
}

/**
 * Activities whose calendar date is on or after `date`, newest first
 */
export function getActivitiesSince(date: string): Activity[] {
  return read('activities since', () =>
    getDatabase()
      .prepare<Activity>('SELECT * FROM activities WHERE date >= ? ORDER BY start_time DESC')
      .all(date)
  );
}

export function getActivitiesForDate(date: string): Activity[] {
  return read('activities for date', () =>
    getDatabase()
      .prepare<Activity>('SELECT * FROM activities WHERE date = ? ORDER BY start_time ASC')
      .all(date)
  );
}

/**
 * Activities since `date` that have stored details, newest first. An empty
 * `types` list matches every activity type.
 */
export function getActivitiesWithDetailsSince(date: string, types: string[] = []): ActivityWithDetails[] {
  const typeFilter = types.length > 0 ? ` AND a.activity_type IN (${types.map(() => '?').join(', ')})` : '';
  return read('activities with details', () =>
    getDatabase()
      .prepare<ActivityWithDetails>(
        `SELECT a.activity_id, a.activity_type, a.start_time, d.details
         FROM activities a
         JOIN activity_details d ON d.activity_id = a.activity_id
         WHERE a.date >= ?${typeFilter}
         ORDER BY a.start_time DESC`
      )
      .all(date, ...types)
  );
}

export function getActivity(activityId: number): Activity | null {
  return read('activity', () => {
    const row = getDatabase()
      .prepare<Activity>('SELECT * FROM activities WHERE activity_id = ?')
      .get(activityId);
    return row ?? null;
  });
}

export function getActivityDetail(activityId: number): ActivityDetail | null {
  return read('activity_details', () => {
    const row = getDatabase()
      .prepare<ActivityDetail>('SELECT * FROM activity_details WHERE activity_id = ?')
      .get(activityId);
    return row ?? null;
  });
}

export function getLatestUserMetrics(): UserMetrics | null {
  return read('user_metrics latest', () => {
    const row = getDatabase()
      .prepare<UserMetrics>('SELECT * FROM user_metrics ORDER BY date DESC LIMIT 1')
      .get();
    return row ?? null;
  });
}
