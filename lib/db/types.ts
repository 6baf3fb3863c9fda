/**
 * Database TypeScript Types
 *
 * Row shapes matching the SQLite schema in migrations/.
 */

/**
 * Daily wellness summary
 * Steps, calories, heart rate, stress and body battery for one calendar day
 */
export interface DailySummary {
  date: string; // YYYY-MM-DD format
  total_steps: number | null;
  total_distance_meters: number | null;
  active_kcal: number | null;
  bmr_kcal: number | null;
  total_kcal: number | null;
  resting_hr: number | null;
  min_hr: number | null;
  max_hr: number | null;
  avg_stress: number | null;
  max_stress: number | null;
  body_battery_current: number | null;
  body_battery_high: number | null;
  body_battery_low: number | null;
  created_at?: number; // Unix timestamp
  updated_at?: number; // Unix timestamp
}

/**
 * Sleep Summary
 * Night ending on `date`; stage durations in seconds
 */
export interface SleepSummary {
  date: string;
  total_sleep_seconds: number | null;
  deep_sleep_seconds: number | null;
  light_sleep_seconds: number | null;
  rem_sleep_seconds: number | null;
  awake_sleep_seconds: number | null;
  sleep_score: number | null; // 0-100
  sleep_quality: string | null; // e.g. GOOD, FAIR
  created_at?: number;
  updated_at?: number;
}

/**
 * Heart rate variability for the night ending on `date`
 */
export interface HrvSummary {
  date: string;
  last_night_avg: number | null; // ms
  weekly_avg: number | null; // ms
  status: string | null; // BALANCED, UNBALANCED, LOW, ...
  created_at?: number;
  updated_at?: number;
}

export interface Activity {
  activity_id: number;
  date: string; // calendar date of start_time
  activity_name: string | null;
  activity_type: string | null;
  start_time: string; // local "YYYY-MM-DD HH:MM:SS"
  distance_meters: number | null;
  duration_seconds: number | null;
  avg_hr: number | null;
  max_hr: number | null;
  calories: number | null;
  avg_power: number | null;
  max_power: number | null;
  elevation_gain_meters: number | null;
  elevation_loss_meters: number | null;
  avg_cadence: number | null;
  max_cadence: number | null;
  steps: number | null;
  created_at?: number;
  updated_at?: number;
}

/**
 * Raw time-series payload for one activity, stored as JSON text
 */
export interface ActivityDetail {
  activity_id: number;
  details: string;
  created_at?: number;
  updated_at?: number;
}

/**
 * Athlete profile values as of `date`
 */
export interface UserMetrics {
  date: string;
  lthr_bpm: number | null; // lactate threshold heart rate
  vo2_max_running: number | null;
  vo2_max_cycling: number | null;
  created_at?: number;
  updated_at?: number;
}

/**
 * Input types for upserts (without auto-generated fields)
 */
export type DailySummaryInput = Omit<DailySummary, 'created_at' | 'updated_at'>;
export type SleepSummaryInput = Omit<SleepSummary, 'created_at' | 'updated_at'>;
export type HrvSummaryInput = Omit<HrvSummary, 'created_at' | 'updated_at'>;
export type ActivityInput = Omit<Activity, 'created_at' | 'updated_at'>;
export type ActivityDetailInput = Omit<ActivityDetail, 'created_at' | 'updated_at'>;
export type UserMetricsInput = Omit<UserMetrics, 'created_at' | 'updated_at'>;

/**
 * Activity joined with its stored time series
 */
export interface ActivityWithDetails {
  activity_id: number;
  activity_type: string | null;
  start_time: string;
  details: string;
}

export interface DateRange {
  start: string;
  end: string;
}

/**
 * Write side of the store. Every method overwrites the row with the same
 * natural key and throws StoreUnavailableError or InvalidRecordError.
 */
export interface MetricsStore {
  upsertDailySummary(record: DailySummaryInput): void;
  upsertSleepSummary(record: SleepSummaryInput): void;
  upsertHrvSummary(record: HrvSummaryInput): void;
  upsertActivity(record: ActivityInput): void;
  upsertActivityDetail(record: ActivityDetailInput): void;
  upsertUserMetrics(record: UserMetricsInput): void;
}
