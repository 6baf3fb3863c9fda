/**
 * Vendor payload normalizer
 *
 * Maps raw Garmin bodies onto the fixed-field store records. Required
 * fields are validated with zod; every optional field the payload lacks
 * becomes null. Pure functions, no I/O.
 */

import { z } from 'zod';
import { fromError } from 'zod-validation-error';
import { MalformedPayloadError } from '@/lib/errors';
import { dateOfLocalTimestamp } from '@/lib/dates';
import type {
  ActivityDetailInput,
  ActivityInput,
  DailySummaryInput,
  HrvSummaryInput,
  SleepSummaryInput,
  UserMetricsInput,
} from '@/lib/db/types';

interface RecordByCategory {
  daily_summary: DailySummaryInput;
  sleep: SleepSummaryInput;
  hrv: HrvSummaryInput;
  activity: ActivityInput;
  activity_detail: ActivityDetailInput;
  user_metrics: UserMetricsInput;
}

export type MetricCategory = keyof RecordByCategory;

/**
 * A raw body tagged with what was requested
 */
export type VendorPayload =
  | { category: 'daily_summary'; date: string; body: unknown }
  | { category: 'sleep'; date: string; body: unknown }
  | { category: 'hrv'; date: string; body: unknown }
  | { category: 'activity'; body: unknown }
  | { category: 'activity_detail'; activityId: number; body: unknown }
  | { category: 'user_metrics'; date: string; body: unknown };

export type NormalizedRecord = {
  [C in MetricCategory]: { category: C; record: RecordByCategory[C] };
}[MetricCategory];

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();
const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

const dailySummarySchema = z.object({
  calendarDate,
  totalSteps: optionalNumber,
  totalDistanceMeters: optionalNumber,
  activeKilocalories: optionalNumber,
  bmrKilocalories: optionalNumber,
  totalKilocalories: optionalNumber,
  restingHeartRate: optionalNumber,
  minHeartRate: optionalNumber,
  maxHeartRate: optionalNumber,
  averageStressLevel: optionalNumber,
  maxStressLevel: optionalNumber,
  bodyBatteryMostRecentValue: optionalNumber,
  bodyBatteryHighestValue: optionalNumber,
  bodyBatteryLowestValue: optionalNumber,
});

const sleepSchema = z.object({
  dailySleepDTO: z.object({
    calendarDate,
    sleepTimeSeconds: optionalNumber,
    deepSleepSeconds: optionalNumber,
    lightSleepSeconds: optionalNumber,
    remSleepSeconds: optionalNumber,
    awakeSleepSeconds: optionalNumber,
    sleepScores: z
      .object({
        overall: z
          .object({
            value: optionalNumber,
            qualifierKey: optionalString,
          })
          .nullish(),
      })
      .nullish(),
  }),
});

const hrvSchema = z
  .object({
    hrvSummary: z
      .object({
        calendarDate: calendarDate.nullish(),
        lastNightAvg: optionalNumber,
        weeklyAvg: optionalNumber,
        status: optionalString,
      })
      .nullish(),
  })
  .nullish();

const activitySchema = z.object({
  activityId: z.number().int().positive(),
  startTimeLocal: z.string().min(10),
  activityName: optionalString,
  activityType: z.object({ typeKey: optionalString }).nullish(),
  distance: optionalNumber,
  duration: optionalNumber,
  averageHR: optionalNumber,
  maxHR: optionalNumber,
  calories: optionalNumber,
  avgPower: optionalNumber,
  maxPower: optionalNumber,
  elevationGain: optionalNumber,
  elevationLoss: optionalNumber,
  averageBikingCadenceInRevPerMinute: optionalNumber,
  averageRunningCadenceInStepsPerMinute: optionalNumber,
  maxBikingCadenceInRevPerMinute: optionalNumber,
  maxRunningCadenceInStepsPerMinute: optionalNumber,
  steps: optionalNumber,
});

const activityDetailSchema = z
  .object({
    metricDescriptors: z.array(z.unknown()),
    activityDetailMetrics: z.array(z.unknown()),
  })
  .passthrough();

const userSettingsSchema = z.object({
  userData: z.object({
    lactateThresholdHeartRate: optionalNumber,
    vo2MaxRunning: optionalNumber,
    vo2MaxCycling: optionalNumber,
  }),
});

function parseWith<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  body: unknown,
  context: string
): Output {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new MalformedPayloadError(
      `${context}: ${fromError(result.error).message}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function requireSameDate(reported: string, requested: string, context: string): void {
  if (reported !== requested) {
    throw new MalformedPayloadError(`${context}: payload is for ${reported}, requested ${requested}`);
  }
}

export function normalizeDailySummary(date: string, body: unknown): DailySummaryInput {
  const context = `daily_summary ${date}`;
  const payload = parseWith(dailySummarySchema, body, context);
  requireSameDate(payload.calendarDate, date, context);

  return {
    date,
    total_steps: payload.totalSteps ?? null,
    total_distance_meters: payload.totalDistanceMeters ?? null,
    active_kcal: payload.activeKilocalories ?? null,
    bmr_kcal: payload.bmrKilocalories ?? null,
    total_kcal: payload.totalKilocalories ?? null,
    resting_hr: payload.restingHeartRate ?? null,
    min_hr: payload.minHeartRate ?? null,
    max_hr: payload.maxHeartRate ?? null,
    avg_stress: payload.averageStressLevel ?? null,
    max_stress: payload.maxStressLevel ?? null,
    body_battery_current: payload.bodyBatteryMostRecentValue ?? null,
    body_battery_high: payload.bodyBatteryHighestValue ?? null,
    body_battery_low: payload.bodyBatteryLowestValue ?? null,
  };
}

export function normalizeSleep(date: string, body: unknown): SleepSummaryInput {
  const context = `sleep ${date}`;
  const { dailySleepDTO: sleep } = parseWith(sleepSchema, body, context);
  requireSameDate(sleep.calendarDate, date, context);
  const overall = sleep.sleepScores?.overall;

  return {
    date,
    total_sleep_seconds: sleep.sleepTimeSeconds ?? null,
    deep_sleep_seconds: sleep.deepSleepSeconds ?? null,
    light_sleep_seconds: sleep.lightSleepSeconds ?? null,
    rem_sleep_seconds: sleep.remSleepSeconds ?? null,
    awake_sleep_seconds: sleep.awakeSleepSeconds ?? null,
    sleep_score: overall?.value ?? null,
    sleep_quality: overall?.qualifierKey ?? null,
  };
}

/**
 * Nights without an HRV reading come back as an empty body; they still
 * produce a row so the date is marked as fetched.
 */
export function normalizeHrv(date: string, body: unknown): HrvSummaryInput {
  const context = `hrv ${date}`;
  const summary = parseWith(hrvSchema, body, context)?.hrvSummary;
  if (summary?.calendarDate) {
    requireSameDate(summary.calendarDate, date, context);
  }

  return {
    date,
    last_night_avg: summary?.lastNightAvg ?? null,
    weekly_avg: summary?.weeklyAvg ?? null,
    status: summary?.status ?? null,
  };
}

export function normalizeActivity(body: unknown): ActivityInput {
  const activity = parseWith(activitySchema, body, 'activity');
  const context = `activity ${activity.activityId}`;
  const date = dateOfLocalTimestamp(activity.startTimeLocal);
  if (!date) {
    throw new MalformedPayloadError(`${context}: unreadable startTimeLocal "${activity.startTimeLocal}"`);
  }

  return {
    activity_id: activity.activityId,
    date,
    activity_name: activity.activityName ?? null,
    activity_type: activity.activityType?.typeKey ?? null,
    start_time: activity.startTimeLocal,
    distance_meters: activity.distance ?? null,
    duration_seconds: activity.duration ?? null,
    avg_hr: activity.averageHR ?? null,
    max_hr: activity.maxHR ?? null,
    calories: activity.calories ?? null,
    avg_power: activity.avgPower ?? null,
    max_power: activity.maxPower ?? null,
    elevation_gain_meters: activity.elevationGain ?? null,
    elevation_loss_meters: activity.elevationLoss ?? null,
    avg_cadence:
      activity.averageBikingCadenceInRevPerMinute ?? activity.averageRunningCadenceInStepsPerMinute ?? null,
    max_cadence: activity.maxBikingCadenceInRevPerMinute ?? activity.maxRunningCadenceInStepsPerMinute ?? null,
    steps: activity.steps ?? null,
  };
}

export interface ActivityListResult {
  activities: ActivityInput[];
  rejected: MalformedPayloadError[];
}

/**
 * Normalize each item of an activity list independently. A malformed item
 * is reported in `rejected` and the rest are kept.
 */
export function normalizeActivityList(items: unknown[]): ActivityListResult {
  const activities: ActivityInput[] = [];
  const rejected: MalformedPayloadError[] = [];

  for (const item of items) {
    try {
      activities.push(normalizeActivity(item));
    } catch (error) {
      if (!(error instanceof MalformedPayloadError)) throw error;
      rejected.push(error);
    }
  }

  return { activities, rejected };
}

export function normalizeActivityDetail(activityId: number, body: unknown): ActivityDetailInput {
  const details = parseWith(activityDetailSchema, body, `activity_detail ${activityId}`);
  return {
    activity_id: activityId,
    details: JSON.stringify(details),
  };
}

export function normalizeUserMetrics(date: string, body: unknown): UserMetricsInput {
  const { userData } = parseWith(userSettingsSchema, body, `user_metrics ${date}`);
  return {
    date,
    lthr_bpm: userData.lactateThresholdHeartRate ?? null,
    vo2_max_running: userData.vo2MaxRunning ?? null,
    vo2_max_cycling: userData.vo2MaxCycling ?? null,
  };
}

/**
 * Normalize any tagged payload
 *
 * @throws {MalformedPayloadError} when required fields are absent or mistyped
 */
export function normalize(payload: VendorPayload): NormalizedRecord {
  switch (payload.category) {
    case 'daily_summary':
      return { category: 'daily_summary', record: normalizeDailySummary(payload.date, payload.body) };
    case 'sleep':
      return { category: 'sleep', record: normalizeSleep(payload.date, payload.body) };
    case 'hrv':
      return { category: 'hrv', record: normalizeHrv(payload.date, payload.body) };
    case 'activity':
      return { category: 'activity', record: normalizeActivity(payload.body) };
    case 'activity_detail':
      return {
        category: 'activity_detail',
        record: normalizeActivityDetail(payload.activityId, payload.body),
      };
    case 'user_metrics':
      return { category: 'user_metrics', record: normalizeUserMetrics(payload.date, payload.body) };
  }
}
