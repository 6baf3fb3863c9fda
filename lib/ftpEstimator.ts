/**
 * Field-based FTP estimation from stored ride power data.
 *
 * 1. Best average power over 3–60 minute windows across recent rides
 * 2. Two-parameter critical power fit (work = CP * t + W') on that curve
 * 3. CP clamped to 110% of the best steady 40/60 minute effort (VI <= 1.05)
 * 4. Average HR/power decoupling on rides of an hour or more
 * 5. Weighted blend of modeled and steady power, shifted toward the steady
 *    effort when decoupling is high
 */

import { parseActivityDetails, type ActivitySample } from '@/lib/activityDetails';
import { getActivitiesWithDetailsSince } from '@/lib/db/queries';
import { daysBefore } from '@/lib/dates';

export const CURVE_DURATIONS_S = [180, 300, 600, 1200, 1800, 2400, 3600];
export const STEADY_DURATIONS_S = [2400, 3600];
export const CYCLING_TYPES = [
  'cycling',
  'road_biking',
  'virtual_ride',
  'mountain_biking',
  'gravel_cycling',
  'indoor_cycling',
];

const MIN_MODEL_DURATION_S = 180;
const MAX_STEADY_VI = 1.05;
const STEADY_CLAMP = 1.1;
const NP_WINDOW_S = 30;
const MAX_HOLD_S = 5;
const DECOUPLING_MIN_DURATION_S = 3600;
const DECOUPLING_HIGH = 7;
const DECOUPLING_LOW = 5;

/**
 * One ride resampled to one value per second
 */
export interface RideSeries {
  activityId: number;
  power: number[];
  heartRate: number[];
}

export interface CurvePoint {
  durationS: number;
  watts: number;
  activityId: number | null;
}

export interface CriticalPowerFit {
  cpWatts: number;
  wPrimeJoules: number;
}

export interface SteadyEffort {
  watts: number;
  durationS: number;
  activityId: number | null;
  variabilityIndex: number;
}

export interface FtpEstimate {
  status: 'estimated';
  ftpWatts: number;
  confidence: number;
  cpWatts: number;
  wPrimeJoules: number;
  steady: SteadyEffort;
  decouplingPct: number;
  curve: CurvePoint[];
  ridesAnalyzed: number;
}

export type FtpEstimateResult = FtpEstimate | { status: 'insufficient_data'; reason: string; ridesAnalyzed: number };

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function numeric(value: ActivitySample[string] | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Expand detail samples to a per-second series. Each value is held until
 * the next sample's timestamp, for at most five seconds; the rest of a
 * longer gap is a stop and reads 0. Without timestamps each sample is one
 * second. Missing values become 0.
 */
export function toSecondSeries(samples: ActivitySample[], key: string): number[] {
  const series: number[] = [];
  samples.forEach((sample, index) => {
    const value = numeric(sample[key]) ?? 0;
    const at = numeric(sample.directTimestamp);
    const nextAt = numeric(samples[index + 1]?.directTimestamp);
    const gap = at !== null && nextAt !== null ? Math.max(1, Math.round((nextAt - at) / 1000)) : 1;
    for (let i = 0; i < gap; i++) series.push(i < MAX_HOLD_S ? value : 0);
  });
  return series;
}

/**
 * Highest mean over any `window` consecutive values, with the index of the
 * window's last value; null when the series is shorter than the window
 */
export function bestRollingAverage(series: number[], window: number): { average: number; end: number } | null {
  if (window <= 0 || series.length < window) return null;

  let sum = 0;
  for (let i = 0; i < window; i++) sum += series[i];
  let best = { average: sum / window, end: window - 1 };

  for (let i = window; i < series.length; i++) {
    sum += series[i] - series[i - window];
    if (sum / window > best.average) {
      best = { average: sum / window, end: i };
    }
  }
  return best;
}

/**
 * Normalized power: fourth root of the mean fourth power of the 30 s
 * rolling average
 */
export function normalizedPower(power: number[]): number {
  if (power.length < NP_WINDOW_S) return mean(power);

  let sum = 0;
  for (let i = 0; i < NP_WINDOW_S; i++) sum += power[i];
  const fourthPowers = [Math.pow(sum / NP_WINDOW_S, 4)];
  for (let i = NP_WINDOW_S; i < power.length; i++) {
    sum += power[i] - power[i - NP_WINDOW_S];
    fourthPowers.push(Math.pow(sum / NP_WINDOW_S, 4));
  }
  return Math.pow(mean(fourthPowers), 0.25);
}

/**
 * Power:HR decoupling in percent, first half against second half.
 * Positive means heart rate drifted up for the same power.
 */
export function decouplingPct(ride: RideSeries): number | null {
  const half = Math.floor(Math.min(ride.power.length, ride.heartRate.length) / 2);
  if (half === 0) return null;

  const ratio = (from: number, to: number): number | null => {
    const hr = mean(ride.heartRate.slice(from, to).filter((v) => v > 0));
    return hr > 0 ? mean(ride.power.slice(from, to)) / hr : null;
  };

  const first = ratio(0, half);
  const second = ratio(half, half * 2);
  if (first === null || second === null || first === 0) return null;
  return ((first - second) / first) * 100;
}

export function bestPowerCurve(rides: RideSeries[], durations: number[] = CURVE_DURATIONS_S): CurvePoint[] {
  return durations.map((durationS) => {
    let best: CurvePoint = { durationS, watts: 0, activityId: null };
    for (const ride of rides) {
      const found = bestRollingAverage(ride.power, durationS);
      if (found && found.average > best.watts) {
        best = { durationS, watts: found.average, activityId: ride.activityId };
      }
    }
    return best;
  });
}

/**
 * Least-squares fit of work = CP * t + W' over curve points of at least
 * three minutes. Needs two such points with power.
 */
export function fitCriticalPower(curve: CurvePoint[]): CriticalPowerFit | null {
  const points = curve.filter((p) => p.watts > 0 && p.durationS >= MIN_MODEL_DURATION_S);
  if (points.length < 2) return null;

  const n = points.length;
  const xs = points.map((p) => p.durationS);
  const ys = points.map((p) => p.watts * p.durationS);
  const sumX = xs.reduce((s, x) => s + x, 0);
  const sumY = ys.reduce((s, y) => s + y, 0);
  const sumXY = xs.reduce((s, x, i) => s + x * ys[i], 0);
  const sumXX = xs.reduce((s, x) => s + x * x, 0);

  const denominator = n * sumXX - sumX * sumX;
  if (denominator === 0) return null;

  const cpWatts = (n * sumXY - sumX * sumY) / denominator;
  return { cpWatts, wPrimeJoules: (sumY - cpWatts * sumX) / n };
}

/**
 * Best 40 or 60 minute window whose variability index stays at or below 1.05
 */
export function bestSteadyEffort(rides: RideSeries[]): SteadyEffort {
  let best: SteadyEffort = { watts: 0, durationS: 0, activityId: null, variabilityIndex: 0 };

  for (const ride of rides) {
    for (const durationS of STEADY_DURATIONS_S) {
      const found = bestRollingAverage(ride.power, durationS);
      if (!found || found.average <= 0) continue;

      const segment = ride.power.slice(found.end - durationS + 1, found.end + 1);
      const variabilityIndex = normalizedPower(segment) / found.average;
      if (variabilityIndex <= MAX_STEADY_VI && found.average > best.watts) {
        best = { watts: found.average, durationS, activityId: ride.activityId, variabilityIndex };
      }
    }
  }
  return best;
}

/**
 * Mean decoupling over rides of an hour or more, ignoring values outside
 * (-20%, 30%); 0 when no ride qualifies
 */
export function averageDecoupling(rides: RideSeries[]): number {
  const values: number[] = [];
  for (const ride of rides) {
    if (ride.power.length < DECOUPLING_MIN_DURATION_S) continue;
    const value = decouplingPct(ride);
    if (value !== null && value > -20 && value < 30) values.push(value);
  }
  return mean(values);
}

export function estimateFtp(rides: RideSeries[]): FtpEstimateResult {
  const curve = bestPowerCurve(rides);
  const fit = fitCriticalPower(curve);
  if (!fit) {
    return {
      status: 'insufficient_data',
      reason: 'Need power data for at least two durations of 3 minutes or more',
      ridesAnalyzed: rides.length,
    };
  }

  const steady = bestSteadyEffort(rides);
  let modeled = fit.cpWatts;
  if (steady.watts > 0 && modeled > steady.watts * STEADY_CLAMP) {
    console.log(
      `[ftpEstimator] Clamping CP ${modeled.toFixed(1)} W to ${STEADY_CLAMP} x steady ${steady.watts.toFixed(1)} W`
    );
    modeled = steady.watts * STEADY_CLAMP;
  }

  const decoupling = averageDecoupling(rides);
  let ftpWatts = modeled;
  if (steady.watts > 0) {
    const steadyWeight = decoupling > DECOUPLING_HIGH ? 0.5 : 0.3;
    ftpWatts = (1 - steadyWeight) * modeled + steadyWeight * steady.watts;
  }

  return {
    status: 'estimated',
    ftpWatts,
    confidence: decoupling < DECOUPLING_LOW ? 0.8 : 0.5,
    cpWatts: fit.cpWatts,
    wPrimeJoules: fit.wPrimeJoules,
    steady,
    decouplingPct: decoupling,
    curve,
    ridesAnalyzed: rides.length,
  };
}

/**
 * Stored rides since `days` ago with any power data, as per-second series
 */
export function loadRides(now: Date, days: number, types: string[] = CYCLING_TYPES): RideSeries[] {
  const rides: RideSeries[] = [];
  for (const row of getActivitiesWithDetailsSince(daysBefore(now, days), types)) {
    const samples = parseActivityDetails(row.details);
    if (!samples.some((sample) => numeric(sample.power) !== null)) continue;
    rides.push({
      activityId: row.activity_id,
      power: toSecondSeries(samples, 'power'),
      heartRate: toSecondSeries(samples, 'heart_rate'),
    });
  }
  return rides;
}

export function formatFtpReport(result: FtpEstimateResult, days: number): string[] {
  if (result.status === 'insufficient_data') {
    return [`No FTP estimate from ${result.ridesAnalyzed} ride(s) in the last ${days} days: ${result.reason}`];
  }

  const lines = [
    `Estimated FTP: ${result.ftpWatts.toFixed(1)} W (confidence ${result.confidence.toFixed(2)})`,
    `  Critical power:     ${result.cpWatts.toFixed(1)} W`,
    `  W':                 ${result.wPrimeJoules.toFixed(0)} J`,
    `  Best steady effort: ${result.steady.watts.toFixed(1)} W for ${result.steady.durationS / 60} min`,
    `  HR decoupling:      ${result.decouplingPct.toFixed(1)} %`,
    `  Rides analyzed:     ${result.ridesAnalyzed} (last ${days} days)`,
  ];
  if (result.decouplingPct < DECOUPLING_LOW) {
    lines.push('Low decoupling: aerobic endurance supports this estimate.');
  } else if (result.decouplingPct > 8) {
    lines.push('High decoupling: fatigue or a thin aerobic base may inflate this estimate.');
  }
  return lines;
}
