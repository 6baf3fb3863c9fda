/**
 * Activity time-series parsing
 *
 * Garmin detail payloads carry one `metrics` array per sample, positioned by
 * the `metricsIndex` of each descriptor. This module turns them into keyed
 * rows with friendlier column names.
 */

export type ActivitySample = Record<string, number | string | null>;

const COLUMN_RENAMES: Record<string, string> = {
  directHeartRate: 'heart_rate',
  directSpeed: 'speed',
  directElevation: 'elevation',
  directLatitude: 'latitude',
  directLongitude: 'longitude',
  sumDistance: 'distance',
  directPower: 'power',
  directCadence: 'cadence',
  directRunCadence: 'cadence',
  directBikeCadence: 'cadence',
  directRunningCadence: 'cadence',
  directCyclingCadence: 'cadence',
  directSwimCadence: 'cadence',
};

const DOWNSAMPLE_THRESHOLD = 300;
const DOWNSAMPLE_TARGET = 100;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function indexDescriptors(descriptors: unknown[]): Map<number, string> {
  const indexToKey = new Map<number, string>();
  for (const descriptor of descriptors) {
    if (!isRecord(descriptor)) continue;
    const { metricsIndex, key } = descriptor;
    if (typeof metricsIndex === 'number' && typeof key === 'string' && key !== '') {
      indexToKey.set(metricsIndex, key);
    }
  }
  return indexToKey;
}

function sampleValue(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Parse a stored detail payload (object or JSON text) into samples.
 * Returns an empty list when the payload lacks descriptors or metrics.
 */
export function parseActivityDetails(details: unknown): ActivitySample[] {
  let payload = details;
  if (typeof payload === 'string') {
    try {
      payload = JSON.parse(payload);
    } catch (error) {
      console.warn('[activityDetails] Stored details are not valid JSON:', error);
      return [];
    }
  }

  if (!isRecord(payload)) return [];
  const { metricDescriptors, activityDetailMetrics } = payload;
  if (!Array.isArray(metricDescriptors) || !Array.isArray(activityDetailMetrics)) return [];

  const indexToKey = indexDescriptors(metricDescriptors);
  const samples: ActivitySample[] = [];

  for (const entry of activityDetailMetrics) {
    const values = isRecord(entry) && Array.isArray(entry.metrics) ? entry.metrics : [];
    const sample: ActivitySample = {};

    values.forEach((value: unknown, index: number) => {
      const key = indexToKey.get(index);
      if (!key) return;
      sample[COLUMN_RENAMES[key] ?? key] = sampleValue(value);
    });

    const timestamp = sample.directTimestamp;
    if (typeof timestamp === 'number') {
      sample.timestamp = new Date(timestamp).toISOString();
    }

    samples.push(sample);
  }

  return samples;
}

/**
 * Thin long series to roughly a hundred rows; short series pass through.
 */
export function downsampleSamples<T>(samples: T[]): T[] {
  if (samples.length <= DOWNSAMPLE_THRESHOLD) return samples;
  const step = Math.max(1, Math.floor(samples.length / DOWNSAMPLE_TARGET));
  return samples.filter((_, index) => index % step === 0);
}
