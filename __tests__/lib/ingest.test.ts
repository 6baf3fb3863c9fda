/**
 * Ingest pipeline tests
 *
 * Runs fetch → normalize → store against an in-process vendor and store.
 */

import { ingestDate, ingestUserMetrics, runSyncCycle, type IngestDeps } from '@/lib/ingest';
import {
  AuthError,
  RateLimitedError,
  StoreUnavailableError,
  VendorUnavailableError,
} from '@/lib/errors';
import { activityBody, FakeVendor, InMemoryStore, notFound } from '../helpers/fakes';

const noSleep = jest.fn(async () => undefined);

describe('ingest', () => {
  let vendor: FakeVendor;
  let store: InMemoryStore;
  let deps: IngestDeps;

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    noSleep.mockClear();
    vendor = new FakeVendor();
    store = new InMemoryStore();
    deps = {
      vendor,
      store,
      retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, sleep: noSleep },
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('ingestDate', () => {
    it('stores every category for a complete day', async () => {
      vendor.activitiesByDate.set('2024-01-02', [activityBody(13001, '2024-01-02')]);

      const result = await ingestDate('2024-01-02', deps);

      expect(result).toEqual({
        date: '2024-01-02',
        stored: { daily_summary: 1, sleep: 1, hrv: 1, activity: 1, activity_detail: 1, user_metrics: 0 },
        missing: [],
        failures: [],
      });
      expect(store.daily.get('2024-01-02')?.total_steps).toBe(9000);
      expect(store.sleep.get('2024-01-02')?.total_sleep_seconds).toBe(27000);
      expect(store.hrv.get('2024-01-02')?.status).toBe('BALANCED');
      expect(store.activities.get(13001)).toMatchObject({ date: '2024-01-02', activity_name: 'Run 13001' });
      expect(store.details.get(13001)?.details).toBe(
        '{"metricDescriptors":[{"metricsIndex":0,"key":"directHeartRate"}],"activityDetailMetrics":[{"metrics":[120]}]}'
      );
    });

    it('keeps going after a category fails', async () => {
      vendor.overrides.sleep = () => ({ dailySleepDTO: { calendarDate: 42 } });

      const result = await ingestDate('2024-01-02', deps);

      expect(result.stored.daily_summary).toBe(1);
      expect(result.stored.hrv).toBe(1);
      expect(result.stored.sleep).toBe(0);
      expect(result.failures).toEqual([
        expect.objectContaining({ date: '2024-01-02', category: 'sleep', kind: 'malformed_payload' }),
      ]);
      expect(store.sleep.size).toBe(0);
    });

    it('treats 404 and empty bodies as no data', async () => {
      vendor.overrides.daily = () => notFound('daily summary');
      vendor.overrides.sleep = () => null;

      const result = await ingestDate('2024-01-02', deps);

      expect(result.missing).toEqual(['daily_summary', 'sleep']);
      expect(result.failures).toEqual([]);
    });

    it('stores an all-empty HRV row for a night without readings', async () => {
      vendor.overrides.hrv = () => null;

      await ingestDate('2024-01-02', deps);

      expect(store.hrv.get('2024-01-02')).toEqual({
        date: '2024-01-02',
        last_night_avg: null,
        weekly_avg: null,
        status: null,
      });
    });

    it('retries a transient vendor failure', async () => {
      let calls = 0;
      vendor.overrides.daily = (date) => {
        calls++;
        if (calls === 1) throw new VendorUnavailableError('503', 503);
        return { calendarDate: date, totalSteps: 4000 };
      };

      const result = await ingestDate('2024-01-02', deps);

      expect(calls).toBe(2);
      expect(noSleep).toHaveBeenCalledWith(10);
      expect(result.failures).toEqual([]);
      expect(store.daily.get('2024-01-02')?.total_steps).toBe(4000);
    });

    it('reports a store outage after the retries run out', async () => {
      const outage = new StoreUnavailableError('database is locked');
      store.failNext = [outage, outage, outage];

      const result = await ingestDate('2024-01-02', deps);

      expect(result.failures).toEqual([
        {
          date: '2024-01-02',
          category: 'daily_summary',
          kind: 'store_unavailable',
          message: 'database is locked',
        },
      ]);
      expect(result.stored.sleep).toBe(1);
    });

    it('rejects a malformed activity without losing the others', async () => {
      vendor.activitiesByDate.set('2024-01-02', [
        { activityName: 'no id', startTimeLocal: '2024-01-02 06:00:00' },
        activityBody(13002, '2024-01-02'),
      ]);

      const result = await ingestDate('2024-01-02', deps);

      expect(result.stored.activity).toBe(1);
      expect([...store.activities.keys()]).toEqual([13002]);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toMatchObject({ category: 'activity', kind: 'malformed_payload' });
    });

    it('skips list entries that started on another date', async () => {
      vendor.activitiesByDate.set('2024-01-02', [activityBody(1, '2024-01-01'), activityBody(2, '2024-01-02')]);

      await ingestDate('2024-01-02', deps);

      expect([...store.activities.keys()]).toEqual([2]);
      expect(vendor.callsTo('detail')).toEqual(['2']);
    });

    it('keeps the activity when its details are missing or broken', async () => {
      vendor.activitiesByDate.set('2024-01-02', [activityBody(1, '2024-01-02'), activityBody(2, '2024-01-02')]);
      vendor.overrides.detail = (id) => (id === '1' ? notFound(`details for ${id}`) : { metricDescriptors: 'x' });

      const result = await ingestDate('2024-01-02', deps);

      expect(result.stored.activity).toBe(2);
      expect(result.stored.activity_detail).toBe(0);
      expect(result.missing).toEqual(['activity_detail']);
      expect(result.failures).toEqual([
        expect.objectContaining({ category: 'activity_detail', reference: '2', kind: 'malformed_payload' }),
      ]);
    });

    it('stops on rejected credentials', async () => {
      vendor.overrides.sleep = () => {
        throw new AuthError('token expired');
      };

      await expect(ingestDate('2024-01-02', deps)).rejects.toBeInstanceOf(AuthError);
      expect(vendor.callsTo('hrv')).toEqual([]);
    });

    it('pauses between vendor calls but not before the first', async () => {
      const pause = jest.fn(async () => 0);
      vendor.activitiesByDate.set('2024-01-02', [activityBody(7, '2024-01-02')]);

      await ingestDate('2024-01-02', { ...deps, pause });

      // daily, sleep, hrv, activity list, detail
      expect(vendor.calls).toHaveLength(5);
      expect(pause).toHaveBeenCalledTimes(4);
    });
  });

  describe('activity paging', () => {
    const date = '2024-01-02';
    const listed = [activityBody(1, date), activityBody(2, date), activityBody(3, date)];

    beforeEach(() => {
      deps.activityPageSize = 2;
      vendor.activitiesByDate.set(date, listed);
    });

    it('requests pages until a short one and paces each page', async () => {
      const pause = jest.fn(async () => 0);

      const result = await ingestDate(date, { ...deps, pause });

      expect(vendor.callsTo('activities')).toEqual(['2024-01-02@0', '2024-01-02@2']);
      expect(result.stored.activity).toBe(3);
      // daily, sleep, hrv, two list pages, three details
      expect(vendor.calls).toHaveLength(8);
      expect(pause).toHaveBeenCalledTimes(7);
    });

    it('retries only the page that was rate limited', async () => {
      let throttled = false;
      vendor.overrides.activities = (key) => {
        const start = Number(key.split('@')[1]);
        if (start === 2 && !throttled) {
          throttled = true;
          throw new RateLimitedError('slow down', 0);
        }
        return listed.slice(start, start + 2);
      };

      const result = await ingestDate(date, deps);

      expect(vendor.callsTo('activities')).toEqual(['2024-01-02@0', '2024-01-02@2', '2024-01-02@2']);
      expect(noSleep).toHaveBeenCalledWith(0);
      expect(result.stored.activity).toBe(3);
      expect(result.failures).toEqual([]);
    });

    it('keeps earlier pages when a later page keeps failing', async () => {
      vendor.overrides.activities = (key) => {
        const start = Number(key.split('@')[1]);
        if (start === 2) throw new VendorUnavailableError('Garmin returned 503', 503);
        return listed.slice(start, start + 2);
      };

      const result = await ingestDate(date, deps);

      expect([...store.activities.keys()]).toEqual([1, 2]);
      expect(result.failures).toEqual([
        { date, category: 'activity', kind: 'vendor_unavailable', message: 'Garmin returned 503' },
      ]);
    });
  });

  describe('ingestUserMetrics', () => {
    it('stores the profile values for the date', async () => {
      await expect(ingestUserMetrics('2024-01-02', deps)).resolves.toEqual({ status: 'stored' });
      expect(store.userMetrics.get('2024-01-02')).toEqual({
        date: '2024-01-02',
        lthr_bpm: 168,
        vo2_max_running: 52,
        vo2_max_cycling: 55,
      });
    });

    it('reports a malformed profile as failed', async () => {
      vendor.overrides.settings = () => ({ profile: {} });

      const outcome = await ingestUserMetrics('2024-01-02', deps);

      expect(outcome.status).toBe('failed');
      expect(outcome.failure?.kind).toBe('malformed_payload');
    });
  });

  describe('runSyncCycle', () => {
    it('ingests dates in order and then the user profile', async () => {
      const result = await runSyncCycle(['2024-01-01', '2024-01-02'], deps);

      expect(result.dates.map((d) => d.date)).toEqual(['2024-01-01', '2024-01-02']);
      expect(vendor.callsTo('daily')).toEqual(['2024-01-01', '2024-01-02']);
      expect(result.userMetrics).toBe('stored');
      expect([...store.userMetrics.keys()]).toEqual(['2024-01-02']);
      expect(result.failures).toEqual([]);
    });

    it('collects failures from every date', async () => {
      vendor.overrides.hrv = (date) => {
        throw new VendorUnavailableError(`hrv down for ${date}`, 502);
      };

      const result = await runSyncCycle(['2024-01-01', '2024-01-02'], deps);

      expect(result.failures.map((f) => `${f.date} ${f.category} ${f.kind}`)).toEqual([
        '2024-01-01 hrv vendor_unavailable',
        '2024-01-02 hrv vendor_unavailable',
      ]);
    });

    it('skips the profile when there are no dates', async () => {
      await expect(runSyncCycle([], deps)).resolves.toEqual({ dates: [], userMetrics: 'skipped', failures: [] });
      expect(vendor.calls).toEqual([]);
    });
  });
});
