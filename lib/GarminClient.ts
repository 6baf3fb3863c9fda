/**
 * Garmin Connect API Client
 *
 * Fetches raw wellness and activity payloads with a bearer token and maps
 * HTTP outcomes onto the pipeline's error taxonomy. Bodies are returned
 * unparsed (`unknown`); shaping them is the normalizer's job.
 */

import { cfg, type GarminConfig } from '@/lib/config';
import {
  AuthError,
  MalformedPayloadError,
  NotFoundError,
  RateLimitedError,
  VendorUnavailableError,
  errorMessage,
} from '@/lib/errors';
import { httpsRequest, type HttpsResponse } from '@/lib/https-proxy-request';

const DETAIL_MAX_CHART_SIZE = 2000;
const DETAIL_MAX_POLYLINE_SIZE = 4000;

/**
 * Source of raw vendor payloads. The ingest cycle depends on this interface
 * so tests can substitute an in-process fake.
 */
export interface MetricsVendor {
  fetchDailySummary(date: string): Promise<unknown>;
  fetchSleep(date: string): Promise<unknown>;
  fetchHrv(date: string): Promise<unknown>;
  /** One page of the activities that started on `date`; empty past the last page. */
  fetchActivities(date: string, start: number, limit: number): Promise<unknown[]>;
  fetchActivityDetail(activityId: number): Promise<unknown>;
  fetchUserSettings(): Promise<unknown>;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(
  header: string | string[] | undefined,
  now: number = Date.now()
): number | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return null;

  if (/^\d+$/.test(value.trim())) {
    return parseInt(value.trim(), 10) * 1000;
  }

  const at = Date.parse(value);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

/**
 * Garmin Connect client with status-to-error mapping
 */
export class GarminClient implements MetricsVendor {
  private readonly accessToken: string;
  private readonly displayName: string;
  private readonly apiBase: string;
  private readonly requestTimeoutMs: number;

  constructor(options: GarminConfig) {
    this.accessToken = options.accessToken;
    this.displayName = options.displayName;
    this.apiBase = options.apiBase.replace(/\/+$/, '');
    this.requestTimeoutMs = options.requestTimeoutMs;
  }

  /**
   * Make an authenticated GET request and decode the JSON body.
   * Resolves to null for 204 or an empty body.
   */
  async get(path: string, params: Record<string, string> = {}): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.apiBase}${path}${query ? `?${query}` : ''}`;

    let response: HttpsResponse;
    try {
      response = await httpsRequest(url, {
        method: 'GET',
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Accept: 'application/json',
          'NK': 'NT',
        },
        timeoutMs: this.requestTimeoutMs,
      });
    } catch (error) {
      throw new VendorUnavailableError(`Garmin request failed for ${path}: ${errorMessage(error)}`, null, {
        cause: error,
      });
    }

    return this.decode(path, response);
  }

  private decode(path: string, response: HttpsResponse): unknown {
    const { status, data } = response;

    if (status === 401 || status === 403) {
      throw new AuthError(`Garmin rejected credentials (${status}) for ${path}`);
    }
    if (status === 404) {
      throw new NotFoundError(`Garmin has no data at ${path}`);
    }
    if (status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers['retry-after']);
      console.warn(`[GarminClient] Rate limited on ${path}`, retryAfterMs === null ? '' : `retry after ${retryAfterMs}ms`);
      throw new RateLimitedError(`Garmin rate limit hit for ${path}`, retryAfterMs);
    }
    if (status >= 500) {
      throw new VendorUnavailableError(`Garmin API error ${status} for ${path}`, status);
    }
    if (status < 200 || status >= 300) {
      throw new MalformedPayloadError(`Unexpected Garmin response ${status} for ${path}`);
    }

    if (status === 204 || data.trim() === '') {
      return null;
    }

    try {
      const parsed: unknown = JSON.parse(data);
      return parsed;
    } catch (error) {
      throw new MalformedPayloadError(`Garmin returned non-JSON body for ${path}`, [], { cause: error });
    }
  }

  async fetchDailySummary(date: string): Promise<unknown> {
    return this.get(`/usersummary-service/usersummary/daily/${encodeURIComponent(this.displayName)}`, {
      calendarDate: date,
    });
  }

  async fetchSleep(date: string): Promise<unknown> {
    return this.get(`/wellness-service/wellness/dailySleepData/${encodeURIComponent(this.displayName)}`, {
      date,
      nonSleepBufferMinutes: '60',
    });
  }

  async fetchHrv(date: string): Promise<unknown> {
    return this.get(`/hrv-service/hrv/${date}`);
  }

  /**
   * One page of the activity search endpoint. Paging, pacing and retries
   * per page belong to the caller.
   */
  async fetchActivities(date: string, start: number, limit: number): Promise<unknown[]> {
    const body = await this.get('/activitylist-service/activities/search/activities', {
      startDate: date,
      endDate: date,
      start: String(start),
      limit: String(limit),
    });

    if (body === null) return [];
    if (!Array.isArray(body)) {
      throw new MalformedPayloadError(`Activity list for ${date} is not an array`);
    }
    return body;
  }

  async fetchActivityDetail(activityId: number): Promise<unknown> {
    return this.get(`/activity-service/activity/${activityId}/details`, {
      maxChartSize: String(DETAIL_MAX_CHART_SIZE),
      maxPolylineSize: String(DETAIL_MAX_POLYLINE_SIZE),
    });
  }

  async fetchUserSettings(): Promise<unknown> {
    return this.get('/userprofile-service/userprofile/user-settings');
  }
}

/**
 * Singleton instance
 */
let garminClientInstance: GarminClient | null = null;

export function getGarminClient(): GarminClient {
  if (!garminClientInstance) {
    garminClientInstance = new GarminClient(cfg().garmin);
  }
  return garminClientInstance;
}

export function resetGarminClient(): void {
  garminClientInstance = null;
}
