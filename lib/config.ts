/**
 * Server-side configuration loader.
 *
 * Reads the environment once, validates every field and reports all
 * problems together. Scripts load `.env.local` through dotenv before the
 * first call.
 */

import { resolve } from 'path';

type ConfigError = {
  field: string;
  message: string;
};

/**
 * Get required environment variable or throw
 */
function mustEnv(key: string): string {
  const value = process.env[key];
  if (!value || value.trim() === '') {
    throw new Error(`REQUIRED environment variable ${key} is not set`);
  }
  return value.trim();
}

/**
 * Get optional environment variable
 */
function optEnv(key: string): string | undefined {
  const value = process.env[key];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Parse a non-negative integer variable, falling back when unset
 */
function intEnv(key: string, fallback: number): number {
  const raw = optEnv(key);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${key} must be a non-negative integer (got "${raw}")`);
  }
  return parseInt(raw, 10);
}

function boolEnv(key: string, fallback: boolean): boolean {
  const raw = optEnv(key);
  if (raw === undefined) return fallback;
  const lowered = raw.toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(lowered)) return true;
  if (['0', 'false', 'no', 'off'].includes(lowered)) return false;
  throw new Error(`${key} must be a boolean (got "${raw}")`);
}

export type GarminConfig = {
  accessToken: string;
  displayName: string;
  apiBase: string;
  requestTimeoutMs: number;
};

export type SyncConfig = {
  intervalMinutes: number;
  refetchYesterday: boolean;
  vendorDelayMinMs: number;
  vendorDelayMaxMs: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
};

export type DatabaseSettings = {
  dbPath: string;
  migrationsPath: string;
};

/**
 * Typed configuration object
 */
export type AppConfig = {
  garmin: GarminConfig;
  sync: SyncConfig;
  database: DatabaseSettings;
};

/**
 * Database location only. Read paths such as the API routes need the store
 * without holding vendor credentials.
 */
export function getDatabaseSettings(): DatabaseSettings {
  return {
    dbPath: optEnv('DB_PATH') ?? resolve(process.cwd(), '.data', 'metrics.db'),
    migrationsPath: optEnv('MIGRATIONS_PATH') ?? resolve(process.cwd(), 'migrations'),
  };
}

/**
 * Load and validate application configuration
 *
 * @throws {Error} If required environment variables are missing or invalid
 */
export function getConfig(): AppConfig {
  const errors: ConfigError[] = [];

  let garmin: GarminConfig | undefined;
  try {
    garmin = {
      accessToken: mustEnv('GARMIN_ACCESS_TOKEN'),
      displayName: mustEnv('GARMIN_DISPLAY_NAME'),
      apiBase: (optEnv('GARMIN_API_BASE') ?? 'https://connectapi.garmin.com').replace(/\/+$/, ''),
      requestTimeoutMs: intEnv('GARMIN_TIMEOUT_MS', 30000),
    };
    if (garmin.requestTimeoutMs < 1) {
      throw new Error('GARMIN_TIMEOUT_MS must be at least 1');
    }
  } catch (error) {
    if (error instanceof Error) {
      errors.push({ field: 'Garmin', message: error.message });
    }
  }

  let sync: SyncConfig | undefined;
  try {
    sync = {
      intervalMinutes: intEnv('SYNC_INTERVAL_MINUTES', 60),
      refetchYesterday: boolEnv('SYNC_REFETCH_YESTERDAY', true),
      vendorDelayMinMs: intEnv('VENDOR_DELAY_MIN_MS', 2000),
      vendorDelayMaxMs: intEnv('VENDOR_DELAY_MAX_MS', 5000),
      retryMaxAttempts: intEnv('RETRY_MAX_ATTEMPTS', 3),
      retryBaseDelayMs: intEnv('RETRY_BASE_DELAY_MS', 1000),
      retryMaxDelayMs: intEnv('RETRY_MAX_DELAY_MS', 30000),
    };
    if (sync.intervalMinutes < 1) {
      throw new Error('SYNC_INTERVAL_MINUTES must be at least 1');
    }
    if (sync.retryMaxAttempts < 1) {
      throw new Error('RETRY_MAX_ATTEMPTS must be at least 1');
    }
    if (sync.vendorDelayMaxMs < sync.vendorDelayMinMs) {
      throw new Error('VENDOR_DELAY_MAX_MS must not be lower than VENDOR_DELAY_MIN_MS');
    }
  } catch (error) {
    if (error instanceof Error) {
      errors.push({ field: 'Sync', message: error.message });
    }
  }

  // If there are any validation errors, throw with all details
  if (errors.length > 0 || !garmin || !sync) {
    const errorMessages = errors.map(e => `  - ${e.field}: ${e.message}`).join('\n');
    throw new Error(
      `Configuration validation failed:\n${errorMessages}\n\n` +
      `Please check your .env.local file or environment variables.`
    );
  }

  return {
    garmin,
    sync,
    database: getDatabaseSettings(),
  };
}

/**
 * Cached configuration instance
 */
let cachedConfig: AppConfig | null = null;

export function cfg(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = getConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached configuration (primarily for testing)
 */
export function resetConfigCache(): void {
  cachedConfig = null;
}
