/**
 * Jest setup for server-side (Node) tests
 * - Placeholder configuration so cfg() loads without a real .env.local
 * - Quiets informational logging; warnings and errors stay visible
 */

process.env.GARMIN_ACCESS_TOKEN = process.env.GARMIN_ACCESS_TOKEN || 'test-token';
process.env.GARMIN_DISPLAY_NAME = process.env.GARMIN_DISPLAY_NAME || 'test-athlete';
process.env.GARMIN_API_BASE = 'https://garmin.test';
delete process.env.HTTPS_PROXY;
delete process.env.HTTP_PROXY;

let logSpy: jest.SpyInstance | undefined;

beforeEach(() => {
  logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

afterEach(() => {
  logSpy?.mockRestore();
});
