/**
 * Shared pieces of the read-only API routes.
 */

import { NextResponse } from 'next/server';
import { InvalidRangeError, errorMessage } from '@/lib/errors';
import { daysBefore, parseIsoDate, todayIso } from '@/lib/dates';
import type { DateRange } from '@/lib/db/types';

export const DEFAULT_RANGE_DAYS = 30;

/**
 * Read `start`/`end` query parameters. Missing values default to the last
 * thirty days ending today.
 *
 * @throws {InvalidRangeError}
 */
export function readDateRange(params: URLSearchParams, now: Date = new Date()): DateRange {
  const end = params.get('end') ?? todayIso(now);
  const start = params.get('start') ?? daysBefore(now, DEFAULT_RANGE_DAYS - 1);

  const startDate = parseIsoDate(start);
  const endDate = parseIsoDate(end);
  if (!startDate || !endDate) {
    throw new InvalidRangeError('Invalid date format. Expected YYYY-MM-DD.');
  }
  if (endDate.getTime() < startDate.getTime()) {
    throw new InvalidRangeError(`End date ${end} is before start date ${start}`);
  }
  return { start, end };
}

export function errorResponse(error: unknown, context: string): NextResponse<{ error: string }> {
  if (error instanceof InvalidRangeError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }
  console.error(`[api] ${context} failed:`, error);
  return NextResponse.json({ error: errorMessage(error) }, { status: 500 });
}

/**
 * GET handler returning `{ range, records }` for a date-keyed table
 */
export function dateRangeRoute<Row>(label: string, reader: (range: DateRange) => Row[]) {
  return async function GET(request: Request): Promise<NextResponse> {
    try {
      const range = readDateRange(new URL(request.url).searchParams);
      const records = reader(range);
      return NextResponse.json({ range, records });
    } catch (error) {
      return errorResponse(error, label);
    }
  };
}
