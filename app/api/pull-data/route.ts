/**
 * Data Pull API Route
 *
 * POST /api/pull-data
 * Body: { targetDate?: 'YYYY-MM-DD' } // Defaults to today
 *
 * Runs one ingest for the date and returns what was stored, what the
 * vendor had no data for, and per-category failures.
 */

import { NextRequest, NextResponse } from 'next/server';
import { AuthError, errorMessage } from '@/lib/errors';
import { isIsoDate, todayIso } from '@/lib/dates';
import { ingestDate, type DateIngestResult } from '@/lib/ingest';
import { createIngestDeps } from '@/lib/pipeline';

interface PullDataResponse {
  success: boolean;
  result: DateIngestResult | null;
  errors: string[];
}

/**
 * undefined when absent, null when present but not a string
 */
function readTargetDate(body: unknown): string | null | undefined {
  if (typeof body !== 'object' || body === null || !('targetDate' in body)) return undefined;
  const { targetDate } = body;
  if (targetDate === undefined || targetDate === null) return undefined;
  return typeof targetDate === 'string' ? targetDate : null;
}

export async function POST(request: NextRequest): Promise<NextResponse<PullDataResponse>> {
  const body: unknown = await request.json().catch(() => ({}));
  const targetDate = readTargetDate(body);
  const date = targetDate === undefined ? todayIso() : targetDate;

  if (date === null || !isIsoDate(date)) {
    return NextResponse.json(
      { success: false, result: null, errors: ['Invalid date format. Expected YYYY-MM-DD.'] },
      { status: 400 }
    );
  }

  try {
    const result = await ingestDate(date, createIngestDeps());
    const errors = result.failures.map((f) => `${f.category}: ${f.message}`);
    return NextResponse.json({ success: errors.length === 0, result, errors });
  } catch (error) {
    if (error instanceof AuthError) {
      return NextResponse.json(
        { success: false, result: null, errors: [`Garmin authentication: ${error.message}`] },
        { status: 401 }
      );
    }
    console.error('[pull-data] Unexpected error:', error);
    return NextResponse.json(
      { success: false, result: null, errors: [errorMessage(error)] },
      { status: 500 }
    );
  }
}
