/**
 * Activities API Endpoint
 *
 * GET /api/activities?months=6
 * Activities started within the last `months` months (1-24), newest first.
 */

import { NextRequest, NextResponse } from 'next/server';
import { getActivitiesSince } from '@/lib/db/queries';
import { monthsBefore } from '@/lib/dates';
import { errorResponse } from '@/lib/routeHelpers';

const DEFAULT_MONTHS = 6;
const MAX_MONTHS = 24;

export async function GET(request: NextRequest): Promise<NextResponse> {
  const raw = request.nextUrl.searchParams.get('months');
  const months = raw === null ? DEFAULT_MONTHS : Number(raw);

  if (!Number.isInteger(months) || months < 1 || months > MAX_MONTHS) {
    return NextResponse.json(
      { error: `months must be an integer between 1 and ${MAX_MONTHS}` },
      { status: 400 }
    );
  }

  try {
    const since = monthsBefore(new Date(), months);
    const activities = getActivitiesSince(since);
    return NextResponse.json({ since, count: activities.length, activities });
  } catch (error) {
    return errorResponse(error, 'activities');
  }
}
