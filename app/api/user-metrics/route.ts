/**
 * GET /api/user-metrics
 *
 * Latest lactate threshold and VO2 max values.
 */

import { NextResponse } from 'next/server';
import { getLatestUserMetrics } from '@/lib/db/queries';
import { errorResponse } from '@/lib/routeHelpers';

export async function GET(): Promise<NextResponse> {
  try {
    const metrics = getLatestUserMetrics();
    if (!metrics) {
      return NextResponse.json({ error: 'No user metrics recorded yet' }, { status: 404 });
    }
    return NextResponse.json(metrics);
  } catch (error) {
    return errorResponse(error, 'user metrics');
  }
}
