/**
 * GET /api/sleep?start=YYYY-MM-DD&end=YYYY-MM-DD
 */

import { getSleepSummaries } from '@/lib/db/queries';
import { dateRangeRoute } from '@/lib/routeHelpers';

export const GET = dateRangeRoute('sleep summaries', getSleepSummaries);
