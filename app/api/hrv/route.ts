/**
 * GET /api/hrv?start=YYYY-MM-DD&end=YYYY-MM-DD
 */

import { getHrvSummaries } from '@/lib/db/queries';
import { dateRangeRoute } from '@/lib/routeHelpers';

export const GET = dateRangeRoute('hrv summaries', getHrvSummaries);
