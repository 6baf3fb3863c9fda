/**
 * GET /api/daily?start=YYYY-MM-DD&end=YYYY-MM-DD
 *
 * Daily wellness summaries in the range, newest first.
 */

import { getDailySummaries } from '@/lib/db/queries';
import { dateRangeRoute } from '@/lib/routeHelpers';

export const GET = dateRangeRoute('daily summaries', getDailySummaries);
