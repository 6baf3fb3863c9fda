/**
 * Historical backfill over an inclusive date range.
 *
 * Dates run strictly in ascending order, one at a time, with a pause
 * between vendor calls. A failing date is reported and the run moves on;
 * rejected credentials stop the run.
 */

import { AuthError, InvalidRangeError, errorMessage } from '@/lib/errors';
import { eachDateInRange, parseIsoDate } from '@/lib/dates';
import { ingestDate, type IngestDeps, type IngestFailure } from '@/lib/ingest';

export interface BackfillRange {
  start: string;
  end: string;
}

export interface BackfillReport {
  start: string;
  end: string;
  processedDates: string[];
  failedDates: string[];
  failures: IngestFailure[];
  /** Set when the run stopped early on rejected credentials */
  aborted: { reason: string; remainingDates: string[] } | null;
}

/**
 * Validate the range and expand it to dates, oldest first
 *
 * @throws {InvalidRangeError} for unparsable dates or end before start
 */
export function backfillDates(range: BackfillRange): string[] {
  const start = parseIsoDate(range.start);
  if (!start) {
    throw new InvalidRangeError(`Invalid start date "${range.start}", expected YYYY-MM-DD`);
  }
  const end = parseIsoDate(range.end);
  if (!end) {
    throw new InvalidRangeError(`Invalid end date "${range.end}", expected YYYY-MM-DD`);
  }
  if (end.getTime() < start.getTime()) {
    throw new InvalidRangeError(`End date ${range.end} is before start date ${range.start}`);
  }
  return eachDateInRange(start, end);
}

export async function runBackfill(range: BackfillRange, deps: IngestDeps): Promise<BackfillReport> {
  const dates = backfillDates(range);
  const report: BackfillReport = {
    start: range.start,
    end: range.end,
    processedDates: [],
    failedDates: [],
    failures: [],
    aborted: null,
  };

  console.log(`[backfill] ${dates.length} date(s) from ${range.start} to ${range.end}`);

  for (const [index, date] of dates.entries()) {
    if (index > 0 && deps.pause) {
      await deps.pause();
    }

    try {
      const result = await ingestDate(date, deps);
      report.processedDates.push(date);
      if (result.failures.length > 0) {
        report.failedDates.push(date);
        report.failures.push(...result.failures);
      }
    } catch (error) {
      if (error instanceof AuthError) {
        report.failedDates.push(date);
        report.aborted = { reason: error.message, remainingDates: dates.slice(index) };
        console.error(`[backfill] Credentials rejected at ${date}, stopping: ${error.message}`);
        break;
      }
      // ingestDate isolates categories, so anything reaching here is unexpected
      report.failedDates.push(date);
      report.failures.push({
        date,
        category: 'date',
        kind: 'unexpected',
        message: errorMessage(error),
      });
      console.error(`[backfill] ${date} failed: ${errorMessage(error)}`);
    }
  }

  console.log(
    `[backfill] Done: ${report.processedDates.length} processed, ${report.failedDates.length} with failures`
  );
  return report;
}

/**
 * Human-readable summary lines for the CLI
 */
export function formatBackfillReport(report: BackfillReport): string[] {
  const lines = [
    `Backfill ${report.start} → ${report.end}: ${report.processedDates.length} date(s) processed`,
  ];
  if (report.failedDates.length === 0) {
    lines.push('No failures.');
  } else {
    lines.push(`Failed dates: ${report.failedDates.join(', ')}`);
    for (const failure of report.failures) {
      const ref = failure.reference ? ` ${failure.reference}` : '';
      lines.push(`  ${failure.date} ${failure.category}${ref} [${failure.kind}] ${failure.message}`);
    }
  }
  if (report.aborted) {
    lines.push(`Aborted: ${report.aborted.reason}`);
    lines.push(`Not processed: ${report.aborted.remainingDates.join(', ')}`);
  }
  return lines;
}
