import {
  ConfigurationError,
  InvariantViolationError,
  StaleDataError,
} from '../errors.js';
import { listFinalMonths, snapshotFilename } from '../snapshots/storage.js';
import type { FetchWindow, SnapshotStatus } from '../types/snapshot.js';
import {
  addMonths,
  compareMonthKeys,
  daysInMonth,
  formatMonthKey,
  formatQueryDate,
  monthKeyOf,
  monthsBetween,
  type Clock,
  type MonthKey,
} from '../utils/date.js';

function windowFor(month: MonthKey, status: SnapshotStatus, runAgain: boolean): FetchWindow {
  return {
    month,
    status,
    dateFrom: formatQueryDate(month, 1, 0, 0),
    dateTo: formatQueryDate(month, daysInMonth(month), 23, 59),
    filename: snapshotFilename(month, status),
    runAgain,
  };
}

/**
 * Decides the next month to fetch from the finalized months on disk.
 *
 * One month behind: the previous month is final, so the current month is
 * fetched as a partial snapshot. Two months behind: the previous month is
 * fetched as final, and a second pass picks up the current month.
 * Anything further behind needs a manual backfill.
 */
export function resolveFetchWindow(finalMonths: readonly MonthKey[], clock: Clock): FetchWindow {
  const latest = finalMonths.reduce<MonthKey | null>(
    (max, m) => (max === null || compareMonthKeys(m, max) > 0 ? m : max),
    null,
  );
  if (!latest) {
    throw new ConfigurationError('No final borrower snapshots found; seed at least one month');
  }

  const current = monthKeyOf(clock.now());
  const monthsDiff = monthsBetween(latest, current);

  if (monthsDiff === 1) return windowFor(current, 'partial', false);
  if (monthsDiff === 2) return windowFor(addMonths(latest, 1), 'final', true);

  if (monthsDiff > 2) {
    throw new StaleDataError(
      `Latest final snapshot ${formatMonthKey(latest)} is ${monthsDiff} months behind ` +
        `${formatMonthKey(current)}; backfill the missing months manually`,
    );
  }
  throw new InvariantViolationError(
    `Latest final snapshot ${formatMonthKey(latest)} is not before the current month ` +
      `${formatMonthKey(current)}`,
  );
}

export function resolveNextWindow(dataDir: string, clock: Clock): FetchWindow {
  return resolveFetchWindow(listFinalMonths(dataDir), clock);
}
