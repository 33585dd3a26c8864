import { DEFAULT_MAX_FETCH_ITERATIONS } from '../config.js';
import { UnexpectedResponseError } from '../errors.js';
import { saveSnapshot } from '../snapshots/storage.js';
import type { QueryClient, QueryRow } from '../types/query.js';
import type { SnapshotWrite } from '../types/snapshot.js';
import { formatMonthKey, type Clock } from '../utils/date.js';
import { logger } from '../utils/logger.js';
import { resolveNextWindow } from './window-resolver.js';

export interface FetchLoopOptions {
  dataDir: string;
  client: QueryClient;
  clock: Clock;
  addressColumn: string;
  maxIterations?: number;
}

/** Splits the single delimited address field of a query row. */
export function extractAddresses(rows: QueryRow[], column: string): string[] {
  if (rows.length !== 1) {
    throw new UnexpectedResponseError(`Expected exactly one result row, got ${rows.length}`);
  }
  const value = rows[0]?.[column];
  if (typeof value !== 'string') {
    throw new UnexpectedResponseError(`Result row has no string column "${column}"`);
  }
  return value
    .split(',')
    .map((a) => a.trim())
    .filter((a) => a.length > 0);
}

/**
 * Fetches snapshots until the resolver is satisfied or the iteration budget
 * runs out. Each iteration re-resolves from disk, so a final snapshot written
 * by the first pass moves the second pass on to the current month.
 */
export async function runFetchLoop(options: FetchLoopOptions): Promise<SnapshotWrite[]> {
  const { dataDir, client, clock, addressColumn } = options;
  let budget = options.maxIterations ?? DEFAULT_MAX_FETCH_ITERATIONS;
  const written: SnapshotWrite[] = [];

  let runAgain = true;
  while (runAgain && budget > 0) {
    const window = resolveNextWindow(dataDir, clock);
    const log = logger.child({ month: formatMonthKey(window.month), status: window.status });
    log.info({ dateFrom: window.dateFrom, dateTo: window.dateTo }, 'Fetching borrower addresses');

    const rows = await client.runQuery({ date_from: window.dateFrom, date_to: window.dateTo });
    const addresses = extractAddresses(rows, addressColumn);

    written.push(
      saveSnapshot(dataDir, { month: window.month, status: window.status, addresses }),
    );

    budget -= 1;
    runAgain = window.runAgain;
  }

  if (runAgain) {
    logger.warn({ iterations: written.length }, 'Fetch iteration budget exhausted before catching up');
  }

  return written;
}
