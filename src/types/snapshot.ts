import type { MonthKey } from '../utils/date.js';

export type SnapshotStatus = 'final' | 'partial';

export interface SnapshotFile {
  month: MonthKey;
  status: SnapshotStatus;
  /** Absolute path to the snapshot on disk */
  path: string;
}

export interface FetchWindow {
  month: MonthKey;
  status: SnapshotStatus;
  /** YYYY-MM-DD HH:MM, first day of the month at 00:00 */
  dateFrom: string;
  /** YYYY-MM-DD HH:MM, last day of the month at 23:59 */
  dateTo: string;
  /** Snapshot filename, relative to the borrowers directory */
  filename: string;
  /** Another resolver pass is needed once this window is written */
  runAgain: boolean;
}

export interface SnapshotWrite {
  month: MonthKey;
  status: SnapshotStatus;
  path: string;
  addressCount: number;
}
