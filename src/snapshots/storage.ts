import fs from 'node:fs';
import path from 'node:path';
import { IOError, MissingDirectoryError } from '../errors.js';
import type { SnapshotFile, SnapshotStatus, SnapshotWrite } from '../types/snapshot.js';
import { compareMonthKeys, formatMonthKey, parseMonthKey, type MonthKey } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const SNAPSHOT_PATTERN = /^(\d{4}_\d{2})_raw(_partial)?\.txt$/;

export function vegaDir(dataDir: string): string {
  return path.join(dataDir, 'vega');
}

export function borrowersDir(dataDir: string): string {
  return path.join(vegaDir(dataDir), 'borrowers');
}

export function snapshotFilename(month: MonthKey, status: SnapshotStatus): string {
  const suffix = status === 'partial' ? '_raw_partial' : '_raw';
  return `${formatMonthKey(month)}${suffix}.txt`;
}

/** Reverse of {@link snapshotFilename}; null for files that are not snapshots. */
export function parseSnapshotFilename(
  filename: string,
): { month: MonthKey; status: SnapshotStatus } | null {
  const match = SNAPSHOT_PATTERN.exec(filename);
  if (!match?.[1]) return null;
  const month = parseMonthKey(match[1]);
  if (!month) return null;
  return { month, status: match[2] ? 'partial' : 'final' };
}

/**
 * Lists every final and partial snapshot in the borrowers directory,
 * ordered by month, final before partial.
 */
export function listSnapshots(dataDir: string): SnapshotFile[] {
  const dir = borrowersDir(dataDir);
  if (!fs.existsSync(dir)) throw new MissingDirectoryError(dir);

  let entries: string[];
  try {
    entries = fs.readdirSync(dir);
  } catch (err) {
    throw new IOError(dir, err);
  }

  const snapshots: SnapshotFile[] = [];
  for (const entry of entries) {
    const parsed = parseSnapshotFilename(entry);
    if (!parsed) continue;
    snapshots.push({ ...parsed, path: path.join(dir, entry) });
  }

  return snapshots.sort(
    (a, b) =>
      compareMonthKeys(a.month, b.month) ||
      Number(a.status === 'partial') - Number(b.status === 'partial'),
  );
}

export function listFinalMonths(dataDir: string): MonthKey[] {
  return listSnapshots(dataDir)
    .filter((s) => s.status === 'final')
    .map((s) => s.month);
}

/** Trimmed, non-empty lines of a snapshot file. */
export function readAddresses(filePath: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new IOError(filePath, err);
  }
  return content
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Writes one month's addresses. A final snapshot supersedes the month's
 * partial one, which is removed once the final file is on disk.
 */
export function saveSnapshot(
  dataDir: string,
  snapshot: { month: MonthKey; status: SnapshotStatus; addresses: string[] },
): SnapshotWrite {
  const dir = borrowersDir(dataDir);
  if (!fs.existsSync(dir)) throw new MissingDirectoryError(dir);

  const filePath = path.join(dir, snapshotFilename(snapshot.month, snapshot.status));
  const body = snapshot.addresses.map((a) => `${a}\n`).join('');

  try {
    fs.writeFileSync(filePath, body, 'utf-8');
  } catch (err) {
    throw new IOError(filePath, err);
  }

  const log = logger.child({ month: formatMonthKey(snapshot.month), status: snapshot.status });
  log.info({ path: filePath, addressCount: snapshot.addresses.length }, 'Snapshot saved');

  if (snapshot.status === 'final') {
    const partialPath = path.join(dir, snapshotFilename(snapshot.month, 'partial'));
    if (fs.existsSync(partialPath)) {
      try {
        fs.rmSync(partialPath);
      } catch (err) {
        throw new IOError(partialPath, err);
      }
      log.info({ path: partialPath }, 'Superseded partial snapshot removed');
    }
  }

  return {
    month: snapshot.month,
    status: snapshot.status,
    path: filePath,
    addressCount: snapshot.addresses.length,
  };
}
