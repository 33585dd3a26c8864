import fs from 'node:fs';
import path from 'node:path';
import { IOError } from '../errors.js';
import { listSnapshots, readAddresses, vegaDir } from '../snapshots/storage.js';
import { formatCaptureTimestamp, type Clock } from '../utils/date.js';
import { logger } from '../utils/logger.js';

export function outputFilename(capturedAt: Date, count: number): string {
  return `addresses_${formatCaptureTimestamp(capturedAt)}_${count}.txt`;
}

/** Union of every address across final and partial snapshots, sorted ascending. */
export function collectAddresses(dataDir: string): string[] {
  const addresses = new Set<string>();
  const snapshots = listSnapshots(dataDir);
  for (const snapshot of snapshots) {
    for (const address of readAddresses(snapshot.path)) addresses.add(address);
  }
  logger.debug({ files: snapshots.length, unique: addresses.size }, 'Snapshots scanned');
  return [...addresses].sort();
}

/**
 * Writes the master address list and returns its path. The file is created
 * exclusively; an existing output with the same name is an error.
 */
export function mergeSnapshots(dataDir: string, clock: Clock): string {
  logger.info('Generating addresses file');
  const addresses = collectAddresses(dataDir);
  const outputPath = path.join(vegaDir(dataDir), outputFilename(clock.now(), addresses.length));

  try {
    fs.writeFileSync(outputPath, addresses.map((a) => `${a}\n`).join(''), {
      encoding: 'utf-8',
      flag: 'wx',
    });
  } catch (err) {
    throw new IOError(outputPath, err);
  }

  logger.info({ path: outputPath, addressCount: addresses.length }, 'Addresses file generated');
  return outputPath;
}
