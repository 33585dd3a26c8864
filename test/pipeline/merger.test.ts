import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { IOError, MissingDirectoryError } from '../../src/errors.js';
import { collectAddresses, mergeSnapshots, outputFilename } from '../../src/pipeline/merger.js';
import { fixedClock, makeDataDir, removeDataDir, writeBorrowers } from '../helpers/data-dir.js';

const clock = fixedClock('2024-03-15T10:20:30Z');

describe('outputFilename', () => {
  it('should carry the capture timestamp and count', () => {
    expect(outputFilename(new Date('2024-03-15T10:20:30Z'), 3)).toBe(
      'addresses_20240315102030_3.txt',
    );
  });
});

describe('mergeSnapshots', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = makeDataDir();
  });

  afterEach(() => {
    removeDataDir(dataDir);
  });

  it('should union final and partial snapshots into one sorted file', () => {
    writeBorrowers(dataDir, '2024_01_raw.txt', ['A', 'B']);
    writeBorrowers(dataDir, '2024_02_raw_partial.txt', ['B', 'C']);

    const output = mergeSnapshots(dataDir, clock);

    expect(output).toBe(path.join(dataDir, 'vega', 'addresses_20240315102030_3.txt'));
    expect(fs.readFileSync(output, 'utf-8')).toBe('A\nB\nC\n');
  });

  it('should trim lines and drop blanks before deduplicating', () => {
    writeBorrowers(dataDir, '2023_12_raw.txt', ['0xbb ', '', ' 0xaa']);
    writeBorrowers(dataDir, '2024_01_raw.txt', ['0xaa', '   ', '0xcc']);

    expect(collectAddresses(dataDir)).toEqual(['0xaa', '0xbb', '0xcc']);
  });

  it('should sort by code unit, not locale', () => {
    writeBorrowers(dataDir, '2024_01_raw.txt', ['b', 'B', 'a', 'A']);

    expect(collectAddresses(dataDir)).toEqual(['A', 'B', 'a', 'b']);
  });

  it('should ignore files that are not snapshots', () => {
    writeBorrowers(dataDir, '2024_01_raw.txt', ['0xaa']);
    writeBorrowers(dataDir, 'scratch.txt', ['0xff']);

    expect(collectAddresses(dataDir)).toEqual(['0xaa']);
  });

  it('should produce identical content for identical inputs', () => {
    writeBorrowers(dataDir, '2024_01_raw.txt', ['0xcc', '0xaa']);
    writeBorrowers(dataDir, '2024_02_raw_partial.txt', ['0xbb', '0xaa']);

    const first = mergeSnapshots(dataDir, clock);
    const second = mergeSnapshots(dataDir, fixedClock('2024-03-15T10:20:31Z'));

    expect(path.basename(second)).toBe('addresses_20240315102031_3.txt');
    expect(fs.readFileSync(second, 'utf-8')).toBe(fs.readFileSync(first, 'utf-8'));
  });

  it('should write an empty list when there are no snapshots', () => {
    const output = mergeSnapshots(dataDir, clock);

    expect(path.basename(output)).toBe('addresses_20240315102030_0.txt');
    expect(fs.readFileSync(output, 'utf-8')).toBe('');
  });

  it('should never overwrite an existing output file', () => {
    writeBorrowers(dataDir, '2024_01_raw.txt', ['0xaa']);
    const existing = path.join(dataDir, 'vega', 'addresses_20240315102030_1.txt');
    fs.writeFileSync(existing, 'keep\n');

    expect(() => mergeSnapshots(dataDir, clock)).toThrow(IOError);
    expect(fs.readFileSync(existing, 'utf-8')).toBe('keep\n');
  });

  it('should fail on an unreadable snapshot without writing a partial list', () => {
    writeBorrowers(dataDir, '2023_12_raw.txt', ['0xaa']);
    fs.mkdirSync(path.join(dataDir, 'vega', 'borrowers', '2024_01_raw.txt'));

    const error = (() => {
      try {
        mergeSnapshots(dataDir, clock);
        return null;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(IOError);
    expect(error).toMatchObject({ cause: expect.any(Error) });
    expect(fs.readdirSync(path.join(dataDir, 'vega'))).toEqual(['borrowers']);
  });

  it('should fail when the snapshot directory is missing', () => {
    removeDataDir(dataDir);
    expect(() => mergeSnapshots(dataDir, clock)).toThrow(MissingDirectoryError);
  });
});
