import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  InvariantViolationError,
  MissingDirectoryError,
  StaleDataError,
} from '../../src/errors.js';
import { resolveFetchWindow, resolveNextWindow } from '../../src/pipeline/window-resolver.js';
import { fixedClock, makeDataDir, removeDataDir, writeBorrowers } from '../helpers/data-dir.js';

const clock = fixedClock('2024-03-15T10:00:00Z');

describe('resolveFetchWindow', () => {
  it('should fetch the current month as partial when the previous month is final', () => {
    const window = resolveFetchWindow([{ year: 2024, month: 2 }], clock);

    expect(window).toEqual({
      month: { year: 2024, month: 3 },
      status: 'partial',
      dateFrom: '2024-03-01 00:00',
      dateTo: '2024-03-31 23:59',
      filename: '2024_03_raw_partial.txt',
      runAgain: false,
    });
  });

  it('should finalize the previous month and ask for another pass when two months behind', () => {
    const window = resolveFetchWindow([{ year: 2024, month: 1 }], clock);

    expect(window).toEqual({
      month: { year: 2024, month: 2 },
      status: 'final',
      dateFrom: '2024-02-01 00:00',
      dateTo: '2024-02-29 23:59',
      filename: '2024_02_raw.txt',
      runAgain: true,
    });
  });

  it('should use the latest of several final months', () => {
    const window = resolveFetchWindow(
      [
        { year: 2023, month: 11 },
        { year: 2024, month: 2 },
        { year: 2023, month: 12 },
      ],
      clock,
    );
    expect(window.status).toBe('partial');
    expect(window.month).toEqual({ year: 2024, month: 3 });
  });

  it('should handle a December final snapshot in January', () => {
    const window = resolveFetchWindow(
      [{ year: 2023, month: 12 }],
      fixedClock('2024-01-02T00:00:00Z'),
    );
    expect(window.filename).toBe('2024_01_raw_partial.txt');
    expect(window.dateTo).toBe('2024-01-31 23:59');
  });

  it('should finalize December when the latest final is November and it is January', () => {
    const window = resolveFetchWindow(
      [{ year: 2023, month: 11 }],
      fixedClock('2024-01-20T00:00:00Z'),
    );
    expect(window.filename).toBe('2023_12_raw.txt');
    expect(window.dateFrom).toBe('2023-12-01 00:00');
    expect(window.dateTo).toBe('2023-12-31 23:59');
    expect(window.runAgain).toBe(true);
  });

  it('should refuse to fill three or more missing months', () => {
    expect(() => resolveFetchWindow([{ year: 2023, month: 12 }], clock)).toThrow(StaleDataError);
    expect(() => resolveFetchWindow([{ year: 2022, month: 6 }], clock)).toThrow(StaleDataError);
  });

  it('should treat a final snapshot for the current or a future month as a defect', () => {
    expect(() => resolveFetchWindow([{ year: 2024, month: 3 }], clock)).toThrow(
      InvariantViolationError,
    );
    expect(() => resolveFetchWindow([{ year: 2024, month: 5 }], clock)).toThrow(
      InvariantViolationError,
    );
  });

  it('should fail without any final snapshot', () => {
    expect(() => resolveFetchWindow([], clock)).toThrow(ConfigurationError);
  });
});

describe('resolveNextWindow', () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = makeDataDir();
  });

  afterEach(() => {
    removeDataDir(dataDir);
  });

  it('should ignore partial snapshots when finding the latest final month', () => {
    writeBorrowers(dataDir, '2024_01_raw.txt', ['0xaa']);
    writeBorrowers(dataDir, '2024_02_raw_partial.txt', ['0xbb']);

    const window = resolveNextWindow(dataDir, clock);
    expect(window.filename).toBe('2024_02_raw.txt');
    expect(window.runAgain).toBe(true);
  });

  it('should fail when the snapshot directory does not exist', () => {
    removeDataDir(dataDir);
    expect(() => resolveNextWindow(dataDir, clock)).toThrow(MissingDirectoryError);
  });
});
