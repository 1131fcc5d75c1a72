/**
 * =============================================================================
 * RIDE SOURCES - Unit Tests
 * =============================================================================
 *
 * CSV parsing, file loading, in-memory validation and location filtering.
 * =============================================================================
 */

import path from 'path';
import { ErrorCode, TripCategory } from '../core/constants';
import { DataSourceError, ValidationError } from '../core/errors/AppError';
import {
  CsvRecordSource,
  InMemoryRecordSource,
  TripRecord,
  filterKnownLocations,
  parseRideCsv,
} from '../modules/rides';
import { logger } from '../shared/services/logger.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const FIXTURE = path.join(__dirname, 'fixtures', 'rides.csv');

const { BUSINESS, PERSONAL } = TripCategory;

beforeEach(() => {
  jest.clearAllMocks();
});

// =============================================================================
// parseRideCsv
// =============================================================================

describe('parseRideCsv', () => {
  it('reads category, start and stop by header name', () => {
    const csv = [
      'START_DATE,END_DATE,CATEGORY,START,STOP,MILES,PURPOSE',
      '01-01-2016 21:11,01-01-2016 21:17,Business,Apex,Cary,5.1,Meal/Entertain',
    ].join('\n');

    expect(parseRideCsv(csv)).toEqual({
      records: [{ origin: 'Apex', destination: 'Cary', category: BUSINESS }],
      totalRows: 1,
      skippedRows: 0,
    });
  });

  it('treats any category other than Business as personal', () => {
    const csv = ['CATEGORY,START,STOP', 'Personal,A,B', 'Leisure,B,C', 'business,C,D', ' Business ,D,E'].join('\n');

    expect(parseRideCsv(csv).records.map(r => r.category)).toEqual([PERSONAL, PERSONAL, PERSONAL, BUSINESS]);
  });

  it('trims location names', () => {
    const csv = ['CATEGORY,START,STOP', 'Business,  Apex , Cary  '].join('\n');
    expect(parseRideCsv(csv).records).toEqual([{ origin: 'Apex', destination: 'Cary', category: BUSINESS }]);
  });

  it('keeps quoted names containing commas', () => {
    const csv = ['CATEGORY,START,STOP', 'Personal,"Raleigh, Downtown",Cary'].join('\n');
    expect(parseRideCsv(csv).records[0].origin).toBe('Raleigh, Downtown');
  });

  it('skips rows that stop before the stop column', () => {
    const csv = ['CATEGORY,START,STOP', 'Business,Apex', 'Business,Apex,Cary'].join('\n');

    expect(parseRideCsv(csv)).toMatchObject({ totalRows: 2, skippedRows: 1 });
    expect(parseRideCsv(csv).records).toHaveLength(1);
  });

  it('honours custom column names', () => {
    const csv = ['kind,from,to', 'Business,Apex,Cary'].join('\n');
    const columns = { category: 'kind', origin: 'from', destination: 'to' };

    expect(parseRideCsv(csv, columns).records).toEqual([{ origin: 'Apex', destination: 'Cary', category: BUSINESS }]);
  });

  it('strips a byte order mark before the header', () => {
    const csv = '\uFEFFCATEGORY,START,STOP\nPersonal,A,B';
    expect(parseRideCsv(csv).records).toHaveLength(1);
  });

  it('returns nothing for a header-only file', () => {
    expect(parseRideCsv('CATEGORY,START,STOP\n')).toEqual({ records: [], totalRows: 0, skippedRows: 0 });
  });
});

// =============================================================================
// CsvRecordSource
// =============================================================================

describe('CsvRecordSource', () => {
  it('loads every complete row of the ride log', async () => {
    const records = await new CsvRecordSource(FIXTURE).loadRecords();

    expect(records).toHaveLength(7);
    expect(records[0]).toEqual({ origin: 'Alder', destination: 'Birch', category: BUSINESS });
    expect(records[5]).toEqual({ origin: 'Dogwood, North', destination: 'Alder', category: BUSINESS });
    expect(records[6]).toEqual({ origin: '', destination: '', category: PERSONAL });
  });

  it('warns about skipped rows', async () => {
    await new CsvRecordSource(FIXTURE).loadRecords();

    expect(logger.warn).toHaveBeenCalledWith('Skipped 1 of 8 rows without CATEGORY/START/STOP');
  });

  it('rejects with DATA_SOURCE_NOT_FOUND for a missing file', async () => {
    const source = new CsvRecordSource(path.join(__dirname, 'fixtures', 'missing.csv'));

    await expect(source.loadRecords()).rejects.toBeInstanceOf(DataSourceError);
    await expect(source.loadRecords()).rejects.toMatchObject({
      code: ErrorCode.DATA_SOURCE_NOT_FOUND,
      isOperational: true,
    });
  });

  it('rejects with DATA_SOURCE_ERROR when the path is a directory', async () => {
    await expect(new CsvRecordSource(__dirname).loadRecords()).rejects.toMatchObject({
      code: ErrorCode.DATA_SOURCE_ERROR,
      details: { filePath: __dirname, cause: expect.stringContaining('EISDIR') },
    });
  });

  it('describes itself by file path', () => {
    expect(new CsvRecordSource('rides.csv').description).toBe('CSV file rides.csv');
  });
});

// =============================================================================
// InMemoryRecordSource
// =============================================================================

describe('InMemoryRecordSource', () => {
  const rides: TripRecord[] = [
    { origin: 'A', destination: 'B', category: PERSONAL },
    { origin: 'B', destination: 'C', category: BUSINESS },
  ];

  it('returns the records it was given', async () => {
    await expect(new InMemoryRecordSource(rides).loadRecords()).resolves.toEqual(rides);
  });

  it('hands out a copy each time', async () => {
    const source = new InMemoryRecordSource(rides);
    const first = await source.loadRecords();
    first.pop();

    await expect(source.loadRecords()).resolves.toHaveLength(2);
  });

  it('rejects an unknown category', () => {
    const input: TripRecord[] = JSON.parse('[{"origin":"A","destination":"B","category":"Leisure"}]');

    expect(() => new InMemoryRecordSource(input)).toThrow(ValidationError);
    try {
      new InMemoryRecordSource(input);
    } catch (error) {
      expect(error).toMatchObject({
        code: ErrorCode.VALIDATION_RECORD_INVALID,
        errors: [{ field: '0.category', message: 'Category must be Business or Personal' }],
      });
    }
  });
});

// =============================================================================
// filterKnownLocations
// =============================================================================

describe('filterKnownLocations', () => {
  const rides: TripRecord[] = [
    { origin: 'A', destination: 'B', category: PERSONAL },
    { origin: '', destination: 'B', category: PERSONAL },
    { origin: 'A', destination: '   ', category: BUSINESS },
    { origin: 'Unknown Location', destination: 'B', category: BUSINESS },
    { origin: 'A', destination: 'Unknown Location', category: PERSONAL },
    { origin: 'B', destination: 'C', category: BUSINESS },
  ];

  it('drops empty and unknown endpoints by default', () => {
    expect(filterKnownLocations(rides)).toEqual([rides[0], rides[5]]);
  });

  it('uses the given exclusion list instead of the default', () => {
    expect(filterKnownLocations(rides, ['C'])).toEqual([rides[0], rides[3], rides[4]]);
  });

  it('leaves the input untouched', () => {
    filterKnownLocations(rides);
    expect(rides).toHaveLength(6);
  });
});
