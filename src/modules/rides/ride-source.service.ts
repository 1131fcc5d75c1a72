/**
 * =============================================================================
 * RIDE SOURCE SERVICE - Where trip records come from
 * =============================================================================
 *
 * The analytics core never opens files. It receives a RecordSource and asks
 * it for records; the CLI picks the implementation:
 *
 * - CsvRecordSource       reads a ride log from disk (papaparse)
 * - InMemoryRecordSource  wraps records already in memory (tests, embedding)
 *
 * filterKnownLocations() drops rides whose endpoints were not captured.
 * =============================================================================
 */

import { promises as fs } from 'fs';
import Papa from 'papaparse';
import { ANALYTICS_DEFAULTS, ErrorCode } from '../../core/constants';
import { DataSourceError, ValidationError } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import {
  CsvColumns,
  CsvParseSummary,
  TripRecord,
  csvRideRowSchema,
  tripRecordListSchema,
} from './ride.schema';

export const DEFAULT_CSV_COLUMNS: CsvColumns = {
  category: 'CATEGORY',
  origin: 'START',
  destination: 'STOP',
};

// =============================================================================
// RECORD SOURCE CONTRACT
// =============================================================================

export interface RecordSource {
  /** Human-readable origin of the records, used in logs */
  readonly description: string;
  loadRecords(): Promise<TripRecord[]>;
}

// =============================================================================
// IN-MEMORY SOURCE
// =============================================================================

export class InMemoryRecordSource implements RecordSource {
  readonly description = 'in-memory ride list';
  private readonly records: readonly TripRecord[];

  constructor(records: readonly TripRecord[]) {
    const result = tripRecordListSchema.safeParse(records);
    if (!result.success) {
      throw ValidationError.fromZodError(
        result.error,
        'Invalid trip records',
        ErrorCode.VALIDATION_RECORD_INVALID
      );
    }
    this.records = Object.freeze(result.data.map(record => Object.freeze({ ...record })));
  }

  async loadRecords(): Promise<TripRecord[]> {
    return [...this.records];
  }
}

// =============================================================================
// CSV SOURCE
// =============================================================================

/**
 * Parse ride-log CSV text. The first line is the header.
 * Rows that lack one of the three required columns are skipped and counted.
 */
export function parseRideCsv(text: string, columns: CsvColumns = DEFAULT_CSV_COLUMNS): CsvParseSummary {
  const parsed = Papa.parse<Record<string, string | undefined>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    skipEmptyLines: true,
    transformHeader: header => header.trim(),
  });

  const records: TripRecord[] = [];
  let skippedRows = 0;

  for (const row of parsed.data) {
    const result = csvRideRowSchema.safeParse({
      category: row[columns.category],
      origin: row[columns.origin],
      destination: row[columns.destination],
    });
    if (result.success) {
      records.push(result.data);
    } else {
      skippedRows++;
    }
  }

  return { records, totalRows: parsed.data.length, skippedRows };
}

// Node system errors carry a string `code` (ENOENT, EISDIR, ...)
function errorCodeOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessageOf(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

export class CsvRecordSource implements RecordSource {
  readonly description: string;

  constructor(
    private readonly filePath: string,
    private readonly columns: CsvColumns = DEFAULT_CSV_COLUMNS
  ) {
    this.description = `CSV file ${filePath}`;
  }

  async loadRecords(): Promise<TripRecord[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error: unknown) {
      if (errorCodeOf(error) === 'ENOENT') {
        throw new DataSourceError(
          `Ride log not found: ${this.filePath}`,
          ErrorCode.DATA_SOURCE_NOT_FOUND,
          { filePath: this.filePath }
        );
      }
      throw new DataSourceError(
        `Could not read ride log: ${this.filePath}`,
        ErrorCode.DATA_SOURCE_ERROR,
        { filePath: this.filePath, cause: errorMessageOf(error) }
      );
    }

    const { records, totalRows, skippedRows } = parseRideCsv(text, this.columns);
    if (skippedRows > 0) {
      logger.warn(`Skipped ${skippedRows} of ${totalRows} rows without ${this.columns.category}/${this.columns.origin}/${this.columns.destination}`);
    }
    logger.debug(`Read ${records.length} rides from ${this.filePath}`);
    return records;
  }
}

// =============================================================================
// FILTERING
// =============================================================================

/**
 * Drop rides with an empty endpoint or one of the excluded placeholder names.
 */
export function filterKnownLocations(
  records: readonly TripRecord[],
  excludedLocations: readonly string[] = [ANALYTICS_DEFAULTS.UNKNOWN_LOCATION]
): TripRecord[] {
  const excluded = new Set(excludedLocations);
  const isKnown = (location: string) => location.trim() !== '' && !excluded.has(location);

  return records.filter(record => isKnown(record.origin) && isKnown(record.destination));
}
