/**
 * =============================================================================
 * RIDES MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * A ride log is a sequence of trip records. Each record is one ride:
 *
 *   { origin: 'Cary', destination: 'Morrisville', category: 'Business' }
 *
 * Several records may share the same origin/destination pair; every one of
 * them is kept (the graph counts parallel edges, the aggregator counts trips).
 * =============================================================================
 */

import { z } from 'zod';
import { TripCategory } from '../../core/constants';

// =============================================================================
// TRIP RECORD
// =============================================================================

export const tripRecordSchema = z.object({
  origin: z.string({ required_error: 'Origin is required' }),
  destination: z.string({ required_error: 'Destination is required' }),
  category: z.nativeEnum(TripCategory, {
    errorMap: () => ({ message: 'Category must be Business or Personal' })
  }),
});

export const tripRecordListSchema = z.array(tripRecordSchema);

export type TripRecord = Readonly<z.infer<typeof tripRecordSchema>>;

// =============================================================================
// CSV INPUT
// =============================================================================

/**
 * Header names of the three columns the analysis reads.
 * Defaults match the public ride-log layout:
 * START_DATE,END_DATE,CATEGORY,START,STOP,MILES,PURPOSE
 */
export interface CsvColumns {
  category: string;
  origin: string;
  destination: string;
}

/**
 * The three cells the analysis reads from one CSV row, already picked out by
 * column name. Any category other than "Business" counts as a personal trip.
 */
export const csvRideRowSchema = z
  .object({
    category: z.string(),
    origin: z.string(),
    destination: z.string(),
  })
  .transform((row): TripRecord => ({
    origin: row.origin.trim(),
    destination: row.destination.trim(),
    category: row.category.trim() === TripCategory.BUSINESS
      ? TripCategory.BUSINESS
      : TripCategory.PERSONAL,
  }));

/**
 * Outcome of parsing a CSV ride log
 */
export interface CsvParseSummary {
  records: TripRecord[];
  /** Data rows (header excluded) seen in the file */
  totalRows: number;
  /** Rows missing one of the required columns */
  skippedRows: number;
}
