/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 * Import from '../core/constants' in other modules.
 * =============================================================================
 */

// =============================================================================
// TRIP CATEGORY
// =============================================================================

/**
 * Trip categories recorded in the ride log
 */
export enum TripCategory {
  BUSINESS = 'Business',
  PERSONAL = 'Personal'
}

/**
 * Every category, in reporting order
 */
export const TRIP_CATEGORIES: readonly TripCategory[] = [
  TripCategory.PERSONAL,
  TripCategory.BUSINESS
];

// =============================================================================
// ANALYTICS DEFAULTS
// =============================================================================

export const ANALYTICS_DEFAULTS = {
  /** How many direct routes the report lists */
  TOP_ROUTES_LIMIT: 5,

  /** Placeholder the ride log uses when the location was not captured */
  UNKNOWN_LOCATION: 'Unknown Location',

  /** Hub name reported for a category with no trips */
  EMPTY_HUB: '',
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Application error codes
 */
export enum ErrorCode {
  // =============================================================================
  // VALIDATION ERRORS (2xxx)
  // =============================================================================
  VALIDATION_ERROR = 'VAL_2001',
  VALIDATION_RECORD_INVALID = 'VAL_2002',
  VALIDATION_OPTIONS_INVALID = 'VAL_2003',

  // =============================================================================
  // GRAPH (3xxx)
  // =============================================================================
  INDEX_OUT_OF_RANGE = 'GRAPH_3001',

  // =============================================================================
  // DATA SOURCE (4xxx)
  // =============================================================================
  DATA_SOURCE_ERROR = 'DATA_4001',
  DATA_SOURCE_NOT_FOUND = 'DATA_4002',

  // =============================================================================
  // SYSTEM (9xxx)
  // =============================================================================
  INTERNAL_ERROR = 'SYS_9001'
}

/**
 * Failure exit codes used by the CLI; success leaves the default 0
 */
export const EXIT_CODE = {
  FAILURE: 1,
  INVALID_INPUT: 2,
} as const;
