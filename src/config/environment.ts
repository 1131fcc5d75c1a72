/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * FOR DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() / getNumber() / getList() for values with sensible defaults
 * - Command-line arguments override these values in cli.ts
 * =============================================================================
 */

import dotenv from 'dotenv';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a comma-separated list, dropping blanks
 */
function getList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

export const config = {
  nodeEnv,

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'info'),

  // Ride log input
  rides: {
    file: getOptional('RIDES_FILE', 'UberDataset.csv'),
    // Rows whose START or STOP matches one of these are dropped before analysis
    excludedLocations: getList('EXCLUDED_LOCATIONS', ['Unknown Location']),
    columns: {
      category: getOptional('CSV_CATEGORY_COLUMN', 'CATEGORY'),
      origin: getOptional('CSV_ORIGIN_COLUMN', 'START'),
      destination: getOptional('CSV_DESTINATION_COLUMN', 'STOP'),
    },
  },

  // Analytics
  analytics: {
    topRoutesLimit: getNumber('TOP_ROUTES_LIMIT', 5),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is wrong
 */
function validateConfig(): void {
  const errors: string[] = [];

  if (config.analytics.topRoutesLimit < 0) {
    errors.push('TOP_ROUTES_LIMIT must be zero or a positive integer');
  }

  const { category, origin, destination } = config.rides.columns;
  if (new Set([category, origin, destination]).size !== 3) {
    errors.push('CSV_CATEGORY_COLUMN, CSV_ORIGIN_COLUMN and CSV_DESTINATION_COLUMN must be distinct');
  }

  if (!['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(config.logLevel)) {
    errors.push(`LOG_LEVEL "${config.logLevel}" is not a winston level`);
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
