#!/usr/bin/env node
/**
 * =============================================================================
 * RIDE GRAPH ANALYTICS - COMMAND LINE ENTRY POINT
 * =============================================================================
 *
 * USAGE:
 *   ride-graph [ridesFile] [topRoutes]
 *
 *   ridesFile   CSV ride log (default: RIDES_FILE, then UberDataset.csv)
 *   topRoutes   How many direct routes to list (default: TOP_ROUTES_LIMIT, then 5)
 *
 * The report goes to stdout; logs go to stderr.
 *
 * EXIT CODES:
 *   0  report printed
 *   1  unexpected failure
 *   2  bad arguments, bad records or unreadable ride log
 * =============================================================================
 */

import { z } from 'zod';
import { config } from './config/environment';
import { EXIT_CODE, ErrorCode, ValidationError, isOperationalError } from './core';
import { formatReport, runAnalysis } from './modules/analytics';
import { CsvRecordSource } from './modules/rides';
import { logError, logger } from './shared/services/logger.service';

const cliArgsSchema = z.object({
  ridesFile: z.string().min(1, 'Rides file path cannot be empty').optional(),
  topRoutes: z
    .string()
    .trim()
    .min(1, 'Top routes cannot be blank')
    .pipe(
      z.coerce
        .number({ invalid_type_error: 'Top routes must be a number' })
        .int('Top routes must be a whole number')
        .min(0, 'Top routes cannot be negative')
    )
    .optional(),
});

export interface CliArgs {
  ridesFile: string;
  topRoutes: number;
}

/**
 * Positional arguments override the environment configuration.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  if (argv.length > 2) {
    throw new ValidationError(
      'Too many arguments',
      [{ field: 'argv', message: 'Usage: ride-graph [ridesFile] [topRoutes]' }],
      ErrorCode.VALIDATION_OPTIONS_INVALID
    );
  }

  const result = cliArgsSchema.safeParse({ ridesFile: argv[0], topRoutes: argv[1] });
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Invalid arguments', ErrorCode.VALIDATION_OPTIONS_INVALID);
  }

  const { ridesFile, topRoutes } = result.data;
  return {
    ridesFile: ridesFile ?? config.rides.file,
    topRoutes: topRoutes ?? config.analytics.topRoutesLimit,
  };
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const source = new CsvRecordSource(args.ridesFile, config.rides.columns);

  const report = await runAnalysis(source, {
    topRoutes: args.topRoutes,
    excludedLocations: [...config.rides.excludedLocations],
  });

  process.stdout.write(`${formatReport(report).join('\n')}\n`);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logError('Ride analysis failed', error);
    process.exit(isOperationalError(error) ? EXIT_CODE.INVALID_INPUT : EXIT_CODE.FAILURE);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason });
    process.exit(EXIT_CODE.FAILURE);
  });
}
