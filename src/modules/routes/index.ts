/**
 * =============================================================================
 * ROUTES MODULE
 * =============================================================================
 *
 * Ride counting over trip records: most frequent direct routes and the
 * busiest location per trip category.
 * =============================================================================
 */

export * from './route-aggregator.service';
export * from './route.schema';
