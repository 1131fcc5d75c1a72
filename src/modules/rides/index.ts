/**
 * =============================================================================
 * RIDES MODULE
 * =============================================================================
 *
 * Trip record types and the sources that supply them (CSV file, memory).
 * =============================================================================
 */

export * from './ride-source.service';
export * from './ride.schema';
