/**
 * =============================================================================
 * ANALYTICS MODULE
 * =============================================================================
 *
 * Runs the full ride-log analysis and renders its report.
 * =============================================================================
 */

export * from './analytics.schema';
export * from './analytics.service';
export * from './report.presenter';
