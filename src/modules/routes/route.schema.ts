/**
 * =============================================================================
 * ROUTES MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * - RouteCount: how many rides went directly from one location to another
 * - PopularHubs: per category, the location that appears most often as an
 *   origin or destination
 * =============================================================================
 */

import { z } from 'zod';
import { TripCategory } from '../../core/constants';

/**
 * Number of routes to return; zero is allowed and yields an empty list
 */
export const routeLimitSchema = z
  .number({ invalid_type_error: 'Route limit must be a number' })
  .int('Route limit must be a whole number')
  .min(0, 'Route limit cannot be negative');

export interface RouteCount {
  origin: string;
  destination: string;
  count: number;
}

/** location → appearances, for one category */
export type HubTally = Map<string, number>;

export type CategoryTallies = Map<TripCategory, HubTally>;

export interface PopularHubs {
  /** Empty string when there were no personal rides */
  personal: string;
  /** Empty string when there were no business rides */
  business: string;
}
