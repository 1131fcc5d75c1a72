/**
 * =============================================================================
 * ANALYTICS MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * Options accepted by the analysis pipeline and the report it produces.
 * =============================================================================
 */

import { z } from 'zod';
import { ANALYTICS_DEFAULTS } from '../../core/constants';
import { DistanceStats } from '../graph/graph.schema';
import { PopularHubs, RouteCount, routeLimitSchema } from '../routes/route.schema';

export const analysisOptionsSchema = z.object({
  topRoutes: routeLimitSchema.default(ANALYTICS_DEFAULTS.TOP_ROUTES_LIMIT),
  excludedLocations: z
    .array(z.string().min(1, 'Excluded location names cannot be empty'))
    .default([ANALYTICS_DEFAULTS.UNKNOWN_LOCATION]),
});

export type AnalysisOptionsInput = z.input<typeof analysisOptionsSchema>;
export type AnalysisOptions = z.infer<typeof analysisOptionsSchema>;

/**
 * Shortest path found for the most frequent direct route
 */
export interface RoutePath {
  origin: string;
  destination: string;
  /** Location names from origin to destination, both included */
  path: string[];
}

export interface RideAnalysisReport {
  /** Rides analyzed (after filtering) */
  totalRides: number;
  locationCount: number;
  /** Directed edges, parallel edges counted */
  edgeCount: number;
  topRoutes: RouteCount[];
  hubs: PopularHubs;
  /** null when there is no route or no path */
  topRoutePath: RoutePath | null;
  distanceStats: DistanceStats;
}
