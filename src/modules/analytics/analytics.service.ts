/**
 * =============================================================================
 * ANALYTICS SERVICE - Ride log analysis pipeline
 * =============================================================================
 *
 * FLOW:
 * ─────────────────────────────────────────────────────────────────────────────
 *   RecordSource.loadRecords()
 *     → filterKnownLocations()
 *     → buildGraph()
 *     → topKRoutes() / popularHubs() / shortestPath() / distanceStats()
 *     → RideAnalysisReport
 *
 * Nothing is cached between calls: analyzing the same rides twice gives the
 * same report.
 * =============================================================================
 */

import { ErrorCode } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';
import { logger } from '../../shared/services/logger.service';
import { LocationGraph } from '../graph/graph.schema';
import { buildGraph, edgeCount, locationIndexOf } from '../graph/graph.service';
import { shortestPath } from '../graph/path-finder.service';
import { allPairsDistances, distanceStats } from '../graph/distance-stats.service';
import { popularHubs, topKRoutes } from '../routes/route-aggregator.service';
import { RouteCount } from '../routes/route.schema';
import { RecordSource, filterKnownLocations } from '../rides/ride-source.service';
import { TripRecord } from '../rides/ride.schema';
import {
  AnalysisOptions,
  AnalysisOptionsInput,
  RideAnalysisReport,
  RoutePath,
  analysisOptionsSchema,
} from './analytics.schema';

export function parseAnalysisOptions(input: AnalysisOptionsInput = {}): AnalysisOptions {
  const result = analysisOptionsSchema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Invalid analysis options', ErrorCode.VALIDATION_OPTIONS_INVALID);
  }
  return result.data;
}

/**
 * Resolve a route's endpoints in the graph and find its hop-count path.
 */
function findRoutePath(graph: LocationGraph, route: RouteCount): RoutePath | null {
  const start = locationIndexOf(graph, route.origin);
  const end = locationIndexOf(graph, route.destination);
  if (start === null || end === null) return null;

  const path = shortestPath(graph.adjacency, start, end);
  if (!path) return null;

  return {
    origin: route.origin,
    destination: route.destination,
    path: path.map(index => graph.locations[index]),
  };
}

/**
 * Analyze rides that are already filtered.
 */
export function analyzeRides(
  records: readonly TripRecord[],
  options: AnalysisOptionsInput = {}
): RideAnalysisReport {
  const { topRoutes: limit } = parseAnalysisOptions(options);

  const graph = buildGraph(records);
  const topRoutes = topKRoutes(records, limit);
  const hubs = popularHubs(records);
  const topRoutePath = topRoutes.length > 0 ? findRoutePath(graph, topRoutes[0]) : null;
  const stats = distanceStats(allPairsDistances(graph.adjacency));

  logger.debug('Ride graph analyzed', {
    locations: graph.locations.length,
    edges: edgeCount(graph.adjacency),
    reachablePairs: stats.pairCount,
  });

  return {
    totalRides: records.length,
    locationCount: graph.locations.length,
    edgeCount: edgeCount(graph.adjacency),
    topRoutes,
    hubs,
    topRoutePath,
    distanceStats: stats,
  };
}

/**
 * Load rides from a source, drop unknown locations and analyze the rest.
 */
export async function runAnalysis(
  source: RecordSource,
  options: AnalysisOptionsInput = {}
): Promise<RideAnalysisReport> {
  const parsed = parseAnalysisOptions(options);

  logger.info(`Loading rides from ${source.description}`);
  const loaded = await source.loadRecords();
  const records = filterKnownLocations(loaded, parsed.excludedLocations);

  const dropped = loaded.length - records.length;
  if (dropped > 0) {
    logger.info(`Dropped ${dropped} rides with missing or excluded locations`);
  }

  return analyzeRides(records, parsed);
}
