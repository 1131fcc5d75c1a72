/**
 * =============================================================================
 * GRAPH SERVICE - Location graph construction
 * =============================================================================
 *
 * Pure functions: the same rides always produce the same graph, and the
 * returned structures are frozen.
 * =============================================================================
 */

import { compareCodePoints } from '../../shared/utils/text.utils';
import { TripRecord } from '../rides/ride.schema';
import { Adjacency, LocationGraph } from './graph.schema';

/**
 * Every location that appears as an origin or destination, in code-point order.
 */
export function uniqueLocations(records: readonly TripRecord[]): string[] {
  const names = new Set<string>();
  for (const { origin, destination } of records) {
    names.add(origin);
    names.add(destination);
  }
  return [...names].sort(compareCodePoints);
}

/**
 * Build the directed ride graph. One edge per ride; parallel edges are kept.
 */
export function buildGraph(records: readonly TripRecord[]): LocationGraph {
  const locations = uniqueLocations(records);
  const locationIndex = new Map<string, number>();
  locations.forEach((name, index) => locationIndex.set(name, index));

  const adjacency: number[][] = locations.map(() => []);
  for (const { origin, destination } of records) {
    const u = locationIndex.get(origin);
    const v = locationIndex.get(destination);
    if (u !== undefined && v !== undefined) {
      adjacency[u].push(v);
    }
  }

  return Object.freeze({
    locations: Object.freeze(locations),
    locationIndex,
    adjacency: Object.freeze(adjacency.map(edges => Object.freeze(edges))),
  });
}

/**
 * Index of a location name, or null when the name is not in the graph.
 */
export function locationIndexOf(graph: LocationGraph, name: string): number | null {
  return graph.locationIndex.get(name) ?? null;
}

export function edgeCount(adjacency: Adjacency): number {
  return adjacency.reduce((sum, edges) => sum + edges.length, 0);
}
