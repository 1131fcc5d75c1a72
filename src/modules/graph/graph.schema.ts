/**
 * =============================================================================
 * GRAPH MODULE - TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - Location index: position of a location name in the sorted name list.
 *   Indices are dense over [0, N) and stable for one analysis run.
 * - Adjacency: adjacency[u] lists the destination index of every ride that
 *   started at u. A pair ridden three times appears three times.
 * - Distance table: hop count from one source to every index, null when the
 *   index cannot be reached.
 *
 * EXAMPLE:
 * Rides: A→B, A→B, B→C, C→D
 *
 *   locations:  ['A', 'B', 'C', 'D']
 *   adjacency:  [[1, 1], [2], [3], []]
 *   distances from A: [0, 1, 2, 3]
 * =============================================================================
 */

export type Adjacency = ReadonlyArray<ReadonlyArray<number>>;

/** Hop count per location index; null = unreachable */
export type DistanceTable = ReadonlyArray<number | null>;

export interface LocationGraph {
  /** Location names, sorted; the array index is the location index */
  readonly locations: readonly string[];
  readonly locationIndex: ReadonlyMap<string, number>;
  readonly adjacency: Adjacency;
}

export interface DistanceStats {
  /** Mean of all finite pairwise hop counts (self-distances included) */
  mean: number;
  /** Population standard deviation of the same values */
  stdDev: number;
  /** Largest finite hop count */
  max: number;
  /** Number of finite entries the figures were computed over */
  pairCount: number;
}

/** Reported when no finite distance exists (empty graph) */
export const EMPTY_DISTANCE_STATS: Readonly<DistanceStats> = Object.freeze({
  mean: 0,
  stdDev: 0,
  max: 0,
  pairCount: 0,
});
