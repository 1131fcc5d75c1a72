/**
 * =============================================================================
 * DISTANCE STATISTICS SERVICE - All-pairs hop counts
 * =============================================================================
 *
 * Runs one BFS per location and summarizes every finite entry of the
 * resulting tables. Self-distances (always 0) are part of the sample;
 * unreachable pairs are not.
 *
 * With no finite entry at all (only possible for an empty graph) every
 * figure is 0.
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { Adjacency, DistanceStats, DistanceTable, EMPTY_DISTANCE_STATS } from './graph.schema';
import { bfsDistances } from './path-finder.service';

function finiteDistances(tables: readonly DistanceTable[]): number[] {
  const values: number[] = [];
  for (const table of tables) {
    for (const hops of table) {
      if (hops !== null) values.push(hops);
    }
  }
  return values;
}

/**
 * One distance table per source location, in index order.
 */
export function allPairsDistances(adjacency: Adjacency): DistanceTable[] {
  return adjacency.map((_, source) => bfsDistances(adjacency, source));
}

// Reductions over an already collected sample; an empty sample yields 0

function meanOf(values: readonly number[]): number {
  if (values.length === 0) return EMPTY_DISTANCE_STATS.mean;
  return values.reduce((sum, hops) => sum + hops, 0) / values.length;
}

function stdDevOf(values: readonly number[], mean: number): number {
  if (values.length === 0) return EMPTY_DISTANCE_STATS.stdDev;
  const variance = values.reduce((sum, hops) => sum + (hops - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

function maxOf(values: readonly number[]): number {
  return values.reduce((max, hops) => (hops > max ? hops : max), EMPTY_DISTANCE_STATS.max);
}

export function meanDistance(tables: readonly DistanceTable[]): number {
  return meanOf(finiteDistances(tables));
}

/**
 * Population standard deviation (divides by the sample count).
 */
export function stdDevDistance(tables: readonly DistanceTable[], mean: number): number {
  return stdDevOf(finiteDistances(tables), mean);
}

export function maxDistance(tables: readonly DistanceTable[]): number {
  return maxOf(finiteDistances(tables));
}

/**
 * Mean, spread and maximum of every finite entry, collected in one pass.
 */
export function distanceStats(tables: readonly DistanceTable[]): DistanceStats {
  const values = finiteDistances(tables);
  if (values.length === 0) {
    logger.debug('No finite distances; reporting zeroed distance statistics');
    return { ...EMPTY_DISTANCE_STATS };
  }

  const mean = meanOf(values);
  return {
    mean,
    stdDev: stdDevOf(values, mean),
    max: maxOf(values),
    pairCount: values.length,
  };
}
