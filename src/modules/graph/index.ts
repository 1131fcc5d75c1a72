/**
 * =============================================================================
 * GRAPH MODULE
 * =============================================================================
 *
 * Directed location graph built from rides:
 * - Construction with a sorted, dense location index
 * - Hop-count shortest paths (BFS)
 * - All-pairs distance statistics (mean, population std-dev, max)
 *
 * Pure functions over frozen structures; no I/O.
 * =============================================================================
 */

export * from './graph.schema';
export * from './graph.service';
export * from './path-finder.service';
export * from './distance-stats.service';
