/**
 * =============================================================================
 * PATH FINDER SERVICE - Hop-count breadth-first search
 * =============================================================================
 *
 * Every edge weighs one hop and is directed. Each traversal owns its own
 * distance/predecessor arrays, pre-sized to the node count, so traversals
 * share no state and can run in any order.
 *
 * Index arguments must lie in [0, N); anything else throws LocationIndexError.
 * =============================================================================
 */

import { LocationIndexError } from '../../core/errors/AppError';
import { Adjacency, DistanceTable } from './graph.schema';

const UNVISITED = -1;

function assertLocationIndex(adjacency: Adjacency, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= adjacency.length) {
    throw new LocationIndexError(index, adjacency.length);
  }
}

/**
 * Core BFS loop. Stops early once `stopAt` is dequeued, when given.
 * distance[i] is UNVISITED for nodes the search never reached.
 */
function traverse(
  adjacency: Adjacency,
  source: number,
  stopAt?: number
): { distance: Int32Array; predecessor: Int32Array } {
  const distance = new Int32Array(adjacency.length).fill(UNVISITED);
  const predecessor = new Int32Array(adjacency.length).fill(UNVISITED);
  const queue: number[] = [source];
  let head = 0;

  distance[source] = 0;

  while (head < queue.length) {
    const u = queue[head++];
    if (u === stopAt) break;

    for (const v of adjacency[u]) {
      if (distance[v] === UNVISITED) {
        distance[v] = distance[u] + 1;
        predecessor[v] = u;
        queue.push(v);
      }
    }
  }

  return { distance, predecessor };
}

/**
 * Hop count from `source` to every location; null where unreachable.
 */
export function bfsDistances(adjacency: Adjacency, source: number): DistanceTable {
  assertLocationIndex(adjacency, source);

  const { distance } = traverse(adjacency, source);
  return Array.from(distance, hops => (hops === UNVISITED ? null : hops));
}

/**
 * A shortest path from `start` to `end` as location indices, both ends
 * included, or null when `end` cannot be reached.
 *
 * @example
 * // A→B→C→A
 * shortestPath([[1], [2], [0]], 0, 2) // [0, 1, 2]
 */
export function shortestPath(adjacency: Adjacency, start: number, end: number): number[] | null {
  assertLocationIndex(adjacency, start);
  assertLocationIndex(adjacency, end);

  if (start === end) return [start];

  const { distance, predecessor } = traverse(adjacency, start, end);
  if (distance[end] === UNVISITED) return null;

  const path: number[] = [];
  for (let current = end; current !== UNVISITED; current = predecessor[current]) {
    path.push(current);
  }
  return path.reverse();
}
