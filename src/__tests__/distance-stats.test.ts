/**
 * =============================================================================
 * DISTANCE STATISTICS - Unit Tests
 * =============================================================================
 */

import {
  Adjacency,
  DistanceTable,
  EMPTY_DISTANCE_STATS,
  allPairsDistances,
  distanceStats,
  maxDistance,
  meanDistance,
  stdDevDistance,
} from '../modules/graph';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const CYCLE: Adjacency = [[1], [2], [0]];
const CHAIN: Adjacency = [[1, 1], [2], [3], []];

describe('allPairsDistances', () => {
  it('returns one table per source in index order', () => {
    expect(allPairsDistances(CHAIN)).toEqual([
      [0, 1, 2, 3],
      [null, 0, 1, 2],
      [null, null, 0, 1],
      [null, null, null, 0],
    ]);
  });

  it('returns no tables for an empty graph', () => {
    expect(allPairsDistances([])).toEqual([]);
  });
});

describe('cycle A→B→C→A', () => {
  const tables = allPairsDistances(CYCLE);

  it('reaches every node within two hops', () => {
    expect(tables[0]).toEqual([0, 1, 2]);
    expect(maxDistance(tables)).toBe(2);
  });

  it('averages the nine pairwise distances', () => {
    // three 0s, three 1s, three 2s
    expect(meanDistance(tables)).toBe(1);
    expect(stdDevDistance(tables, 1)).toBeCloseTo(Math.sqrt(2 / 3), 10);
  });
});

describe('distanceStats', () => {
  it('excludes unreachable pairs and keeps self-distances', () => {
    // finite entries: 0,1,2,3, 0,1,2, 0,1, 0
    expect(distanceStats(allPairsDistances(CHAIN))).toEqual({
      mean: 1,
      stdDev: 1,
      max: 3,
      pairCount: 10,
    });
  });

  it('reports zero spread for a single isolated node', () => {
    expect(distanceStats(allPairsDistances([[]]))).toEqual({
      mean: 0,
      stdDev: 0,
      max: 0,
      pairCount: 1,
    });
  });

  it('falls back to zeros when there is no finite distance', () => {
    expect(distanceStats([])).toEqual(EMPTY_DISTANCE_STATS);
    expect(distanceStats([[null, null]])).toEqual({ mean: 0, stdDev: 0, max: 0, pairCount: 0 });
  });

  it('keeps the mean within [0, max]', () => {
    for (const adjacency of [CYCLE, CHAIN, [[1], [], [0, 1]]]) {
      const { mean, max } = distanceStats(allPairsDistances(adjacency));
      expect(mean).toBeGreaterThanOrEqual(0);
      expect(mean).toBeLessThanOrEqual(max);
    }
  });

  it('does not depend on the order tables are computed in', () => {
    const forward = allPairsDistances(CHAIN);
    const reversed = [...forward].reverse();

    expect(distanceStats(reversed)).toEqual(distanceStats(forward));
  });

  it('reads each table once', () => {
    const entries = [0, 2, null, 1];
    let passes = 0;
    const table: DistanceTable = Object.assign([...entries], {
      [Symbol.iterator]() {
        passes++;
        return entries[Symbol.iterator]();
      },
    });

    expect(distanceStats([table])).toEqual({ mean: 1, stdDev: Math.sqrt(2 / 3), max: 2, pairCount: 3 });
    expect(passes).toBe(1);
  });

  it('agrees with the individual reductions', () => {
    const tables = allPairsDistances([[1], [], [0, 1]]);
    const mean = meanDistance(tables);

    expect(distanceStats(tables)).toEqual({
      mean,
      stdDev: stdDevDistance(tables, mean),
      max: maxDistance(tables),
      pairCount: 6,
    });
  });

  it('returns a fresh object for the empty fallback', () => {
    const stats = distanceStats([]);
    stats.max = 9;

    expect(EMPTY_DISTANCE_STATS.max).toBe(0);
  });
});
