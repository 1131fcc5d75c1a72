/**
 * =============================================================================
 * ROUTE AGGREGATOR SERVICE - Frequent routes & category hubs
 * =============================================================================
 *
 * ORDERING RULES:
 * - Routes: count descending, then origin ascending, then destination ascending
 * - Hubs: highest tally; equal tallies go to the first name in code-point order,
 *   so the answer never depends on record order
 *
 * Names compare by code point, matching the graph's location order.
 * =============================================================================
 */

import { ANALYTICS_DEFAULTS, ErrorCode, TRIP_CATEGORIES, TripCategory } from '../../core/constants';
import { ValidationError } from '../../core/errors/AppError';
import { compareCodePoints } from '../../shared/utils/text.utils';
import { TripRecord } from '../rides/ride.schema';
import { CategoryTallies, HubTally, PopularHubs, RouteCount, routeLimitSchema } from './route.schema';

// =============================================================================
// DIRECT ROUTES
// =============================================================================

/**
 * Every distinct origin→destination pair with its ride count, fully ordered.
 */
export function countRoutes(records: readonly TripRecord[]): RouteCount[] {
  // Keyed by origin first so identical names on either side never collide
  const counts = new Map<string, Map<string, number>>();
  for (const { origin, destination } of records) {
    let byDestination = counts.get(origin);
    if (!byDestination) {
      byDestination = new Map();
      counts.set(origin, byDestination);
    }
    byDestination.set(destination, (byDestination.get(destination) ?? 0) + 1);
  }

  const routes: RouteCount[] = [];
  counts.forEach((byDestination, origin) => {
    byDestination.forEach((count, destination) => routes.push({ origin, destination, count }));
  });

  return routes.sort((a, b) =>
    b.count - a.count ||
    compareCodePoints(a.origin, b.origin) ||
    compareCodePoints(a.destination, b.destination)
  );
}

/**
 * The `limit` most frequent direct routes.
 *
 * @throws ValidationError when `limit` is negative or not an integer
 */
export function topKRoutes(records: readonly TripRecord[], limit: number): RouteCount[] {
  const parsed = routeLimitSchema.safeParse(limit);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, 'Invalid route limit', ErrorCode.VALIDATION_OPTIONS_INVALID);
  }
  if (parsed.data === 0) return [];

  return countRoutes(records).slice(0, parsed.data);
}

// =============================================================================
// HUBS
// =============================================================================

/**
 * Appearance count per location, for each category. Every category is
 * present in the result, possibly with an empty tally.
 */
export function categoryTallies(records: readonly TripRecord[]): CategoryTallies {
  const tallies: CategoryTallies = new Map(
    TRIP_CATEGORIES.map((category): [TripCategory, HubTally] => [category, new Map()])
  );

  for (const { origin, destination, category } of records) {
    let tally = tallies.get(category);
    if (!tally) {
      tally = new Map();
      tallies.set(category, tally);
    }
    tally.set(origin, (tally.get(origin) ?? 0) + 1);
    tally.set(destination, (tally.get(destination) ?? 0) + 1);
  }

  return tallies;
}

/**
 * Location with the highest tally, or the empty hub name for an empty tally.
 */
export function busiestLocation(tally: ReadonlyMap<string, number> | undefined): string {
  let best: string = ANALYTICS_DEFAULTS.EMPTY_HUB;
  let bestCount = 0;

  tally?.forEach((count, location) => {
    if (count > bestCount || (count === bestCount && compareCodePoints(location, best) < 0)) {
      best = location;
      bestCount = count;
    }
  });

  return best;
}

export function popularHubs(records: readonly TripRecord[]): PopularHubs {
  const tallies = categoryTallies(records);
  return {
    personal: busiestLocation(tallies.get(TripCategory.PERSONAL)),
    business: busiestLocation(tallies.get(TripCategory.BUSINESS)),
  };
}
