/**
 * MatchingEngine - picks one driver for one trip
 *
 * Works on a read-only snapshot of candidates taken from the availability
 * tracker; it never commits anything. The orchestrator commits the choice.
 *
 * STEPS:
 *
 * 1. Eligibility: only candidates flagged available.
 *    None left → no_match(no_candidates).
 *
 * 2. Range: pickup distance (Haversine miles) to the trip origin must be
 *    within maxPickupDistanceMiles.
 *    None left → no_match(out_of_range).
 *
 * 3. Pool: keep the candidatePoolSize nearest.
 *
 * 4. Ranking: criteria in the configured priority order, then driver id,
 *    so identical inputs always give the same driver.
 */

import { UnmatchedReason } from '../models/types';
import type { DriverCandidate, Trip } from '../models/types';
import { DEFAULT_MATCHING_CONFIG } from '../config/config';
import type { MatchingConfig } from '../config/config';
import type { CriterionContext } from './BaseCriterion';
import { createCriteria } from './implementations';
import type { CriterionMap } from './implementations';
import { haversineDistance } from '../utils/geo';

// =============================================================================
// RESULT TYPES
// =============================================================================

export interface RankedCandidate {
  driverId: string;
  pickupDistanceMiles: number;
  rating: number;
  idleSince: string;
}

export type MatchOutcome =
  | { kind: 'matched'; driverId: string; ranking: RankedCandidate[] }
  | { kind: 'no_match'; reason: UnmatchedReason };

export type MatchableTrip = Pick<Trip, 'id' | 'origin'>;

/**
 * What the orchestrator depends on. Tests substitute slow or scripted
 * matchers through this interface.
 */
export interface DriverMatcher {
  match(
    trip: MatchableTrip,
    candidates: readonly DriverCandidate[]
  ): MatchOutcome | Promise<MatchOutcome>;
}

// =============================================================================
// ENGINE
// =============================================================================

export class MatchingEngine implements DriverMatcher {
  private criteria: CriterionMap;

  /**
   * @param resolveConfig - read on every match so config changes made
   *        through the API apply to the next trip
   */
  constructor(private readonly resolveConfig: () => MatchingConfig = () => DEFAULT_MATCHING_CONFIG) {
    this.criteria = createCriteria();
  }

  match(
    trip: MatchableTrip,
    candidates: readonly DriverCandidate[]
  ): MatchOutcome {
    const config: MatchingConfig = this.resolveConfig();

    // Step 1: eligibility
    const available = candidates.filter(c => c.available);
    if (available.length === 0) {
      console.log(`[MatchingEngine] Trip ${trip.id}: no available drivers`);
      return { kind: 'no_match', reason: UnmatchedReason.NO_CANDIDATES };
    }

    // Step 2: range
    const pickupDistances = new Map<string, number>();
    for (const candidate of available) {
      pickupDistances.set(candidate.id, haversineDistance(candidate.location, trip.origin));
    }

    const inRange = available.filter(c => {
      const distance = pickupDistances.get(c.id) ?? Infinity;
      return distance <= config.maxPickupDistanceMiles;
    });
    if (inRange.length === 0) {
      console.log(
        `[MatchingEngine] Trip ${trip.id}: ${available.length} available driver(s), ` +
        `none within ${config.maxPickupDistanceMiles} miles`
      );
      return { kind: 'no_match', reason: UnmatchedReason.OUT_OF_RANGE };
    }

    const context: CriterionContext = {
      pickup: trip.origin,
      config,
      pickupDistances
    };

    // Step 3: pool of the nearest
    const distanceCriterion = this.criteria.pickup_distance;
    const pool = [...inRange]
      .sort((a, b) => distanceCriterion.compare(a, b, context) || compareIds(a, b))
      .slice(0, config.candidatePoolSize);

    // Step 4: ranking
    const ranked = pool.sort((a, b) => {
      for (const type of config.priorityOrder) {
        const result = this.criteria[type].compare(a, b, context);
        if (result !== 0) return result;
      }
      return compareIds(a, b);
    });

    const ranking: RankedCandidate[] = ranked.map(c => ({
      driverId: c.id,
      pickupDistanceMiles: pickupDistances.get(c.id) ?? Infinity,
      rating: c.rating,
      idleSince: c.idleSince
    }));

    const best = ranking[0];
    console.log(
      `[MatchingEngine] Trip ${trip.id}: selected ${best.driverId} ` +
      `(${best.pickupDistanceMiles.toFixed(2)} mi) from ${ranking.length} candidate(s)`
    );

    return { kind: 'matched', driverId: best.driverId, ranking };
  }
}

function compareIds(a: DriverCandidate, b: DriverCandidate): number {
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}
