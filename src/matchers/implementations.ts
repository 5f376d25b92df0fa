/**
 * Criterion Implementations
 *
 * - PickupDistanceCriterion: Closest driver to the pickup point
 * - RatingCriterion: Higher rating wins a tie on distance
 * - IdleTimeCriterion: The driver who has waited longest wins what is left
 */

import { BaseCriterion } from './BaseCriterion';
import type { CriterionContext, ICriterion } from './BaseCriterion';
import { CriterionType } from '../models/types';
import type { DriverCandidate } from '../models/types';

// =============================================================================
// PICKUP DISTANCE CRITERION
// =============================================================================
/**
 * Crow-flies distance from the driver's last known location to the
 * trip origin. Shorter is better.
 */
export class PickupDistanceCriterion extends BaseCriterion {
  readonly type = CriterionType.PICKUP_DISTANCE;
  readonly name = 'pickup distance';

  compare(a: DriverCandidate, b: DriverCandidate, context: CriterionContext): number {
    return this.ascending(
      this.getPickupDistance(a, context),
      this.getPickupDistance(b, context)
    );
  }
}

// =============================================================================
// RATING CRITERION
// =============================================================================

export class RatingCriterion extends BaseCriterion {
  readonly type = CriterionType.RATING;
  readonly name = 'rating';

  compare(a: DriverCandidate, b: DriverCandidate): number {
    // Higher first
    return this.ascending(b.rating, a.rating);
  }
}

// =============================================================================
// IDLE TIME CRITERION
// =============================================================================
/**
 * Drivers who became available earlier have been waiting longer and go
 * first. Timestamps that fail to parse sort last.
 */
export class IdleTimeCriterion extends BaseCriterion {
  readonly type = CriterionType.IDLE_TIME;
  readonly name = 'idle time';

  compare(a: DriverCandidate, b: DriverCandidate): number {
    return this.ascending(this.idleSinceMs(a), this.idleSinceMs(b));
  }

  private idleSinceMs(candidate: DriverCandidate): number {
    const ms = Date.parse(candidate.idleSince);
    return Number.isNaN(ms) ? Infinity : ms;
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export type CriterionMap = Record<CriterionType, ICriterion>;

/**
 * Create one instance of every criterion, keyed by type.
 */
export function createCriteria(): CriterionMap {
  return {
    [CriterionType.PICKUP_DISTANCE]: new PickupDistanceCriterion(),
    [CriterionType.RATING]: new RatingCriterion(),
    [CriterionType.IDLE_TIME]: new IdleTimeCriterion()
  };
}
