/**
 * BaseCriterion - Foundation for all ranking criteria
 *
 * Each criterion orders drivers by ONE aspect of suitability for a pickup:
 * - PickupDistanceCriterion: Closer to the pickup point first
 * - RatingCriterion: Higher rated first
 * - IdleTimeCriterion: Longest-waiting first
 *
 * The engine applies criteria in the configured priority order; a later
 * criterion only decides between drivers the earlier ones consider equal.
 *
 * Each criterion returns a comparator result:
 * - negative if `a` should be preferred
 * - positive if `b` should be preferred
 * - 0 if this criterion cannot tell them apart
 */

import type { Coordinates, CriterionType, DriverCandidate } from '../models/types';
import type { MatchingConfig } from '../config/config';

// =============================================================================
// CRITERION CONTEXT
// =============================================================================

/**
 * Shared context passed to all criteria during one match.
 */
export interface CriterionContext {
  /** Trip origin */
  pickup: Coordinates;

  /** Configuration in force for this match */
  config: MatchingConfig;

  /**
   * Pre-calculated driver → pickup distances in miles.
   * Computed once per match so sorting never recomputes them.
   */
  pickupDistances: Map<string, number>;
}

// =============================================================================
// CRITERION INTERFACE
// =============================================================================

export interface ICriterion {
  readonly type: CriterionType;

  /** Human-readable name, used in logs */
  readonly name: string;

  compare(a: DriverCandidate, b: DriverCandidate, context: CriterionContext): number;
}

// =============================================================================
// ABSTRACT BASE CLASS
// =============================================================================

export abstract class BaseCriterion implements ICriterion {
  abstract readonly type: CriterionType;
  abstract readonly name: string;

  abstract compare(a: DriverCandidate, b: DriverCandidate, context: CriterionContext): number;

  // ===========================================================================
  // UTILITY METHODS
  // ===========================================================================

  /**
   * Distance from a candidate to the pickup point.
   *
   * @returns Distance in miles, or Infinity if not calculated
   */
  protected getPickupDistance(candidate: DriverCandidate, context: CriterionContext): number {
    return context.pickupDistances.get(candidate.id) ?? Infinity;
  }

  /**
   * Three-way compare of two numbers, ascending.
   */
  protected ascending(a: number, b: number): number {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
}
