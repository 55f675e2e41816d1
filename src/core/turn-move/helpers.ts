/**
 * Turn-move helper functions
 */

import { GameRulesConfigError, InvalidStateError, RandomSourceError } from '$types/errors';
import type { RandomSource } from '$types/common';
import { isFiniteNumber, isInteger } from '@utils/number';
import { describeIssues, validateGameRules } from '@validation';
import type { GameRules } from './types';

/**
 * Validate game rules
 * @throws {GameRulesConfigError} If the rules are malformed
 */
export function assertGameRules(rules: GameRules): void {
  const result = validateGameRules(rules);
  if (!result.valid) {
    throw new GameRulesConfigError(describeIssues(result.errors));
  }
}

/**
 * Validate that a running total can still be played from
 * @throws {InvalidStateError} If total is not an integer in [0, target - 1]
 */
export function validateRunningTotal(total: number, rules: GameRules): void {
  if (!isInteger(total) || total < 0 || total > rules.target - 1) {
    throw new InvalidStateError(
      "Running total must be an integer from 0 to " + (rules.target - 1) + ", got " + total
    );
  }
}

/**
 * A safe total leaves the opponent unable to avoid speaking the target:
 * (target - 1 - total) is a multiple of (maxSay + 1). For 21 and 3: 4, 8, 12, 16, 20.
 */
export function isSafeTotal(total: number, rules: GameRules): boolean {
  const remaining = rules.target - 1 - total;
  return remaining >= 0 && remaining % (rules.maxSay + 1) === 0;
}

/**
 * Smallest safe total strictly above `total`, or null when none remains below the target
 */
export function nextSafeTotal(total: number, rules: GameRules): number | null {
  const cycle = rules.maxSay + 1;
  const last = rules.target - 1;
  if (total >= last) {
    return null;
  }
  // last - k * cycle > total  ->  k < (last - total) / cycle
  const k = Math.ceil((last - total) / cycle) - 1;
  return last - k * cycle;
}

/**
 * Largest count the rules allow from `total` (never past the target)
 */
export function maxLegalMove(total: number, rules: GameRules): number {
  return Math.min(rules.maxSay, rules.target - total);
}

/**
 * Largest count a random move may take: the legal maximum, minus one when
 * that would land exactly on the target and a smaller move exists
 */
export function randomMoveCap(total: number, rules: GameRules): number {
  const cap = maxLegalMove(total, rules);
  if (total + cap === rules.target && cap > 1) {
    return cap - 1;
  }
  return cap;
}

/**
 * Draw a count uniformly from 1..cap
 * @throws {RandomSourceError} If the source returns a value outside [0, 1)
 */
export function drawMove(random: RandomSource, cap: number): number {
  const r = random();
  if (!isFiniteNumber(r) || r < 0 || r >= 1) {
    throw new RandomSourceError("Random source must return a number in [0, 1), got " + r);
  }
  return 1 + Math.floor(r * cap);
}
