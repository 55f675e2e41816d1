/**
 * Turn-move selector for "Don't Say 21"
 *
 * ## Game
 * Players alternately speak 1 to 3 consecutive numbers counting up from 1.
 * Whoever speaks 21 loses.
 *
 * ## Strategy
 * Ending a turn on 4, 8, 12, 16 or 20 forces the opponent towards 21. When the
 * next such total is 1-3 away, take exactly that many. From a safe total no
 * move keeps the advantage, so play randomly, but never speak the target
 * unless it is the only legal move.
 */

import type { RandomSource } from '$types/common';
import {
  assertGameRules,
  drawMove,
  nextSafeTotal,
  randomMoveCap,
  validateRunningTotal
} from './helpers';
import type { GameRules } from './types';

/**
 * Decide how many numbers the automated player speaks
 *
 * @param runningTotal - Last number spoken (0 before the first move)
 * @param rules - Game rules (target 21, up to 3 numbers per turn)
 * @param random - Source of numbers in [0, 1), used only when no safe total is reachable
 * @returns Count in 1..maxSay; runningTotal + count never exceeds the target
 * @throws {InvalidStateError} If runningTotal is not an integer in [0, target - 1]
 * @throws {GameRulesConfigError} If the rules are malformed
 */
export function selectMove(
  runningTotal: number,
  rules: GameRules,
  random: RandomSource
): number {
  assertGameRules(rules);
  validateRunningTotal(runningTotal, rules);

  const safe = nextSafeTotal(runningTotal, rules);
  if (safe !== null) {
    const distance = safe - runningTotal;
    if (distance >= 1 && distance <= rules.maxSay) {
      return distance;
    }
  }

  return drawMove(random, randomMoveCap(runningTotal, rules));
}
