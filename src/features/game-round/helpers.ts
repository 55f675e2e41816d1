/**
 * Game round helper functions
 */

import { InvalidMoveError } from '$types/errors';
import type { Player } from '$types/common';
import type { GameRules } from '@core/turn-move';

/**
 * Numbers spoken after `start`: formatSpoken(0, 3) -> "1, 2, 3"
 */
export function formatSpoken(start: number, count: number): string {
  return spokenNumbers(start, count).join(', ');
}

/**
 * [start + 1, ..., start + count]
 */
export function spokenNumbers(start: number, count: number): number[] {
  const numbers: number[] = [];
  for (let n = start + 1; n <= start + count; n++) {
    numbers.push(n);
  }
  return numbers;
}

export function otherPlayer(player: Player): Player {
  return player === 'human' ? 'computer' : 'human';
}

/**
 * Parse a typed move
 *
 * @param raw - Text as entered, surrounding whitespace allowed
 * @returns Count in 1..maxSay
 * @throws {InvalidMoveError} If the text is not a whole number or is out of range
 */
export function parseMoveInput(raw: string, rules: GameRules): number {
  const text = raw.trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new InvalidMoveError("Enter a whole number from 1 to " + rules.maxSay);
  }

  const count = parseInt(text, 10);
  if (count < 1 || count > rules.maxSay) {
    throw new InvalidMoveError("Only 1 to " + rules.maxSay + " numbers may be spoken");
  }
  return count;
}
