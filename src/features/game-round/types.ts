/**
 * Game round type definitions
 */

import type { Player } from '$types/common';

/**
 * One turn: who spoke and which numbers
 */
export interface MoveRecord {
  player: Player;
  count: number;
  /** Numbers spoken, ascending */
  spoken: number[];
}

/**
 * Immutable snapshot of a round in progress
 */
export interface RoundState {
  /** Last number spoken (0 before the first move) */
  total: number;

  /** Player to move next */
  turn: Player;

  history: readonly MoveRecord[];

  /** Player who spoke the target, or null while the round is open */
  loser: Player | null;
}
