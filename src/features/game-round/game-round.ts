/**
 * "Don't Say 21" round bookkeeping
 *
 * Every operation returns a new RoundState; the caller owns prompting and
 * printing. The computer's moves come from selectMove.
 */

import { InvalidMoveError } from '$types/errors';
import type { Player, RandomSource } from '$types/common';
import { isInteger } from '@utils/number';
import { selectMove } from '@core/turn-move';
import type { GameRules } from '@core/turn-move';
import { otherPlayer, spokenNumbers } from './helpers';
import type { RoundState } from './types';

/**
 * Start a round at total 0
 */
export function createRound(firstPlayer: Player): RoundState {
  return {
    total: 0,
    turn: firstPlayer,
    history: [],
    loser: null
  };
}

/**
 * Speak `count` numbers for the player whose turn it is
 *
 * @returns New state; `loser` is set when the move speaks the target
 * @throws {InvalidMoveError} If the round is over, the count is outside
 *   1..maxSay, or the move would pass the target
 */
export function applyMove(state: RoundState, count: number, rules: GameRules): RoundState {
  if (state.loser !== null) {
    throw new InvalidMoveError("Round is already over");
  }
  if (!isInteger(count) || count < 1 || count > rules.maxSay) {
    throw new InvalidMoveError(
      "Move must be an integer from 1 to " + rules.maxSay + ", got " + count
    );
  }
  const left = rules.target - state.total;
  if (count > left) {
    throw new InvalidMoveError(
      "Move of " + count + " would pass " + rules.target + " (total is " + state.total + ")"
    );
  }

  const total = state.total + count;
  return {
    total: total,
    turn: otherPlayer(state.turn),
    history: state.history.concat([
      { player: state.turn, count: count, spoken: spokenNumbers(state.total, count) }
    ]),
    loser: total === rules.target ? state.turn : null
  };
}

/**
 * Let the computer move
 *
 * @throws {InvalidMoveError} If the round is over or it is the human's turn
 */
export function playComputerTurn(
  state: RoundState,
  rules: GameRules,
  random: RandomSource
): RoundState {
  if (state.loser !== null) {
    throw new InvalidMoveError("Round is already over");
  }
  if (state.turn !== 'computer') {
    throw new InvalidMoveError("It is not the computer's turn");
  }
  return applyMove(state, selectMove(state.total, rules, random), rules);
}

/**
 * The player who did not speak the target, or null while the round is open
 */
export function winnerOf(state: RoundState): Player | null {
  return state.loser === null ? null : otherPlayer(state.loser);
}
