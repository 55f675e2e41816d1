export { createRound, applyMove, playComputerTurn, winnerOf } from './game-round';
export { formatSpoken, spokenNumbers, otherPlayer, parseMoveInput } from './helpers';
export type { MoveRecord, RoundState } from './types';
