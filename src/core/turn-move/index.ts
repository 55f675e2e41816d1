export { selectMove } from './turn-move';
export {
  assertGameRules,
  validateRunningTotal,
  isSafeTotal,
  nextSafeTotal,
  maxLegalMove,
  randomMoveCap,
  drawMove
} from './helpers';
export type { GameRules } from './types';
