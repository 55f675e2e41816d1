export type { RandomSource, Percent, Celsius, Minutes, Player } from './common';
export {
  ValidationError,
  InvalidStateError,
  InvalidMoveError,
  RandomSourceError,
  GameRulesConfigError,
  RuleBaseConfigError
} from './errors';
