export { loadWateringSystem, estimateDuration, explainDuration } from './watering';
export { READING_VARIABLES, toCrispInputs } from './helpers';
export type {
  WateringReadings,
  ReadingName,
  LoadOptions,
  WateringSystem,
  RuleStrength,
  WateringDecision
} from './types';
