/**
 * Watering-time estimator type definitions
 */

import type { Celsius, Minutes, Percent } from '$types/common';
import type { FuzzifiedInputs, FuzzySystem } from '@core/inference';
import type { Logger } from '@logging';

/**
 * Sensor readings for one estimate; out-of-range values are clamped
 */
export interface WateringReadings {
  soilMoisture: Percent;
  temperature: Celsius;
  airHumidity: Percent;
}

export type ReadingName = keyof WateringReadings;

export interface LoadOptions {
  /** Receives configuration warnings and per-decision traces */
  logger?: Logger;
}

/**
 * Validated rule base, ready for estimates
 */
export interface WateringSystem {
  readonly config: FuzzySystem;
  readonly logger: Logger | null;
}

export interface RuleStrength {
  id: string;
  description: string;
  /** Output category the rule implies */
  consequent: string;
  /** Firing strength in [0, 1] */
  strength: number;
}

/**
 * Full account of one estimate, for display
 */
export interface WateringDecision {
  /** Rule base version the decision was made with */
  version: string;

  duration: Minutes;

  /** True when no rule fired and duration is the output minimum */
  fallback: boolean;

  /** Readings after clamping, keyed by variable name */
  inputs: Record<string, number>;

  degrees: FuzzifiedInputs;
  rules: RuleStrength[];
}
