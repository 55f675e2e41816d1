/**
 * Watering-time estimator helpers
 */

import type { CrispInputs, FuzzySystem } from '@core/inference';
import { fmtReading } from '@logging';
import type { ValidationIssue } from '@validation';
import type { ReadingName, WateringReadings } from './types';

/**
 * Rule-base variable name for each reading
 */
export const READING_VARIABLES: Readonly<Record<ReadingName, string>> = {
  soilMoisture: 'soil_moisture',
  temperature: 'temperature',
  airHumidity: 'air_humidity'
};

/**
 * Key readings by rule-base variable name
 */
export function toCrispInputs(readings: WateringReadings): CrispInputs {
  return {
    [READING_VARIABLES.soilMoisture]: readings.soilMoisture,
    [READING_VARIABLES.temperature]: readings.temperature,
    [READING_VARIABLES.airHumidity]: readings.airHumidity
  };
}

/**
 * Errors for input variables no reading feeds
 */
export function checkReadingCoverage(system: FuzzySystem): ValidationIssue[] {
  const known = Object.values(READING_VARIABLES);
  const issues: ValidationIssue[] = [];

  system.inputs.forEach(function(variable, i) {
    if (known.indexOf(variable.name) === -1) {
      issues.push({
        level: 'CRITICAL',
        field: `inputs[${i}].name`,
        message: `no reading supplies input variable "${variable.name}" (expected one of ${known.join(', ')})`
      });
    }
  });

  return issues;
}

/**
 * "soil 25.0%, temperature 35.0C, humidity 30.0%" from clamped inputs
 */
export function describeInputs(system: FuzzySystem, inputs: Record<string, number>): string {
  return system.inputs
    .map(function(variable) {
      return variable.name + ' ' + fmtReading(inputs[variable.name], variable.unit);
    })
    .join(', ');
}
