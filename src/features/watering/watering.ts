/**
 * Watering-time estimator
 *
 * Maps soil moisture, air temperature and air humidity to a watering duration
 * in minutes using the fuzzy rule base in WATERING_SYSTEM. The rule base is
 * validated once in loadWateringSystem; estimates never fail on numeric input.
 */

import { RuleBaseConfigError } from '$types/errors';
import type { Minutes } from '$types/common';
import { infer } from '@core/inference';
import type { FuzzySystem } from '@core/inference';
import { fmtMinutes } from '@logging';
import { describeIssues, validateFuzzySystem } from '@validation';
import { checkReadingCoverage, describeInputs, toCrispInputs } from './helpers';
import type { LoadOptions, WateringDecision, WateringReadings, WateringSystem } from './types';

/**
 * Validate a rule base and prepare it for estimates
 *
 * @param config - Rule base, normally WATERING_SYSTEM
 * @param options - Optional logger for warnings and decision traces
 * @returns Frozen system to pass to estimateDuration / explainDuration
 * @throws {RuleBaseConfigError} Listing every error found
 */
export function loadWateringSystem(config: FuzzySystem, options: LoadOptions = {}): WateringSystem {
  const result = validateFuzzySystem(config);
  const errors = result.errors.concat(result.valid ? checkReadingCoverage(config) : []);
  if (errors.length > 0) {
    throw new RuleBaseConfigError(describeIssues(errors));
  }

  const logger = options.logger ?? null;
  if (logger) {
    describeIssues(result.warnings).forEach(function(issue) {
      logger.warning('Watering rule base: ' + issue);
    });
    logger.debug(
      'Loaded watering rule base ' + config.version + ' with ' + config.rules.length + ' rules'
    );
  }

  return Object.freeze({ config: config, logger: logger });
}

/**
 * Estimate, keeping every intermediate result
 */
export function explainDuration(system: WateringSystem, readings: WateringReadings): WateringDecision {
  const config = system.config;
  const result = infer(config, toCrispInputs(readings));

  const descriptions = new Map<string, string>();
  config.rules.forEach(function(rule) {
    descriptions.set(rule.id, rule.description);
  });

  if (system.logger) {
    const inputs = describeInputs(config, result.clampedInputs);
    if (result.fallback) {
      system.logger.warning(
        'No watering rule fired for ' + inputs + '; using ' + fmtMinutes(result.value)
      );
    } else {
      system.logger.debug('Watering ' + fmtMinutes(result.value) + ' for ' + inputs);
    }
  }

  return {
    version: config.version,
    duration: result.value,
    fallback: result.fallback,
    inputs: result.clampedInputs,
    degrees: result.fuzzified,
    rules: result.activations.map(function(activation) {
      return {
        id: activation.ruleId,
        description: descriptions.get(activation.ruleId) ?? '',
        consequent: activation.consequent,
        strength: activation.strength
      };
    })
  };
}

/**
 * Watering duration in minutes for the given readings
 *
 * @example
 * ```typescript
 * const system = loadWateringSystem(WATERING_SYSTEM);
 * estimateDuration(system, { soilMoisture: 25, temperature: 35, airHumidity: 30 }); // ~49.3
 * ```
 */
export function estimateDuration(system: WateringSystem, readings: WateringReadings): Minutes {
  return explainDuration(system, readings).duration;
}
