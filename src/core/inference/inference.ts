/**
 * Fuzzy rule inference
 *
 * Mamdani-style inference over a fixed rule base:
 * 1. Fuzzification - clamp each reading into its universe and compute category degrees
 * 2. Rule evaluation - firing strength = min of antecedent degrees (NOT = 1 - degree)
 * 3. Aggregation - clip each consequent at its rule's strength, combine with max,
 *    sampled over the output universe
 * 4. Defuzzification - centroid of the piecewise-linear aggregate curve
 *
 * Every step is a pure function of the rule base and its inputs.
 */

import { InvalidStateError } from '$types/errors';
import { evaluateMembership, fuzzifyVariable } from '@core/membership';
import type { OutputVariable } from '@core/membership';
import { clipCrossings, conditionDegree, consequentShape, mergeSamples, sampleUniverse, segmentMoment } from './helpers';
import type {
  AggregateSet,
  CrispInputs,
  FuzzifiedInputs,
  FuzzyRule,
  FuzzySystem,
  InferenceResult,
  RuleActivation
} from './types';

/**
 * Fuzzify every input variable of the system
 *
 * @param system - Validated rule base
 * @param values - Crisp readings keyed by variable name
 * @returns Clamped readings and membership degrees, both keyed by variable name
 * @throws {InvalidStateError} If a reading for an input variable is missing
 */
export function fuzzifyInputs(
  system: FuzzySystem,
  values: CrispInputs
): { clamped: Record<string, number>; fuzzified: FuzzifiedInputs } {
  const clamped: Record<string, number> = {};
  const fuzzified: FuzzifiedInputs = {};

  for (const variable of system.inputs) {
    const value = values[variable.name];
    if (typeof value !== 'number') {
      throw new InvalidStateError('Missing reading for input variable "' + variable.name + '"');
    }
    const reading = fuzzifyVariable(variable, value);
    clamped[variable.name] = reading.value;
    fuzzified[variable.name] = reading.degrees;
  }

  return { clamped: clamped, fuzzified: fuzzified };
}

/**
 * Firing strength of each rule (min T-norm over its conditions)
 */
export function evaluateRules(
  rules: readonly FuzzyRule[],
  fuzzified: FuzzifiedInputs
): RuleActivation[] {
  return rules.map(function(rule) {
    let strength = 1;
    for (const condition of rule.when) {
      strength = Math.min(strength, conditionDegree(condition, fuzzified));
    }
    return { ruleId: rule.id, consequent: rule.then, strength: strength };
  });
}

/**
 * Combine rule consequents into one output set
 *
 * Each sample's degree is the max over rules of min(strength, consequent degree).
 * Rules with zero strength contribute nothing.
 * @throws {InvalidStateError} If a rule names an unknown output category
 */
export function aggregateActivations(
  output: OutputVariable,
  activations: readonly RuleActivation[]
): AggregateSet {
  const grid = sampleUniverse(output.universe, output.resolution);
  const crossings: number[] = [];
  for (const activation of activations) {
    if (activation.strength > 0 && activation.strength < 1) {
      const shape = consequentShape(output, activation.consequent);
      crossings.push(...clipCrossings(grid, shape, activation.strength));
    }
  }

  // Clip corners fall between grid points; sampling them keeps the curve exact
  const xs = mergeSamples(grid, crossings);
  const degrees = xs.map(function() { return 0; });

  for (const activation of activations) {
    if (activation.strength <= 0) continue;
    const shape = consequentShape(output, activation.consequent);
    for (let i = 0; i < xs.length; i++) {
      const clipped = Math.min(activation.strength, evaluateMembership(shape, xs[i]));
      if (clipped > degrees[i]) {
        degrees[i] = clipped;
      }
    }
  }

  return { xs: xs, degrees: degrees };
}

/**
 * Centroid of the aggregate set, treating samples as a piecewise-linear curve
 *
 * @returns Crisp value, or null when the set is empty (zero area)
 */
export function defuzzifyCentroid(aggregate: AggregateSet): number | null {
  const { xs, degrees } = aggregate;
  let totalArea = 0;
  let totalMoment = 0;

  for (let i = 1; i < xs.length; i++) {
    const segment = segmentMoment(xs[i - 1], degrees[i - 1], xs[i], degrees[i]);
    totalArea += segment.area;
    totalMoment += segment.moment;
  }

  if (totalArea <= 0) {
    return null;
  }
  return totalMoment / totalArea;
}

/**
 * Run the full pipeline
 *
 * When no rule fires the output falls back to the universe minimum and
 * `fallback` is set.
 *
 * @param system - Validated rule base (see validateFuzzySystem)
 * @param values - Crisp readings keyed by input variable name
 */
export function infer(system: FuzzySystem, values: CrispInputs): InferenceResult {
  const { clamped, fuzzified } = fuzzifyInputs(system, values);
  const activations = evaluateRules(system.rules, fuzzified);
  const aggregate = aggregateActivations(system.output, activations);
  const centroid = defuzzifyCentroid(aggregate);

  return {
    value: centroid === null ? system.output.universe.min : centroid,
    fallback: centroid === null,
    clampedInputs: clamped,
    fuzzified: fuzzified,
    activations: activations,
    aggregate: aggregate
  };
}
