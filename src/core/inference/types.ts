/**
 * Fuzzy inference type definitions
 */

import type { LinguisticVariable, MembershipDegrees, OutputVariable } from '@core/membership';

/**
 * One antecedent: "<variable> IS [NOT] <category>"
 */
export interface RuleCondition {
  readonly variable: string;
  readonly category: string;
  /** Use the complement (1 - degree) of the category */
  readonly negated?: boolean;
}

/**
 * IF every condition holds (min T-norm) THEN output IS <then>
 */
export interface FuzzyRule {
  readonly id: string;
  readonly description: string;
  readonly when: readonly RuleCondition[];
  /** Output category */
  readonly then: string;
}

/**
 * Complete rule base: a versioned configuration artifact
 */
export interface FuzzySystem {
  readonly version: string;
  readonly inputs: readonly LinguisticVariable[];
  readonly output: OutputVariable;
  readonly rules: readonly FuzzyRule[];
}

/**
 * Crisp readings keyed by input variable name
 */
export type CrispInputs = Readonly<Record<string, number>>;

/**
 * Membership degrees keyed by input variable name
 */
export type FuzzifiedInputs = Record<string, MembershipDegrees>;

export interface RuleActivation {
  ruleId: string;
  /** Output category the rule implies */
  consequent: string;
  /** Firing strength in [0, 1] */
  strength: number;
}

/**
 * Aggregate output set sampled over the output universe
 */
export interface AggregateSet {
  /** Sample positions, ascending */
  xs: number[];
  /** Degree at each sample */
  degrees: number[];
}

export interface InferenceResult {
  /** Crisp output value */
  value: number;

  /** True when no rule fired and `value` is the output universe minimum */
  fallback: boolean;

  /** Readings after clamping, keyed by variable name */
  clampedInputs: Record<string, number>;

  fuzzified: FuzzifiedInputs;
  activations: RuleActivation[];
  aggregate: AggregateSet;
}
