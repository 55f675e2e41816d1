/**
 * Configuration validators
 *
 * Collect every problem in one pass so a bad rule base is reported once,
 * at load time, with all of its issues.
 */

import { isFiniteNumber } from '@utils/number';
import type { GameRules } from '@core/turn-move/types';
import type { FuzzySystem } from '@core/inference/types';
import type { LinguisticVariable, MembershipShape } from '@core/membership/types';
import {
  addError,
  addWarning,
  validateFinite,
  validateIntegerRange,
  validateNonEmptyString
} from './helpers';
import type { ValidationIssue, ValidationResult } from './types';

/** Above this many output samples defuzzification gets slow for no gain */
const MAX_RECOMMENDED_SAMPLES = 10000;

export function validateGameRules(rules: GameRules): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  validateIntegerRange(rules.target, 'target', 2, 1000, errors, warnings);
  validateIntegerRange(rules.maxSay, 'maxSay', 1, 100, errors, warnings);

  if (errors.length === 0 && rules.maxSay >= rules.target) {
    addError(errors, 'maxSay', `maxSay must be less than target (got ${rules.maxSay} >= ${rules.target})`);
  }

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}

function validateShape(
  shape: MembershipShape,
  variable: LinguisticVariable,
  field: string,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): void {
  const points: readonly number[] = shape.points;
  const expected = shape.kind === 'triangular' ? 3 : 4;
  if (points.length !== expected) {
    addError(errors, field, `${shape.kind} shape needs ${expected} breakpoints (got ${points.length})`);
    return;
  }

  let finite = true;
  points.forEach(function(point, i) {
    if (!validateFinite(point, `${field}.points[${i}]`, errors)) {
      finite = false;
    }
  });
  if (!finite) return;

  for (let i = 1; i < points.length; i++) {
    if (points[i] < points[i - 1]) {
      addError(errors, field, `breakpoints must be non-decreasing (got ${points.join(', ')})`);
      return;
    }
  }

  const first = points[0];
  const last = points[points.length - 1];
  if (first === last) {
    addError(errors, field, `shape has zero width (got ${points.join(', ')})`);
    return;
  }

  if (first < variable.universe.min || last > variable.universe.max) {
    addWarning(
      warnings,
      field,
      `breakpoints extend outside universe ${variable.universe.min}-${variable.universe.max}`
    );
  }
}

function validateVariable(
  variable: LinguisticVariable,
  field: string,
  errors: ValidationIssue[],
  warnings: ValidationIssue[]
): void {
  validateNonEmptyString(variable.name, `${field}.name`, errors);

  const minOk = validateFinite(variable.universe.min, `${field}.universe.min`, errors);
  const maxOk = validateFinite(variable.universe.max, `${field}.universe.max`, errors);
  if (minOk && maxOk && variable.universe.min >= variable.universe.max) {
    addError(
      errors,
      `${field}.universe`,
      `universe min must be less than max (got ${variable.universe.min}-${variable.universe.max})`
    );
    return;
  }

  const names = Object.keys(variable.categories);
  if (names.length === 0) {
    addError(errors, `${field}.categories`, 'at least one category is required');
    return;
  }

  names.forEach(function(name) {
    validateShape(variable.categories[name], variable, `${field}.categories.${name}`, errors, warnings);
  });
}

/**
 * Validate a fuzzy rule base
 *
 * Errors: bad universes or breakpoints, duplicate names, rules that reference
 * unknown variables or categories, an empty rule list.
 * Warnings: breakpoints outside the universe, very fine output resolution,
 * output categories or input variables no rule uses.
 */
export function validateFuzzySystem(system: FuzzySystem): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  validateNonEmptyString(system.version, 'version', errors);

  if (system.inputs.length === 0) {
    addError(errors, 'inputs', 'at least one input variable is required');
  }

  const inputsByName = new Map<string, LinguisticVariable>();
  system.inputs.forEach(function(variable, i) {
    const field = `inputs[${i}]`;
    validateVariable(variable, field, errors, warnings);
    if (inputsByName.has(variable.name) || variable.name === system.output.name) {
      addError(errors, `${field}.name`, `duplicate variable name "${variable.name}"`);
    }
    inputsByName.set(variable.name, variable);
  });

  validateVariable(system.output, 'output', errors, warnings);
  const span = system.output.universe.max - system.output.universe.min;
  const resolution = system.output.resolution;
  if (span > 0) {
    if (!isFiniteNumber(resolution) || resolution <= 0 || resolution > span) {
      addError(
        errors,
        'output.resolution',
        `output.resolution must be greater than 0 and at most ${span} (got ${resolution})`
      );
    } else if (span / resolution > MAX_RECOMMENDED_SAMPLES) {
      addWarning(
        warnings,
        'output.resolution',
        `output.resolution gives more than ${MAX_RECOMMENDED_SAMPLES} samples (got ${resolution})`
      );
    }
  }

  if (system.rules.length === 0) {
    addError(errors, 'rules', 'at least one rule is required');
  }

  const ruleIds = new Set<string>();
  const usedVariables = new Set<string>();
  const usedConsequents = new Set<string>();

  system.rules.forEach(function(rule, i) {
    const field = `rules[${i}]`;
    validateNonEmptyString(rule.id, `${field}.id`, errors);
    if (ruleIds.has(rule.id)) {
      addError(errors, `${field}.id`, `duplicate rule id "${rule.id}"`);
    }
    ruleIds.add(rule.id);

    if (rule.when.length === 0) {
      addError(errors, `${field}.when`, 'rule needs at least one condition');
    }

    rule.when.forEach(function(condition, j) {
      const conditionField = `${field}.when[${j}]`;
      const variable = inputsByName.get(condition.variable);
      if (variable === undefined) {
        addError(errors, conditionField, `unknown input variable "${condition.variable}"`);
        return;
      }
      usedVariables.add(condition.variable);
      if (!Object.prototype.hasOwnProperty.call(variable.categories, condition.category)) {
        addError(
          errors,
          conditionField,
          `unknown category "${condition.category}" for variable "${condition.variable}"`
        );
      }
    });

    if (!Object.prototype.hasOwnProperty.call(system.output.categories, rule.then)) {
      addError(errors, `${field}.then`, `unknown output category "${rule.then}"`);
    } else {
      usedConsequents.add(rule.then);
    }
  });

  Object.keys(system.output.categories).forEach(function(name) {
    if (!usedConsequents.has(name)) {
      addWarning(warnings, `output.categories.${name}`, `no rule concludes "${name}"`);
    }
  });

  inputsByName.forEach(function(_variable, name) {
    if (!usedVariables.has(name)) {
      addWarning(warnings, 'inputs', `no rule reads input variable "${name}"`);
    }
  });

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
