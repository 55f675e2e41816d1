/**
 * Membership functions
 *
 * Piecewise-linear fuzzy sets over a numeric universe. A repeated breakpoint
 * makes a shoulder: trapezoid (0, 0, 20, 40) is fully "dry" from 0 to 20.
 */

import { clamp } from '@utils/number';
import type {
  FuzzifiedReading,
  LinguisticVariable,
  MembershipDegrees,
  MembershipShape,
  TrapezoidalPoints,
  TriangularPoints
} from './types';

/**
 * Triangular membership: 0 outside [a, c], 1 at b, linear in between
 */
export function triangular(x: number, points: TriangularPoints): number {
  const [a, b, c] = points;
  if (x < a || x > c) return 0;
  if (x === b) return 1;
  if (x < b) return (x - a) / (b - a);
  return (c - x) / (c - b);
}

/**
 * Trapezoidal membership: 0 outside [a, d], 1 on [b, c], linear ramps
 */
export function trapezoidal(x: number, points: TrapezoidalPoints): number {
  const [a, b, c, d] = points;
  if (x < a || x > d) return 0;
  if (x >= b && x <= c) return 1;
  if (x < b) return (x - a) / (b - a);
  return (d - x) / (d - c);
}

export function evaluateMembership(shape: MembershipShape, x: number): number {
  switch (shape.kind) {
    case 'triangular':
      return triangular(x, shape.points);
    case 'trapezoidal':
      return trapezoidal(x, shape.points);
  }
}

/**
 * Degree of every category of a variable at x (x is not clamped here)
 */
export function categoryDegrees(variable: LinguisticVariable, x: number): MembershipDegrees {
  const degrees: MembershipDegrees = {};
  for (const name of Object.keys(variable.categories)) {
    degrees[name] = evaluateMembership(variable.categories[name], x);
  }
  return degrees;
}

/**
 * Fuzzify one reading
 *
 * The reading is clamped into the variable's universe first, so a sensor
 * reporting 110% soil moisture counts as fully wet rather than failing.
 * NaN clamps to the universe minimum.
 */
export function fuzzifyVariable(variable: LinguisticVariable, value: number): FuzzifiedReading {
  const clamped = clamp(value, variable.universe.min, variable.universe.max);
  return {
    value: clamped,
    degrees: categoryDegrees(variable, clamped)
  };
}
