/**
 * Inference helper functions
 */

import { InvalidStateError } from '$types/errors';
import { evaluateMembership } from '@core/membership';
import type { MembershipShape, OutputVariable, Universe } from '@core/membership';
import type { RuleCondition, FuzzifiedInputs } from './types';

/**
 * Sample positions over a universe: min, min + step, ... and always max
 *
 * When the step does not divide the span evenly the last interval is shorter.
 */
export function sampleUniverse(universe: Universe, step: number): number[] {
  const xs: number[] = [];
  const count = Math.floor((universe.max - universe.min) / step + 1e-9);
  for (let i = 0; i <= count; i++) {
    xs.push(universe.min + i * step);
  }
  if (universe.max - xs[xs.length - 1] > step * 1e-9) {
    xs.push(universe.max);
  }
  return xs;
}

/**
 * Positions between adjacent samples where the shape crosses the given level,
 * found by linear interpolation
 */
export function clipCrossings(xs: readonly number[], shape: MembershipShape, level: number): number[] {
  const crossings: number[] = [];
  for (let i = 0; i + 1 < xs.length; i++) {
    const m1 = evaluateMembership(shape, xs[i]);
    const m2 = evaluateMembership(shape, xs[i + 1]);
    if ((m1 - level) * (m2 - level) < 0) {
      crossings.push(xs[i] + ((level - m1) * (xs[i + 1] - xs[i])) / (m2 - m1));
    }
  }
  return crossings;
}

/**
 * Sorted union of two position lists without duplicates
 */
export function mergeSamples(xs: readonly number[], extra: readonly number[]): number[] {
  const sorted = xs.concat(extra).sort(function(a, b) { return a - b; });
  const merged: number[] = [];
  for (const x of sorted) {
    if (merged.length === 0 || x - merged[merged.length - 1] > 1e-9) {
      merged.push(x);
    }
  }
  return merged;
}

/**
 * Degree of one antecedent, complemented when negated
 * @throws {InvalidStateError} If the variable or category was never fuzzified
 */
export function conditionDegree(condition: RuleCondition, fuzzified: FuzzifiedInputs): number {
  const degrees = fuzzified[condition.variable];
  if (degrees === undefined || degrees[condition.category] === undefined) {
    throw new InvalidStateError(
      'No membership degree for ' + condition.variable + ' IS ' + condition.category
    );
  }
  const degree = degrees[condition.category];
  return condition.negated ? 1 - degree : degree;
}

/**
 * Shape of an output category named by a rule consequent
 * @throws {InvalidStateError} If the output has no such category
 */
export function consequentShape(output: OutputVariable, category: string): MembershipShape {
  if (!Object.prototype.hasOwnProperty.call(output.categories, category)) {
    throw new InvalidStateError('No output category ' + output.name + ' IS ' + category);
  }
  return output.categories[category];
}

/**
 * Area and first moment of the segment from (x1, y1) to (x2, y2) under a
 * piecewise-linear curve
 */
export function segmentMoment(
  x1: number,
  y1: number,
  x2: number,
  y2: number
): { area: number; moment: number } {
  const width = x2 - x1;
  if (width <= 0 || (y1 === 0 && y2 === 0)) {
    return { area: 0, moment: 0 };
  }
  const area = 0.5 * width * (y1 + y2);
  // Centroid of a trapezoid measured from x1: w * (y1 + 2 * y2) / (3 * (y1 + y2))
  const centroid = x1 + (width * (y1 + 2 * y2)) / (3 * (y1 + y2));
  return { area: area, moment: area * centroid };
}
