/**
 * Membership function type definitions
 *
 * A linguistic variable ("soil_moisture") owns a numeric universe and a set of
 * named categories ("dry", "moist", "wet"), each with a membership shape.
 */

/** Breakpoints a, b, c: rises from a to a peak at b, falls to c */
export type TriangularPoints = readonly [number, number, number];

/** Breakpoints a, b, c, d: rises from a to b, flat to c, falls to d */
export type TrapezoidalPoints = readonly [number, number, number, number];

export type MembershipShape =
  | { readonly kind: 'triangular'; readonly points: TriangularPoints }
  | { readonly kind: 'trapezoidal'; readonly points: TrapezoidalPoints };

/**
 * Numeric domain of a variable; readings are clamped into it
 */
export interface Universe {
  readonly min: number;
  readonly max: number;
}

export interface LinguisticVariable {
  /** Identifier used by rules, e.g. "soil_moisture" */
  readonly name: string;

  /** Display unit, e.g. "%" */
  readonly unit: string;

  readonly universe: Universe;

  /** Category name -> membership shape */
  readonly categories: Readonly<Record<string, MembershipShape>>;
}

/**
 * Output variable; its universe is sampled every `resolution` units for
 * aggregation and defuzzification
 */
export interface OutputVariable extends LinguisticVariable {
  readonly resolution: number;
}

/**
 * Category name -> membership degree in [0, 1]
 */
export type MembershipDegrees = Record<string, number>;

/**
 * Result of fuzzifying one reading
 */
export interface FuzzifiedReading {
  /** Reading after clamping into the universe */
  value: number;
  degrees: MembershipDegrees;
}
