/**
 * Number utilities
 *
 * Value checks and range helpers shared by validation and the
 * decision algorithms.
 */

/**
 * Check if a value is a finite number
 *
 * Unlike global isFinite(), this does NOT coerce to number first.
 * - isFiniteNumber(null) = false
 * - isFiniteNumber("5") = false
 * - isFinite("5") = true (coerces to number)
 */
export function isFiniteNumber(value: unknown): boolean {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Check if a value is an integer
 */
export function isInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value);
}

/**
 * Clamp a value into [min, max]
 *
 * NaN has no position in the range and maps to `min`.
 * Infinities map to the matching bound.
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
