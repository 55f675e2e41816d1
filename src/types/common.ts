/**
 * Common type definitions used throughout the project
 */

/**
 * Source of uniformly distributed numbers in [0, 1)
 * Injected wherever a decision needs randomness, so tests can substitute a fixed sequence
 */
export type RandomSource = () => number;

/**
 * Percentage reading (0-100)
 */
export type Percent = number;

/**
 * Temperature in °C
 */
export type Celsius = number;

/**
 * Duration in minutes
 */
export type Minutes = number;

/**
 * Participant in a counting-game round
 */
export type Player = 'human' | 'computer';
