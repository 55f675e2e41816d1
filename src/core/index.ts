/**
 * Core algorithms
 *
 * Pure functions with no logging and no I/O:
 * - turn-move: Move selection for "Don't Say 21"
 * - membership: Fuzzy membership shapes and fuzzification
 * - inference: Rule evaluation, aggregation and centroid defuzzification
 */

export * from './turn-move';
export * from './membership';
export * from './inference';
