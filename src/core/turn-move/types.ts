/**
 * Turn-move selector type definitions
 */

/**
 * Counting-game rules
 */
export interface GameRules {
  /** Number that loses when spoken (21) */
  readonly target: number;

  /** Most consecutive numbers one turn may speak (3); the least is always 1 */
  readonly maxSay: number;
}
