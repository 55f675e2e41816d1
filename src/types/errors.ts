/**
 * Global error types for the decision engines
 * Custom errors for validation, state and configuration violations
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a decision is requested from a state the rules cannot reach
 * (e.g. a running total outside [0, target - 1])
 */
export class InvalidStateError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateError';
  }
}

/**
 * Error thrown when a move breaks the counting-game rules
 */
export class InvalidMoveError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMoveError';
  }
}

/**
 * Error thrown when an injected random source returns a value outside [0, 1)
 */
export class RandomSourceError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'RandomSourceError';
  }
}

/**
 * Error thrown when game rules configuration is invalid
 */
export class GameRulesConfigError extends ValidationError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('Invalid game rules: ' + issues.join('; '));
    this.name = 'GameRulesConfigError';
    this.issues = issues;
  }
}

/**
 * Error thrown when a fuzzy rule base (variables, categories or rules) is invalid
 */
export class RuleBaseConfigError extends ValidationError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('Invalid rule base: ' + issues.join('; '));
    this.name = 'RuleBaseConfigError';
    this.issues = issues;
  }
}
