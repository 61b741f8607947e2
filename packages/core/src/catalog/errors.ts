/**
 * Catalog Errors
 *
 * Shared error classes for the pattern catalog and runner.
 *
 * @module catalog/errors
 */

/**
 * Error thrown when a pattern identifier is not part of the catalog
 */
export class UnknownPatternError extends Error {
  constructor(
    public readonly patternId: string,
    public readonly knownPatterns: readonly string[] = []
  ) {
    super(`Unknown pattern: ${patternId}`);
    this.name = 'UnknownPatternError';
  }
}

/**
 * Error thrown when a demonstration's input fails validation
 */
export class InvalidPatternInputError extends Error {
  constructor(
    public readonly patternId: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid input for pattern ${patternId}: ${issues.join('; ')}`);
    this.name = 'InvalidPatternInputError';
  }
}

/**
 * Error thrown when registering a demonstration under an id that is taken
 */
export class PatternAlreadyRegisteredError extends Error {
  constructor(public readonly patternId: string) {
    super(`Pattern already registered: ${patternId}`);
    this.name = 'PatternAlreadyRegisteredError';
  }
}
