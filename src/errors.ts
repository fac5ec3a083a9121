/**
 * Error types
 *
 * - ConfigurationError: rejected run settings, raised before any generation
 * - LayoutError: a layout or key space that is not what it claims to be
 * - InvariantError: an operator failed to produce a permutation
 */

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutError';
  }
}

export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}
