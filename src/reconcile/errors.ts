/**
 * Error classes for reconciliation input
 * Input errors abort a run before any cluster call is made
 */

// =============================================================================
// Error Codes
// =============================================================================

export type InputErrorCode =
  | 'MISSING_IDENTITY_FIELD'
  | 'MALFORMED_MANIFEST'
  | 'DUPLICATE_IDENTITY'
  | 'UNRESOLVABLE_ORDERING'
  | 'SOURCE_NOT_FOUND'
  | 'SOURCE_PARSE_ERROR';

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base error for invalid desired state
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly code: InputErrorCode,
    public readonly suggestion?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'InputError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error [${this.code}]: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * A node of the manifest tree is not a resource object
 */
export class MalformedManifestError extends InputError {
  constructor(
    public readonly treePath: string,
    detail: string
  ) {
    super(
      `Malformed manifest at ${treePath}: ${detail}`,
      'MALFORMED_MANIFEST',
      'Every document must be an object with apiVersion, kind and metadata.name, a list of such objects, or a List kind with items'
    );
    this.name = 'MalformedManifestError';
  }
}

/**
 * Two manifests resolve to the same identity
 */
export class DuplicateIdentityError extends InputError {
  constructor(
    public readonly key: string,
    public readonly treePaths: [string, string]
  ) {
    super(
      `Duplicate object ${key} at ${treePaths[0]} and ${treePaths[1]}`,
      'DUPLICATE_IDENTITY',
      'Remove one of the definitions or give them distinct names'
    );
    this.name = 'DuplicateIdentityError';
  }
}

/**
 * Declared kind dependencies form a cycle
 */
export class UnresolvableOrderingError extends InputError {
  constructor(public readonly cycle: string[]) {
    super(
      `Kind dependencies form a cycle: ${cycle.join(' -> ')}`,
      'UNRESOLVABLE_ORDERING',
      'Remove one of the declared kind dependencies in the cycle'
    );
    this.name = 'UnresolvableOrderingError';
  }
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}
