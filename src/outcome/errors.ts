export class OwnlintError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "OwnlintError";
  }
}

/**
 * The analysis reached a state its own algorithms should never produce.
 * Never reported as a Diagnostic.
 */
export class InternalInvariantError extends OwnlintError {
  constructor(
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message, "INTERNAL_INVARIANT");
    this.name = "InternalInvariantError";
  }
}

export interface FormatProblem {
  path: string;
  message: string;
}

export class DeclarationFormatError extends OwnlintError {
  constructor(
    message: string,
    public readonly problems: FormatProblem[]
  ) {
    super(message, "INVALID_DECLARATIONS");
    this.name = "DeclarationFormatError";
  }
}

export class ConfigError extends OwnlintError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

export function invariant(condition: unknown, message: string, details?: Record<string, unknown>): asserts condition {
  if (!condition) {
    throw new InternalInvariantError(message, details);
  }
}
