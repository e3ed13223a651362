/**
 * Raised while a guard is being assembled: unknown detector ids, unreadable or
 * malformed policies and config files, invalid custom patterns.
 */
export class ConfigurationError extends Error {
  readonly source?: string;

  constructor(message: string, options: { source?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ConfigurationError';
    this.source = options.source;
  }
}

/** A detector produced a match that does not describe a slice of its input. */
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class MappingConflictError extends Error {
  readonly placeholder: string;

  constructor(placeholder: string) {
    super(`Placeholder ${placeholder} is already mapped to a different value`);
    this.name = 'MappingConflictError';
    this.placeholder = placeholder;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
