export type DocsErrorKind = 'config' | 'input' | 'output';

export class DocsError extends Error {
  constructor(
    message: string,
    public readonly kind: DocsErrorKind,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends DocsError {
  constructor(details?: unknown) {
    super('Invalid documentation config', 'config', details);
  }
}

/** Primary input missing or unparseable; the run stops before any output is written. */
export class InputError extends DocsError {
  constructor(message: string, details?: unknown) {
    super(message, 'input', details);
  }
}

export class OutputError extends DocsError {
  constructor(message: string, details?: unknown) {
    super(message, 'output', details);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof DocsError) {
    return error.details === undefined
      ? `${error.name}: ${error.message}`
      : `${error.name}: ${error.message} ${JSON.stringify(error.details)}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
