export class TreadmillError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TreadmillError';
    this.code = code;

    if (options.context !== undefined) {
      this.context = options.context;
    }
  }
}

/**
 * Raised by device calls. Reported to the user, never fatal.
 */
export class TransportError extends TreadmillError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

/**
 * Raised while reading configuration at startup. Fatal.
 */
export class ConfigurationError extends TreadmillError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
