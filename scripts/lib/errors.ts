export class DigestError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'DigestError';
  }
}

export class ConfigurationError extends DigestError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/** Failure reported by Telegram or the language-model API. */
export class CollaboratorError extends DigestError {
  constructor(
    message: string,
    public readonly step: string,
    public readonly channel?: string,
    cause?: unknown
  ) {
    super(message, 'COLLABORATOR_ERROR', cause);
    this.name = 'CollaboratorError';
  }
}

export class FilesystemError extends DigestError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(message, 'FILESYSTEM_ERROR', cause);
    this.name = 'FilesystemError';
  }
}

export class TimeoutError extends DigestError {
  constructor(operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends DigestError {
  constructor(operation: string) {
    super(`${operation} was cancelled`, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export function describeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof DigestError ? error.code : 'UNKNOWN';
  return `(${code}) ${message}`;
}
