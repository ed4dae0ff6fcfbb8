// Start-up faults: the service must not serve rankings after one of these.
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFileError';
  }
}

export class DocumentLoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DocumentLoadError';
    this.filePath = filePath;
  }
}

export class SessionClosedError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} has been cleaned up and no longer accepts work.`);
    this.name = 'SessionClosedError';
    this.sessionId = sessionId;
  }
}

export class SessionCleanupError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionCleanupError';
    this.sessionId = sessionId;
  }
}

export class VectorIndexError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VectorIndexError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
