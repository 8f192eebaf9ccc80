// Utilities: Custom error types
// Thrown only for unexpected failures; expected outcomes travel as EngineResult values

export class StoreUnavailableError extends Error {
  statusCode = 503;
  code = 'STORE_UNAVAILABLE';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'StoreUnavailableError';
    this.details = details;
  }
}

export class DataIntegrityError extends Error {
  statusCode = 500;
  code = 'DATA_INTEGRITY';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DataIntegrityError';
    this.details = details;
  }
}

export class ConfigurationError extends Error {
  statusCode = 500;
  code = 'CONFIGURATION_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ConfigurationError';
    this.details = details;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Details of an engine error as one log field
 */
export function describeErrorDetails(error: unknown): string | undefined {
  if (
    error instanceof StoreUnavailableError
    || error instanceof DataIntegrityError
    || error instanceof ConfigurationError
  ) {
    return error.details === undefined ? undefined : JSON.stringify(error.details);
  }
  return undefined;
}
