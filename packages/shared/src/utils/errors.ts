export class SpurnError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SpurnError';
  }
}

/**
 * A broken internal invariant. Never converted into a user-facing query error:
 * it propagates through the dispatcher so the defect surfaces.
 */
export class InvariantViolation extends SpurnError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolation';
  }
}

export class ServiceUnavailableError extends SpurnError {
  constructor(
    message: string,
    public readonly service: string,
    cause?: Error,
  ) {
    super(message, 'SERVICE_UNAVAILABLE', cause);
    this.name = 'ServiceUnavailableError';
  }
}

export class PersistenceError extends SpurnError {
  constructor(message: string, cause?: Error) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class SchemaValidationError extends SpurnError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends SpurnError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}
