/**
 * Error hierarchy for sprintdeck.
 * Every failure an Effect can produce carries a literal `_tag`, so callers can use `Effect.catchTag`.
 */

export abstract class SprintdeckError extends Error {
  abstract readonly _tag: string;
  abstract readonly module: string;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ============= Configuration Errors =============
export class ConfigError extends SprintdeckError {
  readonly _tag = 'ConfigError';
  readonly module = 'config';
}

export class FileError extends SprintdeckError {
  readonly _tag = 'FileError';
  readonly module = 'config';
}

export class ParseError extends SprintdeckError {
  readonly _tag = 'ParseError';
  readonly module = 'validation';
}

// ============= Validation Errors =============
export class ValidationError extends SprintdeckError {
  readonly _tag = 'ValidationError';
  readonly module = 'validation';

  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class InvalidLabelError extends SprintdeckError {
  readonly _tag = 'InvalidLabelError';
  readonly module = 'validation';

  constructor(
    public readonly component: string,
    public readonly label: string,
  ) {
    super(`Label '${label}' is not valid for component '${component}'`);
  }
}

export class IndexError extends SprintdeckError {
  readonly _tag = 'IndexError';
  readonly module = 'validation';

  constructor(
    public readonly index: number,
    public readonly size: number,
  ) {
    super(size === 0 ? `No entry ${index}: the table is empty` : `No entry ${index}: pick a number from 1 to ${size}`);
  }
}

// ============= Network Errors =============
export class NetworkError extends SprintdeckError {
  readonly _tag = 'NetworkError';
  readonly module = 'network';

  constructor(
    message: string,
    public readonly status?: number,
    public readonly url?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class TimeoutError extends SprintdeckError {
  readonly _tag = 'TimeoutError';
  readonly module = 'network';
}

// ============= Auth Errors =============
export class AuthenticationError extends SprintdeckError {
  readonly _tag = 'AuthenticationError';
  readonly module = 'auth';
}

export class CaptchaRequiredError extends SprintdeckError {
  readonly _tag = 'CaptchaRequiredError';
  readonly module = 'auth';

  constructor(
    message: string,
    public readonly loginUrl: string,
  ) {
    super(message);
  }
}

// ============= Tracker Errors =============
export class NotFoundError extends SprintdeckError {
  readonly _tag = 'NotFoundError';
  readonly module = 'jira';

  constructor(
    message: string,
    public readonly kind?: 'sprint' | 'component' | 'status' | 'board' | 'project' | 'issue',
    public readonly query?: string,
  ) {
    super(message);
  }
}

/**
 * The server refused a request body or parameter; `messages` holds its error text verbatim.
 */
export class RemoteValidationError extends SprintdeckError {
  readonly _tag = 'RemoteValidationError';
  readonly module = 'jira';

  constructor(
    message: string,
    public readonly status: number,
    public readonly messages: readonly string[] = [],
  ) {
    super(message);
  }
}

export type TransportError = NetworkError | TimeoutError | AuthenticationError | CaptchaRequiredError | ConfigError;

export type RequestError = TransportError | NotFoundError | RemoteValidationError;
