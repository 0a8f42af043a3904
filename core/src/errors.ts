/**
 * Error taxonomy shared by the server and the reconcilers.
 * `code` is the wire value of `{ error }` bodies.
 */

export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'BAD_REQUEST'
  | 'PAYLOAD_TOO_LARGE'
  | 'INTERNAL_ERROR';

export class ModsyncError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly status: number,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'ModsyncError';
  }
}

export class AuthenticationError extends ModsyncError {
  constructor(message = 'Invalid API key', cause?: unknown) {
    super(message, 'UNAUTHORIZED', 401, cause);
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends ModsyncError {
  constructor(message = 'Not found', cause?: unknown) {
    super(message, 'NOT_FOUND', 404, cause);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends ModsyncError {
  constructor(message = 'Already exists', cause?: unknown) {
    super(message, 'ALREADY_EXISTS', 400, cause);
    this.name = 'AlreadyExistsError';
  }
}

export class BadRequestError extends ModsyncError {
  constructor(message = 'Bad request', cause?: unknown) {
    super(message, 'BAD_REQUEST', 400, cause);
    this.name = 'BadRequestError';
  }
}

export class PayloadTooLargeError extends ModsyncError {
  constructor(message = 'Payload too large', cause?: unknown) {
    super(message, 'PAYLOAD_TOO_LARGE', 413, cause);
    this.name = 'PayloadTooLargeError';
  }
}

/** Any other non-2xx answer from the server */
export class ServerError extends ModsyncError {
  constructor(message: string, status: number, cause?: unknown) {
    super(message, 'INTERNAL_ERROR', status, cause);
    this.name = 'ServerError';
  }
}

/** The request never produced a response */
export class NetworkError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'NetworkError';
  }
}

/** A persisted local state file exists but cannot be parsed */
export class StateFileError extends Error {
  constructor(message: string, public readonly filePath: string, public cause?: unknown) {
    super(message);
    this.name = 'StateFileError';
  }
}

export class IntegrityError extends Error {
  constructor(
    message: string,
    public readonly expectedHash: string,
    public readonly actualHash: string
  ) {
    super(message);
    this.name = 'IntegrityError';
  }
}

export class RunLockedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RunLockedError';
  }
}

/** Missing or invalid configuration */
export class ConfigurationError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
