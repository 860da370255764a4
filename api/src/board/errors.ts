/**
 * Board error taxonomy
 *
 * Every error aborts the whole call. `reason` is a stable tag clients can
 * switch on; `statusCode` is what the HTTP layer answers with.
 */

export abstract class BoardError extends Error {
  public abstract readonly statusCode: number;
  public readonly reason: string;

  constructor(reason: string, message: string) {
    super(message);
    this.reason = reason;
  }
}

/**
 * Malformed or insufficient input: bad handle, underfunded reward,
 * empty result, tampered payload
 */
export class ValidationError extends BoardError {
  public readonly statusCode = 400;

  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'ValidationError';
  }
}

/**
 * Operation not valid for the request's lifecycle position
 */
export class StateError extends BoardError {
  public readonly statusCode = 409;

  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'StateError';
  }
}

/**
 * Signature, VRF or sortition check failed, or caller not an active reporter
 */
export class AuthorizationError extends BoardError {
  public readonly statusCode = 403;

  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'AuthorizationError';
  }
}

/**
 * Inclusion or result proof rejected by the block relay
 */
export class ProofError extends BoardError {
  public readonly statusCode = 422;

  constructor(reason: string, message: string) {
    super(reason, message);
    this.name = 'ProofError';
  }
}

export function isBoardError(error: unknown): error is BoardError {
  return error instanceof BoardError;
}
