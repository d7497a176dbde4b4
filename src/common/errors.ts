/**
 * Domain errors raised by the order and job stores.
 * DomainExceptionFilter turns them into HTTP responses.
 */
export abstract class DomainError extends Error {
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed or missing input (400)
 */
export class DomainValidationError extends DomainError {
  readonly statusCode = 400;

  constructor(message: string, code = 'VALIDATION_FAILED') {
    super(message, code);
  }
}

/**
 * Unknown order or job id (404)
 */
export class NotFoundError extends DomainError {
  readonly statusCode = 404;

  constructor(message: string, code = 'NOT_FOUND') {
    super(message, code);
  }
}

/**
 * Illegal state transition. The public contract reports it as 400, not 409.
 */
export class ConflictError extends DomainError {
  readonly statusCode = 400;

  constructor(message: string, code = 'INVALID_STATE') {
    super(message, code);
  }
}
