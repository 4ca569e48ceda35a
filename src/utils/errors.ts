export class AppError extends Error {
  public readonly errorCode: string;
  public readonly statusCode: number;
  public readonly details: unknown;

  constructor(errorCode: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.errorCode = errorCode;
    this.statusCode = statusCode;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

export const ErrorCode = {
  BadRequest: 'BadRequest',
  Unauthorized: 'Unauthorized',
  NotFound: 'NotFound',
  InternalServerError: 'InternalServerError',
  ValidationError: 'ValidationError',
  // Conversational taxonomy. Everything below except InvariantViolation is
  // recovered into a composed reply and never reaches the caller of a turn.
  ReferenceAmbiguous: 'ReferenceAmbiguous',
  ReferenceNotFound: 'ReferenceNotFound',
  SlotMissing: 'SlotMissing',
  SlotInvalid: 'SlotInvalid',
  IntentUnrecognized: 'IntentUnrecognized',
  StorageUnavailable: 'StorageUnavailable',
  ClassificationTimeout: 'ClassificationTimeout',
  ClassificationMalformed: 'ClassificationMalformed',
  TurnCancelled: 'TurnCancelled',
  InvariantViolation: 'InvariantViolation',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(ErrorCode.NotFound, message, 404, details);
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(ErrorCode.ValidationError, message, 400, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized', details?: unknown) {
    super(ErrorCode.Unauthorized, message, 401, details);
  }
}

export class StorageUnavailableError extends AppError {
  constructor(message = 'The storage backend is unavailable', details?: unknown) {
    super(ErrorCode.StorageUnavailable, message, 503, details);
  }
}

export class ClassificationTimeoutError extends AppError {
  constructor(message = 'Intent classification timed out', details?: unknown) {
    super(ErrorCode.ClassificationTimeout, message, 504, details);
  }
}

export class TurnCancelledError extends AppError {
  constructor(message = 'The turn was cancelled by the caller', details?: unknown) {
    super(ErrorCode.TurnCancelled, message, 499, details);
  }
}

/**
 * A programming defect, e.g. a mutation reached with an unresolved task reference.
 * Never recovered: it propagates out of the turn.
 */
export class InvariantViolationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.InvariantViolation, message, 500, details);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
