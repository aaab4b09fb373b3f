export type ErrorCode =
  | 'VALIDATION'
  | 'INVALID_SLOT'
  | 'PAST_BOOKING'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'INVALID_PAGE';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code: ErrorCode,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, 'VALIDATION');
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class InvalidSlotError extends AppError {
  constructor(message: string = 'Appointments must start on a half-hour slot within business hours.') {
    super(422, message, 'INVALID_SLOT');
    Object.setPrototypeOf(this, InvalidSlotError.prototype);
  }
}

export class PastBookingError extends AppError {
  constructor(message: string = 'Cannot book an appointment in the past.') {
    super(422, message, 'PAST_BOOKING');
    Object.setPrototypeOf(this, PastBookingError.prototype);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'This time slot has already been booked.') {
    super(409, message, 'CONFLICT');
    Object.setPrototypeOf(this, ConflictError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Appointment not found.') {
    super(404, message, 'NOT_FOUND');
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InvalidPageError extends AppError {
  constructor(message: string = 'page must be a non-negative integer.') {
    super(400, message, 'INVALID_PAGE');
    Object.setPrototypeOf(this, InvalidPageError.prototype);
  }
}

/**
 * Raised by the store when a write trips the one-active-booking-per-slot index.
 * Internal only: the conflict guard turns it into a ConflictError.
 */
export class ConstraintViolationError extends Error {
  constructor(
    public constraint: string | undefined,
    public originalError: Error
  ) {
    super(`Constraint violated${constraint ? `: ${constraint}` : ''}: ${originalError.message}`);
    Object.setPrototypeOf(this, ConstraintViolationError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
