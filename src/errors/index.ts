/**
 * Standardized Error Types for the Marketplace Ledger
 *
 * Every ledger failure aborts the whole operation and surfaces as one of the
 * categories below. Each class carries an HTTP status so the API layer can
 * render it without a lookup table.
 */

export enum ErrorCode {
  // Authorization
  UNAUTHORIZED = 'UNAUTHORIZED',
  INVALID_TOKEN = 'INVALID_TOKEN',

  // Lookup
  NOT_FOUND = 'NOT_FOUND',

  // Lifecycle
  INVALID_STATE = 'INVALID_STATE',

  // Input
  INVALID_INPUT = 'INVALID_INPUT',
  VALIDATION_FAILED = 'VALIDATION_FAILED',

  // Value movement
  TRANSFER_FAILED = 'TRANSFER_FAILED',

  // Deployment
  CONFLICT = 'CONFLICT',

  // System
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR'
}

export type ErrorContext = Record<string, unknown>;

export class BaseError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly context: ErrorContext;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    statusCode: number = 500,
    context: ErrorContext = {},
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      stack: this.stack
    };
  }
}

/**
 * Wrong caller for a seller-, bidder-, owner- or admin-gated operation
 */
export class AuthorizationError extends BaseError {
  constructor(
    message: string = 'Unauthorized',
    context: ErrorContext = {},
    code: ErrorCode = ErrorCode.UNAUTHORIZED,
    statusCode: number = 403
  ) {
    super(message, code, statusCode, context);
  }

  static notSeller(listingId: number, caller: string): AuthorizationError {
    return new AuthorizationError('Unauthorized: caller is not the seller', { listingId, caller });
  }

  static notBidder(bidId: number, caller: string): AuthorizationError {
    return new AuthorizationError('Unauthorized: caller is not the bidder', { bidId, caller });
  }

  static notAdmin(caller: string): AuthorizationError {
    return new AuthorizationError('Unauthorized: caller is not the administrator', { caller });
  }

  static invalidToken(): AuthorizationError {
    return new AuthorizationError('Invalid or expired token', {}, ErrorCode.INVALID_TOKEN, 401);
  }
}

export class NotFoundError extends BaseError {
  public readonly resource: string;

  constructor(resource: string, context: ErrorContext = {}) {
    super(`${resource} not found`, ErrorCode.NOT_FOUND, 404, { resource, ...context });
    this.resource = resource;
  }

  static listing(listingId: number): NotFoundError {
    return new NotFoundError('Listing', { listingId });
  }

  static bid(bidId: number): NotFoundError {
    return new NotFoundError('Bid', { bidId });
  }
}

/**
 * Operation attempted in the wrong lifecycle phase
 */
export class InvalidStateError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.INVALID_STATE, 409, context);
  }

  static notForSale(listingId: number): InvalidStateError {
    return new InvalidStateError('Listing is not for sale', { listingId });
  }

  static alreadyForSale(listingId: number): InvalidStateError {
    return new InvalidStateError('Listing is already for sale', { listingId });
  }

  static notOnAuction(listingId: number): InvalidStateError {
    return new InvalidStateError('Listing is not on auction', { listingId });
  }

  static onAuction(listingId: number): InvalidStateError {
    return new InvalidStateError('Listing is on auction', { listingId });
  }

  static auctionEnded(listingId: number, auctionEndTime: number): InvalidStateError {
    return new InvalidStateError('Auction has ended', { listingId, auctionEndTime });
  }

  static paused(): InvalidStateError {
    return new InvalidStateError('Marketplace is paused');
  }

  static reentrantCall(operation: string): InvalidStateError {
    return new InvalidStateError('Reentrant call rejected', { operation });
  }
}

/**
 * Invalid argument: zero/burn address, bad end time, payment mismatch
 */
export class ValidationError extends BaseError {
  public readonly field?: string;
  public readonly violations: Array<{ field: string; message: string }>;

  constructor(
    message: string,
    violations: Array<{ field: string; message: string }> = [],
    context: ErrorContext = {},
    code: ErrorCode = ErrorCode.INVALID_INPUT
  ) {
    super(message, code, 400, { violations, ...context });
    this.violations = violations;
    if (violations.length > 0) {
      this.field = violations[0].field;
    }
  }

  static invalidField(field: string, reason: string): ValidationError {
    return new ValidationError(`Invalid ${field}: ${reason}`, [{ field, message: reason }]);
  }

  static invalidAddress(field: string): ValidationError {
    return ValidationError.invalidField(field, 'zero or burn address');
  }

  static paymentMismatch(expected: bigint, received: bigint): ValidationError {
    return new ValidationError(
      'Attached payment does not match the required amount',
      [{ field: 'value', message: `expected ${expected}, received ${received}` }],
      { expected: expected.toString(), received: received.toString() }
    );
  }
}

/**
 * An asset or value transfer did not go through
 */
export class TransferError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.TRANSFER_FAILED, 502, context);
  }

  static insufficientBalance(account: string, required: bigint, available: bigint): TransferError {
    return new TransferError('Insufficient balance for transfer', {
      account,
      required: required.toString(),
      available: available.toString()
    });
  }

  static rejected(recipient: string, reason: string): TransferError {
    return new TransferError(`Transfer rejected by recipient: ${reason}`, { recipient });
  }
}

export class ConflictError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFLICT, 409, context);
  }

  static alreadyExists(resource: string, context: ErrorContext = {}): ConflictError {
    return new ConflictError(`${resource} already exists`, { resource, ...context });
  }
}

export class ConfigurationError extends BaseError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.CONFIGURATION_ERROR, 500, context, false);
  }
}

export function isOperationalError(error: unknown): boolean {
  if (error instanceof BaseError) {
    return error.isOperational;
  }
  return false;
}

export function wrapError(error: unknown): BaseError {
  if (error instanceof BaseError) {
    return error;
  }

  if (error instanceof Error) {
    return new BaseError(
      error.message,
      ErrorCode.INTERNAL_ERROR,
      500,
      { originalError: error.name },
      false
    );
  }

  return new BaseError(String(error), ErrorCode.INTERNAL_ERROR, 500, {}, false);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
