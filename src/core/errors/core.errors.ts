import { ERROR_CODES, type CoreErrorShape, type ErrorCode } from "./canonical_error_codes";

export class CoreError extends Error implements CoreErrorShape {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { readonly details?: Record<string, unknown>; readonly cause?: unknown }
  ) {
    super(message, options && "cause" in options ? { cause: options.cause } : undefined);
    this.name = "CoreError";
    this.code = code;
    this.details = options?.details;
  }
}

/**
 * Raised by a store adapter when the database file is momentarily locked by
 * another connection. Never surfaced to callers: the serializer and read pool
 * retry it, and convert it to UNAVAILABLE once their budget is spent.
 */
export class StoreBusyError extends Error {
  readonly kind = "StoreBusy";
  readonly sqliteCode: string;

  constructor(message: string, options: { readonly sqliteCode: string; readonly cause?: unknown }) {
    super(message, "cause" in options ? { cause: options.cause } : undefined);
    this.name = "StoreBusyError";
    this.sqliteCode = options.sqliteCode;
  }
}

function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function unauthorized(message = "Invalid or missing secret key"): CoreError {
  return new CoreError(ERROR_CODES.UNAUTHORIZED, message);
}

export function unavailable(message: string, cause?: unknown): CoreError {
  return new CoreError(ERROR_CODES.UNAVAILABLE, message, cause === undefined ? undefined : { cause });
}

export function storeError(
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown
): CoreError {
  return new CoreError(ERROR_CODES.STORE_ERROR, message, { details, cause });
}

export function deadlineExceeded(operationId: string): CoreError {
  return new CoreError(
    ERROR_CODES.DEADLINE_EXCEEDED,
    `DEADLINE_EXCEEDED operation=${operationId} was not started before its deadline`,
    { details: { operationId } }
  );
}

export function invalidInput(message: string): CoreError {
  return new CoreError(ERROR_CODES.INVALID_INPUT, message);
}

export function notFound(message: string): CoreError {
  return new CoreError(ERROR_CODES.NOT_FOUND, message);
}

export function insufficientPaint(): CoreError {
  return new CoreError(
    ERROR_CODES.INSUFFICIENT_PAINT,
    "Not enough paint drops. Study more cards!"
  );
}

export function rateLimited(): CoreError {
  return new CoreError(ERROR_CODES.RATE_LIMITED, "Too many requests. Please wait.");
}

export function configurationError(message: string, cause?: unknown): CoreError {
  return new CoreError(
    ERROR_CODES.CONFIGURATION_ERROR,
    `CONFIGURATION_ERROR ${message}`,
    cause === undefined ? undefined : { cause }
  );
}

export function toCoreError(error: unknown): CoreError {
  if (error instanceof CoreError) {
    return error;
  }
  if (error instanceof StoreBusyError) {
    return unavailable(`UNAVAILABLE store busy (${error.sqliteCode})`, error);
  }
  return new CoreError(ERROR_CODES.INTERNAL_ERROR, asMessage(error), { cause: error });
}
