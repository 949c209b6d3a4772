// ============================================
// Standard error types for consistent handling
// ============================================

export type ErrorCode =
  | "INVALID_REQUEST_METHOD"
  | "INVALID_JSON_PAYLOAD"
  | "INVALID_INPUT"
  | "RESPONSE_ENCODING_FAILED"
  | "UNKNOWN_ERROR";

export interface AppError {
  code: ErrorCode;
  message: string;
  requestId?: string;
  cause?: unknown;
  context?: Record<string, unknown>;
}

export class CardCheckError extends Error implements AppError {
  code: ErrorCode;
  requestId?: string;
  override cause?: unknown;
  context?: Record<string, unknown>;

  constructor(options: AppError) {
    super(options.message);
    this.name = "CardCheckError";
    this.code = options.code;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.context = options.context;
  }

  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      context: this.context,
    };
  }
}

/** Create an error for a character outside '0'-'9' */
export function invalidInputError(message: string, context?: Record<string, unknown>): CardCheckError {
  return new CardCheckError({
    code: "INVALID_INPUT",
    message,
    context,
  });
}

/** Create an error for a body that could not be decoded */
export function payloadError(message: string, requestId?: string, cause?: unknown): CardCheckError {
  return new CardCheckError({
    code: "INVALID_JSON_PAYLOAD",
    message,
    requestId,
    cause,
  });
}

/** Create an error for a response that could not be serialized */
export function encodingError(message: string, requestId?: string, cause?: unknown): CardCheckError {
  return new CardCheckError({
    code: "RESPONSE_ENCODING_FAILED",
    message,
    requestId,
    cause,
  });
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): CardCheckError {
  if (err instanceof CardCheckError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new CardCheckError({
    code: "UNKNOWN_ERROR",
    message,
    requestId,
    cause: err,
  });
}

/** Plain-text body sent to the client for each error code */
export function getUserMessage(error: Pick<AppError, "code">): string {
  switch (error.code) {
    case "INVALID_REQUEST_METHOD":
      return "Invalid request method";
    case "INVALID_JSON_PAYLOAD":
      return "Invalid JSON payload";
    case "INVALID_INPUT":
      return "Invalid card number";
    case "RESPONSE_ENCODING_FAILED":
      return "Error creating response";
    default:
      return "Internal server error";
  }
}

export function getHttpStatus(error: Pick<AppError, "code">): number {
  switch (error.code) {
    case "INVALID_REQUEST_METHOD":
      return 405;
    case "INVALID_JSON_PAYLOAD":
    case "INVALID_INPUT":
      return 400;
    default:
      return 500;
  }
}
