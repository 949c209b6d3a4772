// ============================================
// API Handler — POST / card number check
// ============================================

import type { Response } from "express";
import { checkCardNumber, type CheckMode } from "../luhn/index.js";
import { createRequestLogger } from "../lib/logger.js";
import { encodingError, wrapError } from "../lib/errors.js";
import { decodeCardNumberInput, sendPlainError, type TracedRequest } from "./middleware.js";

// ============================================
// Types
// ============================================

export interface ValidationResult {
  valid: boolean;
}

export type ResponseEncoder = (response: ValidationResult) => string;

export interface ValidateHandlerOptions {
  checkMode: CheckMode;
  /** Serializer for the success body; JSON.stringify unless overridden */
  encodeResponse?: ResponseEncoder;
}

// ============================================
// Handler
// ============================================

/**
 * Build the handler for POST /.
 *
 * Decode, check, encode. Each failure ends the request with a plain-text
 * status; a failed checksum is a 200 with `valid: false`.
 */
export function createValidateHandler(options: ValidateHandlerOptions) {
  const { checkMode, encodeResponse = (response) => JSON.stringify(response) } = options;

  return function handleValidateRequest(req: TracedRequest, res: Response): void {
    const requestId = req.requestId ?? "unknown";
    const log = createRequestLogger(requestId, "api");

    let number: string;
    try {
      ({ number } = decodeCardNumberInput(req.body, requestId));
    } catch (err) {
      const appError = wrapError(err, requestId);
      log.warn("Rejected request body", { errorCode: appError.code, reason: appError.message });
      sendPlainError(res, appError);
      return;
    }

    let valid: boolean;
    try {
      valid = checkCardNumber(number, checkMode);
    } catch (err) {
      const appError = wrapError(err, requestId);
      log.warn("Card number check failed", {
        checkMode,
        errorCode: appError.code,
        numberLength: number.length,
      });
      sendPlainError(res, appError);
      return;
    }

    const response: ValidationResult = { valid };

    let body: string;
    try {
      body = encodeResponse(response);
    } catch (err) {
      const appError = encodingError("Could not serialize validation result", requestId, err);
      log.error("Response encoding failed", { error: err, errorCode: appError.code });
      sendPlainError(res, appError);
      return;
    }

    log.debug("Card number checked", { checkMode, numberLength: number.length, valid });

    res.status(200).type("application/json").send(body);
  };
}
