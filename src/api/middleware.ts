// ============================================
// API Middleware — Method guard, body reading, decoding
// ============================================

import crypto from "crypto";
import express from "express";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { logger } from "../lib/logger.js";
import { getHttpStatus, getUserMessage, payloadError, type AppError } from "../lib/errors.js";

// ============================================
// Types
// ============================================

export interface TracedRequest extends Request {
  requestId?: string;
}

// ============================================
// Plain-text Errors
// ============================================

/**
 * Write an error as status + plain-text body and end the request.
 */
export function sendPlainError(res: Response, error: Pick<AppError, "code">): void {
  res
    .status(getHttpStatus(error))
    .set("X-Content-Type-Options", "nosniff")
    .type("text/plain")
    .send(getUserMessage(error));
}

// ============================================
// Method Guard
// ============================================

/**
 * Reject anything but POST before the body is touched.
 */
export function requirePost(req: TracedRequest, res: Response, next: NextFunction): void {
  if (req.method !== "POST") {
    logger.debug("Rejected request method", {
      stage: "api",
      requestId: req.requestId,
      method: req.method,
    });
    sendPlainError(res, { code: "INVALID_REQUEST_METHOD" });
    return;
  }

  next();
}

// ============================================
// Body Reading
// ============================================

/**
 * Read the body as text whatever its Content-Type; JSON decoding happens in
 * the handler so that every decode failure maps to the same response.
 */
export function readRawBody(limit: string): RequestHandler {
  return express.text({ type: () => true, limit });
}

/**
 * Errors raised by the body reader carry a string `type`
 * (e.g. "entity.too.large", "request.aborted") and a 4xx status.
 */
export function isBodyReaderError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500
  );
}

// ============================================
// Input Validation
// ============================================

/**
 * Pick the `number` field out of a decoded payload.
 *
 * Keys match case-insensitively ("Number", "NUMBER"); a `null` value leaves
 * the field unset and a later matching key overrides an earlier one. The
 * first non-string value is kept as is so the schema rejects it.
 */
function pickNumberField(value: unknown): unknown {
  if (value === null || value === undefined) return {};
  if (typeof value !== "object" || Array.isArray(value)) return value;

  let number: unknown;
  for (const entry of Object.entries(value)) {
    const key = entry[0];
    const field: unknown = entry[1];
    if (key.toLowerCase() !== "number" || field === null) continue;
    number = field;
    if (typeof field !== "string") break;
  }
  return { number };
}

/**
 * Request body schema for POST /.
 * A missing or `null` `number`, or a `null` payload, decode to an empty card number.
 */
export const validateRequestSchema = z.preprocess(
  pickNumberField,
  z.object({
    number: z
      .string()
      .nullish()
      .transform((v) => v ?? ""),
  })
);

export type CardNumberInput = z.infer<typeof validateRequestSchema>;

/**
 * Decode a raw body into a CardNumberInput.
 * Throws INVALID_JSON_PAYLOAD on malformed JSON, data after the first JSON
 * value, or a schema mismatch.
 */
export function decodeCardNumberInput(rawBody: unknown, requestId?: string): CardNumberInput {
  // No body at all leaves the reader's default in place
  const text = typeof rawBody === "string" ? rawBody : "";

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw payloadError("Body is not valid JSON", requestId, err);
  }

  const result = validateRequestSchema.safeParse(parsed);
  if (!result.success) {
    throw payloadError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
      requestId,
      result.error
    );
  }

  return result.data;
}

// ============================================
// Request ID Middleware
// ============================================

/**
 * Add request ID to all requests for tracing.
 */
export function addRequestId(req: TracedRequest, res: Response, next: NextFunction): void {
  const incoming = req.headers["x-request-id"];
  const requestId =
    typeof incoming === "string" && incoming.length > 0 ? incoming : crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader("X-Request-Id", requestId);
  next();
}

export function requestIdOf(req: TracedRequest): string | undefined {
  return req.requestId;
}
