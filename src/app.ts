// ============================================
// Express app — one route, built explicitly
// ============================================

import express from "express";
import type { ErrorRequestHandler } from "express";
import { logger } from "./lib/logger.js";
import { payloadError, wrapError } from "./lib/errors.js";
import {
  addRequestId,
  createValidateHandler,
  isBodyReaderError,
  readRawBody,
  requestIdOf,
  requirePost,
  sendPlainError,
  type ResponseEncoder,
} from "./api/index.js";
import type { CheckMode } from "./luhn/index.js";

export interface AppOptions {
  checkMode: CheckMode;
  bodyLimit?: string;
  encodeResponse?: ResponseEncoder;
}

const DEFAULT_BODY_LIMIT = "16kb";

const handleErrors: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const requestId = requestIdOf(req);
  const appError = isBodyReaderError(err)
    ? payloadError("Request body could not be read", requestId, err)
    : wrapError(err, requestId);

  logger.error("Request failed", {
    stage: "api",
    requestId,
    error: err,
    appError: appError.toJSON(),
  });

  sendPlainError(res, appError);
};

/**
 * Build the application. Nothing is registered globally; the caller owns
 * the returned value and decides when to listen.
 */
export function createApp(options: AppOptions): express.Application {
  const app = express();
  app.disable("x-powered-by");

  app.use(addRequestId);

  app.all(
    "/",
    requirePost,
    readRawBody(options.bodyLimit ?? DEFAULT_BODY_LIMIT),
    createValidateHandler({
      checkMode: options.checkMode,
      encodeResponse: options.encodeResponse,
    })
  );

  app.use(handleErrors);

  return app;
}
