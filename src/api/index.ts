// ============================================
// API Module — single-route card check
// ============================================

export {
  addRequestId,
  decodeCardNumberInput,
  isBodyReaderError,
  readRawBody,
  requestIdOf,
  requirePost,
  sendPlainError,
  validateRequestSchema,
  type CardNumberInput,
  type TracedRequest,
} from "./middleware.js";

export {
  createValidateHandler,
  type ResponseEncoder,
  type ValidateHandlerOptions,
  type ValidationResult,
} from "./handler.js";
