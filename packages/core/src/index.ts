/**
 * @edgeconf/core
 *
 * Shared plumbing for the control-plane client:
 * - Error taxonomy mirroring the API's failure classes
 * - Pino logger with credential redaction
 * - Environment validation
 */

export {
  AppError,
  ConfigurationError,
  TransportError,
  ApiError,
  AuthenticationError,
  NotFoundError,
  ConflictError,
  ValidationError,
  ActivationError,
  DeletionError,
  RateLimitError,
  formatServerMessage,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
  type ApiErrorPayload,
  type ApiErrorOptions,
} from './errors.js';

export {
  createLogger,
  withCorrelationId,
  generateCorrelationId,
  REDACTION_PATHS,
  REDACTED_FIELDS,
  redactObject,
  redactRecord,
  redactString,
  shouldRedactField,
  type CreateLoggerOptions,
  type Logger,
} from './logger.js';

export {
  FastlyEnvSchema,
  loadFastlyEnv,
  formatIssues,
  DEFAULT_API_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type FastlyEnv,
} from './env.js';
