export {
  RetryClassifier,
  defaultRetryClassifier,
  extractErrorCode,
  extractStatusCode,
  DEFAULT_RETRYABLE_CODES,
  DEFAULT_RETRYABLE_STATUS_CODES,
  type RetryDecision,
  type RetryClassifierOptions,
} from "./classifier.js";
