/**
 * Retry Classifier
 *
 * Decides whether a failed status read is worth repeating. Only the
 * poller consults it; the initial create/update/delete call never retries.
 */

import type { ReconcilePhase } from "../types/index.js";
import { ResourceClientError } from "../client/errors.js";

export type RetryDecision = "retry" | "fail";

export type RetryClassifierOptions = {
  /** HTTP status codes treated as transient */
  retryableStatusCodes?: Iterable<number>;
  /** Error codes treated as transient */
  retryableCodes?: Iterable<string>;
};

/**
 * Conflict and rate-limit signals. Everything else is fatal.
 */
export const DEFAULT_RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([409, 429]);

export const DEFAULT_RETRYABLE_CODES: ReadonlySet<string> = new Set([
  "conflict",
  "rate_limited",
  "Conflict",
  "TooManyRequests",
  "TooManyRequestsException",
]);

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  if (!("code" in err)) return undefined;
  if (typeof err.code === "string") return err.code;
  if (typeof err.code === "number") return String(err.code);
  return undefined;
}

/**
 * Extract an HTTP status code from an error object
 */
export function extractStatusCode(err: unknown): number | undefined {
  if (err instanceof ResourceClientError) return err.statusCode;
  if (!err || typeof err !== "object") return undefined;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  if ("status" in err && typeof err.status === "number") return err.status;
  return undefined;
}

export class RetryClassifier {
  private readonly statusCodes: ReadonlySet<number>;
  private readonly codes: ReadonlySet<string>;

  constructor(options: RetryClassifierOptions = {}) {
    this.statusCodes = new Set(options.retryableStatusCodes ?? DEFAULT_RETRYABLE_STATUS_CODES);
    this.codes = new Set(options.retryableCodes ?? DEFAULT_RETRYABLE_CODES);
  }

  classify(err: unknown, phase: ReconcilePhase): RetryDecision {
    if (!err) return "fail";

    // A zone that vanished mid-create or mid-update will not come back.
    const code = extractErrorCode(err);
    if (code === "not_found" && (phase === "create" || phase === "update")) {
      return "fail";
    }

    if (code && this.codes.has(code)) return "retry";

    const statusCode = extractStatusCode(err);
    if (statusCode !== undefined && this.statusCodes.has(statusCode)) return "retry";

    return "fail";
  }

  /** Backend-provided delay before the next attempt, if any. */
  retryAfterMs(err: unknown): number | undefined {
    if (err instanceof ResourceClientError) {
      const hint = err.retryAfterMs;
      if (typeof hint === "number" && Number.isFinite(hint) && hint >= 0) return hint;
    }
    return undefined;
  }
}

export const defaultRetryClassifier = new RetryClassifier();
