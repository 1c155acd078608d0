import type { LifecycleState } from "../types/index.js";

/**
 * Polling deadline passed while the zone was still in a pending state.
 */
export class PollTimeoutError extends Error {
  readonly lastState?: LifecycleState;
  readonly elapsedMs: number;
  readonly timeoutMs: number;

  constructor(timeoutMs: number, elapsedMs: number, lastState?: LifecycleState) {
    super(
      `timeout after ${elapsedMs}ms (limit ${timeoutMs}ms), last state: ${lastState ?? "none observed"}`,
    );
    this.name = "PollTimeoutError";
    this.timeoutMs = timeoutMs;
    this.elapsedMs = elapsedMs;
    this.lastState = lastState;
  }
}

/**
 * A status read failed in a way retrying cannot fix, or the zone
 * reached a state that is neither pending nor a target.
 */
export class PollFatalError extends Error {
  readonly lastState?: LifecycleState;

  constructor(message: string, options: { cause?: unknown; lastState?: LifecycleState } = {}) {
    super(message, { cause: options.cause });
    this.name = "PollFatalError";
    this.lastState = options.lastState;
  }
}

export class PollCancelledError extends Error {
  readonly elapsedMs: number;

  constructor(elapsedMs: number) {
    super(`cancelled after ${elapsedMs}ms`);
    this.name = "PollCancelledError";
    this.elapsedMs = elapsedMs;
  }
}

export class MalformedImportIdError extends Error {
  readonly importId: string;

  constructor(importId: string) {
    super(`unexpected format of ID (${importId}), expected zone <id> or <id>:<project_id>`);
    this.name = "MalformedImportIdError";
    this.importId = importId;
  }
}

export class InvalidPollConfigError extends Error {
  constructor(message: string) {
    super(`invalid poll config: ${message}`);
    this.name = "InvalidPollConfigError";
  }
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(formatErrorMessage(err));
}
