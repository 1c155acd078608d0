import type { LifecycleState } from "../types/index.js";
import { InvalidPollConfigError } from "../errors/errors.js";

/** Timing half of a poll config; the state sets come from the phase. */
export interface PollTiming {
  /** Hard deadline, measured from the start of polling */
  timeoutMs: number;
  /** Grace period before the first read */
  delayMs?: number;
  /** Floor on the time between reads */
  minIntervalMs: number;
  /** Ceiling on the retry backoff */
  maxIntervalMs?: number;
}

export interface PollConfigInput extends PollTiming {
  targets: Iterable<LifecycleState>;
  pendings: Iterable<LifecycleState>;
}

export interface PollConfig {
  readonly targets: readonly LifecycleState[];
  readonly pendings: readonly LifecycleState[];
  readonly timeoutMs: number;
  readonly delayMs: number;
  readonly minIntervalMs: number;
  readonly maxIntervalMs: number;
}

export const DEFAULT_MAX_INTERVAL_MS = 10_000;

const TARGETABLE: ReadonlySet<LifecycleState> = new Set(["ACTIVE", "DELETED"]);

function requireDuration(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidPollConfigError(`${name} must be a non-negative number, got ${value}`);
  }
}

/**
 * Validate a poll config. The result and its state lists are frozen
 * copies, unaffected by later changes to the input.
 * @throws InvalidPollConfigError
 */
export function createPollConfig(input: PollConfigInput): PollConfig {
  const delayMs = input.delayMs ?? 0;
  const maxIntervalMs =
    input.maxIntervalMs ?? Math.max(input.minIntervalMs, DEFAULT_MAX_INTERVAL_MS);

  requireDuration("timeoutMs", input.timeoutMs);
  requireDuration("delayMs", delayMs);
  requireDuration("minIntervalMs", input.minIntervalMs);
  requireDuration("maxIntervalMs", maxIntervalMs);

  if (input.timeoutMs < delayMs) {
    throw new InvalidPollConfigError(
      `timeoutMs (${input.timeoutMs}) must not be shorter than delayMs (${delayMs})`,
    );
  }
  if (input.minIntervalMs <= 0) {
    throw new InvalidPollConfigError("minIntervalMs must be greater than zero");
  }
  if (maxIntervalMs < input.minIntervalMs) {
    throw new InvalidPollConfigError(
      `maxIntervalMs (${maxIntervalMs}) must not be shorter than minIntervalMs (${input.minIntervalMs})`,
    );
  }

  const targets = new Set(input.targets);
  const pendings = new Set(input.pendings);

  if (targets.size === 0) {
    throw new InvalidPollConfigError("at least one target state is required");
  }
  for (const state of targets) {
    if (!TARGETABLE.has(state)) {
      throw new InvalidPollConfigError(`${state} cannot be a target state`);
    }
    if (pendings.has(state)) {
      throw new InvalidPollConfigError(`${state} is both a target and a pending state`);
    }
  }

  return Object.freeze({
    targets: Object.freeze([...targets]),
    pendings: Object.freeze([...pendings]),
    timeoutMs: input.timeoutMs,
    delayMs,
    minIntervalMs: input.minIntervalMs,
    maxIntervalMs,
  });
}

/** Wait for a zone to settle after create or update. */
export function activePollConfig(timing: PollTiming): PollConfig {
  return createPollConfig({ ...timing, targets: ["ACTIVE"], pendings: ["PENDING"] });
}

/** Wait for a zone to disappear after delete. */
export function deletedPollConfig(timing: PollTiming): PollConfig {
  return createPollConfig({
    ...timing,
    targets: ["DELETED"],
    pendings: ["ACTIVE", "PENDING"],
  });
}
