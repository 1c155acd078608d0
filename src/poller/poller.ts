import type { LifecycleState, ZoneDescriptor } from "../types/index.js";
import type { StateResolver } from "../client/state-resolver.js";
import { resolveZoneState } from "../client/state-resolver.js";
import { isNotFound } from "../client/errors.js";
import type { RetryClassifier } from "../retry/classifier.js";
import { defaultRetryClassifier, extractErrorCode } from "../retry/classifier.js";
import {
  PollCancelledError,
  PollFatalError,
  PollTimeoutError,
  formatErrorMessage,
} from "../errors/errors.js";
import type { ZonekeeperMetrics } from "../observability/metrics.js";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { PollConfig } from "./poll-config.js";
import { PollMachine, type PollFailure, type PollTransition } from "./states.js";
import pino from "pino";

export type PollPhase = "create" | "update" | "delete";

export interface PollRequest {
  resourceId: string;
  phase: PollPhase;
  config: PollConfig;
  /** One status read; called once per tick */
  read: () => Promise<ZoneDescriptor>;
  /** State to assume when the read reports the zone as missing */
  notFoundState?: LifecycleState;
  signal?: AbortSignal;
}

/** A single status read as seen by the poller. */
export interface PollObservation {
  resourceId: string;
  phase: PollPhase;
  tick: number;
  state?: LifecycleState;
  /** Raw backend tag, or "NOT_FOUND" when the read reported a missing zone */
  status: string;
  elapsedMs: number;
}

export type PollOutcome =
  | {
      ok: true;
      state: "ACTIVE" | "DELETED";
      /** Descriptor from the final read; absent when the zone is gone */
      zone?: ZoneDescriptor;
      reads: number;
      elapsedMs: number;
    }
  | {
      ok: false;
      error: PollFailure;
      lastState?: LifecycleState;
      reads: number;
      elapsedMs: number;
    };

export interface PollerOptions {
  resolver?: StateResolver;
  classifier?: RetryClassifier;
  clock?: Clock;
  logger?: pino.Logger;
  metrics?: ZonekeeperMetrics | null;
  onObservation?: (observation: PollObservation) => void;
}

type TickResult =
  | { kind: "reached"; state: "ACTIVE" | "DELETED"; zone?: ZoneDescriptor }
  | { kind: "pending"; state: LifecycleState; waitMs: number }
  | { kind: "retry"; waitMs: number }
  | { kind: "failed"; error: PollFatalError };

function isFinalState(state: LifecycleState): state is "ACTIVE" | "DELETED" {
  return state === "ACTIVE" || state === "DELETED";
}

/**
 * Repeatedly reads a zone until it reaches a target state, fails, runs out
 * of time or is cancelled. No read is issued after the deadline, and the
 * first read waits for the configured delay.
 */
export class Poller {
  private readonly resolver: StateResolver;
  private readonly classifier: RetryClassifier;
  private readonly clock: Clock;
  private readonly logger: pino.Logger;
  private readonly metrics: ZonekeeperMetrics | null;
  private readonly onObservation?: (observation: PollObservation) => void;

  constructor(options: PollerOptions = {}) {
    this.resolver = options.resolver ?? resolveZoneState;
    this.classifier = options.classifier ?? defaultRetryClassifier;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? pino({ level: "info" })).child({
      component: "zonekeeper.poller",
    });
    this.metrics = options.metrics ?? null;
    this.onObservation = options.onObservation;
  }

  async poll(request: PollRequest): Promise<PollOutcome> {
    const { config, signal } = request;
    const machine = new PollMachine(request.resourceId);
    const startedAt = this.clock.now();
    const deadline = startedAt + config.timeoutMs;
    const elapsed = () => this.clock.now() - startedAt;

    let reads = 0;
    let consecutiveRetries = 0;
    let lastState: LifecycleState | undefined;

    const fail = (error: PollFailure): PollOutcome => {
      this.logTransition(machine.fail(error));
      return { ok: false, error, lastState, reads, elapsedMs: elapsed() };
    };

    if (config.delayMs > 0) {
      await this.clock.sleep(config.delayMs, signal);
    }

    for (;;) {
      if (signal?.aborted) {
        return fail(new PollCancelledError(elapsed()));
      }
      if (reads > 0 && this.clock.now() >= deadline) {
        return fail(new PollTimeoutError(config.timeoutMs, elapsed(), lastState));
      }

      reads++;
      const tick = await this.tick(request, reads, consecutiveRetries, startedAt);

      if (tick.kind === "reached") {
        this.logTransition(machine.reach(tick.state));
        return { ok: true, state: tick.state, zone: tick.zone, reads, elapsedMs: elapsed() };
      }
      if (tick.kind === "failed") {
        return fail(tick.error);
      }

      if (tick.kind === "pending") {
        lastState = tick.state;
        consecutiveRetries = 0;
      } else {
        consecutiveRetries++;
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return fail(new PollTimeoutError(config.timeoutMs, elapsed(), lastState));
      }
      await this.clock.sleep(Math.min(tick.waitMs, remaining), signal);
    }
  }

  private async tick(
    request: PollRequest,
    tick: number,
    consecutiveRetries: number,
    startedAt: number,
  ): Promise<TickResult> {
    const { config, phase, resourceId } = request;

    const observe = (state: LifecycleState | undefined, status: string) => {
      this.metrics?.pollReads({ phase, state: state ?? status });
      this.onObservation?.({
        resourceId,
        phase,
        tick,
        state,
        status,
        elapsedMs: this.clock.now() - startedAt,
      });
    };

    let zone: ZoneDescriptor | undefined;
    let state: LifecycleState | undefined;
    let status: string;

    try {
      zone = await request.read();
      state = this.resolver(zone);
      status = zone.status;
    } catch (err) {
      if (request.notFoundState && isNotFound(err)) {
        state = request.notFoundState;
        status = "NOT_FOUND";
      } else {
        return this.handleReadError(request, err, consecutiveRetries);
      }
    }

    observe(state, status);
    this.logger.debug({ id: resourceId, phase, tick, status, state }, "Observed zone state");

    if (state && config.targets.includes(state) && isFinalState(state)) {
      return { kind: "reached", state, zone };
    }
    if (state && config.pendings.includes(state)) {
      return { kind: "pending", state, waitMs: config.minIntervalMs };
    }

    const wanted = config.targets.join(", ");
    return {
      kind: "failed",
      error: new PollFatalError(`unexpected state '${state ?? status}', wanted target '${wanted}'`, {
        lastState: state,
      }),
    };
  }

  private handleReadError(
    request: PollRequest,
    err: unknown,
    consecutiveRetries: number,
  ): TickResult {
    const { config, phase, resourceId } = request;
    const decision = this.classifier.classify(err, phase);

    if (decision === "fail") {
      this.logger.warn({ err, id: resourceId, phase }, "Status read failed");
      return {
        kind: "failed",
        error: new PollFatalError(formatErrorMessage(err), { cause: err }),
      };
    }

    const waitMs = this.backoffMs(config, consecutiveRetries + 1, this.classifier.retryAfterMs(err));
    this.metrics?.pollRetries({ phase, code: extractErrorCode(err) ?? "unknown" });
    this.logger.debug(
      { err, id: resourceId, phase, attempt: consecutiveRetries + 1, waitMs },
      "Retrying status read",
    );
    return { kind: "retry", waitMs };
  }

  /** Exponential from the minimum interval, floored by any retry hint. */
  private backoffMs(config: PollConfig, attempt: number, retryAfterMs?: number): number {
    const exponential = config.minIntervalMs * 2 ** (attempt - 1);
    const floor = Math.max(config.minIntervalMs, retryAfterMs ?? 0);
    return Math.min(Math.max(exponential, floor), Math.max(config.maxIntervalMs, floor));
  }

  private logTransition(transition: PollTransition): void {
    this.logger.debug(
      {
        id: transition.resourceId,
        from: transition.previous,
        to: transition.current,
        ...(transition.error ? { reason: transition.error.message } : {}),
      },
      "Poll transition",
    );
  }
}
