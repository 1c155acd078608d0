import type { Span } from "@opentelemetry/api";
import type {
  DeletedZone,
  ReconcilePhase,
  ZoneDelta,
  ZoneDescriptor,
  ZoneScope,
  ZoneSpec,
} from "../types/index.js";
import type { ResourceClient } from "../client/resource-client.js";
import { isNotFound } from "../client/errors.js";
import type { StateResolver } from "../client/state-resolver.js";
import type { RetryClassifier } from "../retry/classifier.js";
import {
  cancelledDiagnostic,
  clientCallDiagnostic,
  failed,
  pollDiagnostic,
  statusReadDiagnostic,
  succeeded,
  type Diagnostic,
  type ReconcileResult,
} from "../errors/diagnostic.js";
import { Poller, type PollObservation, type PollPhase } from "../poller/poller.js";
import {
  activePollConfig,
  deletedPollConfig,
  type PollConfig,
  type PollTiming,
} from "../poller/poll-config.js";
import type { Clock } from "../poller/clock.js";
import { systemClock } from "../poller/clock.js";
import type { ZonekeeperMetrics } from "../observability/metrics.js";
import { endSpanError, endSpanOk, startReconcileSpan } from "../observability/tracer.js";
import { LifecycleEmitter } from "../events/emitter.js";
import type { EventSink } from "../events/types.js";
import { compactDelta, isEmptyDelta } from "./delta.js";
import pino from "pino";

export interface ControllerOptions {
  resolver?: StateResolver;
  classifier?: RetryClassifier;
  clock?: Clock;
  logger?: pino.Logger;
  metrics?: ZonekeeperMetrics | null;
  events?: EventSink | null;
}

export interface ReadOptions {
  scope?: ZoneScope;
  signal?: AbortSignal;
}

export interface ReconcileOptions extends ReadOptions {
  poll: PollTiming;
  /** Skip waiting for ACTIVE/DELETED; the result may still be PENDING */
  skipStatusCheck?: boolean;
}

interface CallContext {
  phase: ReconcilePhase;
  span: Span;
  startedAt: number;
  resourceId?: string;
}

/**
 * Drives a zone through create, update and delete against an
 * eventually-consistent backend, polling until the zone settles.
 *
 * Holds no per-zone state: calls for distinct zones may run concurrently,
 * calls for the same zone must be serialized by the caller.
 */
export class ReconciliationController {
  private readonly client: ResourceClient;
  private readonly poller: Poller;
  private readonly clock: Clock;
  private readonly logger: pino.Logger;
  private readonly metrics: ZonekeeperMetrics | null;
  private readonly emitter: LifecycleEmitter;

  constructor(client: ResourceClient, options: ControllerOptions = {}) {
    this.client = client;
    this.clock = options.clock ?? systemClock;
    const root = options.logger ?? pino({ level: "info" });
    this.logger = root.child({ component: "zonekeeper.controller" });
    this.metrics = options.metrics ?? null;
    this.emitter = new LifecycleEmitter(options.events ?? null, this.metrics);
    this.poller = new Poller({
      resolver: options.resolver,
      classifier: options.classifier,
      clock: this.clock,
      logger: root,
      metrics: this.metrics,
      onObservation: (observation) => this.observed(observation),
    });
  }

  /**
   * Create a zone and wait for it to become ACTIVE.
   *
   * If polling fails the zone still exists remotely: the diagnostic
   * carries its id and `partial: true`.
   */
  async reconcileCreate(
    spec: ZoneSpec,
    options: ReconcileOptions,
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    const config = activePollConfig(options.poll);
    const call = this.begin("create", undefined, { name: spec.name });

    if (options.signal?.aborted) {
      return this.finish(call, failed(cancelledDiagnostic("create")));
    }

    let created: ZoneDescriptor;
    try {
      created = await this.client.create(spec, options.scope);
    } catch (err) {
      return this.finish(call, failed(clientCallDiagnostic("create", err)));
    }

    call.resourceId = created.id;
    this.logger.info({ id: created.id, name: spec.name, status: created.status }, "Zone created");

    if (options.skipStatusCheck) {
      return this.finish(call, await this.readAfterCall("create", created.id, options.scope));
    }

    return this.finish(call, await this.settle("create", created.id, config, options));
  }

  /**
   * Apply a delta and wait for the zone to become ACTIVE again.
   * An empty delta skips the remote update and only reads the zone.
   */
  async reconcileUpdate(
    id: string,
    delta: ZoneDelta,
    options: ReconcileOptions,
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    const config = activePollConfig(options.poll);
    const patch = compactDelta(delta);
    const call = this.begin("update", id, { fields: Object.keys(patch) });

    if (options.signal?.aborted) {
      return this.finish(call, failed(cancelledDiagnostic("update", id)));
    }

    if (isEmptyDelta(patch)) {
      this.logger.debug({ id }, "Nothing to update, reading zone");
      return this.finish(call, await this.readOnce("update", id, options.scope));
    }

    try {
      await this.client.update(id, patch, options.scope);
    } catch (err) {
      return this.finish(call, failed(clientCallDiagnostic("update", err, id)));
    }

    this.logger.info({ id, fields: Object.keys(patch) }, "Zone update accepted");

    if (options.skipStatusCheck) {
      return this.finish(call, await this.readAfterCall("update", id, options.scope));
    }

    return this.finish(call, await this.settle("update", id, config, options));
  }

  /**
   * Delete a zone and wait for it to disappear. Deleting a zone that is
   * already gone succeeds.
   */
  async reconcileDelete(
    id: string,
    options: ReconcileOptions,
  ): Promise<ReconcileResult<DeletedZone>> {
    const config = deletedPollConfig(options.poll);
    const call = this.begin("delete", id);

    if (options.signal?.aborted) {
      return this.finish(call, failed(cancelledDiagnostic("delete", id)));
    }

    try {
      await this.client.delete(id, options.scope);
    } catch (err) {
      if (isNotFound(err)) {
        this.logger.info({ id }, "Zone already absent");
        return this.finish(call, succeeded<DeletedZone>({ id, state: "DELETED", alreadyAbsent: true }));
      }
      return this.finish(call, failed(clientCallDiagnostic("delete", err, id)));
    }

    const deleted: DeletedZone = { id, state: "DELETED", alreadyAbsent: false };

    if (options.skipStatusCheck) {
      return this.finish(call, succeeded(deleted));
    }

    const outcome = await this.poller.poll({
      resourceId: id,
      phase: "delete",
      config,
      read: () => this.client.read(id, options.scope),
      notFoundState: "DELETED",
      signal: options.signal,
    });

    if (!outcome.ok) {
      return this.finish(call, failed(pollDiagnostic("delete", outcome.error, id, outcome.lastState)));
    }
    return this.finish(call, succeeded(deleted));
  }

  /**
   * Read a zone. A missing zone yields a `not_found` diagnostic so the
   * caller can drop its local record.
   */
  async reconcileRead(
    id: string,
    options: ReadOptions = {},
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    const call = this.begin("read", id);

    if (options.signal?.aborted) {
      return this.finish(call, failed(cancelledDiagnostic("read", id)));
    }
    return this.finish(call, await this.readOnce("read", id, options.scope));
  }

  private async readOnce(
    phase: ReconcilePhase,
    id: string,
    scope?: ZoneScope,
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    try {
      return succeeded(await this.client.read(id, scope));
    } catch (err) {
      return failed(clientCallDiagnostic(phase, err, id));
    }
  }

  /** One read after an accepted create or update; failures keep the call's outcome. */
  private async readAfterCall(
    phase: "create" | "update",
    id: string,
    scope?: ZoneScope,
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    try {
      return succeeded(await this.client.read(id, scope));
    } catch (err) {
      return failed(statusReadDiagnostic(phase, err, id));
    }
  }

  private async settle(
    phase: Exclude<PollPhase, "delete">,
    id: string,
    config: PollConfig,
    options: ReconcileOptions,
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    const outcome = await this.poller.poll({
      resourceId: id,
      phase,
      config,
      read: () => this.client.read(id, options.scope),
      signal: options.signal,
    });

    if (!outcome.ok) {
      return failed(pollDiagnostic(phase, outcome.error, id, outcome.lastState));
    }
    if (outcome.zone) {
      return succeeded(outcome.zone);
    }
    // The poller omits the descriptor only for not-found reads mapped to a state.
    return this.readAfterCall(phase, id, options.scope);
  }

  private begin(
    phase: ReconcilePhase,
    resourceId?: string,
    payload: Record<string, unknown> = {},
  ): CallContext {
    const { span } = startReconcileSpan(phase, resourceId);
    this.emitter.emit("reconcile.started", phase, resourceId, payload, span);
    this.logger.debug({ phase, id: resourceId }, "Reconcile started");
    return { phase, span, startedAt: this.clock.now(), resourceId };
  }

  private finish<T>(call: CallContext, result: ReconcileResult<T>): ReconcileResult<T> {
    const durationMs = this.clock.now() - call.startedAt;
    this.metrics?.reconcileDuration(durationMs, { phase: call.phase });

    if (result.ok) {
      this.metrics?.reconcileCount({ phase: call.phase, outcome: "ok" });
      this.emitter.emit("reconcile.completed", call.phase, call.resourceId, { durationMs }, call.span);
      call.span.setAttribute("zonekeeper.zone.id", call.resourceId ?? "");
      endSpanOk(call.span);
      this.logger.info({ phase: call.phase, id: call.resourceId, durationMs }, "Reconcile succeeded");
      return result;
    }

    this.reportFailure(call, result.diagnostic, durationMs);
    return result;
  }

  private reportFailure(call: CallContext, diagnostic: Diagnostic, durationMs: number): void {
    this.metrics?.reconcileCount({ phase: call.phase, outcome: diagnostic.kind });
    this.emitter.emit(
      "reconcile.failed",
      call.phase,
      diagnostic.resourceId ?? call.resourceId,
      {
        code: diagnostic.code,
        kind: diagnostic.kind,
        message: diagnostic.message,
        partial: diagnostic.partial ?? false,
        lastState: diagnostic.lastState,
        durationMs,
      },
      call.span,
    );
    endSpanError(call.span, diagnostic.cause);

    const level = diagnostic.kind === "not_found" ? "info" : "warn";
    this.logger[level](
      {
        phase: call.phase,
        id: diagnostic.resourceId,
        code: diagnostic.code,
        kind: diagnostic.kind,
        err: diagnostic.cause,
      },
      diagnostic.message,
    );
  }

  private observed(observation: PollObservation): void {
    this.emitter.emit("zone.state_observed", observation.phase, observation.resourceId, {
      tick: observation.tick,
      status: observation.status,
      state: observation.state,
      elapsedMs: observation.elapsedMs,
    });
  }
}
