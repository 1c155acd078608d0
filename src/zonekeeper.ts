import type {
  DeletedZone,
  ReconcilePhase,
  ZoneDelta,
  ZoneDescriptor,
  ZoneSpec,
  ZonekeeperConfig,
} from "./types/index.js";
import type { ResourceClient } from "./client/resource-client.js";
import type { StateResolver } from "./client/state-resolver.js";
import type { RetryClassifier } from "./retry/classifier.js";
import type { Clock } from "./poller/clock.js";
import type { PollTiming } from "./poller/poll-config.js";
import { ReconciliationController } from "./controller/controller.js";
import { parseImportId, type ZoneImportId } from "./import/import-id.js";
import { MalformedImportIdError } from "./errors/errors.js";
import {
  failed,
  malformedImportDiagnostic,
  type ReconcileResult,
} from "./errors/diagnostic.js";
import { EventProducer } from "./kafka/producer.js";
import type { EventSink } from "./events/types.js";
import {
  initTracing,
  shutdownTracing,
  initMetrics,
  shutdownMetrics,
} from "./observability/index.js";
import type { ZonekeeperMetrics } from "./observability/index.js";
import pino from "pino";

/**
 * Per-call overrides on top of the configured defaults.
 */
export interface ZoneCallOptions {
  /** Overall polling deadline for this call */
  timeoutMs?: number;
  skipStatusCheck?: boolean;
  projectId?: string;
  signal?: AbortSignal;
}

export interface ZonekeeperDeps {
  logger?: pino.Logger;
  resolver?: StateResolver;
  classifier?: RetryClassifier;
  clock?: Clock;
  /** Replaces the Kafka producer, e.g. with an in-memory sink */
  events?: EventSink;
}

/**
 * Zonekeeper: the CRUD handler layer over the reconciliation controller.
 *
 * Usage:
 *   const keeper = new Zonekeeper(defaultConfig, client);
 *   await keeper.start();
 *
 *   const created = await keeper.createZone({ name: "example.org.", ttl: 300 });
 *   if (!created.ok) console.error(created.diagnostic.message);
 *
 *   await keeper.shutdown();
 */
export class Zonekeeper {
  private config: ZonekeeperConfig;
  private client: ResourceClient;
  private deps: ZonekeeperDeps;
  private rootLogger: pino.Logger;
  private logger: pino.Logger;
  private producer: EventProducer | null = null;
  private controller: ReconciliationController;
  private metrics: ZonekeeperMetrics | null = null;
  private started = false;

  constructor(config: ZonekeeperConfig, client: ResourceClient, deps: ZonekeeperDeps = {}) {
    this.config = config;
    this.client = client;
    this.deps = deps;
    this.rootLogger = deps.logger ?? pino({ level: config.logLevel ?? "info" });
    this.logger = this.rootLogger.child({ component: "zonekeeper" });

    if (!deps.events && config.events.enabled) {
      this.producer = new EventProducer(config.events.kafka, this.rootLogger);
    }

    this.controller = this.buildController();
  }

  /**
   * Start Zonekeeper: init tracing/metrics, connect Kafka.
   */
  async start(): Promise<void> {
    if (this.started) return;

    this.logger.info("Starting Zonekeeper...");

    initTracing(this.config.observability);
    this.metrics = initMetrics(this.config.observability);

    // Rebuild controller with metrics
    this.controller = this.buildController();

    if (this.producer) {
      await this.producer.connect();
    }

    this.started = true;
    this.logger.info({ events: this.producer !== null }, "Zonekeeper started");
  }

  /**
   * Graceful shutdown.
   */
  async shutdown(): Promise<void> {
    if (!this.started) return;

    this.logger.info("Shutting down Zonekeeper...");

    if (this.producer) {
      await this.producer.disconnect();
    }
    await shutdownTracing();
    await shutdownMetrics();

    this.started = false;
    this.logger.info("Zonekeeper shut down");
  }

  // ---------------------------------------------------------------------------
  // CRUD handlers
  // ---------------------------------------------------------------------------

  createZone(
    spec: ZoneSpec,
    options: ZoneCallOptions = {},
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    return this.controller.reconcileCreate(spec, {
      poll: this.timing("create", options),
      skipStatusCheck: options.skipStatusCheck ?? this.config.skipStatusCheck,
      scope: { projectId: options.projectId },
      signal: options.signal,
    });
  }

  readZone(
    id: string,
    options: Pick<ZoneCallOptions, "projectId" | "signal"> = {},
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    return this.controller.reconcileRead(id, {
      scope: { projectId: options.projectId },
      signal: options.signal,
    });
  }

  updateZone(
    id: string,
    delta: ZoneDelta,
    options: ZoneCallOptions = {},
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    return this.controller.reconcileUpdate(id, delta, {
      poll: this.timing("update", options),
      skipStatusCheck: options.skipStatusCheck ?? this.config.skipStatusCheck,
      scope: { projectId: options.projectId },
      signal: options.signal,
    });
  }

  deleteZone(
    id: string,
    options: ZoneCallOptions = {},
  ): Promise<ReconcileResult<DeletedZone>> {
    return this.controller.reconcileDelete(id, {
      poll: this.timing("delete", options),
      skipStatusCheck: options.skipStatusCheck ?? this.config.skipStatusCheck,
      scope: { projectId: options.projectId },
      signal: options.signal,
    });
  }

  /**
   * Adopt an existing zone from `<id>` or `<id>:<projectId>`.
   */
  async importZone(
    importId: string,
    options: Pick<ZoneCallOptions, "signal"> = {},
  ): Promise<ReconcileResult<ZoneDescriptor>> {
    let parsed: ZoneImportId;
    try {
      parsed = parseImportId(importId);
    } catch (err) {
      if (err instanceof MalformedImportIdError) {
        this.logger.warn({ importId }, err.message);
        return failed(malformedImportDiagnostic(err));
      }
      throw err;
    }

    const result = await this.controller.reconcileRead(parsed.id, {
      scope: { projectId: parsed.projectId },
      signal: options.signal,
    });
    if (!result.ok) {
      return failed({ ...result.diagnostic, phase: "import" });
    }
    return {
      ok: true,
      value: { ...result.value, projectId: result.value.projectId ?? parsed.projectId },
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private timing(phase: Exclude<ReconcilePhase, "read" | "import">, options: ZoneCallOptions): PollTiming {
    const polling = this.config.polling;
    const timeouts = {
      create: polling.createTimeoutMs,
      update: polling.updateTimeoutMs,
      delete: polling.deleteTimeoutMs,
    };
    const timeoutMs = options.timeoutMs ?? timeouts[phase];
    return {
      timeoutMs,
      delayMs: Math.min(polling.delayMs, timeoutMs),
      minIntervalMs: polling.minIntervalMs,
      maxIntervalMs: Math.max(polling.maxIntervalMs, polling.minIntervalMs),
    };
  }

  private buildController(): ReconciliationController {
    return new ReconciliationController(this.client, {
      logger: this.rootLogger,
      resolver: this.deps.resolver,
      classifier: this.deps.classifier,
      clock: this.deps.clock,
      metrics: this.metrics,
      events: this.deps.events ?? this.producer,
    });
  }
}
