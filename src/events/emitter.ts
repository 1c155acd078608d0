import { nanoid } from "nanoid";
import type { Span } from "@opentelemetry/api";
import type { ReconcilePhase } from "../types/index.js";
import type { ZonekeeperMetrics } from "../observability/metrics.js";
import { extractTraceContext } from "../observability/tracer.js";
import { eventTypeToTopic } from "../kafka/topics.js";
import type { EventSink, ReconcileEvent, ReconcileEventType } from "./types.js";

/**
 * Builds reconcile events and hands them to the sink.
 * Without a sink every call is a no-op.
 */
export class LifecycleEmitter {
  constructor(
    private readonly sink: EventSink | null,
    private readonly metrics: ZonekeeperMetrics | null = null,
  ) {}

  get enabled(): boolean {
    return this.sink !== null;
  }

  emit(
    type: ReconcileEventType,
    phase: ReconcilePhase,
    resourceId: string | undefined,
    payload: Record<string, unknown>,
    span?: Span,
  ): ReconcileEvent | null {
    if (!this.sink) return null;

    const event: ReconcileEvent = {
      id: nanoid(),
      type,
      source: "controller",
      resourceId: resourceId ?? "",
      phase,
      timestamp: Date.now(),
      payload,
      ...(span ? { traceContext: extractTraceContext(span) } : {}),
    };

    this.sink.emit(event);
    this.metrics?.eventsEmitted({ topic: eventTypeToTopic(type) });
    return event;
  }
}
