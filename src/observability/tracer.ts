import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig, ReconcilePhase } from "../types/index.js";

let provider: NodeTracerProvider | null = null;

/**
 * Initialize the OpenTelemetry trace provider.
 * Call once at startup.
 */
export function initTracing(config: ObservabilityConfig): void {
  if (provider) return;

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...config.resourceAttributes,
  });

  const spanProcessors = config.traceEndpoint
    ? [new BatchSpanProcessor(new OTLPTraceExporter({ url: config.traceEndpoint }))]
    : [];

  provider = new NodeTracerProvider({ resource, spanProcessors });
  provider.register();
}

/**
 * Shutdown the trace provider. Call on process exit.
 */
export async function shutdownTracing(): Promise<void> {
  if (provider) {
    await provider.shutdown();
    provider = null;
  }
}

/**
 * Get a Tracer scoped to a Zonekeeper component.
 */
export function getTracer(component: string): Tracer {
  return trace.getTracer(`zonekeeper.${component}`);
}

/**
 * Create a span for one reconcile call.
 */
export function startReconcileSpan(
  phase: ReconcilePhase,
  resourceId?: string,
): { span: Span; ctx: Context } {
  const tracer = getTracer("controller");
  const span = tracer.startSpan(`reconcile.${phase}`, {
    kind: SpanKind.CLIENT,
    attributes: {
      "zonekeeper.phase": phase,
      ...(resourceId ? { "zonekeeper.zone.id": resourceId } : {}),
    },
  });
  const ctx = trace.setSpan(context.active(), span);
  return { span, ctx };
}

/**
 * End a span with success.
 */
export function endSpanOk(span: Span): void {
  span.setStatus({ code: SpanStatusCode.OK });
  span.end();
}

/**
 * End a span with error.
 */
export function endSpanError(span: Span, error: Error | string): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: typeof error === "string" ? error : error.message,
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.end();
}

/**
 * Extract trace context (traceId + spanId) from current span.
 */
export function extractTraceContext(span: Span): {
  traceId: string;
  spanId: string;
} {
  const spanCtx = span.spanContext();
  return {
    traceId: spanCtx.traceId,
    spanId: spanCtx.spanId,
  };
}
