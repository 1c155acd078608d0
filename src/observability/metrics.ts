import {
  MeterProvider,
  PeriodicExportingMetricReader,
} from "@opentelemetry/sdk-metrics";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let meterProvider: MeterProvider | null = null;

/**
 * Initialize the OpenTelemetry meter provider.
 */
export function initMetrics(config: ObservabilityConfig): ZonekeeperMetrics {
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...config.resourceAttributes,
  });

  const readers: PeriodicExportingMetricReader[] = [];

  if (config.metricsEndpoint) {
    const exporter = new OTLPMetricExporter({
      url: config.metricsEndpoint,
    });
    readers.push(
      new PeriodicExportingMetricReader({
        exporter,
        exportIntervalMillis: config.metricsInterval ?? 15000,
      }),
    );
  }

  const provider = new MeterProvider({ resource, readers });
  meterProvider = provider;

  return createMetrics(provider);
}

export async function shutdownMetrics(): Promise<void> {
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
}

/**
 * Zonekeeper metrics: counters and histograms.
 */
export interface ZonekeeperMetrics {
  /** Count of finished reconcile calls */
  reconcileCount: (attrs: { phase: string; outcome: string }) => void;
  /** Reconcile call duration histogram */
  reconcileDuration: (ms: number, attrs: { phase: string }) => void;
  /** Status reads issued while polling, by observed state */
  pollReads: (attrs: { phase: string; state: string }) => void;
  /** Read errors the classifier let through for another attempt */
  pollRetries: (attrs: { phase: string; code: string }) => void;
  /** Kafka events emitted */
  eventsEmitted: (attrs: { topic: string }) => void;
}

function createMetrics(provider: MeterProvider): ZonekeeperMetrics {
  const meter = provider.getMeter("zonekeeper");

  const reconcileCounter = meter.createCounter("zonekeeper.reconciles.total", {
    description: "Total reconcile calls finished",
  });

  const reconcileHist = meter.createHistogram("zonekeeper.reconciles.duration_ms", {
    description: "Reconcile call duration in milliseconds",
    unit: "ms",
  });

  const readCounter = meter.createCounter("zonekeeper.poll.reads_total", {
    description: "Status reads issued while polling",
  });

  const retryCounter = meter.createCounter("zonekeeper.poll.retries_total", {
    description: "Retryable read errors seen while polling",
  });

  const eventsCounter = meter.createCounter("zonekeeper.kafka.events_total", {
    description: "Total events emitted to Kafka",
  });

  return {
    reconcileCount: (attrs) => reconcileCounter.add(1, attrs),
    reconcileDuration: (ms, attrs) => reconcileHist.record(ms, attrs),
    pollReads: (attrs) => readCounter.add(1, attrs),
    pollRetries: (attrs) => retryCounter.add(1, attrs),
    eventsEmitted: (attrs) => eventsCounter.add(1, attrs),
  };
}
