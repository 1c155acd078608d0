// ============================================================================
// Zone Types: the managed resource and the requests that shape it
// ============================================================================

/**
 * A DNS zone as last observed on the backend.
 * `id` is assigned by the backend on create and never changes afterwards.
 */
export interface ZoneDescriptor {
  id: string;
  name: string;
  email?: string;
  ttl?: number;
  description?: string;
  /** Master hosts for SECONDARY zones. Order carries no meaning. */
  masters: string[];
  attributes: Record<string, string>;
  type?: ZoneType;
  projectId?: string;
  /** Raw status tag as reported by the backend (e.g. "PENDING") */
  status: string;
}

export type ZoneType = "PRIMARY" | "SECONDARY";

/** Desired state for a zone that does not exist yet. */
export interface ZoneSpec {
  name: string;
  email?: string;
  ttl?: number;
  description?: string;
  masters?: string[];
  attributes?: Record<string, string>;
  type?: ZoneType;
  /** Extra request fields passed through to the backend untouched */
  valueSpecs?: Record<string, string>;
}

/**
 * Patch over the fields the backend can change in place.
 * Absent keys are left alone; an empty delta means there is nothing to send.
 */
export interface ZoneDelta {
  email?: string;
  ttl?: number;
  /** An empty string clears the description */
  description?: string;
  masters?: string[];
}

export type MutableZoneField = keyof ZoneDelta;

/** Fields that can only change by replacing the zone. */
export type ReplacementField = "name" | "type" | "attributes" | "projectId";

/** Request scoping forwarded to every client call. */
export interface ZoneScope {
  /** Operate on a zone owned by another project */
  projectId?: string;
}

// ============================================================================
// Lifecycle
// ============================================================================

export type LifecycleState = "PENDING" | "ACTIVE" | "DELETED" | "ERROR";

export const LIFECYCLE_STATES: readonly LifecycleState[] = [
  "PENDING",
  "ACTIVE",
  "DELETED",
  "ERROR",
];

export type ReconcilePhase = "create" | "read" | "update" | "delete" | "import";

// ============================================================================
// Results
// ============================================================================

export interface DeletedZone {
  id: string;
  state: "DELETED";
  /** The zone was already gone when delete was issued */
  alreadyAbsent: boolean;
}

// ============================================================================
// Kafka Configuration
// ============================================================================

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  /** Topic prefix for all Zonekeeper topics */
  topicPrefix: string;
  producer?: {
    /** Batch size before flush */
    batchSize?: number;
    /** Max wait before flush (ms) */
    lingerMs?: number;
    /** Most events held while the broker is unreachable; the oldest are dropped first */
    maxBuffered?: number;
    compression?: CompressionCodec;
  };
  ssl?: boolean;
  sasl?:
    | { mechanism: "plain"; username: string; password: string }
    | { mechanism: "scram-sha-256"; username: string; password: string }
    | { mechanism: "scram-sha-512"; username: string; password: string };
}

export type CompressionCodec = "gzip" | "snappy" | "lz4" | "none";

export interface EventsConfig {
  /** Publish reconcile lifecycle events to Kafka */
  enabled: boolean;
  kafka: KafkaConfig;
}

// ============================================================================
// Observability Configuration
// ============================================================================

export interface ObservabilityConfig {
  /** Service name for traces/metrics */
  serviceName: string;
  /** OTLP endpoint for traces */
  traceEndpoint?: string;
  /** OTLP endpoint for metrics */
  metricsEndpoint?: string;
  /** Metrics export interval (ms) */
  metricsInterval?: number;
  /** Additional resource attributes */
  resourceAttributes?: Record<string, string>;
}

// ============================================================================
// Polling Configuration
// ============================================================================

export interface PollingDefaults {
  createTimeoutMs: number;
  updateTimeoutMs: number;
  deleteTimeoutMs: number;
  /** Grace period before the first status read */
  delayMs: number;
  /** Floor on the time between two status reads */
  minIntervalMs: number;
  /** Ceiling on the backoff applied after retryable read errors */
  maxIntervalMs: number;
}

// ============================================================================
// Zonekeeper Top-Level Configuration
// ============================================================================

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface ZonekeeperConfig {
  polling: PollingDefaults;
  /** Return right after the remote call instead of waiting for ACTIVE/DELETED */
  skipStatusCheck: boolean;
  events: EventsConfig;
  observability: ObservabilityConfig;
  logLevel?: LogLevel;
}
