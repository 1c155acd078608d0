import type { ReconcilePhase } from "../types/index.js";

// ============================================================================
// Reconcile Event Types
// ============================================================================

export interface ReconcileEvent {
  /** Event ID */
  id: string;
  /** Event type discriminator */
  type: ReconcileEventType;
  /** System component that produced the event */
  source: string;
  /** Zone the event concerns; empty until the backend assigns an id */
  resourceId: string;
  phase: ReconcilePhase;
  timestamp: number;
  payload: Record<string, unknown>;
  /** OpenTelemetry trace context for correlation */
  traceContext?: {
    traceId: string;
    spanId: string;
  };
}

export type ReconcileEventType =
  | "reconcile.started"
  | "reconcile.completed"
  | "reconcile.failed"
  | "zone.state_observed";

/**
 * Anything that accepts reconcile events. Implementations must not throw
 * from `emit`; delivery happens in the background.
 */
export interface EventSink {
  emit(event: ReconcileEvent): void;
}
