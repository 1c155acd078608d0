export {
  initTracing,
  shutdownTracing,
  getTracer,
  startReconcileSpan,
  endSpanOk,
  endSpanError,
  extractTraceContext,
} from "./tracer.js";

export {
  initMetrics,
  shutdownMetrics,
} from "./metrics.js";

export type { ZonekeeperMetrics } from "./metrics.js";
