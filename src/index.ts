// Zonekeeper: lifecycle reconciliation for eventually-consistent DNS zones
// ========================================================================
//
// The backend accepts a create/update/delete immediately but applies it
// asynchronously; the zone moves through PENDING before settling on
// ACTIVE or disappearing. Zonekeeper issues the call, then polls until the
// zone settles, the deadline passes, or the caller cancels.
//
//   ┌────────────────────┐
//   │  Zonekeeper facade │  per-phase timeouts, skipStatusCheck, import
//   └─────────┬──────────┘
//             ↓
//   ┌────────────────────────────┐      ┌──────────────────┐
//   │  ReconciliationController  │ ───→ │  ResourceClient  │
//   └─────────┬──────────────────┘      └──────────────────┘
//             ↓                                  ↑
//   ┌────────────────────┐   status reads        │
//   │  Poller            │ ──────────────────────┘
//   │  ├─ StateResolver  │
//   │  └─ RetryClassifier│
//   └─────────┬──────────┘
//             │
//      ┌──────┼───────────┐
//      ↓      ↓           ↓
//   ┌───────┐ ┌────────┐ ┌────────┐
//   │ Kafka │ │ OTel   │ │ pino   │
//   │ events│ │ traces │ │ logs   │
//   └───────┘ └────────┘ └────────┘
//

export { Zonekeeper } from "./zonekeeper.js";
export type { ZoneCallOptions, ZonekeeperDeps } from "./zonekeeper.js";

// Types
export type {
  ZoneDescriptor,
  ZoneSpec,
  ZoneDelta,
  ZoneScope,
  ZoneType,
  DeletedZone,
  LifecycleState,
  ReconcilePhase,
  MutableZoneField,
  ReplacementField,
  ZonekeeperConfig,
  PollingDefaults,
  EventsConfig,
  KafkaConfig,
  ObservabilityConfig,
  LogLevel,
} from "./types/index.js";

// Client contract
export {
  ResourceClientError,
  ResourceNotFoundError,
  isNotFound,
  resolveZoneState,
} from "./client/index.js";
export type { ResourceClient, ClientErrorCode, StateResolver } from "./client/index.js";

// Errors
export {
  PollTimeoutError,
  PollFatalError,
  PollCancelledError,
  MalformedImportIdError,
  InvalidPollConfigError,
  isGone,
} from "./errors/index.js";
export type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticKind,
  ReconcileResult,
} from "./errors/index.js";

// Retry
export { RetryClassifier, defaultRetryClassifier } from "./retry/index.js";
export type { RetryDecision, RetryClassifierOptions } from "./retry/index.js";

// Polling
export {
  Poller,
  createPollConfig,
  activePollConfig,
  deletedPollConfig,
  systemClock,
} from "./poller/index.js";
export type {
  Clock,
  PollConfig,
  PollConfigInput,
  PollTiming,
  PollOutcome,
  PollObservation,
} from "./poller/index.js";

// Controller
export {
  ReconciliationController,
  diffZone,
  replacementFields,
  isEmptyDelta,
} from "./controller/index.js";
export type { ReconcileOptions, ReadOptions, DesiredZone } from "./controller/index.js";

// Import
export { parseImportId } from "./import/index.js";
export type { ZoneImportId } from "./import/index.js";

// Events
export { EventProducer, TOPICS } from "./kafka/index.js";
export type { EventSink, ReconcileEvent, ReconcileEventType } from "./events/index.js";

// Observability
export {
  initTracing,
  shutdownTracing,
  initMetrics,
  shutdownMetrics,
} from "./observability/index.js";
