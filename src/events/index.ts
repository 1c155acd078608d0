export { LifecycleEmitter } from "./emitter.js";
export type { EventSink, ReconcileEvent, ReconcileEventType } from "./types.js";
