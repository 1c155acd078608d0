export {
  ReconciliationController,
  type ControllerOptions,
  type ReconcileOptions,
  type ReadOptions,
} from "./controller.js";
export {
  diffZone,
  replacementFields,
  compactDelta,
  isEmptyDelta,
  MUTABLE_ZONE_FIELDS,
  type DesiredZone,
  type ZoneSnapshot,
} from "./delta.js";
