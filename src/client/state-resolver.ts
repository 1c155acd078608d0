import type { LifecycleState, ZoneDescriptor } from "../types/index.js";
import { LIFECYCLE_STATES } from "../types/index.js";

/**
 * Maps a descriptor's backend status tag to a lifecycle state.
 * Returns undefined for tags it does not recognise.
 */
export type StateResolver = (zone: ZoneDescriptor) => LifecycleState | undefined;

const KNOWN_STATES: ReadonlySet<string> = new Set(LIFECYCLE_STATES);

function isLifecycleState(value: string): value is LifecycleState {
  return KNOWN_STATES.has(value);
}

export const resolveZoneState: StateResolver = (zone) => {
  const tag = zone.status.trim().toUpperCase();
  return isLifecycleState(tag) ? tag : undefined;
};
