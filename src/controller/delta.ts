import type {
  MutableZoneField,
  ReplacementField,
  ZoneDelta,
  ZoneDescriptor,
  ZoneSpec,
} from "../types/index.js";

export const MUTABLE_ZONE_FIELDS: readonly MutableZoneField[] = [
  "email",
  "ttl",
  "description",
  "masters",
];

/** The zone attributes a delta is computed against. */
export type ZoneSnapshot = Pick<
  ZoneDescriptor,
  "email" | "ttl" | "description" | "masters" | "name" | "type" | "attributes" | "projectId"
>;

export interface DesiredZone extends ZoneSpec {
  projectId?: string;
}

function sameSet(a: readonly string[] = [], b: readonly string[] = []): boolean {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size !== right.size) return false;
  for (const value of left) {
    if (!right.has(value)) return false;
  }
  return true;
}

function sameMap(
  a: Record<string, string> = {},
  b: Record<string, string> = {},
): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) return false;
  return keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

/**
 * Patch that moves `previous` to `desired` over the fields the backend
 * updates in place. Masters compare as sets.
 */
export function diffZone(previous: ZoneSnapshot, desired: DesiredZone): ZoneDelta {
  const delta: ZoneDelta = {};

  if ((previous.email ?? "") !== (desired.email ?? "")) {
    delta.email = desired.email ?? "";
  }
  if (desired.ttl !== undefined && previous.ttl !== desired.ttl) {
    delta.ttl = desired.ttl;
  }
  if ((previous.description ?? "") !== (desired.description ?? "")) {
    delta.description = desired.description ?? "";
  }
  if (!sameSet(previous.masters, desired.masters)) {
    delta.masters = [...new Set(desired.masters ?? [])];
  }

  return delta;
}

/**
 * Fields whose change cannot be applied in place. A non-empty result
 * means the zone has to be replaced instead of updated.
 */
export function replacementFields(
  previous: ZoneSnapshot,
  desired: DesiredZone,
): ReplacementField[] {
  const fields: ReplacementField[] = [];

  if (previous.name !== desired.name) fields.push("name");
  if (desired.type !== undefined && previous.type !== desired.type) fields.push("type");
  if (!sameMap(previous.attributes, desired.attributes)) fields.push("attributes");
  if (desired.projectId !== undefined && previous.projectId !== desired.projectId) {
    fields.push("projectId");
  }

  return fields;
}

/** Drop keys that carry no change. */
export function compactDelta(delta: ZoneDelta): ZoneDelta {
  const compact: ZoneDelta = {};
  if (delta.email !== undefined) compact.email = delta.email;
  if (delta.ttl !== undefined) compact.ttl = delta.ttl;
  if (delta.description !== undefined) compact.description = delta.description;
  if (delta.masters !== undefined) compact.masters = delta.masters;
  return compact;
}

export function isEmptyDelta(delta: ZoneDelta): boolean {
  return MUTABLE_ZONE_FIELDS.every((field) => delta[field] === undefined);
}
