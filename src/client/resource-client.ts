import type {
  ZoneDelta,
  ZoneDescriptor,
  ZoneScope,
  ZoneSpec,
} from "../types/index.js";

/**
 * Remote API for DNS zones. Every call is one network round-trip.
 *
 * Implementations throw `ResourceNotFoundError` for unknown ids and
 * `ResourceClientError` for every other failure. Calls are expected to be
 * safe to repeat; where the backend forbids a retry the client must report
 * an error code the retry classifier treats as fatal.
 *
 * A client is shared across reconcile calls for distinct zones and must be
 * safe for concurrent use.
 */
export interface ResourceClient {
  create(spec: ZoneSpec, scope?: ZoneScope): Promise<ZoneDescriptor>;
  read(id: string, scope?: ZoneScope): Promise<ZoneDescriptor>;
  update(id: string, delta: ZoneDelta, scope?: ZoneScope): Promise<ZoneDescriptor>;
  delete(id: string, scope?: ZoneScope): Promise<void>;
}
