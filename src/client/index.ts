export type { ResourceClient } from "./resource-client.js";
export {
  ResourceClientError,
  ResourceNotFoundError,
  isNotFound,
  type ClientErrorCode,
  type ResourceClientErrorOptions,
} from "./errors.js";
export { resolveZoneState, type StateResolver } from "./state-resolver.js";
