/**
 * Error codes a Resource Client attaches to failed calls.
 * Transport-specific errors are mapped onto these by the client.
 */
export type ClientErrorCode =
  | "conflict"
  | "rate_limited"
  | "unauthorized"
  | "forbidden"
  | "bad_request"
  | "not_found"
  | "server_error"
  | "unknown";

export interface ResourceClientErrorOptions {
  statusCode?: number;
  /** Backend hint on when to try again */
  retryAfterMs?: number;
  cause?: unknown;
}

export class ResourceClientError extends Error {
  readonly code: ClientErrorCode;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(
    code: ClientErrorCode,
    message: string,
    options: ResourceClientErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "ResourceClientError";
    this.code = code;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** Thrown by `read`, `update` and `delete` when the zone id is unknown. */
export class ResourceNotFoundError extends ResourceClientError {
  readonly resourceId: string;

  constructor(resourceId: string, options: ResourceClientErrorOptions = {}) {
    super("not_found", `zone ${resourceId} not found`, {
      statusCode: 404,
      ...options,
    });
    this.name = "ResourceNotFoundError";
    this.resourceId = resourceId;
  }
}

export function isNotFound(err: unknown): boolean {
  if (err instanceof ResourceNotFoundError) return true;
  return err instanceof ResourceClientError && err.code === "not_found";
}
