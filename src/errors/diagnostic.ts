import type { LifecycleState, ReconcilePhase } from "../types/index.js";
import { isNotFound } from "../client/errors.js";
import {
  MalformedImportIdError,
  PollCancelledError,
  PollFatalError,
  PollTimeoutError,
  formatErrorMessage,
  toError,
} from "./errors.js";

export type DiagnosticCode =
  | "CreateFailed"
  | "CreateTimeoutOrError"
  | "ReadFailed"
  | "UpdateFailed"
  | "UpdateTimeoutOrError"
  | "DeleteFailed"
  | "DeleteTimeoutOrError"
  | "NotFound"
  | "Cancelled"
  | "MalformedImportId";

export type DiagnosticKind =
  /** The create/update/delete call itself failed */
  | "client_call_failed"
  /** The zone does not exist (the "gone" signal) */
  | "not_found"
  | "poll_timeout"
  | "poll_fatal"
  | "cancelled"
  | "malformed_import_id";

/**
 * Structured failure handed back from every reconcile call that did not
 * succeed.
 */
export interface Diagnostic {
  code: DiagnosticCode;
  kind: DiagnosticKind;
  phase: ReconcilePhase;
  resourceId?: string;
  message: string;
  cause: Error;
  /** Last lifecycle state seen while polling */
  lastState?: LifecycleState;
  elapsedMs?: number;
  /**
   * The zone exists remotely although the call failed: it was created
   * but never became ACTIVE. The caller owns it from here on.
   */
  partial?: boolean;
}

export type ReconcileResult<T> =
  | { ok: true; value: T }
  | { ok: false; diagnostic: Diagnostic };

export function succeeded<T>(value: T): ReconcileResult<T> {
  return { ok: true, value };
}

export function failed(diagnostic: Diagnostic): ReconcileResult<never> {
  return { ok: false, diagnostic };
}

/** True when the result reports that the zone no longer exists. */
export function isGone<T>(result: ReconcileResult<T>): boolean {
  return !result.ok && result.diagnostic.kind === "not_found";
}

const TARGET_WORDING: Record<ReconcilePhase, string> = {
  create: "become active",
  read: "be read",
  update: "become active",
  delete: "become deleted",
  import: "be imported",
};

function describeZone(resourceId?: string): string {
  return resourceId ? `zone ${resourceId}` : "zone";
}

/**
 * Diagnostic for a failed create/update/delete/read call.
 */
export function clientCallDiagnostic(
  phase: ReconcilePhase,
  err: unknown,
  resourceId?: string,
): Diagnostic {
  const cause = toError(err);

  if (isNotFound(err)) {
    return {
      code: "NotFound",
      kind: "not_found",
      phase,
      resourceId,
      message: `${describeZone(resourceId)} no longer exists`,
      cause,
    };
  }

  const codes: Record<ReconcilePhase, DiagnosticCode> = {
    create: "CreateFailed",
    read: "ReadFailed",
    update: "UpdateFailed",
    delete: "DeleteFailed",
    import: "ReadFailed",
  };

  const verb = phase === "import" ? "importing" : `${phase.replace(/e$/, "")}ing`;
  return {
    code: codes[phase],
    kind: "client_call_failed",
    phase,
    resourceId,
    message: `Error ${verb} ${describeZone(resourceId)}: ${formatErrorMessage(err)}`,
    cause,
  };
}

/**
 * Diagnostic for the single status read that follows an accepted create
 * or update when the status check is skipped. The call itself went
 * through, so a created zone is reported as partial.
 */
export function statusReadDiagnostic(
  phase: "create" | "update",
  err: unknown,
  resourceId: string,
): Diagnostic {
  const codes = {
    create: "CreateTimeoutOrError",
    update: "UpdateTimeoutOrError",
  } as const;

  return {
    code: codes[phase],
    kind: isNotFound(err) ? "not_found" : "poll_fatal",
    phase,
    resourceId,
    message: `Error reading ${describeZone(resourceId)} after ${phase}: ${formatErrorMessage(err)}`,
    cause: toError(err),
    partial: phase === "create",
  };
}

/**
 * Diagnostic for a polling run that did not reach its target state.
 */
export function pollDiagnostic(
  phase: "create" | "update" | "delete",
  err: PollTimeoutError | PollFatalError | PollCancelledError,
  resourceId: string,
  lastState?: LifecycleState,
): Diagnostic {
  const codes = {
    create: "CreateTimeoutOrError",
    update: "UpdateTimeoutOrError",
    delete: "DeleteTimeoutOrError",
  } as const;

  const base = {
    phase,
    resourceId,
    cause: err,
    partial: phase === "create",
  };

  if (err instanceof PollCancelledError) {
    return {
      ...base,
      code: "Cancelled",
      kind: "cancelled",
      message: `Waiting for ${describeZone(resourceId)} to ${TARGET_WORDING[phase]} was cancelled`,
      elapsedMs: err.elapsedMs,
    };
  }

  const message = `Error waiting for ${describeZone(resourceId)} to ${TARGET_WORDING[phase]}: ${err.message}`;

  if (err instanceof PollTimeoutError) {
    return {
      ...base,
      code: codes[phase],
      kind: "poll_timeout",
      message,
      lastState: err.lastState,
      elapsedMs: err.elapsedMs,
    };
  }

  return {
    ...base,
    code: codes[phase],
    kind: "poll_fatal",
    message,
    lastState: err.lastState ?? lastState,
  };
}

/**
 * Diagnostic for a call cancelled before any remote call was issued.
 */
export function cancelledDiagnostic(
  phase: ReconcilePhase,
  resourceId?: string,
): Diagnostic {
  return {
    code: "Cancelled",
    kind: "cancelled",
    phase,
    resourceId,
    message: `${phase} of ${describeZone(resourceId)} was cancelled before it started`,
    cause: new PollCancelledError(0),
    elapsedMs: 0,
  };
}

export function malformedImportDiagnostic(err: MalformedImportIdError): Diagnostic {
  return {
    code: "MalformedImportId",
    kind: "malformed_import_id",
    phase: "import",
    message: err.message,
    cause: err,
  };
}
