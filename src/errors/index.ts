export {
  PollTimeoutError,
  PollFatalError,
  PollCancelledError,
  MalformedImportIdError,
  InvalidPollConfigError,
  formatErrorMessage,
  toError,
} from "./errors.js";
export {
  clientCallDiagnostic,
  pollDiagnostic,
  statusReadDiagnostic,
  cancelledDiagnostic,
  malformedImportDiagnostic,
  succeeded,
  failed,
  isGone,
  type Diagnostic,
  type DiagnosticCode,
  type DiagnosticKind,
  type ReconcileResult,
} from "./diagnostic.js";
