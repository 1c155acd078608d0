// Polling state machine:
//
//   [*] --> PENDING
//   PENDING --> PENDING   (pending state observed, or retryable read error)
//   PENDING --> ACTIVE    (target observed)
//   PENDING --> DELETED   (target observed)
//   PENDING --> ERROR     (fatal read error, unexpected state, timeout, cancel)
//   ACTIVE --> [*]
//   DELETED --> [*]
//   ERROR --> [*]

import type { LifecycleState } from "../types/index.js";
import type {
  PollCancelledError,
  PollFatalError,
  PollTimeoutError,
} from "../errors/errors.js";

export type MachineState = "PENDING" | "ACTIVE" | "DELETED" | "ERROR";

export type PollFailure = PollTimeoutError | PollFatalError | PollCancelledError;

export const TERMINAL_STATES: ReadonlySet<MachineState> = new Set([
  "ACTIVE",
  "DELETED",
  "ERROR",
]);

export interface PollTransition {
  resourceId: string;
  previous: MachineState;
  current: MachineState;
  error?: PollFailure;
}

/**
 * Tracks one polling run. Terminal states accept no further transitions.
 */
export class PollMachine {
  private current: MachineState = "PENDING";
  private cause: PollFailure | undefined;

  constructor(readonly resourceId: string) {}

  get state(): MachineState {
    return this.current;
  }

  get error(): PollFailure | undefined {
    return this.cause;
  }

  isTerminal(): boolean {
    return TERMINAL_STATES.has(this.current);
  }

  /** Move to the target state that was observed. */
  reach(target: Extract<LifecycleState, "ACTIVE" | "DELETED">): PollTransition {
    return this.transition(target);
  }

  fail(error: PollFailure): PollTransition {
    this.cause = error;
    return this.transition("ERROR", error);
  }

  private transition(to: MachineState, error?: PollFailure): PollTransition {
    if (this.isTerminal()) {
      throw new Error(
        `Invalid transition for "${this.resourceId}": "${this.current}" is terminal, cannot move to "${to}"`,
      );
    }
    const previous = this.current;
    this.current = to;
    return { resourceId: this.resourceId, previous, current: to, error };
  }
}
