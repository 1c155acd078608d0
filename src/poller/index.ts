export {
  Poller,
  type PollerOptions,
  type PollRequest,
  type PollOutcome,
  type PollObservation,
  type PollPhase,
} from "./poller.js";
export {
  createPollConfig,
  activePollConfig,
  deletedPollConfig,
  DEFAULT_MAX_INTERVAL_MS,
  type PollConfig,
  type PollConfigInput,
  type PollTiming,
} from "./poll-config.js";
export {
  PollMachine,
  TERMINAL_STATES,
  type MachineState,
  type PollFailure,
  type PollTransition,
} from "./states.js";
export { systemClock, type Clock } from "./clock.js";
