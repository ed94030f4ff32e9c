import { InvalidTransitionError } from "../errors.js";

export const jobStatuses = [
  "QUEUED",
  "INITIALIZING",
  "UPLOADING",
  "PROCESSING",
  "VERIFYING",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "PAUSED",
] as const;
export type JobStatus = (typeof jobStatuses)[number];

export const jobEvents = [
  "pickup",
  "ready",
  "uploaded",
  "pause",
  "resume",
  "cancel",
  "fail",
  "convert",
  "verify",
  "timeout",
] as const;
export type JobEvent = (typeof jobEvents)[number];

export const terminalStatuses: readonly JobStatus[] = [
  "COMPLETED",
  "FAILED",
  "CANCELLED",
];
export const isTerminal = (status: JobStatus): boolean =>
  terminalStatuses.includes(status);

type Targets = Partial<Record<JobStatus, JobStatus>>;
type TransitionTable = Record<JobEvent, Targets>;

// The job watchdog ends any job that is still running
const timeoutTargets: Targets = {};
for (const status of jobStatuses) {
  if (!isTerminal(status)) {
    timeoutTargets[status] = "FAILED";
  }
}

const transitions: TransitionTable = {
  pickup: { QUEUED: "INITIALIZING" },
  ready: { INITIALIZING: "UPLOADING" },
  uploaded: { UPLOADING: "PROCESSING" },
  pause: { UPLOADING: "PAUSED" },
  resume: { PAUSED: "UPLOADING" },
  cancel: { UPLOADING: "CANCELLED", PAUSED: "CANCELLED" },
  fail: {
    INITIALIZING: "FAILED",
    UPLOADING: "FAILED",
    PROCESSING: "FAILED",
    VERIFYING: "FAILED",
  },
  convert: { PROCESSING: "VERIFYING" },
  verify: { VERIFYING: "COMPLETED" },
  timeout: timeoutTargets,
};

export const nextStatus = (
  status: JobStatus,
  event: JobEvent
): JobStatus | undefined => transitions[event][status];

export interface Transition {
  from: JobStatus;
  to: JobStatus;
  event: JobEvent;
}

export type TransitionResult =
  | ({ ok: true } & Transition)
  | { ok: false; state: JobStatus; error: InvalidTransitionError };

export type TransitionListener = (transition: Transition) => void;

export class JobStateMachine {
  private current: JobStatus;
  private listeners: TransitionListener[] = [];

  constructor(initial: JobStatus = "QUEUED") {
    this.current = initial;
  }

  get state(): JobStatus {
    return this.current;
  }
  get terminal(): boolean {
    return isTerminal(this.current);
  }

  can(event: JobEvent): boolean {
    return nextStatus(this.current, event) !== undefined;
  }

  /**
   * Moves the job along the transition table. An event that is not legal in
   * the current state leaves the state as it is and is reported back, never
   * thrown.
   */
  apply(event: JobEvent): TransitionResult {
    const from = this.current;
    const to = nextStatus(from, event);
    if (to === undefined) {
      return {
        ok: false,
        state: from,
        error: new InvalidTransitionError(from, event),
      };
    }
    this.current = to;
    const transition: Transition = { from, to, event };
    for (const listener of this.listeners) {
      listener(transition);
    }
    return { ok: true, ...transition };
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }
}
