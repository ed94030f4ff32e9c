import { InvalidTransitionError } from "../../errors.js";
import {
  isTerminal,
  JobEvent,
  jobEvents,
  JobStateMachine,
  JobStatus,
  jobStatuses,
  Transition,
} from "../state-machine.js";

const legal: Record<JobStatus, Partial<Record<JobEvent, JobStatus>>> = {
  QUEUED: { pickup: "INITIALIZING", timeout: "FAILED" },
  INITIALIZING: { ready: "UPLOADING", fail: "FAILED", timeout: "FAILED" },
  UPLOADING: {
    uploaded: "PROCESSING",
    pause: "PAUSED",
    cancel: "CANCELLED",
    fail: "FAILED",
    timeout: "FAILED",
  },
  PAUSED: { resume: "UPLOADING", cancel: "CANCELLED", timeout: "FAILED" },
  PROCESSING: { convert: "VERIFYING", fail: "FAILED", timeout: "FAILED" },
  VERIFYING: { verify: "COMPLETED", fail: "FAILED", timeout: "FAILED" },
  COMPLETED: {},
  FAILED: {},
  CANCELLED: {},
};

describe("job state machine", () => {
  it("starts queued", () => {
    const machine = new JobStateMachine();
    expect(machine.state).toBe("QUEUED");
    expect(machine.terminal).toBe(false);
  });

  for (const status of jobStatuses) {
    for (const event of jobEvents) {
      const target = legal[status][event];
      if (target !== undefined) {
        it(`moves from ${status} to ${target} on ${event}`, () => {
          const machine = new JobStateMachine(status);
          expect(machine.can(event)).toBe(true);
          const result = machine.apply(event);
          expect(result).toStrictEqual({
            ok: true,
            from: status,
            to: target,
            event,
          });
          expect(machine.state).toBe(target);
        });
      } else {
        it(`rejects ${event} in ${status}`, () => {
          const machine = new JobStateMachine(status);
          expect(machine.can(event)).toBe(false);
          const result = machine.apply(event);
          expect(result.ok).toBe(false);
          if (!result.ok) {
            expect(result.state).toBe(status);
            expect(result.error).toBeInstanceOf(InvalidTransitionError);
            expect(result.error.state).toBe(status);
            expect(result.error.event).toBe(event);
          }
          expect(machine.state).toBe(status);
        });
      }
    }
  }

  it("has no way out of terminal states", () => {
    for (const status of jobStatuses) {
      const machine = new JobStateMachine(status);
      const exits = jobEvents.filter((event) => machine.can(event));
      expect(exits.length === 0).toBe(isTerminal(status));
    }
  });

  it("notifies listeners of transitions", () => {
    const machine = new JobStateMachine();
    const transitions: Transition[] = [];
    const remove = machine.onTransition((transition) => {
      transitions.push(transition);
    });
    machine.apply("pickup");
    machine.apply("uploaded");
    machine.apply("ready");
    remove();
    machine.apply("pause");
    expect(transitions).toStrictEqual([
      { from: "QUEUED", to: "INITIALIZING", event: "pickup" },
      { from: "INITIALIZING", to: "UPLOADING", event: "ready" },
    ]);
    expect(machine.state).toBe("PAUSED");
  });
});
