// Lifecycle of one research run.
//
//   START → PRIMARY_QUERY_SENT → PRIMARY_VALIDATED → (FOLLOWUP_QUERY_SENT →)? ASSEMBLED → DONE
//
// FAILED is reachable from every state except DONE. transition() is a pure
// table lookup; RunTracker keeps the history for _metadata and tests.

export type RunState =
  | "START"
  | "PRIMARY_QUERY_SENT"
  | "PRIMARY_VALIDATED"
  | "FOLLOWUP_QUERY_SENT"
  | "ASSEMBLED"
  | "DONE"
  | "FAILED";

export type RunEvent =
  | "send_primary"
  | "primary_valid"
  | "send_followup"
  | "followup_settled"
  | "assemble"
  | "finish"
  | "fail";

const TRANSITIONS: Record<RunState, Partial<Record<RunEvent, RunState>>> = {
  START              : { send_primary: "PRIMARY_QUERY_SENT", fail: "FAILED" },
  PRIMARY_QUERY_SENT : { primary_valid: "PRIMARY_VALIDATED", fail: "FAILED" },
  PRIMARY_VALIDATED  : { send_followup: "FOLLOWUP_QUERY_SENT", assemble: "ASSEMBLED", fail: "FAILED" },
  FOLLOWUP_QUERY_SENT: { followup_settled: "ASSEMBLED", fail: "FAILED" },
  ASSEMBLED          : { finish: "DONE", fail: "FAILED" },
  DONE               : {},
  FAILED             : {},
};

export class IllegalTransitionError extends Error {
  constructor(readonly state: RunState, readonly event: RunEvent) {
    super(`Illegal run transition: ${event} from ${state}`);
    this.name = "IllegalTransitionError";
  }
}

export function transition(state: RunState, event: RunEvent): RunState {
  const next = TRANSITIONS[state][event];
  if (next === undefined) throw new IllegalTransitionError(state, event);
  return next;
}

export const isTerminal = (state: RunState): boolean => state === "DONE" || state === "FAILED";

export class RunTracker {
  private current: RunState = "START";
  private readonly trail: RunState[] = ["START"];

  get state(): RunState {
    return this.current;
  }

  get history(): readonly RunState[] {
    return this.trail;
  }

  apply(event: RunEvent): RunState {
    this.current = transition(this.current, event);
    this.trail.push(this.current);
    return this.current;
  }

  /** Moves to FAILED unless the run is already finished. */
  fail(): void {
    if (!isTerminal(this.current)) this.apply("fail");
  }
}
