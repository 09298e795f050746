import { CodesweepError } from "../errors.js";

export const SCAN_STATES = [
  "idle",
  "scanning",
  "aggregating",
  "reporting",
  "done",
  "failed",
] as const;
export type ScanState = (typeof SCAN_STATES)[number];

export interface StateTransition {
  readonly from: ScanState;
  readonly to: ScanState;
  readonly at: Date;
}

const TRANSITIONS: Readonly<Record<ScanState, readonly ScanState[]>> = {
  idle: ["scanning", "failed"],
  scanning: ["aggregating", "failed"],
  aggregating: ["reporting", "failed"],
  reporting: ["done", "failed"],
  done: [],
  failed: [],
};

export class IllegalTransitionError extends CodesweepError {
  constructor(from: ScanState, to: ScanState) {
    super(`Illegal scan state transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

/** Lifecycle of one analysis run. Terminal states accept no further moves. */
export class ScanStateMachine {
  private current: ScanState = "idle";
  private readonly history: StateTransition[] = [];

  constructor(
    private readonly onTransition?: (transition: StateTransition) => void,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  get state(): ScanState {
    return this.current;
  }

  get transitions(): readonly StateTransition[] {
    return this.history;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: ScanState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: ScanState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    const transition: StateTransition = { from: this.current, to, at: this.clock() };
    this.current = to;
    this.history.push(transition);
    this.onTransition?.(transition);
  }

  /** Move to `failed` unless the run already ended. */
  fail(): void {
    if (!this.isTerminal) {
      this.transition("failed");
    }
  }
}
