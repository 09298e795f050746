import { describe, expect, it } from "vitest";
import {
  IllegalTransitionError,
  ScanStateMachine,
  type ScanState,
  type StateTransition,
} from "../../src/engine/scan-state.js";

describe("scan state machine", () => {
  it("walks the happy path and reports each transition", () => {
    const seen: StateTransition[] = [];
    const machine = new ScanStateMachine((transition) => seen.push(transition));

    machine.transition("scanning");
    machine.transition("aggregating");
    machine.transition("reporting");
    machine.transition("done");

    expect(machine.state).toBe("done");
    expect(machine.isTerminal).toBe(true);
    expect(seen.map((transition) => `${transition.from}->${transition.to}`)).toEqual([
      "idle->scanning",
      "scanning->aggregating",
      "aggregating->reporting",
      "reporting->done",
    ]);
  });

  it("rejects skipping a phase", () => {
    const machine = new ScanStateMachine();

    expect(() => machine.transition("aggregating")).toThrow(IllegalTransitionError);
    expect(() => machine.transition("aggregating")).toThrow(
      "Illegal scan state transition idle -> aggregating",
    );
    expect(machine.state).toBe("idle");
  });

  const stepsTo: Record<string, ScanState[]> = {
    idle: [],
    scanning: ["scanning"],
    aggregating: ["scanning", "aggregating"],
    reporting: ["scanning", "aggregating", "reporting"],
  };

  it.each(Object.entries(stepsTo))("can fail from %s", (_state, steps) => {
    const machine = new ScanStateMachine();
    for (const step of steps) {
      machine.transition(step);
    }

    machine.fail();

    expect(machine.state).toBe("failed");
  });

  it("ignores fail once the run ended", () => {
    const machine = new ScanStateMachine();
    machine.transition("failed");

    machine.fail();

    expect(machine.state).toBe("failed");
    expect(machine.transitions).toHaveLength(1);
    expect(() => machine.transition("scanning")).toThrow(IllegalTransitionError);
  });
});
