import { describe, expect, it, vi } from "vitest";

import { PipelineStateError } from "../../src/errors.js";
import { canTransition, PipelineStateMachine, TRANSITIONS } from "../../src/pipeline/state-machine.js";
import { PipelineState } from "../../src/pipeline/types.js";

describe("PipelineStateMachine", () => {
  it("should start in Pending", () => {
    const machine = new PipelineStateMachine();
    expect(machine.state).toBe(PipelineState.PENDING);
    expect(machine.history).toEqual([PipelineState.PENDING]);
    expect(machine.isTerminal).toBe(false);
  });

  it("should walk the whole chain to Completed", () => {
    const machine = new PipelineStateMachine();
    let state: PipelineState | undefined = TRANSITIONS.get(PipelineState.PENDING);
    while (state !== undefined) {
      machine.advance(state);
      state = TRANSITIONS.get(state);
    }
    expect(machine.state).toBe(PipelineState.COMPLETED);
    expect(machine.history).toHaveLength(13);
    expect(machine.isTerminal).toBe(true);
  });

  it("should reject skipped states", () => {
    const machine = new PipelineStateMachine();
    machine.advance(PipelineState.BASE_BUILDER);
    expect(() => machine.advance(PipelineState.SOURCE_COPIED)).toThrow(
      new PipelineStateError("Illegal transition BaseBuilder -> SourceCopied")
    );
  });

  it("should allow failing from any non-terminal state once", () => {
    const machine = new PipelineStateMachine();
    machine.advance(PipelineState.BASE_BUILDER);
    machine.fail();
    machine.fail();
    expect(machine.history).toEqual([PipelineState.PENDING, PipelineState.BASE_BUILDER, PipelineState.FAILED]);
  });

  it("should not fail after completion", () => {
    expect(canTransition(PipelineState.COMPLETED, PipelineState.FAILED)).toBe(false);
    expect(canTransition(PipelineState.FAILED, PipelineState.PENDING)).toBe(false);
  });

  it("should notify the listener of each transition", () => {
    const listener = vi.fn();
    const machine = new PipelineStateMachine(listener);
    machine.advance(PipelineState.BASE_BUILDER);
    machine.fail();
    expect(listener.mock.calls).toEqual([
      [PipelineState.PENDING, PipelineState.BASE_BUILDER],
      [PipelineState.BASE_BUILDER, PipelineState.FAILED],
    ]);
  });
});
