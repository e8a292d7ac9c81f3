import { describe, it, expect } from "vitest";
import { DockOperationError } from "../core/errors";
import { DockingState, DockingStateMachine } from "../manager/DockingState";

describe("DockingStateMachine", () => {
  it("should start idle and accept input", () => {
    const machine = new DockingStateMachine();
    expect(machine.state).toBe(DockingState.Idle);
    expect(machine.isIdle).toBe(true);
    expect(machine.acceptsInput()).toBe(true);
  });

  it("should allow only one gesture at a time", () => {
    const machine = new DockingStateMachine();
    machine.begin(DockingState.Resizing);
    expect(() => machine.begin(DockingState.DraggingTab)).toThrow(DockOperationError);
    expect(machine.state).toBe(DockingState.Resizing);
  });

  it("should ignore ending a gesture that is not active", () => {
    const machine = new DockingStateMachine();
    machine.begin(DockingState.DraggingWindow);
    machine.end(DockingState.Resizing);
    expect(machine.state).toBe(DockingState.DraggingWindow);
    machine.end(DockingState.DraggingWindow);
    expect(machine.isIdle).toBe(true);
  });

  it("should block input while rendering and hand back the previous state", () => {
    const machine = new DockingStateMachine();
    machine.begin(DockingState.DraggingTab);
    const seen: boolean[] = [];

    const result = machine.runRendering(() => {
      seen.push(machine.acceptsInput());
      return machine.runRendering(() => {
        seen.push(machine.isRendering);
        return 42;
      });
    });

    expect(result).toBe(42);
    expect(seen).toEqual([false, true]);
    expect(machine.state).toBe(DockingState.DraggingTab);
  });

  it("should leave rendering even when the mutation throws", () => {
    const machine = new DockingStateMachine();
    expect(() =>
      machine.runRendering(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(machine.state).toBe(DockingState.Idle);
  });

  it("should reset to idle", () => {
    const machine = new DockingStateMachine();
    machine.begin(DockingState.Resizing);
    machine.reset();
    expect(machine.isIdle).toBe(true);
  });
});
