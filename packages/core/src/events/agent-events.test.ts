import { describe, it, expect, vi } from "vitest";
import { AgentEventBus } from "./agent-events.js";
import { BUS_EVENTS } from "./events.js";

describe("AgentEventBus", () => {
  it("delivers events to every subscriber until it unsubscribes", () => {
    const bus = new AgentEventBus();
    const first = vi.fn();
    const second = vi.fn();
    const unsubscribe = bus.subscribe(first);
    bus.subscribe(second);

    bus.emit(BUS_EVENTS.TASK_QUEUED, { taskId: "t1" });
    unsubscribe();
    bus.emit(BUS_EVENTS.TASK_ROUTED, { taskId: "t1" });

    expect(first).toHaveBeenCalledTimes(1);
    expect(first).toHaveBeenCalledWith({ type: "task:queued", data: { taskId: "t1" }, timestamp: expect.any(Number) });
    expect(second).toHaveBeenCalledTimes(2);
  });

  it("keeps delivering when a handler throws", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const bus = new AgentEventBus();
    const after = vi.fn();
    bus.subscribe(() => { throw new Error("listener bug"); });
    bus.subscribe(after);

    bus.emit(BUS_EVENTS.STATUS);

    expect(after).toHaveBeenCalledWith(expect.objectContaining({ type: "status", data: {} }));
    expect(error).toHaveBeenCalledTimes(1);
    error.mockRestore();
  });
});
