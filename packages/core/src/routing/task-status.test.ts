import { describe, it, expect } from "vitest";
import { advanceStatus, canTransition } from "./task-status.js";
import type { Task } from "../types.js";

describe("task status transitions", () => {
  it("allows only forward moves", () => {
    expect(canTransition("queued", "routed")).toBe(true);
    expect(canTransition("routed", "running")).toBe(true);
    expect(canTransition("running", "done")).toBe(true);
    expect(canTransition("queued", "escalated")).toBe(true);
    expect(canTransition("escalated", "failed")).toBe(true);

    expect(canTransition("running", "queued")).toBe(false);
    expect(canTransition("escalated", "routed")).toBe(false);
    expect(canTransition("done", "failed")).toBe(false);
    expect(canTransition("failed", "queued")).toBe(false);
  });

  it("leaves the task untouched on an illegal move", () => {
    const task: Task = { id: "t1", type: "reporting", priority: "low", payload: {}, createdAt: 0, status: "done" };
    expect(advanceStatus(task, "running")).toBe(false);
    expect(task.status).toBe("done");
  });
});
