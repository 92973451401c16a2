import { describe, it, expect } from "vitest";
import { createInMemoryTaskStore } from "./task-store.js";
import type { TaskRecord } from "../interfaces.js";

function record(id: string, createdAt = 0): TaskRecord {
  return {
    id,
    type: "reporting",
    priority: "medium",
    status: "queued",
    late: false,
    createdAt,
    updatedAt: createdAt,
    history: [{ status: "queued", at: createdAt }],
  };
}

describe("createInMemoryTaskStore", () => {
  it("appends to the history only when the status changes", async () => {
    const clock = { now: 10 };
    const store = createInMemoryTaskStore({ now: () => clock.now });
    await store.create(record("t1"));

    clock.now = 20;
    await store.update("t1", { status: "routed", agentId: "reporting" });
    clock.now = 30;
    const updated = await store.update("t1", { status: "routed", late: true });

    expect(updated).toMatchObject({ status: "routed", agentId: "reporting", late: true, updatedAt: 30 });
    expect(updated?.history).toEqual([
      { status: "queued", at: 0 },
      { status: "routed", at: 20 },
    ]);
  });

  it("hands out copies that do not alias the stored record", async () => {
    const store = createInMemoryTaskStore();
    const created = await store.create(record("t1"));
    created.history.push({ status: "done", at: 99 });
    created.status = "done";

    const fetched = await store.get("t1");
    expect(fetched?.status).toBe("queued");
    expect(fetched?.history).toHaveLength(1);
  });

  it("returns null for unknown ids", async () => {
    const store = createInMemoryTaskStore();
    await expect(store.get("missing")).resolves.toBeNull();
    await expect(store.update("missing", { status: "failed" })).resolves.toBeNull();
  });

  it("keeps active records and drops terminal ones after the retention period", async () => {
    const clock = { now: 0 };
    const store = createInMemoryTaskStore({ retentionSeconds: 60, now: () => clock.now });
    await store.create(record("active"));
    await store.create(record("finished"));
    await store.update("finished", { status: "failed" });

    clock.now = 59_999;
    await expect(store.get("finished")).resolves.not.toBeNull();

    clock.now = 60_000;
    await expect(store.get("finished")).resolves.toBeNull();
    await expect(store.get("active")).resolves.not.toBeNull();
  });

  it("lists records oldest first, optionally by status", async () => {
    const store = createInMemoryTaskStore();
    await store.create(record("late", 200));
    await store.create(record("early", 100));
    await store.update("late", { status: "routed" });

    expect((await store.list()).map((r) => r.id)).toEqual(["early", "late"]);
    expect((await store.list({ status: "routed" })).map((r) => r.id)).toEqual(["late"]);
  });
});
