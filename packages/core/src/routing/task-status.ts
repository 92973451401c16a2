import type { Task, TaskStatus } from "../types.js";

/**
 * Legal transitions. `done` and `failed` are terminal; `escalated` only
 * ever leads to `failed`.
 */
const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  queued: ["routed", "escalated", "failed"],
  routed: ["running", "failed"],
  running: ["done", "failed"],
  escalated: ["failed"],
  done: [],
  failed: [],
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Moves the task to `next` if the transition is legal. Returns whether it moved. */
export function advanceStatus(task: Task, next: TaskStatus): boolean {
  if (!canTransition(task.status, next)) return false;
  task.status = next;
  return true;
}
