import type { Priority, TaskStatus, TaskType } from "../types.js";
import type { TaskFailure } from "../errors.js";

// ── Task Store ──

export interface TaskTransition {
  status: TaskStatus;
  /** Epoch ms */
  at: number;
}

/** Caller-facing record of a submitted task */
export interface TaskRecord {
  id: string;
  type: TaskType;
  priority: Priority;
  status: TaskStatus;
  /** Agent the task was routed to */
  agentId?: string;
  result?: unknown;
  error?: TaskFailure;
  /** True when the task finished after its deadline */
  late: boolean;
  /** Epoch ms */
  deadline?: number;
  createdAt: number;
  updatedAt: number;
  history: TaskTransition[];
}

export type TaskRecordPatch = Partial<Pick<TaskRecord, "status" | "agentId" | "result" | "error" | "late">>;

/**
 * Stores task records for polling.
 *
 * `update()` appends to `history` whenever the status changes. Records in a
 * terminal status may be dropped after a retention period; `get()` then
 * returns `null` (do not throw).
 */
export interface TaskStore {
  create(record: TaskRecord): Promise<TaskRecord>;
  /** Returns `null` if not found or expired. */
  get(id: string): Promise<TaskRecord | null>;
  /** Returns `null` if not found. */
  update(id: string, patch: TaskRecordPatch): Promise<TaskRecord | null>;
  list(filter?: { status?: TaskStatus }): Promise<TaskRecord[]>;
}
