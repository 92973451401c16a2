import type { TaskRecord, TaskStore } from "../interfaces.js";
import { TERMINAL_STATUSES } from "../../types.js";
import { TtlCache } from "../../cache/ttl-cache.js";
import { DEFAULTS } from "../../utils/constants.js";

export interface InMemoryTaskStoreOptions {
  /** How long terminal records stay readable */
  retentionSeconds?: number;
  now?: () => number;
}

/**
 * Creates an in-memory TaskStore. Active records never expire; terminal ones
 * are kept for `retentionSeconds` after they settle.
 */
export function createInMemoryTaskStore(options: InMemoryTaskStoreOptions = {}): TaskStore {
  const now = options.now ?? Date.now;
  const retentionMs = (options.retentionSeconds ?? DEFAULTS.TASK_RETENTION_SECONDS) * 1000;
  const records = new TtlCache<TaskRecord>({ maxEntries: Number.POSITIVE_INFINITY, now });

  function ttlFor(record: TaskRecord): number {
    return TERMINAL_STATUSES.has(record.status) ? retentionMs : Number.POSITIVE_INFINITY;
  }

  function copy(record: TaskRecord): TaskRecord {
    return { ...record, history: [...record.history] };
  }

  return {
    async create(record) {
      const stored = copy(record);
      records.set(stored.id, stored, ttlFor(stored));
      return copy(stored);
    },

    async get(id) {
      const record = records.getValue(id);
      return record ? copy(record) : null;
    },

    async update(id, patch) {
      const current = records.getValue(id);
      if (!current) return null;
      const at = now();
      const next: TaskRecord = { ...current, ...patch, updatedAt: at, history: [...current.history] };
      if (patch.status !== undefined && patch.status !== current.status) {
        next.history.push({ status: patch.status, at });
      }
      records.set(id, next, ttlFor(next));
      return copy(next);
    },

    async list(filter) {
      const result: TaskRecord[] = [];
      for (const record of records.values()) {
        if (!filter?.status || record.status === filter.status) result.push(copy(record));
      }
      return result.sort((a, b) => a.createdAt - b.createdAt);
    },
  };
}
