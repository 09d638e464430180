import type { CommandExecutionRecord, TrajectoryEntry, TrajectorySnapshot } from './types.ts';

export interface TrajectoryOptions {
  /** 0 keeps every record. */
  maxEntries?: number;
}

interface SandboxLog {
  records: CommandExecutionRecord[];
  total: number;
  dropped: number;
}

/**
 * Append-only command log per sandbox. Records are frozen on append and
 * snapshots are copies, so a returned trajectory never changes afterwards.
 */
export class TrajectoryRecorder {
  private readonly logs = new Map<string, SandboxLog>();
  private readonly maxEntries: number;

  constructor(opts: TrajectoryOptions = {}) {
    this.maxEntries = opts.maxEntries ?? 0;
    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 0) {
      throw new RangeError(`maxEntries must be a non-negative integer, got ${this.maxEntries}`);
    }
  }

  append(sandboxId: string, entry: TrajectoryEntry): CommandExecutionRecord {
    let log = this.logs.get(sandboxId);
    if (!log) {
      log = { records: [], total: 0, dropped: 0 };
      this.logs.set(sandboxId, log);
    }

    const record = Object.freeze({ ...entry, index: log.total });
    log.records.push(record);
    log.total += 1;

    if (this.maxEntries > 0 && log.records.length > this.maxEntries) {
      const excess = log.records.length - this.maxEntries;
      log.records.splice(0, excess);
      log.dropped += excess;
    }
    return record;
  }

  get(sandboxId: string): TrajectorySnapshot {
    const log = this.logs.get(sandboxId);
    if (!log) return { records: [], total: 0, dropped: 0, truncated: false };
    return {
      records: [...log.records],
      total: log.total,
      dropped: log.dropped,
      truncated: log.dropped > 0,
    };
  }

  count(sandboxId: string): number {
    return this.logs.get(sandboxId)?.total ?? 0;
  }

  drop(sandboxId: string): void {
    this.logs.delete(sandboxId);
  }
}
