import type { SandboxErrorCode } from '../errors.ts';

export type ExecutionMode = 'session' | 'standalone';

export interface CommandExecutionRecord {
  index: number;
  command: string;
  mode: ExecutionMode;
  stdout: string;
  stderr: string;
  // null when the command never completed (session timed out or closed)
  exit_code: number | null;
  error: SandboxErrorCode | null;
  started_at: string;
  finished_at: string;
}

export type TrajectoryEntry = Omit<CommandExecutionRecord, 'index'>;

export interface TrajectorySnapshot {
  records: CommandExecutionRecord[];
  /** Records ever appended, including evicted ones. */
  total: number;
  dropped: number;
  truncated: boolean;
}
