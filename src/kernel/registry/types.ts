import type { ContainerHandle } from '../container/types.ts';
import type { ShellSession } from '../session/session.ts';
import type { AdmissionTicket } from '../admission/controller.ts';

export type SandboxState = 'created' | 'starting' | 'running' | 'stopping' | 'stopped' | 'failed';

export const TERMINAL_STATES: readonly SandboxState[] = ['stopped', 'failed'];

export interface SandboxSpec {
  image: string;
  setupCommands: readonly string[];
}

export interface SandboxRecord {
  readonly id: string;
  readonly image: string;
  readonly setupCommands: readonly string[];
  state: SandboxState;
  createdAt: Date;
  startedAt?: Date;
  stoppedAt?: Date;
  failureReason?: string;
  container?: ContainerHandle;
  ticket?: AdmissionTicket;
  // present exactly while state is 'running'
  session?: ShellSession;
  sessionCommandCount: number;
  lastStandaloneExitCode?: number;
}

export interface TransitionPatch {
  session?: ShellSession;
  ticket?: AdmissionTicket;
  reason?: string;
}

export interface TransitionResult {
  previous: SandboxState;
  /** The session detached by leaving `running`; the caller must close it. */
  session?: ShellSession;
}

export type BookkeepingPatch = Partial<Pick<SandboxRecord, 'sessionCommandCount' | 'lastStandaloneExitCode'>>;

export interface SandboxSummary {
  id: string;
  image: string;
  setup_commands: string[];
  state: SandboxState;
  container_id: string | null;
  created_at: string;
  started_at: string | null;
  stopped_at: string | null;
  failure_reason: string | null;
  command_count: number;
  last_standalone_exit_code: number | null;
}
