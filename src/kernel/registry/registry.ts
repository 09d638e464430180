import { randomUUID } from 'node:crypto';
import { InvalidTransitionError, NotFoundError } from '../errors.ts';
import type { ContainerHandle } from '../container/types.ts';
import type { AdmissionTicket } from '../admission/controller.ts';
import {
  TERMINAL_STATES,
  type BookkeepingPatch,
  type SandboxRecord,
  type SandboxSpec,
  type SandboxState,
  type SandboxSummary,
  type TransitionPatch,
  type TransitionResult,
} from './types.ts';

const VALID_TRANSITIONS: Record<SandboxState, SandboxState[]> = {
  created:  ['starting', 'failed'],
  starting: ['running', 'stopping', 'failed'],
  running:  ['stopping', 'failed'],
  stopping: ['stopped', 'failed'],
  stopped:  [],
  failed:   [],
};

export function canTransition(from: SandboxState, to: SandboxState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Owns every sandbox record. State changes go through `transition`, a
 * compare-and-swap on the current state, so two requests racing on the same
 * sandbox cannot both win.
 */
export class SandboxRegistry {
  private readonly records = new Map<string, SandboxRecord>();
  private readonly newId: () => string;

  constructor(newId: () => string = randomUUID) {
    this.newId = newId;
  }

  create(spec: SandboxSpec): Readonly<SandboxRecord> {
    const record: SandboxRecord = {
      id: this.newId(),
      image: spec.image,
      setupCommands: [...spec.setupCommands],
      state: 'created',
      createdAt: new Date(),
      sessionCommandCount: 0,
    };
    this.records.set(record.id, record);
    return record;
  }

  get(id: string): Readonly<SandboxRecord> {
    return this.require(id);
  }

  find(id: string): Readonly<SandboxRecord> | undefined {
    return this.records.get(id);
  }

  list(): Readonly<SandboxRecord>[] {
    return [...this.records.values()];
  }

  inState(...states: SandboxState[]): Readonly<SandboxRecord>[] {
    return this.list().filter(record => states.includes(record.state));
  }

  transition(
    id: string,
    expected: SandboxState | readonly SandboxState[],
    next: SandboxState,
    patch: TransitionPatch = {},
  ): TransitionResult {
    const record = this.require(id);
    const current = record.state;
    const allowed = typeof expected === 'string' ? [expected] : expected;

    if (!allowed.includes(current)) {
      throw new InvalidTransitionError(id, current, next, `expected ${allowed.join(' or ')}`);
    }
    if (!canTransition(current, next)) {
      throw new InvalidTransitionError(id, current, next);
    }
    if (next === 'running' && !patch.session) {
      throw new InvalidTransitionError(id, current, next, 'a running sandbox needs a live session');
    }

    const result: TransitionResult = { previous: current };
    if (current === 'running') {
      result.session = record.session;
      record.session = undefined;
    }

    record.state = next;
    if (patch.ticket) record.ticket = patch.ticket;
    if (next === 'running') {
      record.session = patch.session;
      record.startedAt = new Date();
    }
    if (next === 'failed') {
      record.failureReason = patch.reason ?? 'unknown failure';
    }
    if (TERMINAL_STATES.includes(next)) {
      record.stoppedAt = new Date();
    }
    return result;
  }

  /** Stores the container only if the record is still in `expected`; otherwise the caller keeps ownership. */
  attachContainer(id: string, expected: SandboxState, handle: ContainerHandle): boolean {
    const record = this.require(id);
    if (record.state !== expected) return false;
    record.container = handle;
    return true;
  }

  take(id: string, resource: 'container'): ContainerHandle | undefined;
  take(id: string, resource: 'ticket'): AdmissionTicket | undefined;
  take(id: string, resource: 'container' | 'ticket'): ContainerHandle | AdmissionTicket | undefined {
    const record = this.records.get(id);
    if (!record) return undefined;
    if (resource === 'container') {
      const handle = record.container;
      record.container = undefined;
      return handle;
    }
    const ticket = record.ticket;
    record.ticket = undefined;
    return ticket;
  }

  update(id: string, patch: BookkeepingPatch): void {
    const record = this.require(id);
    if (patch.sessionCommandCount !== undefined) record.sessionCommandCount = patch.sessionCommandCount;
    if (patch.lastStandaloneExitCode !== undefined) record.lastStandaloneExitCode = patch.lastStandaloneExitCode;
  }

  remove(id: string): void {
    const record = this.require(id);
    if (!TERMINAL_STATES.includes(record.state)) {
      throw new InvalidTransitionError(id, record.state, 'removed', 'only stopped or failed sandboxes can be removed');
    }
    this.records.delete(id);
  }

  private require(id: string): SandboxRecord {
    const record = this.records.get(id);
    if (!record) throw new NotFoundError(id);
    return record;
  }
}

export function toSummary(record: Readonly<SandboxRecord>): SandboxSummary {
  return {
    id: record.id,
    image: record.image,
    setup_commands: [...record.setupCommands],
    state: record.state,
    container_id: record.container?.id ?? null,
    created_at: record.createdAt.toISOString(),
    started_at: record.startedAt?.toISOString() ?? null,
    stopped_at: record.stoppedAt?.toISOString() ?? null,
    failure_reason: record.failureReason ?? null,
    command_count: record.sessionCommandCount,
    last_standalone_exit_code: record.lastStandaloneExitCode ?? null,
  };
}
