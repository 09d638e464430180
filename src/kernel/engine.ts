import { AdmissionController, type AdmissionStats, type AdmissionTicket } from './admission/index.ts';
import type { ContainerLimits, ContainerRuntime } from './container/types.ts';
import {
  CancelledError,
  InvalidRequestError,
  InvalidTransitionError,
  SandboxError,
  SessionClosedError,
  SessionTimeoutError,
  SetupFailedError,
  errorMessage,
} from './errors.ts';
import type { Logger } from './logger.ts';
import {
  SandboxRegistry,
  canTransition,
  toSummary,
  type SandboxState,
  type SandboxSummary,
} from './registry/index.ts';
import { ShellSession } from './session/index.ts';
import {
  TrajectoryRecorder,
  formatTrajectory,
  type TrajectoryEntry,
  type TrajectorySnapshot,
} from './trajectory/index.ts';

export interface EngineOptions {
  runtime: ContainerRuntime;
  maxSandboxes?: number;
  /** How long `start` waits for a free slot; 0 fails at once. */
  admissionTimeoutMs?: number;
  execTimeoutMs?: number;
  probeTimeoutMs?: number;
  setupTimeoutMs?: number;
  stopTimeoutMs?: number;
  /** Running sandboxes are stopped after this long; 0 disables the limit. */
  sandboxTimeoutMs?: number;
  trajectoryLimit?: number;
  shell?: string;
  workdir?: string;
  limits?: ContainerLimits;
  logger?: Logger;
  registry?: SandboxRegistry;
}

export interface CreateRequest {
  image: string;
  setupCommands?: readonly string[];
}

export interface StartOptions {
  signal?: AbortSignal;
}

export interface ExecRequest {
  command: string;
  standalone?: boolean;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface SandboxTrajectory extends TrajectorySnapshot {
  sandboxId: string;
}

export interface EngineStats {
  admission: AdmissionStats;
  sandboxes: Record<SandboxState, number>;
}

const EMPTY_COUNTS: Record<SandboxState, number> = {
  created: 0,
  starting: 0,
  running: 0,
  stopping: 0,
  stopped: 0,
  failed: 0,
};

function checkpoint(signal: AbortSignal | undefined, sandboxId: string): void {
  if (signal?.aborted) throw new CancelledError('start', { sandboxId });
}

/**
 * The only entry point the HTTP layer talks to. Ties admission, the
 * registry, the runtime adapter, shell sessions and trajectories together
 * and guarantees every container and admission ticket is released once.
 */
export class SandboxEngine {
  readonly registry: SandboxRegistry;
  readonly admission: AdmissionController;
  readonly trajectories: TrajectoryRecorder;
  private readonly runtime: ContainerRuntime;
  private readonly logger: Logger;
  private readonly admissionTimeoutMs: number;
  private readonly execTimeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly setupTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly sandboxTimeoutMs: number;
  private readonly shell: string;
  private readonly workdir: string;
  private readonly limits: ContainerLimits | undefined;
  private readonly timers = new Map<string, NodeJS.Timeout>();

  constructor(opts: EngineOptions) {
    this.runtime = opts.runtime;
    this.logger = opts.logger ?? console;
    this.registry = opts.registry ?? new SandboxRegistry();
    this.admission = new AdmissionController(opts.maxSandboxes ?? 10);
    this.trajectories = new TrajectoryRecorder({ maxEntries: opts.trajectoryLimit ?? 0 });
    this.admissionTimeoutMs = opts.admissionTimeoutMs ?? 0;
    this.execTimeoutMs = opts.execTimeoutMs ?? 30_000;
    this.probeTimeoutMs = opts.probeTimeoutMs ?? 10_000;
    this.setupTimeoutMs = opts.setupTimeoutMs ?? 10 * 60_000;
    this.stopTimeoutMs = opts.stopTimeoutMs ?? 5000;
    this.sandboxTimeoutMs = opts.sandboxTimeoutMs ?? 10 * 60_000;
    this.shell = opts.shell ?? '/bin/sh';
    this.workdir = opts.workdir ?? '/';
    this.limits = opts.limits;
  }

  create(req: CreateRequest): SandboxSummary {
    if (req.image.trim().length === 0) {
      throw new InvalidRequestError('image must not be empty');
    }
    const record = this.registry.create({
      image: req.image.trim(),
      setupCommands: (req.setupCommands ?? []).filter(cmd => cmd.trim().length > 0),
    });
    this.logger.info(`[engine] created sandbox ${record.id} (${record.image})`);
    return toSummary(record);
  }

  /** Creates and starts in one step; a sandbox that fails to start is discarded. */
  async launch(req: CreateRequest, opts: StartOptions = {}): Promise<SandboxSummary> {
    const { id } = this.create(req);
    try {
      return await this.start(id, opts);
    } catch (err) {
      await this.remove(id).catch((cleanupErr: unknown) =>
        this.logger.error(`[engine] failed to discard sandbox ${id}: ${errorMessage(cleanupErr)}`),
      );
      throw err;
    }
  }

  async start(id: string, opts: StartOptions = {}): Promise<SandboxSummary> {
    const record = this.registry.get(id);
    if (record.state !== 'created') {
      throw new InvalidTransitionError(id, record.state, 'starting', 'expected created');
    }

    let ticket: AdmissionTicket;
    try {
      ticket = await this.admission.acquire({
        signal: opts.signal,
        timeoutMs: this.admissionTimeoutMs,
      });
    } catch (err) {
      // a concurrent start of the same sandbox may hold the slot we were refused
      const current = this.registry.get(id);
      if (current.state !== 'created') {
        throw new InvalidTransitionError(id, current.state, 'starting', 'expected created');
      }
      throw err;
    }
    try {
      this.registry.transition(id, 'created', 'starting', { ticket });
    } catch (err) {
      this.admission.release(ticket);
      throw err;
    }

    try {
      await this.provision(id, opts.signal);
    } catch (err) {
      this.logger.error(`[engine] sandbox ${id} failed to start: ${errorMessage(err)}`);
      await this.fail(id, errorMessage(err));
      throw err;
    }

    this.setLifetimeTimer(id);
    this.logger.info(`[engine] sandbox ${id} is running`);
    return toSummary(this.registry.get(id));
  }

  async exec(id: string, req: ExecRequest): Promise<CommandResult> {
    if (req.command.trim().length === 0) {
      throw new InvalidRequestError('command must not be empty');
    }
    const record = this.registry.get(id);
    if (record.state !== 'running') {
      throw new InvalidTransitionError(id, record.state, 'exec', 'sandbox is not running');
    }
    return req.standalone ? this.execStandalone(id, req) : this.execInSession(id, req);
  }

  async stop(id: string): Promise<SandboxSummary> {
    const { session } = this.registry.transition(id, ['running', 'starting'], 'stopping');
    session?.close();

    const errors = await this.teardown(id);
    if (errors.length === 0) {
      this.registry.transition(id, 'stopping', 'stopped');
      this.logger.info(`[engine] sandbox ${id} stopped`);
    } else {
      this.registry.transition(id, 'stopping', 'failed', {
        reason: `cleanup failed: ${errors.join('; ')}`,
      });
    }
    return toSummary(this.registry.get(id));
  }

  async remove(id: string): Promise<void> {
    const record = this.registry.get(id);
    if (record.state === 'running' || record.state === 'starting') {
      await this.stop(id);
    } else if (record.state === 'created') {
      this.registry.transition(id, 'created', 'failed', { reason: 'removed before start' });
    }
    this.registry.remove(id);
    this.trajectories.drop(id);
    this.logger.info(`[engine] sandbox ${id} removed`);
  }

  get(id: string): SandboxSummary {
    return toSummary(this.registry.get(id));
  }

  list(): SandboxSummary[] {
    return this.registry.list().map(toSummary);
  }

  trajectory(id: string): SandboxTrajectory {
    this.registry.get(id);
    return { sandboxId: id, ...this.trajectories.get(id) };
  }

  formattedTrajectory(id: string): string {
    return formatTrajectory(this.trajectory(id));
  }

  stats(): EngineStats {
    const sandboxes = { ...EMPTY_COUNTS };
    for (const record of this.registry.list()) {
      sandboxes[record.state] += 1;
    }
    return { admission: this.admission.stats(), sandboxes };
  }

  async shutdown(): Promise<void> {
    this.admission.close();
    const active = this.registry.inState('running', 'starting');
    for (const { id } of active) {
      await this.stop(id).catch((err: unknown) => {
        this.logger.error(`[engine] failed to stop sandbox during shutdown (${id}): ${errorMessage(err)}`);
      });
    }
  }

  private async provision(id: string, signal: AbortSignal | undefined): Promise<void> {
    const record = this.registry.get(id);

    await this.runtime.ensureImage(record.image);
    checkpoint(signal, id);

    const handle = await this.runtime.create({
      sandboxId: id,
      image: record.image,
      shell: this.shell,
      limits: this.limits,
    });
    if (!this.registry.attachContainer(id, 'starting', handle)) {
      // stopped while the container was being created; nobody else owns it
      await this.runtime.remove(handle);
      throw new CancelledError('start', { sandboxId: id });
    }
    await this.runtime.start(handle);
    checkpoint(signal, id);

    if (record.setupCommands.length > 0) {
      const setup = await this.runtime.run(handle, record.setupCommands.join(' && '), {
        timeoutMs: this.setupTimeoutMs,
        signal,
        workdir: this.workdir,
      });
      checkpoint(signal, id);
      if (setup.exitCode !== 0) {
        throw new SetupFailedError(id, setup.exitCode, setup.stderr || setup.stdout);
      }
    }

    const session = new ShellSession(await this.runtime.attach(handle), {
      sandboxId: id,
      execTimeoutMs: this.execTimeoutMs,
      probeTimeoutMs: this.probeTimeoutMs,
      logger: this.logger,
    });
    try {
      await session.initialize(this.workdir);
      checkpoint(signal, id);
      this.registry.transition(id, 'starting', 'running', { session });
    } catch (err) {
      session.close();
      throw err;
    }
  }

  private async execInSession(id: string, req: ExecRequest): Promise<CommandResult> {
    const { session } = this.registry.get(id);
    if (!session) {
      throw new InvalidTransitionError(id, 'running', 'exec', 'sandbox has no session');
    }
    const startedAt = new Date().toISOString();

    try {
      return await session.exec(req.command, {
        timeoutMs: req.timeoutMs,
        signal: req.signal,
        onResult: (result) => {
          this.record(id, session, {
            command: req.command,
            mode: 'session',
            stdout: result.stdout,
            stderr: result.stderr,
            exit_code: result.exitCode,
            error: null,
            started_at: startedAt,
            finished_at: new Date().toISOString(),
          });
        },
        onFailure: (err) => {
          this.record(id, session, {
            command: req.command,
            mode: 'session',
            stdout: '',
            stderr: '',
            exit_code: null,
            error: err.code,
            started_at: startedAt,
            finished_at: new Date().toISOString(),
          });
        },
      });
    } catch (err) {
      if (err instanceof SessionTimeoutError || err instanceof SessionClosedError) {
        await this.demote(id, err);
      }
      throw err;
    }
  }

  private async execStandalone(id: string, req: ExecRequest): Promise<CommandResult> {
    const { container } = this.registry.get(id);
    if (!container) {
      throw new InvalidTransitionError(id, 'running', 'exec', 'sandbox has no container');
    }
    const startedAt = new Date().toISOString();
    const result = await this.runtime.run(container, req.command, {
      timeoutMs: req.timeoutMs ?? this.execTimeoutMs,
      signal: req.signal,
      workdir: this.workdir,
    });
    if (req.signal?.aborted) throw new CancelledError('exec', { sandboxId: id });

    if (this.registry.find(id)) {
      this.registry.update(id, { lastStandaloneExitCode: result.exitCode });
      this.trajectories.append(id, {
        command: req.command,
        mode: 'standalone',
        stdout: result.stdout,
        stderr: result.stderr,
        exit_code: result.exitCode,
        error: null,
        started_at: startedAt,
        finished_at: new Date().toISOString(),
      });
    }
    return result;
  }

  private record(id: string, session: ShellSession, entry: TrajectoryEntry): void {
    if (!this.registry.find(id)) return;
    this.trajectories.append(id, entry);
    this.registry.update(id, { sessionCommandCount: session.commandCount });
  }

  // A session that timed out or closed is never trusted again.
  private async demote(id: string, err: SandboxError): Promise<void> {
    const record = this.registry.find(id);
    if (!record || record.state !== 'running') return;

    this.logger.warn(`[engine] sandbox ${id} failed: ${err.message}`);
    const { session } = this.registry.transition(id, 'running', 'failed', { reason: err.message });
    session?.close();
    await this.teardown(id);
  }

  // Moves a sandbox that is not being stopped to failed and releases what it holds.
  private async fail(id: string, reason: string): Promise<void> {
    const record = this.registry.find(id);
    if (!record) return;
    if (record.state !== 'stopping' && canTransition(record.state, 'failed')) {
      const { session } = this.registry.transition(id, record.state, 'failed', { reason });
      session?.close();
    }
    await this.teardown(id);
  }

  private async teardown(id: string): Promise<string[]> {
    const errors: string[] = [];
    this.clearLifetimeTimer(id);

    const handle = this.registry.take(id, 'container');
    if (handle) {
      await this.runtime.stop(handle, this.stopTimeoutMs).catch((err: unknown) => errors.push(errorMessage(err)));
      await this.runtime.remove(handle).catch((err: unknown) => errors.push(errorMessage(err)));
    }
    const ticket = this.registry.take(id, 'ticket');
    if (ticket) this.admission.release(ticket);

    if (errors.length > 0) {
      this.logger.error(`[engine] cleanup warnings for ${id}: ${errors.join('; ')}`);
    }
    return errors;
  }

  private setLifetimeTimer(id: string): void {
    if (this.sandboxTimeoutMs <= 0) return;
    const timer = setTimeout(() => {
      this.timers.delete(id);
      this.logger.warn(`[engine] sandbox ${id} exceeded its lifetime (${this.sandboxTimeoutMs}ms), stopping`);
      this.stop(id).catch((err: unknown) =>
        this.logger.error(`[engine] failed to stop expired sandbox ${id}: ${errorMessage(err)}`),
      );
    }, this.sandboxTimeoutMs);
    timer.unref();
    this.timers.set(id, timer);
  }

  private clearLifetimeTimer(id: string): void {
    const timer = this.timers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(id);
    }
  }
}
