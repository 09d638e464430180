import { spawn } from 'node:child_process';
import {
  execFileNoThrow,
  type ExecOptions,
  type ExecResult,
} from '../../utils/execFileNoThrow.ts';
import { RuntimeError } from '../errors.ts';
import type { Logger } from '../logger.ts';
import { withRetry } from './retry.ts';
import {
  CONTAINER_PREFIX,
  MANAGED_LABEL,
  SANDBOX_LABEL,
  containerName,
} from './types.ts';
import type {
  AttachedStream,
  ContainerHandle,
  ContainerRuntime,
  ContainerSpec,
  RunOptions,
  RunResult,
} from './types.ts';

type ExecFn = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

interface DockerAdapterDeps {
  exec?: ExecFn;
  spawnProc?: typeof spawn;
  logger?: Logger;
  retryDelayMs?: number;
}

// `docker exec` uses 125 for failures of the CLI or daemon itself
const DOCKER_ERROR_STATUS = 125;

const PULL_TIMEOUT_MS = 10 * 60_000;

export function isPermanentRuntimeError(err: unknown): boolean {
  const message = err instanceof Error ? err.message : String(err);
  return /no such (container|image|object)|not found|manifest unknown|access denied/i.test(message);
}

function isMissingContainer(detail: string): boolean {
  return /no such container/i.test(detail);
}

export class DockerAdapter implements ContainerRuntime {
  private readonly binary: string;
  private readonly exec: ExecFn;
  private readonly spawnProc: typeof spawn;
  private readonly logger: Logger;
  private readonly retryDelayMs: number;

  constructor(binary: string = 'docker', deps: DockerAdapterDeps = {}) {
    this.binary = binary;
    this.exec = deps.exec ?? execFileNoThrow;
    this.spawnProc = deps.spawnProc ?? spawn;
    this.logger = deps.logger ?? console;
    this.retryDelayMs = deps.retryDelayMs ?? 250;
  }

  async ensureImage(image: string): Promise<void> {
    const inspect = await this.exec(this.binary, ['image', 'inspect', '--format', '{{.Id}}', image]);
    if (inspect.status === 0) return;

    this.logger.info(`[runtime] pulling image ${image}`);
    await this.retrying('pull', undefined, () =>
      this.invoke('pull', ['pull', '--quiet', image], undefined, { timeoutMs: PULL_TIMEOUT_MS }),
    );
  }

  async create(spec: ContainerSpec): Promise<ContainerHandle> {
    const name = containerName(spec.sandboxId);
    const limits = spec.limits ?? {};
    const args = [
      'create',
      '--interactive',
      '--name', name,
      '--label', `${MANAGED_LABEL}=true`,
      '--label', `${SANDBOX_LABEL}=${spec.sandboxId}`,
      ...(limits.memory ? ['--memory', limits.memory] : []),
      ...(typeof limits.cpus === 'number' ? ['--cpus', String(limits.cpus)] : []),
      ...(typeof limits.pidsLimit === 'number' ? ['--pids-limit', String(limits.pidsLimit)] : []),
      ...(limits.network ? ['--network', limits.network] : []),
      spec.image,
      spec.shell,
    ];
    const id = (await this.invoke('create', args, name)).trim();
    return { id, name, sandboxId: spec.sandboxId };
  }

  async start(handle: ContainerHandle): Promise<void> {
    await this.retrying('start', handle, () => this.invoke('start', ['start', handle.name], handle.name));
  }

  async attach(handle: ContainerHandle): Promise<AttachedStream> {
    const child = this.spawnProc(this.binary, ['attach', '--sig-proxy=false', handle.name], {
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      const text = chunk.trim();
      if (text) this.logger.warn(`[runtime] attach ${handle.name}: ${text}`);
    });

    const { stdin, stdout } = child;
    if (!stdin || !stdout) {
      child.kill('SIGKILL');
      throw new RuntimeError('attach', 'attach process has no stdio pipes', {
        sandboxId: handle.sandboxId,
        container: handle.name,
      });
    }

    return new Promise<AttachedStream>((resolve, reject) => {
      const onError = (err: NodeJS.ErrnoException): void => {
        const detail = err.code === 'ENOENT' ? `${this.binary} binary not found` : err.message;
        reject(new RuntimeError('attach', detail, {
          sandboxId: handle.sandboxId,
          container: handle.name,
        }, err));
      };
      child.once('error', onError);
      child.once('spawn', () => {
        child.off('error', onError);
        // a later failure ends the output so the session sees the stream close
        child.on('error', (err) => stdout.destroy(err));
        resolve({
          input: stdin,
          output: stdout,
          close: () => {
            stdin.destroy();
            if (child.exitCode === null) child.kill('SIGTERM');
          },
        });
      });
    });
  }

  async run(handle: ContainerHandle, command: string, opts: RunOptions = {}): Promise<RunResult> {
    if (command.length === 0) {
      throw new RuntimeError('exec', 'command must not be empty', {
        sandboxId: handle.sandboxId,
        container: handle.name,
      });
    }
    const execOpts: ExecOptions = {};
    if (typeof opts.timeoutMs === 'number') execOpts.timeoutMs = opts.timeoutMs;
    if (opts.signal) execOpts.signal = opts.signal;

    const args = ['exec', ...(opts.workdir ? ['--workdir', opts.workdir] : []), handle.name, '/bin/sh', '-c', command];
    const result = await this.exec(this.binary, args, execOpts);
    if (result.status === DOCKER_ERROR_STATUS && !result.timedOut) {
      throw new RuntimeError('exec', result.stderr.trim() || 'exec failed', {
        sandboxId: handle.sandboxId,
        container: handle.name,
      });
    }
    return {
      stdout: result.stdout,
      stderr: result.stderr,
      exitCode: result.status,
    };
  }

  async stop(handle: ContainerHandle, timeoutMs: number): Promise<void> {
    const seconds = String(Math.max(0, Math.ceil(timeoutMs / 1000)));
    await this.retrying('stop', handle, () =>
      this.invoke('stop', ['stop', '-t', seconds, handle.name], handle.name, {}, true),
    );
  }

  async remove(handle: ContainerHandle): Promise<void> {
    await this.retrying('remove', handle, () =>
      this.invoke('remove', ['rm', '-f', handle.name], handle.name, {}, true),
    );
  }

  async listManaged(): Promise<ContainerHandle[]> {
    const out = await this.retrying('list', undefined, () =>
      this.invoke('list', [
        'ps', '-a',
        '--filter', `label=${MANAGED_LABEL}=true`,
        '--format', `{{.ID}}\t{{.Names}}\t{{.Label "${SANDBOX_LABEL}"}}`,
      ]),
    );
    return out
      .trim()
      .split('\n')
      .map(line => {
        const [id, name, sandboxId] = line.split('\t');
        return {
          id: (id ?? '').trim(),
          name: (name ?? '').trim(),
          sandboxId: (sandboxId ?? '').trim(),
        };
      })
      .filter(({ id, name }) => id.length > 0 && name.startsWith(CONTAINER_PREFIX));
  }

  async ping(): Promise<boolean> {
    const result = await this.exec(this.binary, ['info', '--format', '{{.ServerVersion}}'], {
      timeoutMs: 5000,
    });
    return result.status === 0;
  }

  private retrying<T>(
    operation: string,
    handle: ContainerHandle | undefined,
    fn: () => Promise<T>,
  ): Promise<T> {
    return withRetry(fn, {
      delayMs: this.retryDelayMs,
      isTransient: (err) => !isPermanentRuntimeError(err),
      onRetry: (err) => {
        const target = handle ? ` ${handle.name}` : '';
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[runtime] ${operation}${target} failed, retrying once: ${message}`);
      },
    });
  }

  private async invoke(
    operation: string,
    args: string[],
    container?: string,
    options: ExecOptions = {},
    missingIsOk = false,
  ): Promise<string> {
    const result = await this.exec(this.binary, args, options);
    if (result.status !== 0) {
      const detail = result.stderr.trim() || `${this.binary} ${args.join(' ')} exited with ${result.status}`;
      if (missingIsOk && isMissingContainer(detail)) return '';
      const context = container ? { container } : {};
      throw new RuntimeError(operation, detail, context);
    }
    return result.stdout;
  }
}
