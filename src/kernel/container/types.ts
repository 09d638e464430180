import type { Readable, Writable } from 'node:stream';

export const MANAGED_LABEL = 'sandboxd.managed';
export const SANDBOX_LABEL = 'sandboxd.sandbox';
export const CONTAINER_PREFIX = 'sandboxd-';

export interface ContainerHandle {
  id: string;
  name: string;
  sandboxId: string;
}

export interface ContainerLimits {
  memory?: string;
  cpus?: number;
  pidsLimit?: number;
  network?: string;
}

export interface ContainerSpec {
  sandboxId: string;
  image: string;
  shell: string;
  limits?: ContainerLimits;
}

export interface AttachedStream {
  input: Writable;
  output: Readable;
  close(): void;
}

export interface RunOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Directory the command starts in; the image's default when unset. */
  workdir?: string;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ContainerRuntime {
  ensureImage(image: string): Promise<void>;
  create(spec: ContainerSpec): Promise<ContainerHandle>;
  start(handle: ContainerHandle): Promise<void>;
  attach(handle: ContainerHandle): Promise<AttachedStream>;
  run(handle: ContainerHandle, command: string, opts?: RunOptions): Promise<RunResult>;
  stop(handle: ContainerHandle, timeoutMs: number): Promise<void>;
  remove(handle: ContainerHandle): Promise<void>;
  listManaged(): Promise<ContainerHandle[]>;
  ping(): Promise<boolean>;
}

export function containerName(sandboxId: string): string {
  return `${CONTAINER_PREFIX}${sandboxId}`;
}
