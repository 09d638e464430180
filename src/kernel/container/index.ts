export { DockerAdapter, isPermanentRuntimeError } from './runtime.ts';
export { scanOrphans } from './orphan.ts';
export { withRetry } from './retry.ts';
export { containerName, CONTAINER_PREFIX, MANAGED_LABEL, SANDBOX_LABEL } from './types.ts';
export type {
  AttachedStream,
  ContainerHandle,
  ContainerLimits,
  ContainerRuntime,
  ContainerSpec,
  RunOptions,
  RunResult,
} from './types.ts';
