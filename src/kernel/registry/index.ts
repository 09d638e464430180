export { SandboxRegistry, canTransition, toSummary } from './registry.ts';
export { TERMINAL_STATES } from './types.ts';
export type {
  BookkeepingPatch,
  SandboxRecord,
  SandboxSpec,
  SandboxState,
  SandboxSummary,
  TransitionPatch,
  TransitionResult,
} from './types.ts';
