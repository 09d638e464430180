export { TrajectoryRecorder } from './recorder.ts';
export type { TrajectoryOptions } from './recorder.ts';
export { formatTrajectory } from './format.ts';
export type { CommandExecutionRecord, ExecutionMode, TrajectoryEntry, TrajectorySnapshot } from './types.ts';
