export { SentinelFramer, newToken, sentinelLine } from './framer.ts';
export type { Frame } from './framer.ts';
export { ExecutionLock } from './lock.ts';
export { ShellSession } from './session.ts';
export type { SessionExecOptions, SessionHealth, SessionOptions, SessionResult } from './session.ts';
