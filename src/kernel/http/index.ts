export { createSandboxApp } from './app.ts';
export type { SandboxAppDeps } from './app.ts';
export { errorResponse, jsonError, statusFor } from './http.ts';
