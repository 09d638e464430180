#!/usr/bin/env tsx
import * as fs from 'node:fs';
import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import { pathToFileURL } from 'node:url';

export const DEFAULT_SERVER = 'http://localhost:3000';
export const DEFAULT_IMAGE = 'ubuntu:latest';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'serve'; argv: string[] }
  | { kind: 'request'; method: 'GET' | 'POST' | 'DELETE'; path: string; body?: Record<string, unknown>; text?: boolean }
  | { kind: 'exec'; id: string; command: string; standalone: boolean; timeoutMs?: number }
  | { kind: 'session'; image: string; setupCommands: string[] };

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliIo {
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
  stdin?: Readable;
  stdout?: OutputStream;
  stderr?: OutputStream;
  serve?: (argv: string[]) => Promise<unknown>;
}

export class ApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(`${code}: ${message}`);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

export function printHelp(out: OutputStream = process.stdout): void {
  out.write(`sandboxd - container sandboxes with persistent shell sessions

Usage:
  sandboxd [--server <url>] <command> [args]

Commands:
  serve [--port n] [--host h] [--max-sandboxes n] [--timeout s] [--config path] ...
  create [--image img] [--setup cmd]... [--start]
  list
  get <id>
  start <id>
  stop <id> [--remove]
  rm <id>
  exec [-s|--standalone] [--timeout ms] <id> <command...>
  trajectory <id> [--formatted]
  session [--image img] [--setup cmd]...

The server defaults to $SANDBOXD_SERVER or ${DEFAULT_SERVER}.
`);
}

export function parseGlobalArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): { server: string; args: string[] } {
  const args: string[] = [];
  let server = env.SANDBOXD_SERVER || DEFAULT_SERVER;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (typeof arg !== 'string') continue;
    // flags after the command name belong to the command
    if (arg === '--server' && args.length === 0) {
      const value = argv[i + 1];
      if (!value || value.startsWith('-')) {
        throw new Error('--server requires a URL value');
      }
      server = value;
      i += 1;
      continue;
    }
    args.push(arg);
  }
  return { server: server.replace(/\/+$/, ''), args };
}

function requireId(args: string[], command: string): string {
  const id = args.find(arg => !arg.startsWith('-'));
  if (!id) throw new Error(`${command} requires <id>`);
  return encodeURIComponent(id);
}

function parseImageFlags(args: string[], command: string): { image: string; setupCommands: string[]; start: boolean } {
  const setupCommands: string[] = [];
  const result = { image: DEFAULT_IMAGE, setupCommands, start: false };
  for (let i = 0; i < args.length; i++) {
    const flag = args[i];
    if (flag === '--start' && command === 'create') {
      result.start = true;
      continue;
    }
    if (flag === '--image' || flag === '--setup') {
      const value = args[i + 1];
      if (value === undefined) throw new Error(`${command} ${flag} requires a value`);
      if (flag === '--image') result.image = value;
      else result.setupCommands.push(value);
      i += 1;
      continue;
    }
    throw new Error(`Unknown ${command} flag: ${flag}`);
  }
  return result;
}

function parseExecCommand(args: string[]): CliCommand {
  let standalone = false;
  let timeoutMs: number | undefined;
  let i = 0;
  for (; i < args.length; i++) {
    const flag = args[i];
    if (flag === '-s' || flag === '--standalone') {
      standalone = true;
      continue;
    }
    if (flag === '--timeout') {
      const value = Number(args[i + 1]);
      if (!Number.isInteger(value) || value <= 0) {
        throw new Error('exec --timeout must be a positive integer (milliseconds)');
      }
      timeoutMs = value;
      i += 1;
      continue;
    }
    break;
  }

  const id = args[i];
  const words = args.slice(i + 1);
  if (!id || words.length === 0) throw new Error('exec requires <id> <command...>');
  const command = { kind: 'exec' as const, id: encodeURIComponent(id), command: words.join(' '), standalone };
  return timeoutMs === undefined ? command : { ...command, timeoutMs };
}

export function parseCommand(args: string[]): CliCommand {
  const [command, ...rest] = args;
  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { kind: 'help' };
    case 'serve':
      return { kind: 'serve', argv: rest };
    case 'create': {
      const { image, setupCommands, start } = parseImageFlags(rest, 'create');
      return {
        kind: 'request',
        method: 'POST',
        path: '/sandboxes',
        body: { image, setup_commands: setupCommands, start },
      };
    }
    case 'list':
      return { kind: 'request', method: 'GET', path: '/sandboxes' };
    case 'get':
      return { kind: 'request', method: 'GET', path: `/sandboxes/${requireId(rest, 'get')}` };
    case 'start':
      return { kind: 'request', method: 'POST', path: `/sandboxes/${requireId(rest, 'start')}/start` };
    case 'stop':
      return {
        kind: 'request',
        method: 'POST',
        path: `/sandboxes/${requireId(rest, 'stop')}/stop`,
        body: { remove: rest.includes('--remove') },
      };
    case 'rm':
      return { kind: 'request', method: 'DELETE', path: `/sandboxes/${requireId(rest, 'rm')}` };
    case 'exec':
      return parseExecCommand(rest);
    case 'trajectory': {
      const id = requireId(rest, 'trajectory');
      return rest.includes('--formatted')
        ? { kind: 'request', method: 'GET', path: `/sandboxes/${id}/trajectory/formatted`, text: true }
        : { kind: 'request', method: 'GET', path: `/sandboxes/${id}/trajectory` };
    }
    case 'session': {
      const { image, setupCommands } = parseImageFlags(rest, 'session');
      return { kind: 'session', image, setupCommands };
    }
    default:
      throw new Error(`Unknown command: ${command}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SandboxdClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(baseUrl: string, fetchImpl: typeof fetch = fetch) {
    this.baseUrl = baseUrl;
    this.fetchImpl = fetchImpl;
  }

  async json(method: string, path: string, body?: Record<string, unknown>): Promise<unknown> {
    const res = await this.send(method, path, body);
    return res.json();
  }

  async text(path: string): Promise<string> {
    const res = await this.send('GET', path);
    return res.text();
  }

  private async send(method: string, path: string, body?: Record<string, unknown>): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: body ? { 'content-type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`cannot reach sandboxd at ${this.baseUrl}: ${message}`);
    }
    if (res.ok) return res;

    const payload: unknown = await res.json().catch(() => undefined);
    const envelope = isRecord(payload) ? payload.error : undefined;
    const error: Record<string, unknown> = isRecord(envelope) ? envelope : {};
    throw new ApiError(
      res.status,
      typeof error.code === 'string' ? error.code : `HTTP_${res.status}`,
      typeof error.message === 'string' ? error.message : res.statusText,
    );
  }
}

interface ExecResponse {
  stdout: string;
  stderr: string;
  exitCode: number;
}

function toExecResponse(value: unknown): ExecResponse {
  if (!isRecord(value) || typeof value.stdout !== 'string' || typeof value.stderr !== 'string'
    || typeof value.exit_code !== 'number') {
    throw new Error('unexpected exec response from server');
  }
  return { stdout: value.stdout, stderr: value.stderr, exitCode: value.exit_code };
}

async function exec(
  client: SandboxdClient,
  id: string,
  command: string,
  opts: { standalone?: boolean; timeoutMs?: number } = {},
): Promise<ExecResponse> {
  const body: Record<string, unknown> = { command, standalone: opts.standalone ?? false };
  if (opts.timeoutMs !== undefined) body.timeout_ms = opts.timeoutMs;
  return toExecResponse(await client.json('POST', `/sandboxes/${id}/exec`, body));
}

async function runSession(
  client: SandboxdClient,
  spec: Extract<CliCommand, { kind: 'session' }>,
  stdin: Readable,
  stdout: OutputStream,
  stderr: OutputStream,
): Promise<number> {
  const created = await client.json('POST', '/sandboxes', {
    image: spec.image,
    setup_commands: spec.setupCommands,
    start: true,
  });
  if (!isRecord(created) || typeof created.id !== 'string') throw new Error('unexpected create response from server');
  const id = encodeURIComponent(created.id);
  stderr.write(`[session] sandbox ${created.id} running ${spec.image}; type 'exit' to finish\n`);

  let lastExit = 0;
  const lines = readline.createInterface({ input: stdin, crlfDelay: Infinity });
  try {
    for await (const raw of lines) {
      const line = raw.trim();
      if (line === 'exit') break;
      if (line.length === 0) continue;
      try {
        const result = await exec(client, id, line);
        stdout.write(result.stdout);
        stderr.write(result.stderr);
        lastExit = result.exitCode;
      } catch (err) {
        stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
        lastExit = 1;
        if (err instanceof ApiError && err.status !== 400 && err.status !== 499) break;
      }
    }
  } finally {
    lines.close();
    await client.json('DELETE', `/sandboxes/${id}`).catch((err: unknown) => {
      stderr.write(`[session] failed to remove sandbox ${created.id}: ${err instanceof Error ? err.message : String(err)}\n`);
    });
  }
  return lastExit;
}

/**
 * Runs one CLI invocation. Resolves with the process exit code, or with
 * `undefined` for `serve`, which keeps running until a signal arrives.
 */
export async function runCli(argv: string[] = process.argv.slice(2), io: CliIo = {}): Promise<number | undefined> {
  const stdout = io.stdout ?? process.stdout;
  const stderr = io.stderr ?? process.stderr;
  const { server, args } = parseGlobalArgs(argv, io.env);
  const spec = parseCommand(args);
  const client = new SandboxdClient(server, io.fetch);

  switch (spec.kind) {
    case 'help':
      printHelp(stdout);
      return 0;
    case 'serve': {
      const serve = io.serve ?? (async (serveArgv: string[]) => {
        const { runServer } = await import('../kernel/index.ts');
        return runServer(serveArgv);
      });
      await serve(spec.argv);
      return undefined;
    }
    case 'request': {
      if (spec.text) {
        stdout.write(await client.text(spec.path));
      } else {
        const result = await client.json(spec.method, spec.path, spec.body);
        stdout.write(`${JSON.stringify(result, null, 2)}\n`);
      }
      return 0;
    }
    case 'exec': {
      const result = await exec(client, spec.id, spec.command, spec);
      stdout.write(result.stdout);
      stderr.write(result.stderr);
      return result.exitCode;
    }
    case 'session':
      return runSession(client, spec, io.stdin ?? process.stdin, stdout, stderr);
  }
}

function isDirectRun(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  // bin links point at this file; the module URL is always the resolved path
  const entry = fs.existsSync(argv1) ? fs.realpathSync(argv1) : argv1;
  return import.meta.url === pathToFileURL(entry).href;
}

if (isDirectRun()) {
  runCli().then(
    (code) => {
      if (code !== undefined) process.exitCode = code;
    },
    (err) => {
      const message = err instanceof Error ? err.message : String(err);
      console.error(message);
      process.exit(1);
    },
  );
}
