import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse } from 'yaml';
import type { ContainerLimits } from './container/types.ts';

export interface SandboxdConfig {
  port: number;
  host: string;
  maxSandboxes: number;
  admissionTimeoutMs: number;
  execTimeoutMs: number;
  probeTimeoutMs: number;
  sandboxTimeoutMs: number;
  trajectoryLimit: number;
  runtime: string;
  shell: string;
  workdir: string;
  limits: ContainerLimits;
}

type ScalarKey = Exclude<keyof SandboxdConfig, 'limits'>;

interface OptionSpec {
  key: ScalarKey;
  flags: string[];
  env: string[];
  yaml: string;
  kind: 'int' | 'string';
  min?: number;
  max?: number;
  /** Multiplier applied to flag values only (`--timeout` is in seconds). */
  flagScale?: number;
}

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_CONFIG: SandboxdConfig = {
  port: 3000,
  host: '0.0.0.0',
  maxSandboxes: 10,
  admissionTimeoutMs: 0,
  execTimeoutMs: 30_000,
  probeTimeoutMs: 10_000,
  sandboxTimeoutMs: 600_000,
  trajectoryLimit: 0,
  runtime: 'docker',
  shell: '/bin/sh',
  workdir: '/',
  limits: {},
};

const OPTIONS: OptionSpec[] = [
  { key: 'port', flags: ['--port', '-p'], env: ['SANDBOXD_PORT', 'PORT'], yaml: 'port', kind: 'int', min: 0, max: 65535 },
  { key: 'host', flags: ['--host'], env: ['SANDBOXD_HOST'], yaml: 'host', kind: 'string' },
  { key: 'maxSandboxes', flags: ['--max-sandboxes', '-m'], env: ['SANDBOXD_MAX_SANDBOXES'], yaml: 'max_sandboxes', kind: 'int', min: 1 },
  { key: 'admissionTimeoutMs', flags: ['--admission-timeout'], env: ['SANDBOXD_ADMISSION_TIMEOUT_MS'], yaml: 'admission_timeout_ms', kind: 'int', min: 0, max: MAX_TIMER_MS },
  { key: 'execTimeoutMs', flags: ['--exec-timeout'], env: ['SANDBOXD_EXEC_TIMEOUT_MS'], yaml: 'exec_timeout_ms', kind: 'int', min: 1, max: MAX_TIMER_MS },
  { key: 'probeTimeoutMs', flags: ['--probe-timeout'], env: ['SANDBOXD_PROBE_TIMEOUT_MS'], yaml: 'probe_timeout_ms', kind: 'int', min: 1, max: MAX_TIMER_MS },
  { key: 'sandboxTimeoutMs', flags: ['--timeout'], env: ['SANDBOXD_TIMEOUT_MS'], yaml: 'sandbox_timeout_ms', kind: 'int', min: 0, max: MAX_TIMER_MS, flagScale: 1000 },
  { key: 'trajectoryLimit', flags: ['--trajectory-limit'], env: ['SANDBOXD_TRAJECTORY_LIMIT'], yaml: 'trajectory_limit', kind: 'int', min: 0 },
  { key: 'runtime', flags: ['--runtime'], env: ['SANDBOXD_RUNTIME'], yaml: 'runtime', kind: 'string' },
  { key: 'shell', flags: ['--shell'], env: ['SANDBOXD_SHELL'], yaml: 'shell', kind: 'string' },
  { key: 'workdir', flags: ['--workdir'], env: ['SANDBOXD_WORKDIR'], yaml: 'workdir', kind: 'string' },
];

export const CONFIG_FILE_NAME = 'sandboxd.yaml';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

interface ParsedFlags {
  values: Map<OptionSpec, string>;
  configPath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function coerce(spec: OptionSpec, raw: unknown, source: string, scale = 1): number | string {
  if (spec.kind === 'string') {
    if (typeof raw !== 'string' || raw.trim().length === 0) {
      throw new ConfigError(`${spec.key} from ${source} must be a non-empty string`);
    }
    return raw.trim();
  }

  const value = typeof raw === 'number' ? raw : typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : NaN;
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${spec.key} from ${source} must be an integer, got ${JSON.stringify(raw)}`);
  }
  // max bounds the scaled value: `--timeout` is given in seconds
  const scaled = value * scale;
  if ((spec.min !== undefined && value < spec.min) || (spec.max !== undefined && scaled > spec.max)) {
    const range = spec.max === undefined ? `>= ${spec.min}` : `between ${spec.min} and ${spec.max}`;
    throw new ConfigError(`${spec.key} from ${source} must be ${range}, got ${scaled}`);
  }
  return scaled;
}

function assign(config: SandboxdConfig, spec: OptionSpec, value: number | string): void {
  // coerce() returns a number exactly for 'int' options
  if (spec.kind === 'int' && typeof value === 'number') {
    switch (spec.key) {
      case 'port':
      case 'maxSandboxes':
      case 'admissionTimeoutMs':
      case 'execTimeoutMs':
      case 'probeTimeoutMs':
      case 'sandboxTimeoutMs':
      case 'trajectoryLimit':
        config[spec.key] = value;
    }
  } else if (typeof value === 'string') {
    switch (spec.key) {
      case 'host':
      case 'runtime':
      case 'shell':
      case 'workdir':
        config[spec.key] = value;
    }
  }
}

export function parseServeFlags(argv: string[]): ParsedFlags {
  const values = new Map<OptionSpec, string>();
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    const eq = arg.indexOf('=');
    const name = arg.startsWith('--') && eq !== -1 ? arg.slice(0, eq) : arg;
    const inline = name === arg ? undefined : arg.slice(eq + 1);
    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) throw new ConfigError(`${name} requires a value`);
      i += 1;
      return next;
    };

    if (name === '--config' || name === '-c') {
      configPath = takeValue();
      continue;
    }
    const spec = OPTIONS.find(option => option.flags.includes(name));
    if (!spec) throw new ConfigError(`unknown option ${arg}`);
    values.set(spec, takeValue());
  }

  return configPath === undefined ? { values } : { values, configPath };
}

function parseLimits(raw: unknown, source: string): ContainerLimits {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new ConfigError(`limits in ${source} must be a mapping`);

  const limits: ContainerLimits = {};
  const memory = raw['memory'];
  if (memory !== undefined) {
    if (typeof memory !== 'string' && typeof memory !== 'number') {
      throw new ConfigError(`limits.memory in ${source} must be a size such as 512m`);
    }
    limits.memory = String(memory);
  }
  const cpus = raw['cpus'];
  if (cpus !== undefined) {
    if (typeof cpus !== 'number' || cpus <= 0) throw new ConfigError(`limits.cpus in ${source} must be a positive number`);
    limits.cpus = cpus;
  }
  const pids = raw['pids_limit'];
  if (pids !== undefined) {
    if (typeof pids !== 'number' || !Number.isInteger(pids) || pids < 1) {
      throw new ConfigError(`limits.pids_limit in ${source} must be a positive integer`);
    }
    limits.pidsLimit = pids;
  }
  const network = raw['network'];
  if (network !== undefined) {
    if (typeof network !== 'string') throw new ConfigError(`limits.network in ${source} must be a string`);
    limits.network = network;
  }
  return limits;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read config file ${filePath}: ${detail}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`config file ${filePath} must contain a mapping`);
  return parsed;
}

/**
 * Resolves the server configuration. Later sources win: built-in defaults,
 * the YAML file, environment variables, then command-line flags.
 */
export function loadConfig(opts: LoadConfigOptions = {}): SandboxdConfig {
  const env = opts.env ?? process.env;
  const cwd = opts.cwd ?? process.cwd();
  const flags = parseServeFlags(opts.argv ?? []);
  const config: SandboxdConfig = { ...DEFAULT_CONFIG, limits: {} };

  const explicitPath = flags.configPath ?? env['SANDBOXD_CONFIG'];
  const filePath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, CONFIG_FILE_NAME);
  if (explicitPath && !fs.existsSync(filePath)) {
    throw new ConfigError(`config file ${filePath} does not exist`);
  }

  if (fs.existsSync(filePath)) {
    const file = readConfigFile(filePath);
    for (const spec of OPTIONS) {
      const raw = file[spec.yaml];
      if (raw !== undefined && raw !== null) assign(config, spec, coerce(spec, raw, filePath));
    }
    config.limits = parseLimits(file['limits'], filePath);
  }

  for (const spec of OPTIONS) {
    const name = spec.env.find(candidate => env[candidate] !== undefined && env[candidate] !== '');
    if (name) assign(config, spec, coerce(spec, env[name], `$${name}`));
  }

  for (const [spec, raw] of flags.values) {
    assign(config, spec, coerce(spec, raw, spec.flags[0] ?? spec.key, spec.flagScale));
  }

  return config;
}
