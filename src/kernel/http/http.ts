import type { Context } from 'hono';
import {
  InvalidRequestError,
  errorMessage,
  isSandboxError,
  type SandboxErrorCode,
} from '../errors.ts';
import type { Logger } from '../logger.ts';

type ErrorStatus = 400 | 404 | 409 | 422 | 499 | 500 | 502 | 503 | 504;

const STATUS_BY_CODE: Record<SandboxErrorCode, ErrorStatus> = {
  INVALID_REQUEST: 400,
  NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  SETUP_FAILED: 422,
  CANCELLED: 499,
  RUNTIME_ERROR: 500,
  SESSION_CLOSED: 502,
  ADMISSION_EXHAUSTED: 503,
  SESSION_TIMEOUT: 504,
};

export function statusFor(code: SandboxErrorCode): ErrorStatus {
  return STATUS_BY_CODE[code];
}

// Response.json instead of c.json: 499 is not a status hono's types know.
export function jsonError(status: ErrorStatus, code: string, message: string, retryable = false): Response {
  return Response.json({ error: { code, message, retryable } }, { status });
}

export function errorResponse(err: unknown, logger: Logger): Response {
  if (isSandboxError(err)) {
    const status = statusFor(err.code);
    if (status >= 500) logger.warn(`[http] ${err.code}: ${err.message}`);
    return jsonError(status, err.code, err.message, err.retryable);
  }
  logger.error(`[http] unhandled error: ${errorMessage(err)}`);
  return jsonError(500, 'INTERNAL_ERROR', errorMessage(err));
}

/** Parses the body as JSON; an empty body reads as `{}`. */
export async function readJsonBody(c: Context): Promise<Record<string, unknown>> {
  const text = await c.req.text();
  if (text.trim().length === 0) return {};
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    throw new InvalidRequestError('request body must be valid JSON');
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidRequestError('request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

export function requireString(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new InvalidRequestError(`${key} must be a non-empty string`);
  }
  return value;
}

export function optionalBoolean(body: Record<string, unknown>, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') throw new InvalidRequestError(`${key} must be a boolean`);
  return value;
}

export function optionalPositiveInt(
  body: Record<string, unknown>,
  key: string,
  max = Number.MAX_SAFE_INTEGER,
): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new InvalidRequestError(`${key} must be a positive integer`);
  }
  if (value > max) throw new InvalidRequestError(`${key} must be at most ${max}`);
  return value;
}

export function optionalStringArray(body: Record<string, unknown>, key: string): string[] | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new InvalidRequestError(`${key} must be an array of strings`);
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') throw new InvalidRequestError(`${key} must be an array of strings`);
    items.push(item);
  }
  return items;
}
