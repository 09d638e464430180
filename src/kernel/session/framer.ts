import { randomBytes } from 'node:crypto';

export interface Frame {
  output: string;
  exitCode: number;
}

export function newToken(): string {
  return `__sandboxd_${randomBytes(8).toString('hex')}`;
}

/** Shell line that prints `\n<token> <exit status>\n` after the previous command. */
export function sentinelLine(token: string): string {
  return `printf '\\n%s %d\\n' ${token} "$?"\n`;
}

/**
 * Accumulates shell output and cuts it at sentinel frames. Everything before
 * the frame's leading newline belongs to the command.
 */
export class SentinelFramer {
  private buffer = '';

  push(chunk: string): void {
    this.buffer += chunk;
  }

  extract(token: string): Frame | undefined {
    // tokens are generated by newToken, so they carry no regex metacharacters
    const match = new RegExp(`\\n${token} (-?\\d+)\\n`).exec(this.buffer);
    if (!match) return undefined;

    const output = this.buffer.slice(0, match.index);
    this.buffer = this.buffer.slice(match.index + match[0].length);
    return { output, exitCode: Number(match[1]) };
  }

  get pending(): number {
    return this.buffer.length;
  }
}
