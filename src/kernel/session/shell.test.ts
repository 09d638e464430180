import { afterEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import * as fs from 'node:fs';
import { ShellSession } from './session.ts';
import { CancelledError } from '../errors.ts';
import { silentLogger } from '../logger.ts';

const shells: ChildProcessWithoutNullStreams[] = [];

async function openShell(workdir = '/'): Promise<ShellSession> {
  const child = spawn('/bin/sh');
  shells.push(child);
  const session = new ShellSession(
    {
      input: child.stdin,
      output: child.stdout,
      close: () => {
        child.stdin.end();
        child.kill();
      },
    },
    { sandboxId: 'local', probeTimeoutMs: 5000, execTimeoutMs: 5000, logger: silentLogger },
  );
  await session.initialize(workdir);
  return session;
}

afterEach(() => {
  for (const child of shells.splice(0, shells.length)) {
    if (child.exitCode === null) child.kill();
  }
});

describe('ShellSession over /bin/sh', { skip: !fs.existsSync('/bin/sh') }, () => {
  it('keeps the working directory between commands', async () => {
    const session = await openShell('/');

    await session.exec('cd /tmp');
    const pwd = await session.exec('pwd');

    assert.deepEqual(pwd, { stdout: '/tmp\n', stderr: '', exitCode: 0 });
    session.close();
  });

  it('returns output that has no trailing newline', async () => {
    const session = await openShell();

    const result = await session.exec("printf 'abc'");

    assert.deepEqual(result, { stdout: 'abc', stderr: '', exitCode: 0 });
    session.close();
  });

  it('merges standard error and reports the exit status', async () => {
    const session = await openShell();

    const result = await session.exec('echo oops >&2; (exit 3)');

    assert.deepEqual(result, { stdout: 'oops\n', stderr: '', exitCode: 3 });
    session.close();
  });

  it('fails initialization for a missing working directory', async () => {
    await assert.rejects(openShell('/no/such/dir'), /cannot enter \/no\/such\/dir/);
  });

  it('runs the next command cleanly after a cancelled one', async () => {
    const session = await openShell();
    const controller = new AbortController();

    const pending = session.exec('sleep 1; echo late', { signal: controller.signal });
    setTimeout(() => controller.abort(), 100);
    await assert.rejects(pending, CancelledError);
    assert.equal(session.health, 'unknown');

    const next = await session.exec('echo after');

    assert.deepEqual(next, { stdout: 'after\n', stderr: '', exitCode: 0 });
    assert.equal(session.health, 'healthy');
    session.close();
  });
});
