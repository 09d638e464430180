import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ShellSession } from './session.ts';
import { FakeContainer } from '../testing/fake-runtime.ts';
import { CancelledError, SessionClosedError, SessionTimeoutError } from '../errors.ts';
import { silentLogger } from '../logger.ts';

function makeContainer(): FakeContainer {
  return new FakeContainer(
    { id: 'fake-1', name: 'sandboxd-box-1', sandboxId: 'box-1' },
    { sandboxId: 'box-1', image: 'ubuntu:latest', shell: '/bin/sh' },
  );
}

async function openSession(workdir = '/'): Promise<{ container: FakeContainer; session: ShellSession }> {
  const container = makeContainer();
  const session = new ShellSession(container.attach(), {
    sandboxId: 'box-1',
    probeTimeoutMs: 500,
    logger: silentLogger,
  });
  await session.initialize(workdir);
  return { container, session };
}

describe('ShellSession', () => {
  it('initialize merges stderr, enters the working directory and becomes healthy', async () => {
    const { container, session } = await openSession('/tmp');

    assert.equal(session.health, 'healthy');
    assert.deepEqual(container.received.slice(0, 2), ['exec 2>&1', "cd '/tmp'"]);
    const result = await session.exec('pwd');
    assert.deepEqual(result, { stdout: '/tmp\n', stderr: '', exitCode: 0 });
  });

  it('keeps working directory and environment between commands', async () => {
    const { session } = await openSession();

    await session.exec('cd /tmp');
    await session.exec('export GREETING=hello');
    const pwd = await session.exec('pwd');
    const echo = await session.exec('echo $GREETING');

    assert.equal(pwd.stdout, '/tmp\n');
    assert.equal(echo.stdout, 'hello\n');
    assert.equal(session.commandCount, 4);
  });

  it('reports non-zero exit codes as results with combined output', async () => {
    const { session } = await openSession();

    const result = await session.exec('cat /missing.txt');

    assert.deepEqual(result, {
      stdout: 'cat: /missing.txt: No such file or directory\n',
      stderr: '',
      exitCode: 1,
    });
  });

  it('returns empty output for a silent command', async () => {
    const { session } = await openSession();

    const result = await session.exec('true');

    assert.deepEqual(result, { stdout: '', stderr: '', exitCode: 0 });
  });

  it('runs concurrent commands in acceptance order and calls onResult inside the lock', async () => {
    const { session } = await openSession();
    const seen: string[] = [];

    const results = await Promise.all(['one', 'two', 'three'].map(word =>
      session.exec(`echo ${word}`, { onResult: (r) => seen.push(r.stdout.trim()) }),
    ));

    assert.deepEqual(seen, ['one', 'two', 'three']);
    assert.deepEqual(results.map(r => r.stdout), ['one\n', 'two\n', 'three\n']);
  });

  it('times out a hanging command and refuses further work', async () => {
    const { session } = await openSession();

    await assert.rejects(session.exec('tail -f /dev/null', { timeoutMs: 30 }), SessionTimeoutError);
    assert.equal(session.health, 'corrupted');
    await assert.rejects(session.exec('echo later'), SessionClosedError);
  });

  it('a cancelled command leaves the session usable after a probe', async () => {
    const { session } = await openSession();
    const controller = new AbortController();

    const pending = session.exec('sleep 0.05', { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);
    await assert.rejects(pending, CancelledError);
    assert.equal(session.health, 'unknown');

    const next = await session.exec('echo after');

    assert.deepEqual(next, { stdout: 'after\n', stderr: '', exitCode: 0 });
    assert.equal(session.health, 'healthy');
  });

  it('a waiter that aborts before reaching the shell does not disturb the session', async () => {
    const { session } = await openSession();
    const controller = new AbortController();

    const first = session.exec('sleep 0.02');
    const second = session.exec('echo skipped', { signal: controller.signal });
    controller.abort();

    await assert.rejects(second, CancelledError);
    assert.equal((await first).exitCode, 0);
    assert.equal(session.health, 'healthy');
  });

  it('fails the pending command when the stream ends', async () => {
    const { container, session } = await openSession();

    const pending = session.exec('tail -f /dev/null', { timeoutMs: 5000 });
    setTimeout(() => container.crash(), 5);

    await assert.rejects(pending, SessionClosedError);
    assert.equal(session.health, 'closed');
  });

  it('exit in the shell closes the session', async () => {
    const { session } = await openSession();

    await assert.rejects(session.exec('exit'), /Shell session closed/);
    assert.equal(session.health, 'closed');
  });

  it('close rejects later commands', async () => {
    const { session } = await openSession();

    session.close();

    await assert.rejects(session.exec('pwd'), SessionClosedError);
  });

  it('initialize fails when the working directory does not exist', async () => {
    const container = makeContainer();
    const session = new ShellSession(container.attach(), { logger: silentLogger, probeTimeoutMs: 500 });

    await assert.rejects(session.initialize('/nowhere'), /cannot enter \/nowhere/);
    assert.equal(session.health, 'corrupted');
  });
});
