import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { SandboxRegistry, canTransition, toSummary } from './registry.ts';
import { InvalidTransitionError, NotFoundError } from '../errors.ts';
import { ShellSession } from '../session/session.ts';
import { FakeContainer } from '../testing/fake-runtime.ts';
import { silentLogger } from '../logger.ts';

function makeSession(): ShellSession {
  const container = new FakeContainer(
    { id: 'fake-1', name: 'sandboxd-box1', sandboxId: 'box1' },
    { sandboxId: 'box1', image: 'ubuntu:latest', shell: '/bin/sh' },
  );
  return new ShellSession(container.attach(), { logger: silentLogger });
}

describe('SandboxRegistry', () => {
  let registry: SandboxRegistry;
  let ids: number;

  beforeEach(() => {
    ids = 0;
    registry = new SandboxRegistry(() => `box${++ids}`);
  });

  it('create allocates a record in created state', () => {
    const record = registry.create({ image: 'ubuntu:latest', setupCommands: ['apt-get update'] });

    assert.equal(record.id, 'box1');
    assert.equal(record.state, 'created');
    assert.deepEqual(record.setupCommands, ['apt-get update']);
    assert.equal(registry.list().length, 1);
  });

  it('valid path: created -> starting -> running -> stopping -> stopped', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    const session = makeSession();

    registry.transition(id, 'created', 'starting');
    registry.transition(id, 'starting', 'running', { session });
    const leaving = registry.transition(id, 'running', 'stopping');
    registry.transition(id, 'stopping', 'stopped');

    assert.equal(leaving.session, session);
    assert.equal(registry.get(id).session, undefined);
    assert.equal(registry.get(id).state, 'stopped');
    assert.ok(registry.get(id).stoppedAt);
  });

  it('compare-and-swap fails when the expected state does not match', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    registry.transition(id, 'created', 'starting');

    assert.throws(
      () => registry.transition(id, 'created', 'starting'),
      /Invalid transition: starting -> starting for sandbox box1 \(expected created\)/,
    );
  });

  it('rejects edges outside the lifecycle table', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });

    assert.throws(() => registry.transition(id, 'created', 'running', { session: makeSession() }), InvalidTransitionError);
    assert.equal(canTransition('stopped', 'failed'), false);
    assert.equal(canTransition('starting', 'stopping'), true);
  });

  it('entering running requires a session', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    registry.transition(id, 'created', 'starting');

    assert.throws(() => registry.transition(id, 'starting', 'running'), /needs a live session/);
  });

  it('accepts a set of expected states', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    registry.transition(id, 'created', 'starting');

    const result = registry.transition(id, ['running', 'starting'], 'stopping');

    assert.equal(result.previous, 'starting');
  });

  it('terminal states cannot transition again', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    registry.transition(id, 'created', 'failed', { reason: 'boom' });

    assert.equal(registry.get(id).failureReason, 'boom');
    assert.throws(() => registry.transition(id, 'failed', 'stopped'), InvalidTransitionError);
  });

  it('attachContainer only succeeds in the expected state', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    const handle = { id: 'c1', name: 'sandboxd-box1', sandboxId: id };

    assert.equal(registry.attachContainer(id, 'starting', handle), false);
    registry.transition(id, 'created', 'starting');
    assert.equal(registry.attachContainer(id, 'starting', handle), true);
    assert.equal(registry.get(id).container, handle);
  });

  it('take hands out a resource exactly once', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });
    const ticket = { id: 7, acquiredAt: new Date() };
    registry.transition(id, 'created', 'starting', { ticket });

    assert.equal(registry.take(id, 'ticket'), ticket);
    assert.equal(registry.take(id, 'ticket'), undefined);
    assert.equal(registry.take('missing', 'container'), undefined);
  });

  it('remove is only legal from stopped or failed', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: [] });

    assert.throws(() => registry.remove(id), /only stopped or failed/);
    registry.transition(id, 'created', 'failed', { reason: 'discarded' });
    registry.remove(id);
    assert.throws(() => registry.get(id), NotFoundError);
  });

  it('summary exposes the API view', () => {
    const { id } = registry.create({ image: 'alpine', setupCommands: ['true'] });
    registry.update(id, { lastStandaloneExitCode: 3, sessionCommandCount: 2 });

    const summary = toSummary(registry.get(id));

    assert.equal(summary.id, 'box1');
    assert.equal(summary.state, 'created');
    assert.deepEqual(summary.setup_commands, ['true']);
    assert.equal(summary.container_id, null);
    assert.equal(summary.started_at, null);
    assert.equal(summary.command_count, 2);
    assert.equal(summary.last_standalone_exit_code, 3);
  });

  it('inState filters records', () => {
    const a = registry.create({ image: 'alpine', setupCommands: [] });
    registry.create({ image: 'alpine', setupCommands: [] });
    registry.transition(a.id, 'created', 'starting');

    assert.deepEqual(registry.inState('starting', 'running').map(r => r.id), ['box1']);
  });
});
