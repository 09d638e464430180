import { Hono } from 'hono';
import { MAX_TIMER_MS } from '../config.ts';
import type { ContainerRuntime } from '../container/types.ts';
import type { SandboxEngine } from '../engine.ts';
import type { Logger } from '../logger.ts';
import {
  errorResponse,
  jsonError,
  optionalBoolean,
  optionalPositiveInt,
  optionalStringArray,
  readJsonBody,
  requireString,
} from './http.ts';

export interface SandboxAppDeps {
  engine: SandboxEngine;
  runtime: Pick<ContainerRuntime, 'ping'>;
  logger?: Logger;
}

export function createSandboxApp(deps: SandboxAppDeps): Hono {
  const { engine, runtime } = deps;
  const logger = deps.logger ?? console;
  const app = new Hono();

  app.use('*', async (c, next) => {
    const started = Date.now();
    await next();
    logger.info(`[http] ${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - started}ms`);
  });

  app.get('/health', async (c) => {
    const stats = engine.stats();
    return c.json({
      ok: true,
      runtime: await runtime.ping(),
      admission: stats.admission,
      sandboxes: stats.sandboxes,
    });
  });

  app.post('/sandboxes', async (c) => {
    const body = await readJsonBody(c);
    const request = {
      image: requireString(body, 'image'),
      setupCommands: optionalStringArray(body, 'setup_commands') ?? [],
    };
    const start = optionalBoolean(body, 'start') ?? false;

    const summary = start
      ? await engine.launch(request, { signal: c.req.raw.signal })
      : engine.create(request);
    return c.json(summary, 201);
  });

  app.get('/sandboxes', (c) => c.json(engine.list()));

  app.get('/sandboxes/:id', (c) => c.json(engine.get(c.req.param('id'))));

  app.post('/sandboxes/:id/start', async (c) => {
    const summary = await engine.start(c.req.param('id'), { signal: c.req.raw.signal });
    return c.json(summary);
  });

  app.post('/sandboxes/:id/exec', async (c) => {
    const body = await readJsonBody(c);
    const result = await engine.exec(c.req.param('id'), {
      command: requireString(body, 'command'),
      standalone: optionalBoolean(body, 'standalone') ?? false,
      timeoutMs: optionalPositiveInt(body, 'timeout_ms', MAX_TIMER_MS),
      signal: c.req.raw.signal,
    });
    return c.json({ stdout: result.stdout, stderr: result.stderr, exit_code: result.exitCode });
  });

  app.get('/sandboxes/:id/trajectory', (c) => {
    const trajectory = engine.trajectory(c.req.param('id'));
    return c.json({
      sandbox_id: trajectory.sandboxId,
      command_count: trajectory.records.length,
      total: trajectory.total,
      dropped: trajectory.dropped,
      truncated: trajectory.truncated,
      trajectory: trajectory.records,
    });
  });

  app.get('/sandboxes/:id/trajectory/formatted', (c) =>
    c.text(engine.formattedTrajectory(c.req.param('id'))),
  );

  app.post('/sandboxes/:id/stop', async (c) => {
    const id = c.req.param('id');
    const body = await readJsonBody(c);
    const remove = optionalBoolean(body, 'remove') ?? false;

    const summary = await engine.stop(id);
    if (remove) await engine.remove(id);
    return c.json({ ...summary, removed: remove });
  });

  app.delete('/sandboxes/:id', async (c) => {
    const id = c.req.param('id');
    await engine.remove(id);
    return c.json({ id, removed: true });
  });

  app.notFound((c) => jsonError(404, 'NOT_FOUND', `No route for ${c.req.method} ${c.req.path}`));

  app.onError((err) => errorResponse(err, logger));

  return app;
}
