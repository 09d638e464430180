import type { Server as NetServer } from 'node:net';
import { serve } from '@hono/node-server';
import type { Hono } from 'hono';
import type { SandboxdConfig } from './config.ts';
import { DockerAdapter, scanOrphans, type ContainerRuntime } from './container/index.ts';
import { SandboxEngine } from './engine.ts';
import { errorMessage } from './errors.ts';
import { createSandboxApp } from './http/index.ts';
import type { Logger } from './logger.ts';

export interface HttpListener {
  url: string;
  close(): Promise<void>;
}

export type Listen = (app: Hono, port: number, hostname: string) => Promise<HttpListener>;

export const listenWithNodeServer: Listen = (app, port, hostname) =>
  new Promise((resolve, reject) => {
    const server: NetServer = serve({ fetch: app.fetch, port, hostname }, (info) => {
      server.off('error', reject);
      resolve({
        url: `http://${info.address}:${info.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close(err => (err ? fail(err) : done()));
          }),
      });
    });
    server.once('error', reject);
  });

export interface SandboxServerOptions {
  config: SandboxdConfig;
  runtime?: ContainerRuntime;
  logger?: Logger;
  listen?: Listen;
}

export class SandboxServer {
  private readonly config: SandboxdConfig;
  private readonly runtime: ContainerRuntime;
  private readonly logger: Logger;
  private readonly listen: Listen;

  private engine: SandboxEngine | undefined;
  private listener: HttpListener | undefined;

  private started = false;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: SandboxServerOptions) {
    this.config = options.config;
    this.runtime = options.runtime ?? new DockerAdapter(options.config.runtime);
    this.logger = options.logger ?? console;
    this.listen = options.listen ?? listenWithNodeServer;
  }

  get url(): string | undefined {
    return this.listener?.url;
  }

  async start(): Promise<void> {
    if (this.started) return;
    const { config, runtime, logger } = this;

    if (!(await runtime.ping())) {
      logger.warn(`[server] container runtime '${config.runtime}' is not reachable; sandboxes will fail to start`);
    }

    const engine = new SandboxEngine({
      runtime,
      maxSandboxes: config.maxSandboxes,
      admissionTimeoutMs: config.admissionTimeoutMs,
      execTimeoutMs: config.execTimeoutMs,
      probeTimeoutMs: config.probeTimeoutMs,
      sandboxTimeoutMs: config.sandboxTimeoutMs,
      trajectoryLimit: config.trajectoryLimit,
      shell: config.shell,
      workdir: config.workdir,
      limits: config.limits,
      logger,
    });

    try {
      const removed = await scanOrphans(runtime, id => engine.registry.find(id) !== undefined, logger);
      if (removed.length > 0) logger.info(`[server] removed ${removed.length} orphaned container(s)`);
    } catch (err) {
      logger.warn(`[server] orphan scan failed: ${errorMessage(err)}`);
    }

    const app = createSandboxApp({ engine, runtime, logger });
    this.listener = await this.listen(app, config.port, config.host);
    this.engine = engine;
    this.started = true;
    logger.info(`[server] listening on ${this.listener.url} (max ${config.maxSandboxes} sandboxes)`);
  }

  async stop(signal: string): Promise<void> {
    if (!this.started) return;
    if (this.shutdownPromise) return this.shutdownPromise;

    this.shutdownPromise = this.doStop(signal).finally(() => {
      this.shutdownPromise = null;
    });
    return this.shutdownPromise;
  }

  private async doStop(signal: string): Promise<void> {
    this.logger.info(`[server] shutting down (${signal})...`);

    try {
      await this.listener?.close();
    } catch (err) {
      this.logger.warn(`[server] failed to close listener: ${errorMessage(err)}`);
    }

    try {
      await this.engine?.shutdown();
    } catch (err) {
      this.logger.warn(`[server] failed to shut down engine: ${errorMessage(err)}`);
    }

    this.listener = undefined;
    this.engine = undefined;
    this.started = false;
  }
}
