// src/kernel/index.ts
import { loadConfig } from './config.ts';
import { SandboxServer } from './orchestrator.ts';

export async function runServer(argv: string[]): Promise<SandboxServer> {
  const config = loadConfig({ argv });
  const server = new SandboxServer({ config });
  await server.start();

  const onSignal = (signal: NodeJS.Signals): void => {
    server.stop(signal).then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[server] shutdown failed:', err);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return server;
}
