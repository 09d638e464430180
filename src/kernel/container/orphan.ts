import { errorMessage } from '../errors.ts';
import type { Logger } from '../logger.ts';
import type { ContainerHandle, ContainerRuntime } from './types.ts';

async function cleanupOrphan(runtime: ContainerRuntime, handle: ContainerHandle, logger: Logger): Promise<void> {
  logger.warn(`[runtime] orphan container found: ${handle.name} (${handle.id}), removing`);
  await runtime.stop(handle, 1000).catch((err: unknown) =>
    logger.warn(`[runtime] stop of orphan ${handle.name} failed: ${errorMessage(err)}`),
  );
  await runtime.remove(handle);
}

/**
 * Removes managed containers no live sandbox owns, such as those left
 * behind by a crashed server. Returns the names of the removed containers.
 */
export async function scanOrphans(
  runtime: ContainerRuntime,
  isOwned: (sandboxId: string) => boolean,
  logger: Logger = console,
): Promise<string[]> {
  const containers = await runtime.listManaged();
  const removed: string[] = [];

  for (const handle of containers) {
    if (isOwned(handle.sandboxId)) continue;
    try {
      await cleanupOrphan(runtime, handle, logger);
      removed.push(handle.name);
    } catch (err) {
      logger.error(`[runtime] failed to clean orphan ${handle.name}: ${errorMessage(err)}`);
    }
  }

  return removed;
}
