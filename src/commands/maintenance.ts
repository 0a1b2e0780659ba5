import type { CanvasContext } from '../lib/context.ts';

export async function runTestSsh(context: CanvasContext): Promise<boolean> {
  return context.repository.testSshConnection();
}

export async function runReset(context: CanvasContext): Promise<boolean> {
  return context.repository.reset();
}

/**
 * Remove everything but the tracked pool and essential files. Irreversible
 * for anything not protected.
 */
export async function runCleanup(context: CanvasContext): Promise<boolean> {
  const { logger, repository } = context;
  if (!(await repository.exists())) {
    logger.error('Repository does not exist, nothing to clean up');
    return false;
  }

  const { removed, pushed } = await repository.cleanup();
  logger.info(`Cleanup removed ${removed.length} file(s)`);
  return pushed;
}
