import type { GitClient } from '../utils/git.ts';
import type { Logger } from '../utils/logger.ts';

export interface PushContext {
  git: GitClient;
  logger: Logger;
  remote: string;
  /** Brings the local branch level with the remote; resolves false on failure. */
  sync: () => Promise<boolean>;
}

/**
 * Push `branch`, escalating plain → sync + one plain retry → force-with-lease.
 * The sync step only runs when the first rejection is a non-fast-forward.
 */
export async function pushWithFallback(context: PushContext, branch: string): Promise<boolean> {
  const { git, logger, remote } = context;
  logger.info(`Pushing changes to ${branch}...`);

  const first = await git.push('plain', remote, branch);
  if (first.ok) return true;

  if (first.reason === 'non-fast-forward') {
    logger.warn('Non-fast-forward rejection detected, synchronizing before retrying');
    if (await context.sync()) {
      const retry = await git.push('plain', remote, branch);
      if (retry.ok) return true;
    }
  }

  logger.warn('Normal push failed, trying force-with-lease');
  const lease = await git.push('force-with-lease', remote, branch);
  if (!lease.ok) logger.error(`Push to ${remote}/${branch} failed: ${lease.stderr || lease.reason}`);
  return lease.ok;
}

/** Unconditional overwrite of the remote branch. Callers gate this behind an explicit opt-in. */
export async function forcePush(context: PushContext, branch: string): Promise<boolean> {
  context.logger.warn(`Force pushing ${branch} to ${context.remote}`);
  const result = await context.git.push('force', context.remote, branch);
  return result.ok;
}
