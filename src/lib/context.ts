import { CommitDriver } from './commit-driver.ts';
import { RepositoryManager } from './repository.ts';
import { CliGitClient, type GitClient } from '../utils/git.ts';
import type { Logger } from '../utils/logger.ts';
import { createPacer, mathRandom, type Pacer, type Random } from '../utils/pacing.ts';
import type { AppConfig } from '../types.ts';

export interface CanvasContext {
  config: AppConfig;
  logger: Logger;
  git: GitClient;
  repository: RepositoryManager;
  driver: CommitDriver;
  random: Random;
  now: () => Date;
}

export interface CanvasContextOptions {
  config: AppConfig;
  logger: Logger;
  git?: GitClient;
  random?: Random;
  pacer?: Pacer;
  now?: () => Date;
}

/**
 * Wire the components for one run. Anything not supplied gets its production
 * implementation.
 */
export function createCanvasContext(options: CanvasContextOptions): CanvasContext {
  const { config, logger } = options;
  const random = options.random ?? mathRandom;
  const now = options.now ?? (() => new Date());
  const git = options.git ?? new CliGitClient(config.repository.localPath, logger);
  const pacer = options.pacer ?? createPacer(config.pacing, random);
  const repository = new RepositoryManager(config, git, logger);
  const driver = new CommitDriver({ config, git, repository, logger, random, pacer, now });

  return { config, logger, git, repository, driver, random, now };
}
