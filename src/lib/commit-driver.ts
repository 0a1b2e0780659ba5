import { join } from 'path';
import { forcePush, pushWithFallback, type PushContext } from './push.ts';
import { compactTimestamp, formatCalendarDate, formatCommitDate } from './pattern.ts';
import type { RepositoryManager } from './repository.ts';
import { writeTextFile } from '../utils/files.ts';
import type { GitClient } from '../utils/git.ts';
import type { Logger } from '../utils/logger.ts';
import type { Pacer, Random } from '../utils/pacing.ts';
import type { AppConfig } from '../types.ts';

export interface CommitDriverDeps {
  config: AppConfig;
  git: GitClient;
  repository: RepositoryManager;
  logger: Logger;
  random: Random;
  pacer: Pacer;
  now?: () => Date;
}

export interface BackdatedOptions {
  /** Permit `push --force` when the lease-guarded push also fails. */
  force?: boolean;
}

interface BatchPlan {
  count: number;
  branch: string;
  pushEvery: number;
  marker: (index: number) => string;
  message: (index: number) => string;
  commitDate?: () => string;
  onPushFailure: (index: number) => Promise<void>;
}

/**
 * Turns a commit count into MODIFY → STAGE → COMMIT cycles over the tracked
 * file pool, pushing every few commits and on the last one.
 */
export class CommitDriver {
  private readonly config: AppConfig;
  private readonly git: GitClient;
  private readonly repository: RepositoryManager;
  private readonly logger: Logger;
  private readonly random: Random;
  private readonly pacer: Pacer;
  private readonly now: () => Date;
  private readonly pushContext: PushContext;

  constructor(deps: CommitDriverDeps) {
    this.config = deps.config;
    this.git = deps.git;
    this.repository = deps.repository;
    this.logger = deps.logger;
    this.random = deps.random;
    this.pacer = deps.pacer;
    this.now = deps.now ?? (() => new Date());
    this.pushContext = {
      git: deps.git,
      logger: deps.logger,
      remote: deps.config.repository.remote,
      sync: () => deps.repository.sync(),
    };
  }

  pushChanges(branch: string): Promise<boolean> {
    return pushWithFallback(this.pushContext, branch);
  }

  forcePush(branch: string): Promise<boolean> {
    return forcePush(this.pushContext, branch);
  }

  /**
   * Commits stamped with the current time, followed by a trailing push.
   * Returns how many commits were recorded.
   */
  async createLiveCommits(count: number): Promise<number> {
    const now = this.now();
    const today = formatCalendarDate(now);
    const stamp = compactTimestamp(now);
    const { label, livePushEvery } = this.config.commits;
    this.logger.info(`Creating ${count} commits for today (${today})`);

    const branch = await this.repository.currentBranch();
    await this.repository.sync();

    const made = await this.runBatch({
      count,
      branch,
      pushEvery: livePushEvery,
      marker: (i) => `${label} commit - ${today} - ${stamp} - ${i}`,
      message: (i) => `${label} - ${today} - ${i}`,
      onPushFailure: async (i) => {
        this.logger.error(`Failed to push commit ${i}`);
        await this.repository.sync();
      },
    });

    await this.pushChanges(branch);
    return made;
  }

  /**
   * Commits whose author and committer dates fall on `date`, at a random hour
   * within working hours.
   */
  async createBackdatedCommits(date: Date, count: number, options: BackdatedOptions = {}): Promise<number> {
    const day = formatCalendarDate(date);
    const stamp = compactTimestamp(this.now());
    const { label, backdatedPushEvery, workHours } = this.config.commits;
    this.logger.info(`Creating ${count} commits for ${day}`);

    const branch = await this.repository.currentBranch();

    return this.runBatch({
      count,
      branch,
      pushEvery: backdatedPushEvery,
      marker: (i) => `${label} backfill - ${day} - ${stamp} - ${i}`,
      message: (i) => `${label} backfill - ${day} - ${i}`,
      commitDate: () => formatCommitDate(date, this.random.int(workHours[0], workHours[1])),
      onPushFailure: async () => {
        if (!options.force) return;
        this.logger.warn('Normal push failed, attempting force push due to --force flag');
        await this.forcePush(branch);
      },
    });
  }

  private poolFile(index: number): string {
    const files = this.repository.poolFiles();
    return files[index % files.length];
  }

  private async runBatch(plan: BatchPlan): Promise<number> {
    let made = 0;

    for (let i = 0; i < plan.count; i++) {
      const file = this.poolFile(i);
      this.logger.info(`Modifying file for commit: ${file}`);
      try {
        await writeTextFile(join(this.repository.localPath, file), plan.marker(i));
      } catch (error) {
        this.logger.error(`Could not write ${file}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }

      const staged = await this.git.add([file]);
      if (!staged.ok) continue;

      const committed = await this.git.commit(plan.message(i), { date: plan.commitDate?.() });
      if (!committed.ok) continue;
      made++;

      if (i % plan.pushEvery === 0 || i === plan.count - 1) {
        if (!(await this.pushChanges(plan.branch))) {
          await plan.onPushFailure(i);
        }
      }

      await this.pacer.pause();
    }

    return made;
  }
}
