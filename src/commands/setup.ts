import type { CanvasContext } from '../lib/context.ts';
import {
  commitCountForIntensity,
  eachCalendarDay,
  formatCalendarDate,
  intensityForDate,
  parseCalendarDate,
} from '../lib/pattern.ts';

export interface SetupOptions {
  force?: boolean;
}

/**
 * Backfill the pattern with dated commits from `startDate` through today.
 */
export async function runSetup(context: CanvasContext, startDate: string, options: SetupOptions = {}): Promise<boolean> {
  const { logger, repository, driver, config, random } = context;
  const start = parseCalendarDate(startDate);

  if (!(await repository.prepare())) {
    logger.error('Repository setup failed');
    return false;
  }

  const today = context.now();
  logger.info(`Creating initial pattern from ${formatCalendarDate(start)} to ${formatCalendarDate(today)}...`);
  const branch = await repository.currentBranch();

  let total = 0;
  for (const day of eachCalendarDay(start, today)) {
    const count = commitCountForIntensity(intensityForDate(config.pattern, day), random);
    if (count === 0) continue;
    total += await driver.createBackdatedCommits(day, count, { force: options.force });
  }

  if (!(await driver.pushChanges(branch)) && options.force) {
    logger.warn('Final push failed, attempting force push due to --force flag');
    await driver.forcePush(branch);
  }

  logger.info(`Initial setup completed successfully with ${total} commits`);
  return true;
}
