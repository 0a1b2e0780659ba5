import type { CanvasContext } from '../lib/context.ts';
import { commitCountForIntensity, formatCalendarDate, intensityForDate } from '../lib/pattern.ts';

/**
 * Today's share of the pattern. A blank day is a successful no-op.
 */
export async function runDaily(context: CanvasContext): Promise<boolean> {
  const { logger, repository, driver, config, random } = context;

  if (!(await repository.prepare())) {
    logger.error('Repository setup failed');
    return false;
  }

  const today = context.now();
  const day = formatCalendarDate(today);
  const intensity = intensityForDate(config.pattern, today);
  const count = commitCountForIntensity(intensity, random);

  if (count === 0) {
    logger.info(`No commits needed for today (${day}) according to the pattern.`);
    return true;
  }

  logger.info(`Intensity ${intensity} for ${day}, making ${count} commits`);
  await driver.createLiveCommits(count);
  logger.info(`Daily update completed successfully for ${day}`);
  return true;
}
