import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'fs/promises';
import { join } from 'path';
import { createLogger, formatLogLine } from '../src/utils/logger.ts';
import { createTempDir } from './helpers/fixtures.ts';

describe('formatLogLine', () => {
  it('prefixes the timestamp, logger name and level', () => {
    const at = new Date(Date.UTC(2024, 4, 6, 10, 30, 0));
    expect(formatLogLine('canvas', 'warn', 'push rejected', at))
      .toBe('2024-05-06T10:30:00.000Z - canvas - WARN - push rejected');
  });
});

describe('createLogger', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir('canvas-logger-');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  const messagesIn = async (file: string) =>
    (await readFile(file, 'utf-8'))
      .trim()
      .split('\n')
      .map((line) => line.split(' - ').slice(1).join(' - '));

  it('appends lines to the log file, creating its directory', async () => {
    const file = join(testDir, 'logs', 'canvas.log');
    const logger = createLogger({ name: 'canvas', file });

    logger.info('first');
    logger.error('second');

    expect(await messagesIn(file)).toEqual(['canvas - INFO - first', 'canvas - ERROR - second']);
  });

  it('drops messages below the threshold', async () => {
    const file = join(testDir, 'canvas.log');
    const logger = createLogger({ name: 'canvas', level: 'warn', file });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(await messagesIn(file)).toEqual(['canvas - WARN - shown']);
  });

  it('lowers the threshold on request', async () => {
    const file = join(testDir, 'canvas.log');
    const logger = createLogger({ name: 'canvas', file });

    logger.debug('hidden');
    logger.setLevel('debug');
    logger.debug('shown');

    expect(await messagesIn(file)).toEqual(['canvas - DEBUG - shown']);
  });
});
