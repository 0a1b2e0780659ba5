import { mkdtemp } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig } from '../../src/config/config.ts';
import type { Logger, LogLevel } from '../../src/utils/logger.ts';
import type { Pacer, Random } from '../../src/utils/pacing.ts';
import type { AppConfig, Bitmap } from '../../src/types.ts';

export async function createTempDir(prefix: string = 'canvas-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export interface ConfigOverrides {
  localPath: string;
  poolSize?: number;
  figures?: Bitmap[];
  gapWeeks?: number;
}

export function makeConfig(overrides: ConfigOverrides): AppConfig {
  const base = loadConfig({
    CANVAS_LOCAL_PATH: overrides.localPath,
    CANVAS_LOG_DIR: overrides.localPath,
    CANVAS_PACING_MIN_MS: '0',
    CANVAS_PACING_MAX_MS: '0',
  });
  return {
    ...base,
    pattern: {
      ...base.pattern,
      figures: overrides.figures ?? base.pattern.figures,
      gapWeeks: overrides.gapWeeks ?? base.pattern.gapWeeks,
    },
    commits: { ...base.commits, poolSize: overrides.poolSize ?? base.commits.poolSize },
  };
}

export interface MemoryLogger extends Logger {
  lines: { level: LogLevel; message: string }[];
}

export function createMemoryLogger(): MemoryLogger {
  const lines: { level: LogLevel; message: string }[] = [];
  return {
    lines,
    debug: (message) => lines.push({ level: 'debug', message }),
    info: (message) => lines.push({ level: 'info', message }),
    warn: (message) => lines.push({ level: 'warn', message }),
    error: (message) => lines.push({ level: 'error', message }),
    setLevel: () => {},
  };
}

/** Always picks the lower bound, unless a queued integer is waiting. */
export function scriptedRandom(ints: number[] = []): Random & { intCalls: number } {
  const queue = [...ints];
  const random: Random & { intCalls: number } = {
    intCalls: 0,
    int: (min: number, max: number) => {
      random.intCalls++;
      const next = queue.shift();
      return next === undefined ? min : Math.min(max, Math.max(min, next));
    },
    float: (min: number) => min,
  };
  return random;
}

export function countingPacer(): Pacer & { pauses: number } {
  const pacer: Pacer & { pauses: number } = {
    pauses: 0,
    pause: async () => {
      pacer.pauses++;
    },
  };
  return pacer;
}
