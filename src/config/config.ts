import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import figuresJson from './figures.json';
import { ConfigError } from '../errors.ts';
import type { AppConfig, Bitmap } from '../types.ts';

export const DEFAULT_USERNAME = 'example-user';
export const DEFAULT_REPO_NAME = 'activity-canvas';
export const DEFAULT_HOST = 'github.com';
export const DEFAULT_POOL_SIZE = 10;
export const DEFAULT_GAP_WEEKS = 1;

const BitmapSchema = z.array(z.string().regex(/^[0-3]+$/, 'rows hold intensity digits 0-3')).min(1);
const FiguresSchema = z.array(BitmapSchema).min(1);

const optionalText = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  CANVAS_USERNAME: optionalText,
  CANVAS_REPO: optionalText,
  CANVAS_HOST: optionalText,
  CANVAS_LOCAL_PATH: optionalText,
  CANVAS_POOL_SIZE: z.coerce.number().int().min(1).max(100).optional(),
  CANVAS_GAP_WEEKS: z.coerce.number().int().min(0).max(52).optional(),
  CANVAS_PACING_MIN_MS: z.coerce.number().int().min(0).optional(),
  CANVAS_PACING_MAX_MS: z.coerce.number().int().min(0).optional(),
  CANVAS_LOG_DIR: optionalText,
});

export const sshUrlFor = (host: string, username: string, repoName: string): string =>
  `git@${host}:${username}/${repoName}.git`;

export function loadFigures(raw: unknown = figuresJson): Bitmap[] {
  const parsed = FiguresSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid figure set: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Build the immutable run configuration from defaults and environment overrides.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const vars = parsed.data;

  const username = vars.CANVAS_USERNAME ?? DEFAULT_USERNAME;
  const repoName = vars.CANVAS_REPO ?? DEFAULT_REPO_NAME;
  const host = vars.CANVAS_HOST ?? DEFAULT_HOST;
  const minMs = vars.CANVAS_PACING_MIN_MS ?? 500;
  const maxMs = vars.CANVAS_PACING_MAX_MS ?? 1000;
  if (minMs > maxMs) {
    throw new ConfigError(`Invalid configuration: pacing minimum ${minMs}ms exceeds maximum ${maxMs}ms`);
  }
  const logDir = vars.CANVAS_LOG_DIR ?? process.cwd();

  return Object.freeze({
    repository: Object.freeze({
      username,
      repoName,
      host,
      sshUrl: sshUrlFor(host, username, repoName),
      localPath: vars.CANVAS_LOCAL_PATH ?? join(homedir(), 'activity-canvas', repoName),
      remote: 'origin',
      branchCandidates: Object.freeze(['main', 'master']),
    }),
    pattern: Object.freeze({
      figures: Object.freeze(loadFigures()),
      gapWeeks: vars.CANVAS_GAP_WEEKS ?? DEFAULT_GAP_WEEKS,
      epoch: new Date(1970, 0, 1),
    }),
    commits: Object.freeze({
      poolSize: vars.CANVAS_POOL_SIZE ?? DEFAULT_POOL_SIZE,
      filePrefix: 'canvas_file_',
      label: 'Activity pattern',
      livePushEvery: 3,
      backdatedPushEvery: 5,
      workHours: Object.freeze([9, 18] as const),
      essentialFiles: Object.freeze(['README.md', '.gitignore']),
      essentialExtensions: Object.freeze(['.py', '.sh', '.ts']),
    }),
    pacing: Object.freeze({ minMs, maxMs }),
    logging: Object.freeze({
      canvasLogFile: join(logDir, 'commit-canvas.log'),
      doctorLogFile: join(logDir, 'commit-canvas-doctor.log'),
    }),
  });
}
