import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { runDaily } from '../src/commands/daily.ts';
import { runOperation, selectOperation } from '../src/commands/index.ts';
import { runCleanup } from '../src/commands/maintenance.ts';
import { runSetup } from '../src/commands/setup.ts';
import { InvalidDateError } from '../src/errors.ts';
import { createCanvasContext, type CanvasContext } from '../src/lib/context.ts';
import type { Bitmap } from '../src/types.ts';
import { FakeGitClient, fail } from './helpers/fake-git.ts';
import { countingPacer, createMemoryLogger, createTempDir, makeConfig, scriptedRandom } from './helpers/fixtures.ts';

const NOW = new Date(2024, 4, 6, 12, 0, 0);

describe('commands', () => {
  let testDir: string;
  let git: FakeGitClient;
  let random: ReturnType<typeof scriptedRandom>;

  const context = (figures: Bitmap[], localPath: string = testDir): CanvasContext =>
    createCanvasContext({
      config: makeConfig({ localPath, figures, gapWeeks: 0, poolSize: 3 }),
      logger: createMemoryLogger(),
      git,
      random,
      pacer: countingPacer(),
      now: () => NOW,
    });

  const messages = () => git.callsTo('commit').map((args) => args[0]);

  beforeEach(async () => {
    testDir = await createTempDir('canvas-commands-');
    git = new FakeGitClient();
    random = scriptedRandom();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('runDaily', () => {
    it('succeeds without committing on a blank day', async () => {
      expect(await runDaily(context([['0000000']]))).toBe(true);
      expect(git.callsTo('commit')).toEqual([]);
      expect(git.callsTo('push')).toEqual([]);
      expect(random.intCalls).toBe(0);
    });

    it('commits the count drawn for the day', async () => {
      expect(await runDaily(context([['3333333']]))).toBe(true);
      expect(messages()).toHaveLength(6);
      expect(messages()[5]).toBe('Activity pattern - 2024-05-06 - 5');
    });

    it('aborts when the working copy cannot be set up', async () => {
      git.script('clone', fail('auth'));

      expect(await runDaily(context([['3333333']], join(testDir, 'missing')))).toBe(false);
      expect(git.callsTo('commit')).toEqual([]);
    });
  });

  describe('runSetup', () => {
    it('backfills every day from the start date through today', async () => {
      expect(await runSetup(context([['1111111']]), '2024-05-04')).toBe(true);

      expect(git.callsTo('commit')).toEqual([
        ['Activity pattern backfill - 2024-05-04 - 0', { date: '2024-05-04 09:00:00' }],
        ['Activity pattern backfill - 2024-05-05 - 0', { date: '2024-05-05 09:00:00' }],
        ['Activity pattern backfill - 2024-05-06 - 0', { date: '2024-05-06 09:00:00' }],
      ]);
      expect(git.callsTo('push')).toHaveLength(4);
    });

    it('skips blank days', async () => {
      expect(await runSetup(context([['0000000']]), '2024-05-01')).toBe(true);
      expect(git.callsTo('commit')).toEqual([]);
      expect(git.pushModes()).toEqual(['plain']);
    });

    it('rejects a malformed start date before touching the repository', async () => {
      await expect(runSetup(context([['1111111']]), '2024-13-01')).rejects.toThrow(InvalidDateError);
      expect(git.calls).toEqual([]);
    });

    it('is fatal when the initial clone fails', async () => {
      git.script('clone', fail('auth'));

      expect(await runSetup(context([['1111111']], join(testDir, 'missing')), '2024-05-04')).toBe(false);
      expect(git.callsTo('commit')).toEqual([]);
    });

    it('force pushes the final batch only with --force', async () => {
      git.setDefault('push', fail('stale-info'));

      await runSetup(context([['0000000']]), '2024-05-06', { force: true });
      expect(git.pushModes()).toEqual(['plain', 'force-with-lease', 'force']);
    });
  });

  describe('runCleanup', () => {
    it('fails when there is no working copy', async () => {
      expect(await runCleanup(context([['0000000']], join(testDir, 'missing')))).toBe(false);
      expect(git.calls).toEqual([]);
    });

    it('succeeds once the cleanup is pushed', async () => {
      await writeFile(join(testDir, 'notes.txt'), 'scratch');

      expect(await runCleanup(context([['0000000']]))).toBe(true);
    });

    it('fails when the cleanup cannot be pushed', async () => {
      await writeFile(join(testDir, 'notes.txt'), 'scratch');
      git.setDefault('commit', fail());
      git.setDefault('push', fail('stale-info'));

      expect(await runCleanup(context([['0000000']]))).toBe(false);
      expect(git.pushModes()).toEqual(['plain', 'force-with-lease']);
    });
  });

  describe('selectOperation', () => {
    it('applies a fixed precedence when several flags are set', () => {
      expect(selectOperation({ setup: '2024-01-01', testSsh: true })).toEqual({ kind: 'test-ssh' });
      expect(selectOperation({ reset: true, daily: true })).toEqual({ kind: 'reset' });
      expect(selectOperation({ daily: true, cleanup: true })).toEqual({ kind: 'daily' });
    });

    it('carries the start date and force flag for setup', () => {
      expect(selectOperation({ setup: '2024-01-01', force: true })).toEqual({
        kind: 'setup',
        startDate: '2024-01-01',
        force: true,
      });
      expect(selectOperation({ setup: '2024-01-01' })).toEqual({ kind: 'setup', startDate: '2024-01-01', force: false });
    });

    it('falls back to help when no operation is requested', () => {
      expect(selectOperation({})).toEqual({ kind: 'help' });
      expect(selectOperation({ force: true, debug: true })).toEqual({ kind: 'help' });
    });
  });

  describe('runOperation', () => {
    it('dispatches test-ssh to the probe', async () => {
      expect(await runOperation({ kind: 'test-ssh' }, context([['0000000']]))).toBe(true);
      expect(git.callsTo('probeSsh')).toEqual([['github.com']]);
    });

    it('treats help as a no-op', async () => {
      expect(await runOperation({ kind: 'help' }, context([['0000000']]))).toBe(true);
      expect(git.calls).toEqual([]);
    });
  });
});
