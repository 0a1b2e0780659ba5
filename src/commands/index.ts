import type { CanvasContext } from '../lib/context.ts';
import { runDaily } from './daily.ts';
import { runCleanup, runReset, runTestSsh } from './maintenance.ts';
import { runSetup } from './setup.ts';

export interface CanvasFlags {
  setup?: string;
  daily?: boolean;
  testSsh?: boolean;
  cleanup?: boolean;
  reset?: boolean;
  force?: boolean;
  debug?: boolean;
}

export type CanvasOperation =
  | { kind: 'test-ssh' }
  | { kind: 'reset' }
  | { kind: 'setup'; startDate: string; force: boolean }
  | { kind: 'daily' }
  | { kind: 'cleanup' }
  | { kind: 'help' };

/**
 * Operation flags are exclusive; the first one set, in this order, wins.
 */
export function selectOperation(flags: CanvasFlags): CanvasOperation {
  if (flags.testSsh) return { kind: 'test-ssh' };
  if (flags.reset) return { kind: 'reset' };
  if (flags.setup) return { kind: 'setup', startDate: flags.setup, force: flags.force ?? false };
  if (flags.daily) return { kind: 'daily' };
  if (flags.cleanup) return { kind: 'cleanup' };
  return { kind: 'help' };
}

export async function runOperation(operation: CanvasOperation, context: CanvasContext): Promise<boolean> {
  switch (operation.kind) {
    case 'test-ssh':
      return runTestSsh(context);
    case 'reset':
      return runReset(context);
    case 'setup':
      return runSetup(context, operation.startDate, { force: operation.force });
    case 'daily':
      return runDaily(context);
    case 'cleanup':
      return runCleanup(context);
    case 'help':
      return true;
  }
}
