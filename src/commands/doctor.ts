import type { Diagnostics } from '../lib/diagnostics.ts';

export interface DoctorFlags {
  check?: boolean;
  fix?: boolean;
  reset?: boolean;
  testCommit?: boolean;
  yes?: boolean;
}

export type DoctorOperation = 'check' | 'reset' | 'test-commit' | 'fix' | 'survey';

export const DOCTOR_HINTS = [
  'To fix repository issues, run: commit-canvas-doctor --fix',
  'To create a test commit, run: commit-canvas-doctor --test-commit',
  'To reset the repository, run: commit-canvas-doctor --reset',
];

export function selectDoctorOperation(flags: DoctorFlags): DoctorOperation {
  if (flags.check) return 'check';
  if (flags.reset) return 'reset';
  if (flags.testCommit) return 'test-commit';
  if (flags.fix) return 'fix';
  return 'survey';
}

export interface DoctorIo {
  confirm: (message: string) => Promise<boolean>;
  print: (line: string) => void;
}

export async function runDoctorOperation(
  operation: DoctorOperation,
  diagnostics: Diagnostics,
  io: DoctorIo,
): Promise<boolean> {
  switch (operation) {
    case 'check': {
      const report = await diagnostics.runChecks();
      return Object.values(report).every(Boolean);
    }
    case 'reset':
      return diagnostics.reset({ confirm: io.confirm });
    case 'test-commit':
      return diagnostics.createTestCommit();
    case 'fix':
      return diagnostics.fix();
    case 'survey': {
      const report = await diagnostics.runChecks();
      io.print('');
      DOCTOR_HINTS.forEach((hint) => io.print(hint));
      return Object.values(report).every(Boolean);
    }
  }
}
