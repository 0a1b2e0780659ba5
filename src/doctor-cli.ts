#!/usr/bin/env tsx
import 'dotenv/config';
import { Command } from 'commander';
import { runDoctorOperation, selectDoctorOperation, type DoctorFlags } from './commands/doctor.ts';
import { loadConfig } from './config/config.ts';
import { Diagnostics } from './lib/diagnostics.ts';
import { CliGitClient } from './utils/git.ts';
import { createLogger } from './utils/logger.ts';
import { promptForConfirmation } from './utils/prompt.ts';

const program = new Command();

program
  .name('commit-canvas-doctor')
  .description('Check and repair the local working copy used by commit-canvas')
  .version('1.0.0')
  .option('--check', 'Check repository status')
  .option('--fix', 'Fix repository issues')
  .option('--reset', 'Reset repository to a clean state')
  .option('--test-commit', 'Create a test commit')
  .option('-y, --yes', 'Skip the confirmation prompt before deleting a broken directory')
  .action(async (flags: DoctorFlags) => {
    const operation = selectDoctorOperation(flags);

    try {
      const config = loadConfig();
      const logger = createLogger({ name: 'commit-canvas-doctor', file: config.logging.doctorLogFile });
      const git = new CliGitClient(config.repository.localPath, logger);
      const diagnostics = new Diagnostics({ config, git, logger });

      const ok = await runDoctorOperation(operation, diagnostics, {
        confirm: flags.yes ? async () => true : promptForConfirmation,
        print: (line) => console.log(line),
      });
      if (!ok) console.log(`⚠️  ${operation} reported problems, see the log for details`);
    } catch (error) {
      console.error(`❌ ${operation} failed:`, error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

await program.parseAsync();
