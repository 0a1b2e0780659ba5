#!/usr/bin/env tsx
import 'dotenv/config';
import { Command } from 'commander';
import { runOperation, selectOperation, type CanvasFlags } from './commands/index.ts';
import { loadConfig } from './config/config.ts';
import { createCanvasContext } from './lib/context.ts';
import { createLogger } from './utils/logger.ts';

const program = new Command();

program
  .name('commit-canvas')
  .description('Paint a pattern onto the contribution calendar with scheduled commits')
  .version('1.0.0')
  .option('--setup <startDate>', 'Run initial setup from START_DATE (YYYY-MM-DD) to today')
  .option('--daily', 'Run the daily update')
  .option('--test-ssh', 'Test the SSH connection to the hosting service')
  .option('--cleanup', 'Clean up the repository to reduce size (use with caution)')
  .option('--reset', 'Reset the local repository to match the remote')
  .option('--force', 'Use force push if necessary (use with caution)')
  .option('--debug', 'Enable debug logging')
  .action(async (flags: CanvasFlags) => {
    const operation = selectOperation(flags);
    if (operation.kind === 'help') {
      program.outputHelp();
      return;
    }

    try {
      const config = loadConfig();
      const logger = createLogger({ name: 'commit-canvas', file: config.logging.canvasLogFile });
      if (flags.debug) {
        logger.setLevel('debug');
        logger.debug('Debug logging enabled');
      }

      const context = createCanvasContext({ config, logger });
      const ok = await runOperation(operation, context);
      console.log(ok ? `✅ ${operation.kind} finished` : `⚠️  ${operation.kind} did not complete, see the log for details`);
    } catch (error) {
      console.error(`❌ ${operation.kind} failed:`, error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

await program.parseAsync();
