#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line front end for reelkeeper. Each command loads the config and
 * registry snapshot, runs one operation in the foreground and saves the
 * snapshot again. No business logic lives here.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { describeError } from '@reelkeeper/core';

import { refreshCommand } from './commands/refresh.js';
import { tidyCommand, type TidyCommandOptions } from './commands/tidy.js';
import { processCommand } from './commands/process.js';
import { updateCommand } from './commands/update.js';
import { downloadCommand } from './commands/download.js';
import { previewCommand } from './commands/preview.js';
import { printError } from './lib/output.js';
import type { GlobalOptions } from './lib/runOperation.js';
import { TIDY_FLAGS } from './lib/tidyFlags.js';

const program = new Command();

program
  .name('reelkeeper')
  .description('Keep a local video archive in step with its sources')
  .version('0.1.0')
  .option('--json', 'Output the final result as JSON')
  .option('--no-commands', 'Do not echo child process commands');

const globals = (): GlobalOptions => program.opts<GlobalOptions>();

// ============================================
// ARCHIVE COMMANDS
// ============================================

program
  .command('refresh [container]')
  .description('Match files on disk with the registry (whole archive, or one container by name or id)')
  .action((container: string | undefined) => refreshCommand(container, globals()));

const tidy = program
  .command('tidy [container]')
  .description('Check and clean up files in the archive');
for (const { flag, description } of TIDY_FLAGS) {
  tidy.option(flag, description);
}
tidy.action((container: string | undefined, options: TidyCommandOptions) =>
  tidyCommand(container, options, globals())
);

program
  .command('download [ids...]')
  .description('Download new videos (all channels and playlists, or the given ids)')
  .option('-a, --args <string>', 'Extra downloader arguments, e.g. "-f best"')
  .action((ids: string[], options: { args?: string }) => downloadCommand(ids, options, globals()));

// ============================================
// FFMPEG COMMANDS
// ============================================

program
  .command('process <ids...>')
  .description('Run videos through an FFmpeg recipe')
  .option('-o, --options <file>', 'Recipe file (JSON); defaults apply when omitted')
  .option('--clip-folder', 'Put split clips in a new folder per video')
  .action((ids: string[], options: { options?: string; clipFolder?: boolean }) =>
    processCommand(ids, options, globals())
  );

program
  .command('preview')
  .description('Print the command a recipe compiles to')
  .option('-o, --options <file>', 'Recipe file (JSON)')
  .action((options: { options?: string }) => previewCommand(options, globals()));

// ============================================
// MAINTENANCE COMMANDS
// ============================================

program
  .command('update')
  .description('Install or update the downloader')
  .option('--ffmpeg', 'Install or update FFmpeg instead (MSYS2 only)')
  .action((options: { ffmpeg?: boolean }) => updateCommand(options, globals()));

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.log('Run', chalk.cyan('reelkeeper --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  printError(describeError(error));
  process.exit(1);
});
