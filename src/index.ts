#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { initCommand } from './commands/init.js';
import { listCommand } from './commands/list.js';
import { cloneCommand } from './commands/clone.js';
import { checkCommand } from './commands/check.js';
import { diffCommand } from './commands/diff.js';

const program = new Command();

program
  .name('twinview')
  .description('Keep a literate document and its source-code view in step')
  .version('0.1.0');

program
  .command('init')
  .description('Write .twinview/config.yaml with the default links')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(initCommand);

program
  .command('list')
  .description('List the named configurations')
  .action(() => listCommand());

program
  .command('clone <patterns...>')
  .description('Regenerate the linked view of each file')
  .option('-c, --config <name>', 'Configuration to use (defaults by file extension)')
  .option('-o, --out <path>', 'Target path (defaults to the source path with the target extension)')
  .option('--dry-run', 'Print the linked view instead of writing it')
  .action(cloneCommand);

program
  .command('check <patterns...>')
  .description('Verify that each file survives a transform and its inverse')
  .option('-c, --config <name>', 'Configuration to use (defaults by file extension)')
  .action(checkCommand);

program
  .command('diff <file>')
  .description('Show what clone would change in the linked view')
  .option('-c, --config <name>', 'Configuration to use (defaults by file extension)')
  .action(diffCommand);

program.parseAsync().catch((error: unknown) => {
  const reason = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`\n  ✗ ${reason}\n`));
  process.exitCode = 1;
});

if (!process.argv.slice(2).length) {
  console.log(chalk.cyan('\n  twinview - linked literate views\n'));
  program.outputHelp();
}
