/**
 * List Command
 *
 * Print every named configuration, built-in and user-defined.
 */

import chalk from 'chalk';
import { buildCatalog, loadConfig } from '../config/config-loader.js';

interface ListOptions {
  cwd?: string;
}

export async function listCommand(options: ListOptions = {}): Promise<void> {
  const config = await loadConfig(options.cwd ?? process.cwd());
  const catalog = buildCatalog(config);
  const defaults = new Set(Object.values(config.defaults));

  console.log(chalk.cyan('\n  twinview configurations\n'));

  const width = Math.max(...catalog.map(e => e.name.length));
  for (const entry of catalog) {
    const marker = defaults.has(entry.name) ? chalk.green('*') : ' ';
    const route = chalk.dim(`.${entry.sourceExtension} → .${entry.targetExtension}`);
    console.log(`  ${marker} ${entry.name.padEnd(width)}  ${route}  ${entry.description}`);
  }

  console.log(chalk.dim('\n  * default for its source extension\n'));
}
