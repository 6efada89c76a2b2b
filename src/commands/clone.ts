/**
 * Clone Command
 *
 * Regenerate the linked view of each matching file.
 */

import chalk from 'chalk';
import { buildCatalog, loadConfig, resolveInitializer } from '../config/config-loader.js';
import { expandPatterns, openFileLink, saveTarget } from '../sync/files.js';

interface CloneOptions {
  config?: string;
  out?: string;
  dryRun?: boolean;
  cwd?: string;
}

export async function cloneCommand(patterns: string[], options: CloneOptions): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig(cwd);
  const catalog = buildCatalog(config);
  const files = await expandPatterns(patterns, cwd);

  console.log(chalk.cyan('\n  twinview clone\n'));

  if (options.out && files.length > 1) {
    console.log(chalk.red('  ✗ --out needs exactly one source file'));
    process.exitCode = 1;
    return;
  }

  let failures = 0;
  for (const file of files) {
    let entryName = options.config ?? '(default)';
    try {
      const entry = resolveInitializer(catalog, config, file, options.config);
      entryName = entry.name;
      const fileLink = await openFileLink(file, entry, { cwd, out: options.out });
      const report = fileLink.link.clone();

      for (const issue of report.issues) {
        console.log(chalk.yellow(`  ⚠ ${file}: ${issue.message}`));
      }

      if (options.dryRun) {
        console.log(chalk.dim(`  [Dry run] ${file} → ${fileLink.targetPath} (${entry.name}):`));
        console.log(fileLink.link.thatBuffer.content);
        continue;
      }

      if (!report.changed && fileLink.targetExists) {
        console.log(chalk.dim(`  = ${fileLink.targetPath} is up to date`));
        continue;
      }

      await saveTarget(fileLink);
      console.log(chalk.green(`  ✓ ${file} → ${fileLink.targetPath}`) + chalk.dim(` (${entry.name}, ${report.lines} lines)`));
    } catch (error) {
      failures++;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`  ✗ ${file} [${entryName}]: ${reason}`));
    }
  }

  if (failures > 0) {
    process.exitCode = 1;
  }
  console.log('');
}
