/**
 * Diff Command
 *
 * Show the diff between a file's current linked view and what `clone`
 * would write.
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import { execFileSync } from 'child_process';
import chalk from 'chalk';
import { buildCatalog, loadConfig, resolveInitializer } from '../config/config-loader.js';
import { openFileLink } from '../sync/files.js';

interface DiffOptions {
  config?: string;
  cwd?: string;
}

function printDiff(diff: string): void {
  for (const line of diff.split('\n')) {
    if (line.startsWith('+++') || line.startsWith('---')) {
      console.log(chalk.dim(line));
    } else if (line.startsWith('+')) {
      console.log(chalk.green(line));
    } else if (line.startsWith('-')) {
      console.log(chalk.red(line));
    } else if (line.startsWith('@@')) {
      console.log(chalk.cyan(line));
    } else {
      console.log(line);
    }
  }
}

export async function diffCommand(file: string, options: DiffOptions): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig(cwd);
  const entry = resolveInitializer(buildCatalog(config), config, file, options.config);
  const fileLink = await openFileLink(file, entry, { cwd });

  console.log(chalk.cyan('\n  twinview diff\n'));
  console.log(chalk.dim(`  ${file} → ${fileLink.targetPath} (${entry.name})\n`));

  const report = fileLink.link.clone();
  for (const issue of report.issues) {
    console.log(chalk.yellow(`  ⚠ ${file}: ${issue.message}`));
  }

  if (!fileLink.targetExists) {
    console.log(chalk.dim(`  ${fileLink.targetPath} does not exist yet.`));
    console.log(chalk.dim('  Run `twinview clone` to create it.\n'));
    return;
  }

  const tempDir = await mkdtemp(join(tmpdir(), 'twinview-'));
  const proposed = join(tempDir, 'proposed');
  try {
    await writeFile(proposed, fileLink.link.thatBuffer.content);
    // diff exits 0 when identical, 1 when the files differ
    execFileSync('diff', ['-u', resolve(cwd, fileLink.targetPath), proposed], {
      encoding: 'utf-8',
      maxBuffer: 10 * 1024 * 1024,
    });
    console.log(chalk.green('  ✓ No differences - the linked view is up to date.\n'));
  } catch (error: unknown) {
    const execError = error as { status?: number; stdout?: string };
    if (execError.status === 1 && execError.stdout) {
      printDiff(execError.stdout);
      console.log(chalk.cyan('\n  To apply these changes:'));
      console.log(chalk.dim(`    twinview clone ${file}\n`));
    } else {
      console.error(chalk.red(`  ✗ Error running diff: ${String(error)}`));
      process.exitCode = 1;
    }
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
}
