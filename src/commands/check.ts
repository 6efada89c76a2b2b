/**
 * Check Command
 *
 * Validate that each file survives a round trip: transform with its
 * configuration, transform back with the inverse, compare.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import chalk from 'chalk';
import { buildCatalog, loadConfig, resolveInitializer } from '../config/config-loader.js';
import { createStrategy } from '../engine/strategy.js';
import { splitLines } from '../engine/text.js';
import { expandPatterns } from '../sync/files.js';
import { deriveTargetPath } from '../sync/paths.js';

interface CheckOptions {
  config?: string;
  cwd?: string;
}

export interface RoundTripResult {
  ok: boolean;
  /** One-based line of the first difference. */
  line?: number;
  expected?: string;
  actual?: string;
}

export function compareRoundTrip(original: string, restored: string): RoundTripResult {
  if (original === restored) return { ok: true };

  const a = splitLines(original).lines;
  const b = splitLines(restored).lines;
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return { ok: false, line: i + 1, expected: a[i] ?? '<end of file>', actual: b[i] ?? '<end of file>' };
    }
  }
  // differ only in line endings or the final terminator
  return { ok: false, line: length, expected: JSON.stringify(original.slice(-2)), actual: JSON.stringify(restored.slice(-2)) };
}

export async function checkCommand(patterns: string[], options: CheckOptions): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig(cwd);
  const catalog = buildCatalog(config);
  const files = await expandPatterns(patterns, cwd);

  console.log(chalk.cyan('\n  twinview check\n'));

  let failures = 0;
  for (const file of files) {
    try {
      const entry = resolveInitializer(catalog, config, file, options.config);
      const original = await readFile(resolve(cwd, file), 'utf-8');
      const strategy = createStrategy(entry.create(file, deriveTargetPath(file, entry.targetExtension)));
      const restored = strategy.invert().transform(strategy.transform(original));
      const result = compareRoundTrip(original, restored);

      if (result.ok) {
        console.log(chalk.green(`  ✓ ${file}`) + chalk.dim(` (${entry.name} ⇄ ${strategy.invert().config.name})`));
        continue;
      }

      failures++;
      console.log(chalk.red(`  ✗ ${file}: round trip differs at line ${result.line}`));
      console.log(chalk.dim(`    expected: ${result.expected}`));
      console.log(chalk.dim(`    actual:   ${result.actual}`));
    } catch (error) {
      failures++;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`  ✗ ${file}: ${reason}`));
    }
  }

  if (failures > 0) {
    process.exitCode = 1;
    console.log(chalk.yellow(`\n  ${failures} of ${files.length} file(s) did not round-trip.\n`));
  } else {
    console.log(chalk.green(`\n  All ${files.length} file(s) round-trip.\n`));
  }
}
