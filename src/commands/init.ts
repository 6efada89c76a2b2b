/**
 * Init Command
 *
 * Write .twinview/config.yaml with the built-in defaults and a commented
 * example of a user-defined link.
 */

import { mkdir, writeFile, access } from 'fs/promises';
import { dirname } from 'path';
import chalk from 'chalk';
import yaml from 'js-yaml';
import { DEFAULT_CONFIG, configPath } from '../config/config-loader.js';

interface InitOptions {
  force?: boolean;
  cwd?: string;
}

const EXAMPLE = `
# Example user-defined link (its inverse, rb-to-org, is registered automatically):
#
# configurations:
#   - name: org-to-rb
#     sourceExtension: org
#     targetExtension: rb
#     commentPrefix: "# "
#     regionStartPattern: "^#\\\\+BEGIN_SRC ruby"
#     regionEndPattern: "^#\\\\+END_SRC"
#     caseSensitive: false
#     direction: uncommented
`;

export async function initCommand(options: InitOptions): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const path = configPath(cwd);

  console.log(chalk.cyan('\n  Initializing twinview...\n'));

  try {
    await access(path);
    if (!options.force) {
      console.log(chalk.yellow('  twinview already initialized.'));
      console.log(chalk.dim('  Use --force to reinitialize.\n'));
      return;
    }
    console.log(chalk.dim('  Reinitializing (--force)...\n'));
  } catch {
    // Not initialized, continue
  }

  await mkdir(dirname(path), { recursive: true });

  const configYaml = yaml.dump(DEFAULT_CONFIG, {
    indent: 2,
    lineWidth: 100,
    noRefs: true,
  });

  await writeFile(path, `# twinview configuration\n\n${configYaml}${EXAMPLE}`);
  console.log(chalk.green('  ✓ Created .twinview/config.yaml'));

  console.log(chalk.dim('\n  Next steps:'));
  console.log(chalk.dim('    1. Review .twinview/config.yaml'));
  console.log(chalk.dim('    2. Run `twinview clone <file.org>` to generate the source view\n'));
}
