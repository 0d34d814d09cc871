/**
 * Init Command
 *
 * Write a pocket-reference.yaml with the default settings.
 */

import { access, writeFile } from 'fs/promises';
import { join } from 'path';
import chalk from 'chalk';
import { CONFIG_FILE_NAME, dumpDefaultConfig, PREPROCESSOR_NAME } from '../config/config.js';

interface InitOptions {
  force?: boolean;
}

export async function initCommand(options: InitOptions): Promise<void> {
  const configPath = join(process.cwd(), CONFIG_FILE_NAME);

  console.log(chalk.cyan('\n  Initializing pocket reference settings...\n'));

  try {
    await access(configPath);
    if (!options.force) {
      console.log(chalk.yellow(`  ${CONFIG_FILE_NAME} already exists.`));
      console.log(chalk.dim('  Use --force to overwrite it.\n'));
      return;
    }
    console.log(chalk.dim('  Overwriting (--force)...\n'));
  } catch {
    // Not there yet
  }

  await writeFile(configPath, dumpDefaultConfig());
  console.log(chalk.green(`  ✓ Created ${CONFIG_FILE_NAME}`));

  console.log(chalk.dim('\n  Next steps:'));
  console.log(chalk.dim('    1. Add to book.toml:'));
  console.log(chalk.dim(`         [preprocessor.${PREPROCESSOR_NAME}]`));
  console.log(chalk.dim('         command = "mdbook-pocket-reference"'));
  console.log(chalk.dim('    2. Put {{ #aipr_header }} at the top of a chapter\n'));
}
