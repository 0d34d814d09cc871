#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { preprocessCommand } from './commands/preprocess.js';
import { renderCommand } from './commands/render.js';
import { supportsCommand } from './commands/supports.js';

const program = new Command();

program
  .name('mdbook-pocket-reference')
  .description('mdbook preprocessor for pocket reference headers and external links')
  .version('0.1.0')
  .action(preprocessCommand);

program
  .command('supports <renderer>')
  .description('Tell mdbook whether a renderer is supported (always yes)')
  .action(supportsCommand);

program
  .command('render <patterns...>')
  .description('Expand directives and links in markdown files outside of mdbook')
  .option('-o, --out-dir <dir>', 'Directory for rendered files', 'rendered')
  .option('--dry-run', 'Print rendered files instead of writing them')
  .option('--no-footer', 'Do not append the footer')
  .action(renderCommand);

program
  .command('init')
  .description('Write pocket-reference.yaml with default settings')
  .option('-f, --force', 'Overwrite an existing pocket-reference.yaml')
  .action(initCommand);

// With no subcommand mdbook is driving us over stdin/stdout
await program.parseAsync();
