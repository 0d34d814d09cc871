/**
 * Preprocess Command
 *
 * Default action when mdbook runs the preprocessor: read `[context, book]`
 * from stdin, expand every chapter, write the book back to stdout.
 * Diagnostics go to stderr since stdout carries the book.
 */

import chalk from 'chalk';
import { loadConfig, PREPROCESSOR_NAME, type ResolvedConfig } from '../config/config.js';
import {
  getPreprocessorTable,
  parsePreprocessorInput,
  preprocessBook,
  SUPPORTED_MDBOOK_VERSION,
  type PreprocessorInput,
} from '../preprocess/book.js';
import { getDefaultRenderer } from '../render/template-renderer.js';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

export async function preprocessCommand(): Promise<void> {
  let input: PreprocessorInput;
  try {
    input = parsePreprocessorInput(await readStdin());
  } catch (error) {
    console.error(chalk.red(`  ✗ ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }

  const { context, book } = input;

  if (!SUPPORTED_MDBOOK_VERSION.test(context.mdbook_version)) {
    console.error(chalk.yellow(
      `  ⚠ ${PREPROCESSOR_NAME} was built for mdbook 0.4.x but is being called from mdbook ${context.mdbook_version}`
    ));
  }

  let resolved: ResolvedConfig;
  try {
    resolved = await loadConfig(context.root, getPreprocessorTable(context, PREPROCESSOR_NAME));
  } catch (error) {
    console.error(chalk.red(`  ✗ ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }

  for (const warning of resolved.warnings) {
    console.error(chalk.yellow(`  ⚠ ${warning}`));
  }

  const result = preprocessBook(book, { renderer: getDefaultRenderer(), config: resolved.config });
  if (!result.success) {
    console.error(chalk.red(`  ✗ Chapter "${result.chapter}": ${result.error.message}`));
    process.exit(1);
  }

  console.error(chalk.dim(`  ${PREPROCESSOR_NAME}: expanded ${result.chapters} chapters`));
  process.stdout.write(JSON.stringify(result.book));
}
