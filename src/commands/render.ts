/**
 * Render Command
 *
 * Expand directives and links in markdown files outside of an mdbook build.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import chalk from 'chalk';
import { glob } from 'glob';
import { CONFIG_FILE_NAME, loadConfig, type ResolvedConfig } from '../config/config.js';
import { transformChapter, type ChapterOptions } from '../preprocess/transform.js';
import { getDefaultRenderer, type RenderError } from '../render/template-renderer.js';

export interface RenderOptions {
  outDir: string;
  dryRun?: boolean;
  /** False with --no-footer */
  footer: boolean;
}

export interface RenderedFile {
  file: string;
  content: string;
}

export type RenderFilesResult =
  | { success: true; files: RenderedFile[] }
  | { success: false; file: string; error: RenderError };

const IGNORE = ['**/node_modules/**', 'book/**'];

/**
 * Glob pattern covering `outDir` when it lies inside `cwd`, so earlier
 * output is never rendered again.
 */
export function outDirIgnore(cwd: string, outDir: string): string | null {
  const rel = relative(cwd, resolve(cwd, outDir));
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
  return `${rel.split(sep).join('/')}/**`;
}

/**
 * Expand every markdown file matching `patterns` under `cwd`.
 * Files are returned in path order; the first render failure stops the run.
 */
export async function renderFiles(
  cwd: string,
  patterns: string[],
  options: ChapterOptions,
  ignore: string[] = []
): Promise<RenderFilesResult> {
  const matches = await glob(patterns, { cwd, nodir: true, ignore: [...IGNORE, ...ignore] });
  const files: RenderedFile[] = [];

  for (const file of matches.sort()) {
    const source = await readFile(join(cwd, file), 'utf-8');
    const result = transformChapter(source, options);
    if (!result.success) {
      return { success: false, file, error: result.error };
    }
    files.push({ file, content: result.content });
  }

  return { success: true, files };
}

export async function renderCommand(patterns: string[], options: RenderOptions): Promise<void> {
  const cwd = process.cwd();

  console.log(chalk.cyan('\n  Pocket Reference Render\n'));

  let resolved: ResolvedConfig;
  try {
    resolved = await loadConfig(cwd);
  } catch (error) {
    console.log(chalk.red(`  ✗ ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  }

  for (const warning of resolved.warnings) {
    console.log(chalk.yellow(`  ⚠ ${warning}`));
  }

  const config = { ...resolved.config, footer: resolved.config.footer && options.footer };
  const outDirPattern = outDirIgnore(cwd, options.outDir);
  const result = await renderFiles(
    cwd,
    patterns,
    { renderer: getDefaultRenderer(), config },
    outDirPattern ? [outDirPattern] : []
  );

  if (!result.success) {
    console.log(chalk.red(`  ✗ ${result.file}: ${result.error.message}`));
    process.exit(1);
  }

  if (result.files.length === 0) {
    console.log(chalk.yellow('  No files matched.'));
    console.log(chalk.dim(`  Patterns: ${patterns.join(', ')}\n`));
    return;
  }

  if (options.dryRun) {
    for (const { file, content } of result.files) {
      console.log(chalk.dim(`  [Dry run] ${file}:`));
      console.log(content);
    }
    return;
  }

  for (const { file, content } of result.files) {
    const target = join(cwd, options.outDir, file);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
    console.log(chalk.green(`  ✓ ${join(options.outDir, file)}`));
  }

  console.log(chalk.dim(`\n  ${result.files.length} files rendered (settings from ${CONFIG_FILE_NAME} if present)\n`));
}
