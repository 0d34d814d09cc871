/**
 * Book
 *
 * mdbook preprocessor protocol: the `[context, book]` JSON mdbook writes to
 * stdin, and the walk over every chapter of the book.
 */

import { isRecord } from '../config/config.js';
import type { RenderError } from '../render/template-renderer.js';
import { transformChapter, type ChapterOptions } from './transform.js';

export interface Chapter {
  name: string;
  content: string;
  sub_items: BookItem[];
  [field: string]: unknown;
}

export type BookItem = { Chapter: Chapter } | { PartTitle: string } | 'Separator';

export interface Book {
  sections: BookItem[];
  [field: string]: unknown;
}

export interface PreprocessorContext {
  root: string;
  renderer: string;
  mdbook_version: string;
  config: Record<string, unknown>;
  [field: string]: unknown;
}

export interface PreprocessorInput {
  context: PreprocessorContext;
  book: Book;
}

export class PreprocessorInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreprocessorInputError';
  }
}

export type BookResult =
  | { success: true; book: Book; chapters: number }
  | { success: false; chapter: string; error: RenderError };

export const SUPPORTED_MDBOOK_VERSION = /^0\.4\./;

function isChapter(value: unknown): value is Chapter {
  return (
    isRecord(value) &&
    typeof value.name === 'string' &&
    typeof value.content === 'string' &&
    Array.isArray(value.sub_items) &&
    value.sub_items.every(isBookItem)
  );
}

function isBookItem(value: unknown): value is BookItem {
  if (value === 'Separator') return true;
  if (!isRecord(value)) return false;
  if ('Chapter' in value) return isChapter(value.Chapter);
  return typeof value.PartTitle === 'string';
}

function isContext(value: unknown): value is PreprocessorContext {
  return (
    isRecord(value) &&
    typeof value.root === 'string' &&
    typeof value.renderer === 'string' &&
    typeof value.mdbook_version === 'string' &&
    isRecord(value.config)
  );
}

function isBook(value: unknown): value is Book {
  return isRecord(value) && Array.isArray(value.sections) && value.sections.every(isBookItem);
}

/**
 * Parse the JSON mdbook sends to a preprocessor.
 */
export function parsePreprocessorInput(raw: string): PreprocessorInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PreprocessorInputError(`Preprocessor input is not valid JSON: ${detail}`);
  }

  if (!Array.isArray(parsed) || parsed.length !== 2) {
    throw new PreprocessorInputError('Preprocessor input must be a [context, book] array');
  }

  const context: unknown = parsed[0];
  const book: unknown = parsed[1];
  if (!isContext(context)) {
    throw new PreprocessorInputError('Preprocessor context is missing root, renderer, mdbook_version or config');
  }
  if (!isBook(book)) {
    throw new PreprocessorInputError('Book has no valid sections');
  }

  return { context, book };
}

/**
 * The `[preprocessor.pocket-reference]` table of book.toml, if any.
 */
export function getPreprocessorTable(context: PreprocessorContext, name: string): Record<string, unknown> {
  const preprocessors = context.config.preprocessor;
  if (!isRecord(preprocessors)) return {};
  const table = preprocessors[name];
  return isRecord(table) ? table : {};
}

/**
 * Transform every chapter of the book, depth first.
 * The first render failure stops the walk and names the chapter.
 */
export function preprocessBook(book: Book, options: ChapterOptions): BookResult {
  let chapters = 0;

  const walk = (items: BookItem[]): BookItem[] | { chapter: string; error: RenderError } => {
    const out: BookItem[] = [];
    for (const item of items) {
      if (item === 'Separator' || !('Chapter' in item)) {
        out.push(item);
        continue;
      }

      const chapter = item.Chapter;
      const result = transformChapter(chapter.content, options);
      if (!result.success) {
        return { chapter: chapter.name, error: result.error };
      }

      const subItems = walk(chapter.sub_items);
      if (!Array.isArray(subItems)) return subItems;

      chapters++;
      out.push({ Chapter: { ...chapter, content: result.content, sub_items: subItems } });
    }
    return out;
  };

  const sections = walk(book.sections);
  if (!Array.isArray(sections)) {
    return { success: false, ...sections };
  }
  return { success: true, book: { ...book, sections }, chapters };
}
