/**
 * Transform
 *
 * Chapter pipeline: directive markers first, then links, each pass over
 * the output of the one before.
 */

import { findDirectives } from '../markers/directive-resolver.js';
import { findLinks, isEscapedLink } from '../markers/link-matcher.js';
import { replaceSpans } from '../markers/span-replacer.js';
import { RenderError, type TemplateRenderer } from '../render/template-renderer.js';
import { renderDirective, renderFooter, renderLink, type RenderContext } from '../render/directive-renderer.js';
import type { PocketReferenceConfig } from '../config/config.js';
import { countWords } from './word-count.js';

export type TransformResult =
  | { success: true; content: string }
  | { success: false; error: RenderError };

export function replaceAllDirectives(content: string, ctx: RenderContext): string {
  return replaceSpans(content, findDirectives(content), match => renderDirective(match.directive, ctx));
}

export function replaceAllLinks(content: string, renderer: TemplateRenderer): string {
  return replaceSpans(content, findLinks(content), link =>
    isEscapedLink(content, link) ? link.rawText : renderLink(link, renderer)
  );
}

export function replaceAll(content: string, ctx: RenderContext): string {
  return replaceAllLinks(replaceAllDirectives(content, ctx), ctx.renderer);
}

export interface ChapterOptions {
  renderer: TemplateRenderer;
  config: PocketReferenceConfig;
}

/**
 * Run the full pipeline on one chapter body, footer included.
 * Render failures come back as a failed result; other errors are thrown.
 */
export function transformChapter(content: string, options: ChapterOptions): TransformResult {
  const ctx: RenderContext = { ...options, wordCount: countWords(content) };

  try {
    let transformed = replaceAll(content, ctx);
    if (options.config.footer) {
      transformed += renderFooter(options.renderer);
    }
    return { success: true, content: transformed };
  } catch (error) {
    if (error instanceof RenderError) {
      return { success: false, error };
    }
    throw error;
  }
}
