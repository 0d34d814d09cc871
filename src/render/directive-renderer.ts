/**
 * Directive Renderer
 *
 * Builds template data for directives and links and renders it.
 */

import type { PocketReferenceConfig } from '../config/config.js';
import type { Directive } from '../markers/directive-resolver.js';
import type { HeaderSettings } from '../markers/settings-parser.js';
import type { LinkMatch } from '../markers/link-matcher.js';
import type { TemplateData, TemplateRenderer } from './template-renderer.js';

export const HEADER_TEMPLATE = 'aipr-header.njk';
export const LINK_TEMPLATE = 'md-link.njk';
export const FOOTER_TEMPLATE = 'footer.njk';

export interface RenderContext {
  renderer: TemplateRenderer;
  /** Words in the chapter before any replacement */
  wordCount: number;
  config: PocketReferenceConfig;
}

export function formatReadingTime(wordCount: number, wordsPerMinute: number): string {
  return `${Math.round(wordCount / wordsPerMinute)} min`;
}

export function buildHeaderData(settings: HeaderSettings, ctx: Omit<RenderContext, 'renderer'>): TemplateData {
  const data: TemplateData = {
    submit_issue: settings.submitIssue,
    issue_url: ctx.config.issueUrl,
  };

  if (settings.colabPath !== null) {
    data.colab_nb = {
      path: settings.colabPath,
      url: `${ctx.config.colabBaseUrl}${settings.colabPath}`,
    };
  }

  if (settings.readingTime) {
    data.reading_time = { value: formatReadingTime(ctx.wordCount, ctx.config.wordsPerMinute) };
  }

  return data;
}

export function renderDirective(directive: Directive, ctx: RenderContext): string {
  switch (directive.kind) {
    case 'header':
      return ctx.renderer.render(HEADER_TEMPLATE, buildHeaderData(directive.settings, ctx));
  }
}

export function renderLink(link: Pick<LinkMatch, 'text' | 'url'>, renderer: TemplateRenderer): string {
  return renderer.render(LINK_TEMPLATE, { text: link.text, url: link.url });
}

export function renderFooter(renderer: TemplateRenderer): string {
  return renderer.render(FOOTER_TEMPLATE, {});
}
