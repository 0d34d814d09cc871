/**
 * Template Renderer
 *
 * Renders named templates from the `templates/` directory with nunjucks.
 * Anything that can turn (name, data) into text can stand in for it.
 */

import { fileURLToPath } from 'url';
import nunjucks from 'nunjucks';
import type { Environment } from 'nunjucks';

export type TemplateData = Record<string, unknown>;

export interface TemplateRenderer {
  /** Render a template, throwing `RenderError` on failure. */
  render(templateName: string, data: TemplateData): string;
}

export class RenderError extends Error {
  readonly templateName: string;

  constructor(templateName: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to render template "${templateName}": ${detail}`, { cause });
    this.name = 'RenderError';
    this.templateName = templateName;
  }
}

export const TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

export class NunjucksRenderer implements TemplateRenderer {
  private env: Environment;

  constructor(templatesDir: string = TEMPLATES_DIR) {
    this.env = new nunjucks.Environment(new nunjucks.FileSystemLoader(templatesDir), {
      autoescape: true,
      trimBlocks: true,
      lstripBlocks: true,
    });
  }

  render(templateName: string, data: TemplateData): string {
    try {
      return this.env.render(templateName, data);
    } catch (error) {
      throw new RenderError(templateName, error);
    }
  }
}

let defaultRenderer: NunjucksRenderer | null = null;

/**
 * Shared renderer over the bundled templates, created on first use.
 */
export function getDefaultRenderer(): TemplateRenderer {
  if (!defaultRenderer) {
    defaultRenderer = new NunjucksRenderer();
  }
  return defaultRenderer;
}
