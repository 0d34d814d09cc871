import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../config/config.js';
import { RenderError, type TemplateData, type TemplateRenderer } from '../render/template-renderer.js';
import type { RenderContext } from '../render/directive-renderer.js';
import { replaceAll, replaceAllLinks, transformChapter } from './transform.js';

interface RenderCall {
  name: string;
  data: TemplateData;
}

/** Records each call and renders it as `<n>`. */
function recordingRenderer(): TemplateRenderer & { calls: RenderCall[] } {
  const calls: RenderCall[] = [];
  return {
    calls,
    render(name, data) {
      calls.push({ name, data });
      return `<${calls.length}>`;
    },
  };
}

/** Renders every template as `<template-name>`. */
const namingRenderer: TemplateRenderer = {
  render: name => `<${name}>`,
};

function contextWith(renderer: TemplateRenderer, wordCount = 201): RenderContext {
  return { renderer, wordCount, config: DEFAULT_CONFIG };
}

describe('replaceAll', () => {
  it('should replace directives first and then links', () => {
    const renderer = recordingRenderer();
    const output = replaceAll(
      '{{ #aipr_header }} {{ #aipr_header colab=nlp/lora.ipynb }} text [a](https://x.io)',
      contextWith(renderer)
    );

    expect(output).toBe('<1> <2> text <3>');
    expect(renderer.calls).toEqual([
      {
        name: 'aipr-header.njk',
        data: { submit_issue: true, issue_url: DEFAULT_CONFIG.issueUrl, reading_time: { value: '1 min' } },
      },
      {
        name: 'aipr-header.njk',
        data: {
          submit_issue: true,
          issue_url: DEFAULT_CONFIG.issueUrl,
          colab_nb: { path: 'nlp/lora.ipynb', url: `${DEFAULT_CONFIG.colabBaseUrl}nlp/lora.ipynb` },
          reading_time: { value: '1 min' },
        },
      },
      { name: 'md-link.njk', data: { text: 'a', url: 'https://x.io' } },
    ]);
  });

  it('should return text without markers unchanged', () => {
    const renderer = recordingRenderer();
    const text = '# Title\n\nJust prose, {braces} and [brackets].\n';
    expect(replaceAll(text, contextWith(renderer))).toBe(text);
    expect(renderer.calls).toEqual([]);
  });

  it('should echo escaped markers byte for byte', () => {
    const renderer = recordingRenderer();
    const text = '\\{{#aipr_header}}\nSee \\[x](https://y.io) and ![x](https://y.io)';
    expect(replaceAll(text, contextWith(renderer))).toBe(text);
    expect(renderer.calls).toEqual([]);
  });

  it('should leave unknown directives and non-http links alone', () => {
    const renderer = recordingRenderer();
    const text = '{{#my_author ar.rs}} {{#aipr_header}} [intro](./intro.md) [mail](mailto:someone@x.test)';
    expect(replaceAll(text, contextWith(renderer))).toBe(text);
    expect(renderer.calls).toEqual([]);
  });

  it('should propagate render failures', () => {
    const failing: TemplateRenderer = {
      render: name => {
        throw new RenderError(name, new Error('bad template'));
      },
    };
    expect(() => replaceAll('{{ #aipr_header }}', contextWith(failing))).toThrow(
      'Failed to render template "aipr-header.njk": bad template'
    );
  });
});

describe('replaceAllLinks', () => {
  it('should check the escape character in the text being scanned', () => {
    expect(replaceAllLinks('![a](https://x.io) [b](https://x.io)', namingRenderer)).toBe(
      '![a](https://x.io) <md-link.njk>'
    );
  });
});

describe('transformChapter', () => {
  it('should append the footer after replacements', () => {
    const result = transformChapter('{{ #aipr_header }}\nHello', { renderer: namingRenderer, config: DEFAULT_CONFIG });
    expect(result).toEqual({ success: true, content: '<aipr-header.njk>\nHello<footer.njk>' });
  });

  it('should skip the footer when disabled', () => {
    const result = transformChapter('Hello', {
      renderer: namingRenderer,
      config: { ...DEFAULT_CONFIG, footer: false },
    });
    expect(result).toEqual({ success: true, content: 'Hello' });
  });

  it('should count words on the chapter before replacement', () => {
    const renderer = recordingRenderer();
    transformChapter('one two three {{ #aipr_header }}', {
      renderer,
      config: { ...DEFAULT_CONFIG, wordsPerMinute: 2, footer: false },
    });
    expect(renderer.calls[0].data.reading_time).toEqual({ value: '2 min' });
  });

  it('should return render failures as a failed result', () => {
    const error = new RenderError('md-link.njk', new Error('bad template'));
    const failing: TemplateRenderer = {
      render: () => {
        throw error;
      },
    };
    expect(transformChapter('[a](https://x.io)', { renderer: failing, config: DEFAULT_CONFIG })).toEqual({
      success: false,
      error,
    });
  });

  it('should rethrow errors that are not render failures', () => {
    const broken: TemplateRenderer = {
      render: () => {
        throw new TypeError('not a render error');
      },
    };
    expect(() => transformChapter('[a](https://x.io)', { renderer: broken, config: DEFAULT_CONFIG })).toThrow(
      TypeError
    );
  });
});
