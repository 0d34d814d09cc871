import { describe, it, expect } from 'vitest';
import { findLinks, hasApprovedScheme, isEscapedLink } from './link-matcher.js';

describe('findLinks', () => {
  it('should find an http(s) link with its offsets', () => {
    const content =
      '{{ #aipr_header }} {{ #aipr_header colab=nlp/lora.ipynb }} Some random [text with](https://fake.io) and more text ...';
    expect([...findLinks(content)]).toEqual([
      {
        start: 71,
        end: 99,
        rawText: '[text with](https://fake.io)',
        text: 'text with',
        url: 'https://fake.io',
      },
    ]);
  });

  it('should find nothing in plain text', () => {
    expect([...findLinks('Some random text without link...')]).toEqual([]);
  });

  it('should skip links without an http(s) scheme', () => {
    const links = [...findLinks('[docs](ftp://files.test) [local](./intro.md) [site](http://site.test)')];
    expect(links.map(l => l.text)).toEqual(['site']);
  });

  it('should skip an escaped link with a relative target', () => {
    expect([...findLinks('Some random \\[text with\\](test)')]).toEqual([]);
  });

  it('should allow escaped closing brackets in the text', () => {
    const [link] = findLinks('[a\\]b](https://x.test)');
    expect(link.text).toBe('a\\]b');
    expect(link.url).toBe('https://x.test');
  });

  it('should end the url at the first closing paren', () => {
    const [link] = findLinks('[wiki](https://x.test/a_(b)) tail');
    expect(link.url).toBe('https://x.test/a_(b');
    expect(link.end).toBe(27);
  });

  it('should start at the leftmost opening bracket', () => {
    const [link] = findLinks('[outer [inner](https://a.test)');
    expect(link.text).toBe('outer [inner');
    expect(link.start).toBe(0);
  });

  it('should not report links swallowed by a skipped link', () => {
    expect([...findLinks('[x](see [y](https://a.test))')]).toEqual([]);
  });
});

describe('hasApprovedScheme', () => {
  it('should accept only http and https prefixes', () => {
    expect(hasApprovedScheme('https://x.test')).toBe(true);
    expect(hasApprovedScheme('http://x.test')).toBe(true);
    expect(hasApprovedScheme('HTTPS://x.test')).toBe(false);
    expect(hasApprovedScheme('mailto:someone@x.test')).toBe(false);
    expect(hasApprovedScheme('')).toBe(false);
  });
});

describe('isEscapedLink', () => {
  it('should treat a preceding backslash or bang as an escape', () => {
    const escaped = '\\[a](https://x.test)';
    const [link] = findLinks(escaped);
    expect(isEscapedLink(escaped, link)).toBe(true);

    const image = '![logo](https://x.test/logo.png)';
    const [img] = findLinks(image);
    expect(isEscapedLink(image, img)).toBe(true);
  });

  it('should not treat other characters or the document start as an escape', () => {
    expect(isEscapedLink('[a](https://x.test)', { start: 0, end: 19 })).toBe(false);
    expect(isEscapedLink('see [a](https://x.test)', { start: 4, end: 23 })).toBe(false);
  });
});
