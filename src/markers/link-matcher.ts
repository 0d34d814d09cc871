/**
 * Link Matcher
 *
 * Finds markdown links `[text](url)` that point at http(s) URLs.
 */

import type { Span } from './span-replacer.js';

export interface LinkMatch extends Span {
  rawText: string;
  text: string;
  url: string;
}

const APPROVED_SCHEMES = ['https://', 'http://'];

// `]` inside the text must be escaped with a backslash; the URL ends at the first `)`.
const LINK_SOURCE = String.raw`\[([^\]]*(?:\\\][^\]]*)*)\]\(([^)]*(?:\\\)[^)]*)*)\)`;

let linkPattern: RegExp | null = null;

function getLinkPattern(): RegExp {
  if (!linkPattern) {
    linkPattern = new RegExp(LINK_SOURCE, 'g');
  }
  return linkPattern;
}

export function hasApprovedScheme(url: string): boolean {
  return APPROVED_SCHEMES.some(scheme => url.startsWith(scheme));
}

/**
 * Lazily find http(s) links in `content`.
 *
 * Links with any other scheme still consume their text, so a link nested
 * inside them is never reported.
 */
export function* findLinks(content: string): Generator<LinkMatch> {
  const pattern = new RegExp(getLinkPattern());

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    const [rawText, text, url] = match;
    if (!hasApprovedScheme(url)) continue;

    yield {
      start: match.index,
      end: match.index + rawText.length,
      rawText,
      text,
      url,
    };
  }
}

/**
 * A link is escaped when the character right before it is `\` or `!`
 * (the latter being markdown image syntax).
 */
export function isEscapedLink(source: string, link: Span): boolean {
  if (link.start === 0) return false;
  const previous = source[link.start - 1];
  return previous === '\\' || previous === '!';
}
