/**
 * Marker Matcher
 *
 * Finds `{{ #name params }}` directive markers and their escaped form `\{{#...}}`.
 */

import type { Span } from './span-replacer.js';

export interface EscapedMarker extends Span {
  kind: 'escaped';
  rawText: string;
}

export interface DirectiveMarker extends Span {
  kind: 'directive';
  rawText: string;
  name: string;
  params: string | null;
}

export type MarkerCandidate = EscapedMarker | DirectiveMarker;

const MARKER_SOURCE = [
  // escaped marker, echoed as written
  String.raw`\\\{\{#[^\n]*\}\}`,
  // opening braces, `#name`, required whitespace, optional params, closing braces
  String.raw`\{\{\s*#([a-zA-Z0-9_]+)\s+([^}]+)?\}\}`,
].join('|');

let markerPattern: RegExp | null = null;

function getMarkerPattern(): RegExp {
  if (!markerPattern) {
    markerPattern = new RegExp(MARKER_SOURCE, 'g');
  }
  return markerPattern;
}

/**
 * Lazily scan `content` for marker candidates, leftmost first.
 *
 * Every call scans with its own copy of the shared pattern, so the
 * returned iterator is single-use and independent of other scans.
 */
export function* findMarkers(content: string): Generator<MarkerCandidate> {
  const pattern = new RegExp(getMarkerPattern());

  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    const rawText = match[0];
    const start = match.index;
    const end = start + rawText.length;

    if (rawText.startsWith('\\')) {
      yield { kind: 'escaped', start, end, rawText };
      continue;
    }

    const params: string | undefined = match[2];
    yield {
      kind: 'directive',
      start,
      end,
      rawText,
      name: match[1],
      params: params === undefined ? null : params,
    };
  }
}
