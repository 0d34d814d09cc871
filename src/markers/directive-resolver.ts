/**
 * Directive Resolver
 *
 * Turns marker candidates into known directives. Escaped markers and
 * unknown directive names are dropped, so their text passes through untouched.
 */

import { findMarkers, type MarkerCandidate } from './marker-matcher.js';
import { DEFAULT_HEADER_SETTINGS, parseHeaderSettings, type HeaderSettings } from './settings-parser.js';
import type { Span } from './span-replacer.js';

export type Directive = { kind: 'header'; settings: HeaderSettings };

export interface DirectiveMatch extends Span {
  rawText: string;
  directive: Directive;
}

type DirectiveParser = (params: string | null) => Directive;

const DIRECTIVES: Record<string, DirectiveParser> = {
  aipr_header: params => ({
    kind: 'header',
    settings: params === null ? { ...DEFAULT_HEADER_SETTINGS } : parseHeaderSettings(params.trim()),
  }),
};

export function isKnownDirective(name: string): boolean {
  return Object.hasOwn(DIRECTIVES, name);
}

/**
 * Resolve a single candidate, or return null when it is not replaceable.
 */
export function resolveDirective(candidate: MarkerCandidate): DirectiveMatch | null {
  if (candidate.kind === 'escaped') return null;
  if (!isKnownDirective(candidate.name)) return null;

  const parse = DIRECTIVES[candidate.name];
  return {
    start: candidate.start,
    end: candidate.end,
    rawText: candidate.rawText,
    directive: parse(candidate.params),
  };
}

/**
 * Lazily find every replaceable directive in `content`.
 */
export function* findDirectives(content: string): Generator<DirectiveMatch> {
  for (const candidate of findMarkers(content)) {
    const resolved = resolveDirective(candidate);
    if (resolved) yield resolved;
  }
}
