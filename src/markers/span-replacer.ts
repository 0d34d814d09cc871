/**
 * Span Replacer
 *
 * Rebuilds a document from ordered, non-overlapping matches.
 * Text between matches is copied verbatim; each match is swapped for its rendering.
 */

export interface Span {
  start: number;
  end: number;
}

/**
 * Replace every item's span in `source` with `render(item)`.
 *
 * Items must arrive in source order. A throwing `render` aborts the whole
 * pass and nothing partial is returned.
 */
export function replaceSpans<T extends Span>(
  source: string,
  items: Iterable<T>,
  render: (item: T) => string
): string {
  let cursor = 0;
  let replaced = '';

  for (const item of items) {
    if (item.start < cursor || item.end <= item.start) {
      throw new Error(`Span [${item.start}, ${item.end}) overlaps or precedes offset ${cursor}`);
    }
    replaced += source.slice(cursor, item.start);
    replaced += render(item);
    cursor = item.end;
  }

  return replaced + source.slice(cursor);
}
