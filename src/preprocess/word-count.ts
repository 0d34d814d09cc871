/**
 * Word Count
 *
 * Each CJK character counts as a word; any other run of non-space
 * characters counts when it holds a letter or digit.
 */

const CJK = String.raw`\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Hangul}`;
const WORD_PATTERN = new RegExp(`[${CJK}]|[^\\s${CJK}]+`, 'gu');
const HAS_LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

export function countWords(content: string): number {
  let count = 0;
  for (const [token] of content.matchAll(WORD_PATTERN)) {
    if (HAS_LETTER_OR_DIGIT.test(token)) count++;
  }
  return count;
}
