/**
 * Word tokenizing for label matching and context windows.
 *
 * Two notions of "word" are used:
 * - word characters (letters, digits, underscore in any script) decide where a
 *   label may start and end, so "Art" does not match inside "Article";
 * - whitespace-separated tokens make up the context windows around a mention.
 */

export interface TextSpan {
  start: number;
  end: number;
}

export interface WordToken extends TextSpan {
  text: string;
}

const WORD_CHAR = /^[\p{L}\p{N}\p{M}_]$/u;
const WHITESPACE_RUN = /\S+/g;

function isWordChar(char: string): boolean {
  return char !== '' && WORD_CHAR.test(char);
}

/**
 * The code point ending at `index` (empty at the start of the string)
 */
function charBefore(text: string, index: number): string {
  if (index <= 0) return '';
  const code = text.charCodeAt(index - 1);
  if (code >= 0xdc00 && code <= 0xdfff && index >= 2) {
    return text.slice(index - 2, index);
  }
  return text.slice(index - 1, index);
}

/**
 * The code point starting at `index` (empty at the end of the string)
 */
function charAt(text: string, index: number): string {
  const codePoint = text.codePointAt(index);
  return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
}

/**
 * Check that `label` may be matched at [start, end) of `text`.
 * A boundary is only required at label ends that are themselves word
 * characters, so labels such as "Dr." or "(Vic.)" still match.
 */
export function isWholeWordAt(text: string, label: string, start: number): boolean {
  const end = start + label.length;
  if (isWordChar(charAt(label, 0)) && isWordChar(charBefore(text, start))) {
    return false;
  }
  if (isWordChar(charBefore(label, label.length)) && isWordChar(charAt(text, end))) {
    return false;
  }
  return true;
}

/**
 * Find every non-overlapping whole-word occurrence of `label`, left to right.
 * Matching is exact and case-sensitive.
 */
export function findWholeWords(text: string, label: string): TextSpan[] {
  const spans: TextSpan[] = [];
  if (!label) return spans;

  let from = 0;
  while (from <= text.length - label.length) {
    const start = text.indexOf(label, from);
    if (start === -1) break;
    if (isWholeWordAt(text, label, start)) {
      spans.push({ start, end: start + label.length });
      from = start + label.length;
    } else {
      from = start + 1;
    }
  }
  return spans;
}

/**
 * Split text into whitespace-separated tokens with their offsets.
 */
export function splitWords(text: string): WordToken[] {
  const tokens: WordToken[] = [];
  for (const match of text.matchAll(WHITESPACE_RUN)) {
    const start = match.index ?? 0;
    tokens.push({ text: match[0], start, end: start + match[0].length });
  }
  return tokens;
}

/**
 * The last `count` words of a string, joined by single spaces
 */
export function lastWords(text: string, count: number): string {
  const words = splitWords(text);
  return words.slice(Math.max(0, words.length - count)).map(word => word.text).join(' ');
}

/**
 * The first `count` words of a string, joined by single spaces
 */
export function firstWords(text: string, count: number): string {
  return splitWords(text).slice(0, count).map(word => word.text).join(' ');
}
