/**
 * Character classification shared by the lexer and the serializer.
 *
 * The serializer decides whether an argument needs quotes with the same
 * predicates the lexer uses to end a word, so the two cannot drift apart.
 */

import type { ParserOptions } from '../options';

/** Punctuators that are rejected unless an extension claims them */
export const RESERVED_PUNCTUATORS = new Set(['(', ')', '[', ']']);

const ALWAYS_BREAKS_WORD = new Set(['"', '{', '}', ';', '#', '\\']);

const BIDI_CHARACTERS = new Set([
  '\u061c', // arabic letter mark
  '\u200e', // left-to-right mark
  '\u200f', // right-to-left mark
  '\u202a', // left-to-right embedding
  '\u202b', // right-to-left embedding
  '\u202c', // pop directional formatting
  '\u202d', // left-to-right override
  '\u202e', // right-to-left override
  '\u2066', // left-to-right isolate
  '\u2067', // right-to-left isolate
  '\u2068', // first strong isolate
  '\u2069', // pop directional isolate
]);

export function isNewline(char: string): boolean {
  return char === '\n' || char === '\r';
}

/**
 * Whitespace other than line terminators
 */
export function isWhitespace(char: string): boolean {
  return !isNewline(char) && /\s/.test(char);
}

export function isBidiCharacter(char: string): boolean {
  return BIDI_CHARACTERS.has(char);
}

export function isControlCharacter(char: string): boolean {
  const code = char.charCodeAt(0);
  return code < 0x20 || (code >= 0x7f && code <= 0x9f);
}

/**
 * Characters that may not appear anywhere in the source text
 */
export function isForbidden(char: string, options: ParserOptions): boolean {
  if (isControlCharacter(char) && !isWhitespace(char) && !isNewline(char)) {
    return true;
  }
  return options.forbidBidiCharacters && isBidiCharacter(char);
}

/**
 * Whether a character can be part of an unquoted word
 */
export function isWordChar(char: string, options: ParserOptions): boolean {
  if (isWhitespace(char) || isNewline(char) || ALWAYS_BREAKS_WORD.has(char)) {
    return false;
  }
  if (RESERVED_PUNCTUATORS.has(char)) {
    return false;
  }
  if (char === ',' && options.allowArgumentSeparators) {
    return false;
  }
  if (options.customPunctuators.includes(char)) {
    return false;
  }
  return !isForbidden(char, options);
}

/**
 * Whether `next` after a `/` opens a C-style comment
 */
export function opensCStyleComment(char: string, next: string, options: ParserOptions): boolean {
  return options.allowCStyleComments && char === '/' && (next === '/' || next === '*');
}

/**
 * Whether a value must be quoted to be read back as a single word with the same text
 */
export function requiresQuotes(value: string, options: ParserOptions): boolean {
  if (value.length === 0) {
    return true;
  }
  for (const char of value) {
    if (!isWordChar(char, options)) {
      return true;
    }
  }
  return options.allowCStyleComments && (value.includes('//') || value.includes('/*'));
}
