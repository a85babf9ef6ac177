/**
 * @dirconf/syntax
 *
 * Lexer, parser and serializer for the directive configuration language:
 *
 *   server "main" {
 *     listen 8080;
 *     root /var/www;
 *   }
 */

import { LexError } from './lexer/lexer-error';
import type { ParserOptions } from './options';
import type { Document } from './parser/ast';
import { Parser } from './parser/parser';
import { ParseError } from './parser/parser-error';

export * from './lexer/index';
export * from './parser/index';
export * from './serializer/index';
export {
  DEFAULT_LIMITS,
  DEFAULT_PARSER_OPTIONS,
  resolveParserOptions,
  type ParserOptions,
} from './options';

/**
 * Errors a parse can fail with
 */
export type SyntaxFailure = LexError | ParseError;

export type ParseResult =
  | { success: true; document: Document }
  | { success: false; error: SyntaxFailure };

/**
 * Parse a source text into a directive tree
 *
 * @throws {LexError} On malformed tokens and unterminated constructs
 * @throws {ParseError} On grammar violations and mismatched blocks
 * @throws {ResourceLimitExceededError} When a configured limit is exceeded
 *
 * @example
 * ```ts
 * const doc = parse('server { listen 80; }');
 * doc.children[0].children?.[0].arguments[0].value // => '80'
 * ```
 */
export function parse(input: string, options: Partial<ParserOptions> = {}): Document {
  return new Parser(options).parse(input);
}

/**
 * Parse without throwing on syntax errors
 *
 * Lexer and parser failures come back as values; anything else is rethrown.
 */
export function tryParse(input: string, options: Partial<ParserOptions> = {}): ParseResult {
  try {
    return { success: true, document: parse(input, options) };
  } catch (error) {
    if (error instanceof LexError || error instanceof ParseError) {
      return { success: false, error };
    }
    throw error;
  }
}
