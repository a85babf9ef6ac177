/**
 * Rendering of single arguments
 *
 * Shared by the serializer and by the parser, which flattens expression
 * arguments into their canonical text.
 */

import { isForbidden, requiresQuotes } from '../lexer/chars';
import { Lexer } from '../lexer/lexer';
import { LexError } from '../lexer/lexer-error';
import { TokenType } from '../lexer/token-types';
import type { ParserOptions } from '../options';
import type { Argument } from '../parser/ast';
import { SerializeError } from './serialize-error';

const ESCAPES: Record<string, string> = {
  '"': '\\"',
  '\\': '\\\\',
  '\n': '\\n',
  '\t': '\\t',
  '\r': '\\r',
  '\b': '\\b',
  '\f': '\\f',
  '\0': '\\0',
};

function unicodeEscape(char: string): string {
  return `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`;
}

/**
 * Render a value as a double-quoted string
 */
export function quote(value: string, options: ParserOptions): string {
  let result = '"';
  for (const char of value) {
    const escape = ESCAPES[char];
    if (escape !== undefined) {
      result += escape;
    } else if (isForbidden(char, options)) {
      result += unicodeEscape(char);
    } else {
      result += char;
    }
  }
  return `${result}"`;
}

/**
 * Render a value as a triple-quoted string. Newlines, tabs and lone quotes stay
 * literal; a quote that could join a closing `"""` is escaped.
 */
export function tripleQuote(value: string, options: ParserOptions): string {
  let result = '"""';
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '"') {
      const next = value[i + 1];
      result += next === undefined || next === '"' ? '\\"' : '"';
    } else if (char === '\\') {
      result += '\\\\';
    } else if (char === '\n' || char === '\r' || char === '\t') {
      result += char;
    } else if (ESCAPES[char] !== undefined) {
      result += ESCAPES[char];
    } else if (isForbidden(char, options)) {
      result += unicodeEscape(char);
    } else {
      result += char;
    }
  }
  return `${result}"""`;
}

/**
 * Whether `value` reads back as the content of exactly one expression argument
 */
function isWellFormedExpression(value: string, options: ParserOptions): boolean {
  let depth = 0;
  try {
    for (const token of new Lexer(options).tokens(`(${value})`)) {
      switch (token.type) {
        case TokenType.EXPRESSION_OPEN:
          depth++;
          break;
        case TokenType.EXPRESSION_CLOSE:
          depth--;
          if (depth === 0 && token.loc.end.offset !== value.length + 2) return false;
          break;
        case TokenType.END_OF_DIRECTIVE:
        case TokenType.BLOCK_OPEN:
        case TokenType.BLOCK_CLOSE:
        case TokenType.COMMENT:
          return false;
        case TokenType.EOF:
          return depth === 0;
      }
    }
  } catch (error) {
    if (error instanceof LexError) return false;
    throw error;
  }
  return false;
}

/**
 * Render one argument so that the lexer reads back the same value and kind
 *
 * @throws {SerializeError} If the argument cannot be expressed with the given options
 */
export function formatArgument(
  argument: Argument,
  options: ParserOptions,
  path: string | null = null,
): string {
  const { value } = argument;

  switch (argument.kind) {
    case 'word':
      return requiresQuotes(value, options) ? quote(value, options) : value;

    case 'quoted':
      return quote(value, options);

    case 'triple-quoted':
      return options.allowTripleQuotes ? tripleQuote(value, options) : quote(value, options);

    case 'punctuator':
      if (!options.customPunctuators.includes(value)) {
        throw new SerializeError(`'${value}' is not a configured punctuator`, path);
      }
      return value;

    case 'expression':
      if (!options.allowExpressionArguments) {
        throw new SerializeError('Expression arguments are not enabled', path);
      }
      if (!isWellFormedExpression(value, options)) {
        throw new SerializeError(`Expression '${value}' is not balanced`, path);
      }
      return `(${value})`;
  }
}
