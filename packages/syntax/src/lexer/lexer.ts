import { resolveParserOptions, type ParserOptions } from '../options';
import {
  isForbidden,
  isNewline,
  isWhitespace,
  isWordChar,
  opensCStyleComment,
  RESERVED_PUNCTUATORS,
} from './chars';
import { LexError } from './lexer-error';
import type { SourcePosition, Token } from './token';
import { TokenType } from './token-types';

/**
 * Lexer for directive syntax
 *
 * Produces tokens lazily. Every call to `tokens()` scans the input from the
 * beginning with its own state, so one lexer can serve many inputs.
 */
export class Lexer {
  readonly options: ParserOptions;

  constructor(options: Partial<ParserOptions> = {}) {
    this.options = resolveParserOptions(options);
  }

  /**
   * Lazily tokenize a source text. The final token is always EOF.
   */
  *tokens(input: string): Generator<Token, void, undefined> {
    const scanner = new Scanner(input, this.options);
    while (true) {
      const token = scanner.next();
      yield token;
      if (token.type === TokenType.EOF) return;
    }
  }

  /**
   * Tokenize a source text into an array
   */
  tokenize(input: string): Token[] {
    return Array.from(this.tokens(input));
  }
}

function describeCharacter(char: string): string {
  return `U+${char.charCodeAt(0).toString(16).toUpperCase().padStart(4, '0')}`;
}

class Scanner {
  private position: number = 0;
  private line: number = 1;
  private column: number = 0;
  /** Open expression parentheses; newlines inside them are whitespace */
  private parenDepth: number = 0;

  constructor(
    private readonly input: string,
    private readonly options: ParserOptions,
  ) {}

  next(): Token {
    this.skipWhitespace();

    const start = this.currentPosition();
    if (this.isAtEnd()) {
      return this.makeToken(TokenType.EOF, '', '', start);
    }

    const char = this.peek();

    if (isForbidden(char, this.options)) {
      this.error(`Forbidden character ${describeCharacter(char)}`, start);
    }

    if (isNewline(char) || char === ';') {
      return this.endOfDirective(start);
    }

    if (char === '#') {
      return this.lineComment(start, 1);
    }

    if (opensCStyleComment(char, this.peekAt(1), this.options)) {
      return this.peekAt(1) === '/' ? this.lineComment(start, 2) : this.blockComment(start);
    }

    if (char === '"') {
      return this.string(start);
    }

    return this.punctuation(char, start) ?? this.word(start);
  }

  // Character navigation

  private isAtEnd(): boolean {
    return this.position >= this.input.length;
  }

  private peek(): string {
    return this.peekAt(0);
  }

  private peekAt(distance: number): string {
    const index = this.position + distance;
    if (index >= this.input.length) return '';
    return this.input[index];
  }

  private advance(): string {
    const char = this.input[this.position];
    this.position++;
    if (char === '\n' || (char === '\r' && this.peek() !== '\n')) {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private currentPosition(): SourcePosition {
    return {
      line: this.line,
      column: this.column,
      offset: this.position,
    };
  }

  private makeToken(type: TokenType, raw: string, value: string, start: SourcePosition): Token {
    return {
      type,
      raw,
      value,
      loc: { start, end: this.currentPosition() },
    };
  }

  private sliceFrom(start: SourcePosition): string {
    return this.input.slice(start.offset, this.position);
  }

  private error(message: string, position: SourcePosition = this.currentPosition()): never {
    throw new LexError(message, position);
  }

  private skipWhitespace(): void {
    const newlinesAreWhitespace = this.parenDepth > 0 || this.options.requireSemicolons;
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (isWhitespace(char) || (newlinesAreWhitespace && isNewline(char))) {
        this.advance();
      } else {
        break;
      }
    }
  }

  // Token scanners

  /**
   * A run of `;`, newlines and whitespace is one directive boundary
   */
  private endOfDirective(start: SourcePosition): Token {
    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === ';' || isWhitespace(char) || isNewline(char)) {
        this.advance();
      } else {
        break;
      }
    }
    const raw = this.sliceFrom(start);
    return this.makeToken(TokenType.END_OF_DIRECTIVE, raw, raw, start);
  }

  private lineComment(start: SourcePosition, markerLength: number): Token {
    for (let i = 0; i < markerLength; i++) this.advance();

    while (!this.isAtEnd() && !isNewline(this.peek())) {
      if (isForbidden(this.peek(), this.options)) {
        this.error(`Forbidden character ${describeCharacter(this.peek())} in comment`);
      }
      this.advance();
    }

    const raw = this.sliceFrom(start);
    return this.makeToken(TokenType.COMMENT, raw, raw.slice(markerLength), start);
  }

  /**
   * Block comments do not nest: the first `*\/` closes the comment
   */
  private blockComment(start: SourcePosition): Token {
    this.advance(); // consume '/'
    this.advance(); // consume '*'

    while (true) {
      if (this.isAtEnd()) {
        this.error('Unterminated block comment', start);
      }
      const char = this.peek();
      if (char === '*' && this.peekAt(1) === '/') {
        this.advance();
        this.advance();
        break;
      }
      if (isForbidden(char, this.options)) {
        this.error(`Forbidden character ${describeCharacter(char)} in comment`);
      }
      this.advance();
    }

    const raw = this.sliceFrom(start);
    return this.makeToken(TokenType.COMMENT, raw, raw.slice(2, -2), start);
  }

  private string(start: SourcePosition): Token {
    if (this.options.allowTripleQuotes && this.peekAt(1) === '"' && this.peekAt(2) === '"') {
      return this.tripleQuotedString(start);
    }

    this.advance(); // consume opening quote
    let value = '';

    while (true) {
      if (this.isAtEnd() || isNewline(this.peek())) {
        this.error('Unterminated quoted string', start);
      }
      const char = this.peek();
      if (char === '"') {
        this.advance();
        break;
      }
      if (char === '\\') {
        value += this.escape();
        continue;
      }
      if (isForbidden(char, this.options)) {
        this.error(`Forbidden character ${describeCharacter(char)} in quoted string`);
      }
      value += this.advance();
    }

    return this.makeToken(TokenType.QUOTED_STRING, this.sliceFrom(start), value, start);
  }

  private tripleQuotedString(start: SourcePosition): Token {
    this.advance();
    this.advance();
    this.advance();
    let value = '';

    while (true) {
      if (this.isAtEnd()) {
        this.error('Unterminated triple-quoted string', start);
      }
      const char = this.peek();
      if (char === '"' && this.peekAt(1) === '"' && this.peekAt(2) === '"') {
        this.advance();
        this.advance();
        this.advance();
        break;
      }
      if (char === '\\') {
        value += this.escape();
        continue;
      }
      if (isForbidden(char, this.options)) {
        this.error(`Forbidden character ${describeCharacter(char)} in quoted string`);
      }
      value += this.advance();
    }

    return this.makeToken(TokenType.TRIPLE_QUOTED_STRING, this.sliceFrom(start), value, start);
  }

  /**
   * Decode one escape sequence starting at a backslash. A backslash before a
   * newline elides the newline.
   */
  private escape(): string {
    const start = this.currentPosition();
    this.advance(); // consume backslash

    if (this.isAtEnd()) {
      this.error('Unterminated escape sequence', start);
    }

    const escaped = this.advance();
    switch (escaped) {
      case '"':
        return '"';
      case '\\':
        return '\\';
      case '/':
        return '/';
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      case 'b':
        return '\b';
      case 'f':
        return '\f';
      case '0':
        return '\0';
      case 'u':
        return this.unicodeEscape(start);
      case '\r':
        if (this.peek() === '\n') this.advance();
        return '';
      case '\n':
        return '';
      default:
        this.error(`Invalid escape sequence '\\${escaped}'`, start);
    }
  }

  private unicodeEscape(start: SourcePosition): string {
    const digits = this.input.slice(this.position, this.position + 4);
    if (!/^[0-9a-fA-F]{4}$/.test(digits)) {
      this.error('Invalid unicode escape sequence, expected \\uXXXX', start);
    }
    for (let i = 0; i < 4; i++) this.advance();
    return String.fromCharCode(parseInt(digits, 16));
  }

  /**
   * Single-character structure tokens, separators, continuations and punctuators.
   * Returns null when the character starts a word.
   */
  private punctuation(char: string, start: SourcePosition): Token | null {
    switch (char) {
      case '{':
        this.advance();
        return this.makeToken(TokenType.BLOCK_OPEN, char, char, start);
      case '}':
        this.advance();
        return this.makeToken(TokenType.BLOCK_CLOSE, char, char, start);
      case '\\':
        return this.lineContinuation(start);
      case ',':
        if (this.options.allowArgumentSeparators) {
          this.advance();
          return this.makeToken(TokenType.ARGUMENT_SEPARATOR, char, char, start);
        }
        break;
      case '(':
        if (this.options.allowExpressionArguments) {
          this.advance();
          this.parenDepth++;
          return this.makeToken(TokenType.EXPRESSION_OPEN, char, char, start);
        }
        break;
      case ')':
        if (this.options.allowExpressionArguments) {
          this.advance();
          if (this.parenDepth > 0) this.parenDepth--;
          return this.makeToken(TokenType.EXPRESSION_CLOSE, char, char, start);
        }
        break;
    }

    if (this.options.customPunctuators.includes(char)) {
      this.advance();
      return this.makeToken(TokenType.PUNCTUATOR, char, char, start);
    }

    if (RESERVED_PUNCTUATORS.has(char)) {
      this.error(`Unexpected punctuator '${char}'`, start);
    }

    return null;
  }

  private lineContinuation(start: SourcePosition): Token {
    const next = this.peekAt(1);
    if (!isNewline(next)) {
      this.error("Unexpected '\\' outside a quoted string", start);
    }
    if (!this.options.allowLineContinuations) {
      this.error('Line continuations are not enabled', start);
    }

    this.advance(); // consume backslash
    if (this.peek() === '\r') this.advance();
    if (this.peek() === '\n') this.advance();

    return this.makeToken(TokenType.LINE_CONTINUATION, this.sliceFrom(start), '', start);
  }

  private word(start: SourcePosition): Token {
    while (
      !this.isAtEnd() &&
      isWordChar(this.peek(), this.options) &&
      !opensCStyleComment(this.peek(), this.peekAt(1), this.options)
    ) {
      this.advance();
    }

    const raw = this.sliceFrom(start);
    return this.makeToken(TokenType.WORD, raw, raw, start);
  }
}
