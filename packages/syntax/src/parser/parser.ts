import { Lexer } from '../lexer/lexer';
import type { SourceLocation, SourcePosition, Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import { resolveParserOptions, type ParserOptions } from '../options';
import { formatArgument } from '../serializer/format';
import {
  createArgument,
  createDirective,
  createDocument,
  type Argument,
  type ArgumentKind,
  type Comment,
  type Directive,
  type Document,
} from './ast';
import { ParseError, ResourceLimitExceededError } from './parser-error';

/**
 * Recursive descent parser for directive syntax
 *
 * Grammar (terminators are `;`, newline, or the enclosing `}`):
 *
 *   document   := directive*
 *   directive  := name argument* (block | terminator)
 *   block      := '{' directive* '}'
 *   argument   := word | string | punctuator | expression
 *   expression := '(' (argument | ',')* ')'
 *
 * One call frame per open block or expression; depth is bounded by maxDepth.
 */
export class Parser {
  readonly options: ParserOptions;

  constructor(options: Partial<ParserOptions> = {}) {
    this.options = resolveParserOptions(options);
  }

  /**
   * Parse a source text into a directive tree
   */
  parse(input: string): Document {
    if (input.length > this.options.maxInputLength) {
      throw new ResourceLimitExceededError(
        'maxInputLength',
        this.options.maxInputLength,
        `Input exceeds maximum length of ${this.options.maxInputLength} characters`,
        null,
      );
    }
    return new ParserState(input, this.options).document();
  }
}

const ARGUMENT_KINDS: Partial<Record<TokenType, ArgumentKind>> = {
  [TokenType.WORD]: 'word',
  [TokenType.QUOTED_STRING]: 'quoted',
  [TokenType.TRIPLE_QUOTED_STRING]: 'triple-quoted',
  [TokenType.PUNCTUATOR]: 'punctuator',
};

function describe(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return 'end of input';
    case TokenType.END_OF_DIRECTIVE:
      return 'end of directive';
    default:
      return `'${token.raw}'`;
  }
}

/**
 * State of a single parse: token cursor, depth and counters
 */
class ParserState {
  private readonly tokens: Iterator<Token, void, undefined>;
  private current: Token;
  private lastEnd: SourcePosition = { line: 1, column: 0, offset: 0 };
  private depth: number = 0;
  private directiveCount: number = 0;
  private readonly comments: Comment[] = [];

  constructor(
    input: string,
    private readonly options: ParserOptions,
  ) {
    this.tokens = new Lexer(options).tokens(input);
    this.current = this.pull();
  }

  document(): Document {
    const children: Directive[] = [];

    while (true) {
      this.skipBoundaries();
      if (this.check(TokenType.EOF)) break;
      if (this.check(TokenType.BLOCK_CLOSE)) {
        throw this.error("Unexpected '}' with no matching '{'");
      }
      children.push(this.directive());
    }

    return createDocument(children, this.comments);
  }

  // Token navigation

  /**
   * Next significant token; comments are collected on the way
   */
  private pull(): Token {
    while (true) {
      const result = this.tokens.next();
      if (result.done) {
        throw new ParseError('Unexpected end of token stream', this.lastEnd);
      }
      const token = result.value;
      if (token.type !== TokenType.COMMENT) {
        return token;
      }
      this.comments.push(
        Object.freeze({
          type: 'Comment',
          text: token.value,
          multiLine: token.raw.startsWith('/*'),
          loc: token.loc,
        } satisfies Comment),
      );
    }
  }

  private check(type: TokenType): boolean {
    return this.current.type === type;
  }

  private advance(): Token {
    const token = this.current;
    if (token.type !== TokenType.EOF) {
      this.lastEnd = token.loc.end;
      this.current = this.pull();
    }
    return token;
  }

  private skipBoundaries(): void {
    while (this.check(TokenType.END_OF_DIRECTIVE) || this.check(TokenType.LINE_CONTINUATION)) {
      this.advance();
    }
  }

  private error(message: string, position: SourcePosition = this.current.loc.start): ParseError {
    return new ParseError(message, position);
  }

  private span(start: SourcePosition): SourceLocation {
    return { start, end: this.lastEnd };
  }

  private enter(open: Token): void {
    this.depth++;
    if (this.depth > this.options.maxDepth) {
      throw new ResourceLimitExceededError(
        'maxDepth',
        this.options.maxDepth,
        `Maximum nesting depth of ${this.options.maxDepth} exceeded`,
        open.loc.start,
      );
    }
  }

  private leave(): void {
    this.depth--;
  }

  // Grammar

  private directive(): Directive {
    const nameToken = this.current;
    const nameKind = ARGUMENT_KINDS[nameToken.type];
    if (nameKind === undefined || nameKind === 'punctuator') {
      throw this.error(`Expected directive name, found ${describe(nameToken)}`);
    }

    this.directiveCount++;
    if (this.directiveCount > this.options.maxDirectives) {
      throw new ResourceLimitExceededError(
        'maxDirectives',
        this.options.maxDirectives,
        `Document exceeds maximum of ${this.options.maxDirectives} directives`,
        nameToken.loc.start,
      );
    }

    this.advance();
    const name = createArgument(nameToken.value, nameKind, nameToken.loc);
    const args = this.arguments();

    let children: Directive[] | null = null;
    if (this.check(TokenType.BLOCK_OPEN)) {
      children = this.block();
    } else if (this.check(TokenType.END_OF_DIRECTIVE)) {
      const loc = this.span(nameToken.loc.start);
      this.advance();
      return createDirective(name, { arguments: args, children, loc });
    } else if (this.check(TokenType.EOF) || this.check(TokenType.BLOCK_CLOSE)) {
      if (this.options.requireSemicolons) {
        throw this.error(`Expected ';' after directive '${name.value}'`);
      }
    } else {
      throw this.error(`Unexpected ${describe(this.current)}`);
    }

    return createDirective(name, {
      arguments: args,
      children,
      loc: this.span(nameToken.loc.start),
    });
  }

  private arguments(): Argument[] {
    const args: Argument[] = [];

    while (true) {
      const token = this.current;
      const kind = ARGUMENT_KINDS[token.type];

      if (kind !== undefined) {
        this.advance();
        args.push(createArgument(token.value, kind, token.loc));
      } else if (token.type === TokenType.EXPRESSION_OPEN) {
        args.push(this.expression());
      } else if (
        token.type === TokenType.ARGUMENT_SEPARATOR ||
        token.type === TokenType.LINE_CONTINUATION
      ) {
        this.advance();
        continue;
      } else {
        return args;
      }

      if (args.length > this.options.maxArguments) {
        throw new ResourceLimitExceededError(
          'maxArguments',
          this.options.maxArguments,
          `Directive exceeds maximum of ${this.options.maxArguments} arguments`,
          token.loc.start,
        );
      }
    }
  }

  private block(): Directive[] {
    const open = this.current;
    this.enter(open);
    this.advance(); // consume '{'

    const children: Directive[] = [];
    while (true) {
      this.skipBoundaries();
      if (this.check(TokenType.BLOCK_CLOSE)) {
        this.advance();
        break;
      }
      if (this.check(TokenType.EOF)) {
        throw this.error("Expected '}' to close block", open.loc.start);
      }
      children.push(this.directive());
    }

    this.leave();
    return children;
  }

  /**
   * Parse `( ... )` into one argument whose value is the canonical text of
   * its items joined by single spaces.
   */
  private expression(): Argument {
    const open = this.current;
    this.enter(open);
    this.advance(); // consume '('

    const parts: string[] = [];
    while (true) {
      const token = this.current;
      const kind = ARGUMENT_KINDS[token.type];

      if (kind !== undefined) {
        this.advance();
        parts.push(formatArgument(createArgument(token.value, kind), this.options));
      } else if (token.type === TokenType.EXPRESSION_OPEN) {
        parts.push(formatArgument(this.expression(), this.options));
      } else if (
        token.type === TokenType.ARGUMENT_SEPARATOR ||
        token.type === TokenType.LINE_CONTINUATION
      ) {
        this.advance();
      } else if (token.type === TokenType.EXPRESSION_CLOSE) {
        this.advance();
        break;
      } else if (token.type === TokenType.EOF) {
        throw this.error("Expected ')' to close expression", open.loc.start);
      } else {
        throw this.error(`Unexpected ${describe(token)} inside expression`);
      }
    }

    this.leave();
    return createArgument(parts.join(' '), 'expression', this.span(open.loc.start));
  }
}
