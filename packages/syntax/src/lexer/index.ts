export { Lexer } from './lexer';
export { LexError } from './lexer-error';
export { TokenType } from './token-types';
export { isWordChar, requiresQuotes, RESERVED_PUNCTUATORS } from './chars';
export type { SourceLocation, SourcePosition, Token } from './token';
