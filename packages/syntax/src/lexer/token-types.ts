/**
 * Token types for the directive lexer
 */

export const TokenType = {
  // Arguments and directive names
  WORD: 'WORD', // localhost, 8080, /var/log
  QUOTED_STRING: 'QUOTED_STRING', // "hello world"
  TRIPLE_QUOTED_STRING: 'TRIPLE_QUOTED_STRING', // """multi-line"""
  PUNCTUATOR: 'PUNCTUATOR', // any character listed in customPunctuators

  // Trivia
  COMMENT: 'COMMENT', // # ..., // ..., /* ... */
  LINE_CONTINUATION: 'LINE_CONTINUATION', // \ followed by a newline

  // Structure
  BLOCK_OPEN: 'BLOCK_OPEN', // {
  BLOCK_CLOSE: 'BLOCK_CLOSE', // }
  EXPRESSION_OPEN: 'EXPRESSION_OPEN', // (
  EXPRESSION_CLOSE: 'EXPRESSION_CLOSE', // )
  ARGUMENT_SEPARATOR: 'ARGUMENT_SEPARATOR', // ,
  END_OF_DIRECTIVE: 'END_OF_DIRECTIVE', // ; or newline

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
