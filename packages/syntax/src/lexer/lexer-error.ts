import type { SourcePosition } from './token';

/**
 * Error thrown during lexical analysis
 */
export class LexError extends Error {
  /** Position where the error occurred */
  readonly position: SourcePosition;
  /** Message without the position suffix */
  readonly reason: string;

  constructor(message: string, position: SourcePosition) {
    const fullMessage = `${message} at line ${position.line}, column ${position.column}`;
    super(fullMessage);
    this.name = 'LexError';
    this.position = position;
    this.reason = message;
  }
}
