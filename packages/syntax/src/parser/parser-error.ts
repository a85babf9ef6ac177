import type { SourcePosition } from '../lexer/token';

/**
 * Error thrown when the token stream does not form a valid directive tree
 */
export class ParseError extends Error {
  /** Position where the error occurred */
  readonly position: SourcePosition | null;
  /** Message without the position suffix */
  readonly reason: string;

  constructor(message: string, position: SourcePosition | null) {
    const fullMessage = position
      ? `${message} at line ${position.line}, column ${position.column}`
      : message;
    super(fullMessage);
    this.name = 'ParseError';
    this.position = position;
    this.reason = message;
  }
}

export type ResourceLimit = 'maxDepth' | 'maxDirectives' | 'maxArguments' | 'maxInputLength';

/**
 * Thrown when input exceeds one of the configured parser limits
 */
export class ResourceLimitExceededError extends ParseError {
  /** Which limit was exceeded */
  readonly limit: ResourceLimit;
  /** The configured maximum */
  readonly maximum: number;

  constructor(limit: ResourceLimit, maximum: number, message: string, position: SourcePosition | null) {
    super(message, position);
    this.name = 'ResourceLimitExceededError';
    this.limit = limit;
    this.maximum = maximum;
  }
}
