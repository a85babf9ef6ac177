import { LexError, ParseError, ResourceLimitExceededError } from '@dirconf/syntax';
import { IoError } from './io';

export type DiagnosticCode = 'LEX_ERROR' | 'PARSE_ERROR' | 'RESOURCE_LIMIT' | 'IO_ERROR';

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** 1-based line, null when the failure has no position */
  line: number | null;
  /** 1-based column */
  column: number | null;
}

export interface FileResult {
  path: string;
  diagnostics: Diagnostic[];
}

/**
 * Convert a known failure into a diagnostic, or return null for anything else
 */
export function toDiagnostic(error: unknown): Diagnostic | null {
  if (error instanceof IoError) {
    return { code: 'IO_ERROR', message: error.message, line: null, column: null };
  }

  if (error instanceof LexError || error instanceof ParseError) {
    const code: DiagnosticCode =
      error instanceof ResourceLimitExceededError
        ? 'RESOURCE_LIMIT'
        : error instanceof LexError
          ? 'LEX_ERROR'
          : 'PARSE_ERROR';
    const position = error.position;
    return {
      code,
      message: error.reason,
      line: position ? position.line : null,
      // Positions are 0-based internally; editors count columns from 1
      column: position ? position.column + 1 : null,
    };
  }

  return null;
}
