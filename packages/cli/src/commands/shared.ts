import type { ParserOptions } from '@dirconf/syntax';
import { InvalidArgumentError, type Command } from 'commander';
import * as path from 'node:path';

/**
 * Parser flags shared by every command that reads files
 */
export interface ParserFlags {
  maxDepth?: number;
  cStyleComments?: boolean;
  expressions?: boolean;
  requireSemicolons?: boolean;
}

export function parserOptionsFrom(flags: ParserFlags): Partial<ParserOptions> {
  const parserOptions: Partial<ParserOptions> = {};
  if (flags.maxDepth !== undefined) parserOptions.maxDepth = flags.maxDepth;
  if (flags.cStyleComments) parserOptions.allowCStyleComments = true;
  if (flags.expressions) parserOptions.allowExpressionArguments = true;
  if (flags.requireSemicolons) parserOptions.requireSemicolons = true;
  return parserOptions;
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
}

export function displayPath(file: string, cwd: string): string {
  return path.relative(cwd, file) || file;
}

/**
 * Add the parser flags to a command
 */
export function withParserFlags(command: Command): Command {
  return command
    .option('--c-style-comments', 'Accept // and /* */ comments')
    .option('--expressions', 'Accept parenthesized expression arguments')
    .option('--require-semicolons', 'Require ; after every directive without a block')
    .option('--max-depth <n>', 'Maximum nesting depth', parsePositiveInteger);
}
