/**
 * dirconf format command
 *
 * Rewrites configuration files in canonical layout. Comments do not survive
 * the directive tree, so files that have any are left alone.
 */

import { parse, serialize, type ParserOptions } from '@dirconf/syntax';
import { Command } from 'commander';
import { loadConfig, parseIndent } from '../config';
import { createCommandContext, type CommandContext } from '../context';
import { toDiagnostic } from '../diagnostics';
import { resolveFiles } from '../files';
import { readTextFile, writeTextFile } from '../io';
import { displayPath, parserOptionsFrom, withParserFlags, type ParserFlags } from './shared';

export type FormatMode = 'stdout' | 'write' | 'check';

export interface FormatOptions {
  mode: FormatMode;
  indent?: string;
  parserOptions?: Partial<ParserOptions>;
}

export type FormatOutcome =
  | { status: 'formatted'; text: string; changed: boolean }
  | { status: 'has-comments' };

/**
 * Format source text
 *
 * @throws {LexError | ParseError} If the text does not parse
 */
export function formatText(text: string, options: Omit<FormatOptions, 'mode'> = {}): FormatOutcome {
  const document = parse(text, options.parserOptions);
  if (document.comments.length > 0) {
    return { status: 'has-comments' };
  }
  const formatted = serialize(document, { indent: options.indent, parserOptions: options.parserOptions });
  return { status: 'formatted', text: formatted, changed: formatted !== text };
}

/**
 * Format files and directories, returning the process exit code
 */
export async function runFormat(paths: readonly string[], options: FormatOptions, context: CommandContext): Promise<number> {
  const { files, missing } = await resolveFiles(paths, context.cwd);
  const { output, logger } = context;
  let exitCode = 0;

  for (const p of missing) {
    output.err(`Path not found: ${p}`);
    exitCode = 1;
  }

  for (const file of files) {
    const shown = displayPath(file, context.cwd);

    let outcome: FormatOutcome;
    try {
      outcome = formatText(await readTextFile(file), options);
    } catch (error) {
      const diagnostic = toDiagnostic(error);
      if (!diagnostic) throw error;
      const location = diagnostic.line === null ? '' : `:${diagnostic.line}:${diagnostic.column ?? 0}`;
      output.err(`${shown}${location}: ${diagnostic.message}`);
      logger.info('file_failed', { path: shown, code: diagnostic.code, message: diagnostic.message });
      exitCode = 1;
      continue;
    }

    if (outcome.status === 'has-comments') {
      output.err(`${shown}: contains comments, which formatting would remove; skipped`);
      exitCode = 1;
      continue;
    }

    logger.debug('file_formatted', { path: shown, changed: outcome.changed });

    switch (options.mode) {
      case 'stdout':
        if (outcome.text) output.out(outcome.text.slice(0, -1));
        break;
      case 'check':
        if (outcome.changed) {
          output.out(shown);
          exitCode = 1;
        }
        break;
      case 'write':
        if (outcome.changed) {
          await writeTextFile(file, outcome.text);
          output.out(`formatted ${shown}`);
        }
        break;
    }
  }

  return exitCode;
}

interface FormatCommandOptions extends ParserFlags {
  write?: boolean;
  check?: boolean;
  indent?: string;
}

export const formatCommand = withParserFlags(
  new Command('format')
    .description('Rewrite configuration files in canonical layout')
    .argument('[paths...]', 'Files or directories to format', ['.'])
    .option('--write', 'Rewrite files in place')
    .option('--check', 'List files that are not formatted and exit 1 if any')
    .option('--indent <indent>', "Spaces per level, or 'tab'"),
).action(async (paths: string[], options: FormatCommandOptions) => {
  try {
    if (options.write && options.check) {
      throw new Error('--write and --check cannot be combined');
    }
    const config = loadConfig();
    const context = createCommandContext(config);
    process.exitCode = await runFormat(
      paths,
      {
        mode: options.write ? 'write' : options.check ? 'check' : 'stdout',
        indent: options.indent === undefined ? config.indent : parseIndent(options.indent),
        parserOptions: parserOptionsFrom(options),
      },
      context,
    );
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 2;
  }
});
