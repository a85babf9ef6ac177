/**
 * dirconf check command
 *
 * Parses every configuration file and reports syntax errors.
 */

import { tryParse, type ParserOptions } from '@dirconf/syntax';
import { Command } from 'commander';
import { loadConfig } from '../config';
import { createCommandContext, type CommandContext } from '../context';
import { toDiagnostic, type Diagnostic, type FileResult } from '../diagnostics';
import { resolveFiles } from '../files';
import { readTextFile } from '../io';
import { isReportFormat, reportResults, type ReportFormat } from '../reporter';
import { displayPath, parserOptionsFrom, withParserFlags, type ParserFlags } from './shared';

export interface CheckOptions {
  format: ReportFormat;
  quiet?: boolean;
  noColor?: boolean;
  parserOptions?: Partial<ParserOptions>;
}

/**
 * Check one file, returning its diagnostics
 */
export async function checkFile(file: string, parserOptions: Partial<ParserOptions> = {}): Promise<Diagnostic[]> {
  try {
    const text = await readTextFile(file);
    const result = tryParse(text, parserOptions);
    return result.success ? [] : [diagnose(result.error)];
  } catch (error) {
    return [diagnose(error)];
  }
}

function diagnose(error: unknown): Diagnostic {
  const diagnostic = toDiagnostic(error);
  if (!diagnostic) {
    throw error;
  }
  return diagnostic;
}

/**
 * Check files and directories, returning the process exit code
 */
export async function runCheck(paths: readonly string[], options: CheckOptions, context: CommandContext): Promise<number> {
  const { files, missing } = await resolveFiles(paths, context.cwd);
  const results: FileResult[] = missing.map((p): FileResult => ({
    path: p,
    diagnostics: [{ code: 'IO_ERROR', message: `Path not found: ${p}`, line: null, column: null }],
  }));

  if (files.length === 0 && results.length === 0) {
    if (!options.quiet) {
      context.output.out('No files found to check');
    }
    return 0;
  }

  for (const file of files) {
    const diagnostics = await checkFile(file, options.parserOptions);
    const shown = displayPath(file, context.cwd);
    context.logger.debug('file_checked', { path: shown, errors: diagnostics.length });
    for (const diagnostic of diagnostics) {
      context.logger.info('file_failed', { path: shown, code: diagnostic.code, message: diagnostic.message });
    }
    results.push({ path: shown, diagnostics });
  }

  reportResults(results, options, context.output);

  return results.some((result) => result.diagnostics.length > 0) ? 1 : 0;
}

interface CheckCommandOptions extends ParserFlags {
  format: string;
  quiet?: boolean;
  color: boolean;
}

export const checkCommand = withParserFlags(
  new Command('check')
    .description('Check configuration files for syntax errors')
    .argument('[paths...]', 'Files or directories to check', ['.'])
    .option('--format <type>', 'Output format: pretty, json', 'pretty')
    .option('--quiet', 'Only output on errors')
    .option('--no-color', 'Disable colored output'),
).action(async (paths: string[], options: CheckCommandOptions) => {
  try {
    if (!isReportFormat(options.format)) {
      throw new Error(`Unknown format '${options.format}'`);
    }
    const context = createCommandContext(loadConfig());
    process.exitCode = await runCheck(
      paths,
      {
        format: options.format,
        quiet: options.quiet,
        noColor: !options.color,
        parserOptions: parserOptionsFrom(options),
      },
      context,
    );
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 2;
  }
});
