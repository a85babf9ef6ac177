/**
 * Check result reporter
 */

import chalk from 'chalk';
import type { FileResult } from './diagnostics';
import type { Output } from './output';

export type ReportFormat = 'pretty' | 'json';

export interface ReporterOptions {
  format: ReportFormat;
  quiet?: boolean;
  noColor?: boolean;
}

type Paint = (s: string) => string;

interface Palette {
  green: Paint;
  red: Paint;
  gray: Paint;
  bold: Paint;
}

const plain: Paint = (s) => s;

function palette(noColor: boolean | undefined): Palette {
  return noColor ? { green: plain, red: plain, gray: plain, bold: plain } : chalk;
}

export function isReportFormat(value: string): value is ReportFormat {
  return value === 'pretty' || value === 'json';
}

/**
 * Report check results in pretty format
 */
function reportPretty(results: FileResult[], options: ReporterOptions, output: Output): void {
  const c = palette(options.noColor);
  let totalErrors = 0;

  for (const result of results) {
    const count = result.diagnostics.length;
    totalErrors += count;

    if (count === 0) {
      if (!options.quiet) {
        output.out(`${c.green('✓')} ${result.path}`);
      }
      continue;
    }

    output.out(`${c.red('✗')} ${result.path}`);
    for (const diagnostic of result.diagnostics) {
      const location = diagnostic.line === null ? '' : `${diagnostic.line}:${diagnostic.column ?? 0}  `;
      output.out(`  ${c.red('error')}  ${c.gray(location)}${diagnostic.message}`);
    }
  }

  const failed = results.filter((result) => result.diagnostics.length > 0).length;
  if (failed === 0) {
    if (!options.quiet) {
      output.out('');
      output.out(c.bold(c.green(`${results.length} ${results.length === 1 ? 'file' : 'files'} ok`)));
    }
    return;
  }

  output.out('');
  output.out(
    c.bold(c.red(`${totalErrors} ${totalErrors === 1 ? 'error' : 'errors'} in ${failed} of ${results.length} files`)),
  );
}

/**
 * Report check results in JSON format
 */
function reportJson(results: FileResult[], output: Output): void {
  const summary = {
    files: results.length,
    failed: results.filter((result) => result.diagnostics.length > 0).length,
    errors: results.reduce((sum, result) => sum + result.diagnostics.length, 0),
  };

  output.out(JSON.stringify({ summary, files: results }, null, 2));
}

/**
 * Report check results
 */
export function reportResults(results: FileResult[], options: ReporterOptions, output: Output): void {
  if (options.format === 'json') {
    reportJson(results, output);
  } else {
    reportPretty(results, options, output);
  }
}
