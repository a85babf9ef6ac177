/**
 * Programmatic entry points of the dirconf CLI
 */

export { checkFile, runCheck, type CheckOptions } from './commands/check';
export { formatText, runFormat, type FormatMode, type FormatOptions, type FormatOutcome } from './commands/format';
export { loadConfig, parseEnvFile, parseIndent, type DirconfConfig } from './config';
export { createCommandContext, type CommandContext } from './context';
export { toDiagnostic, type Diagnostic, type DiagnosticCode, type FileResult } from './diagnostics';
export { CONFIG_FILE_PATTERN, resolveFiles, type ResolvedFiles } from './files';
export { IoError, loadRecord, readTextFile, saveRecord, writeTextFile, type IoOperation } from './io';
export { consoleOutput, createBufferedOutput, type Output } from './output';
export { createProgram } from './program';
export { reportResults, type ReporterOptions, type ReportFormat } from './reporter';
