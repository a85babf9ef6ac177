/**
 * Where command output goes. Commands never touch the console directly so
 * they can run under test.
 */
export interface Output {
  /** Results (stdout) */
  out(line: string): void;
  /** Diagnostics and failures (stderr) */
  err(line: string): void;
}

export const consoleOutput: Output = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Output that keeps every line, for tests and for callers that post-process
 */
export function createBufferedOutput(): Output & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
  };
}
