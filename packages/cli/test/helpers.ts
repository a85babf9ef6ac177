import { createMockLogger } from '@dirconf/logger/mock';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach } from 'vitest';
import type { CommandContext } from '../src/context';
import { createBufferedOutput } from '../src/output';

/**
 * Temporary directories, removed after each test
 */
export function useTempDirs(): () => Promise<string> {
  const dirs: string[] = [];

  afterEach(async () => {
    await Promise.all(dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  });

  return async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'dirconf-'));
    dirs.push(dir);
    return dir;
  };
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(dir, name);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf-8');
  }
}

export function createTestContext(cwd: string) {
  const output = createBufferedOutput();
  const logger = createMockLogger();
  const context: CommandContext = { cwd, output, logger };
  return { context, output, logger };
}
