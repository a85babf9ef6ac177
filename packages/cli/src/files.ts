import { glob } from 'glob';
import { stat } from 'node:fs/promises';
import * as path from 'node:path';

export const CONFIG_FILE_PATTERN = '**/*.conf';

export interface ResolvedFiles {
  files: string[];
  /** Arguments that name nothing on disk */
  missing: string[];
}

/**
 * Expand command line paths: files are taken as given, directories are
 * searched for configuration files.
 */
export async function resolveFiles(paths: readonly string[], cwd: string = process.cwd()): Promise<ResolvedFiles> {
  const files: string[] = [];
  const missing: string[] = [];

  for (const p of paths) {
    const resolved = path.resolve(cwd, p);

    const stats = await stat(resolved).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
      throw error;
    });

    if (stats === null) {
      missing.push(p);
    } else if (stats.isFile()) {
      files.push(resolved);
    } else if (stats.isDirectory()) {
      const found = await glob(CONFIG_FILE_PATTERN, {
        cwd: resolved,
        absolute: true,
        nodir: true,
        ignore: ['**/node_modules/**', '**/dist/**'],
      });
      files.push(...found.sort());
    }
  }

  return { files: [...new Set(files)], missing };
}
