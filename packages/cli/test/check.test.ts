import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import { checkFile, runCheck } from '../src/commands/check';
import { createTestContext, useTempDirs, writeFiles } from './helpers';

const GOOD = 'server {\n  listen 8080;\n}\n';

describe('check', () => {
  const tempDir = useTempDirs();

  describe('checkFile', () => {
    it('returns no diagnostics for a valid file', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'good.conf': GOOD });

      expect(await checkFile(`${dir}/good.conf`)).toEqual([]);
    });

    it('reports lexer errors with 1-based columns', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'bad.conf': 'a "open' });

      expect(await checkFile(`${dir}/bad.conf`)).toEqual([
        { code: 'LEX_ERROR', message: 'Unterminated quoted string', line: 1, column: 3 },
      ]);
    });

    it('reports parser errors', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'bad.conf': 'a {\n  b;' });

      expect(await checkFile(`${dir}/bad.conf`)).toEqual([
        { code: 'PARSE_ERROR', message: "Expected '}' to close block", line: 1, column: 3 },
      ]);
    });

    it('reports exceeded limits', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'deep.conf': 'a { b { c; } }' });

      const [diagnostic] = await checkFile(`${dir}/deep.conf`, { maxDepth: 1 });

      expect(diagnostic.code).toBe('RESOURCE_LIMIT');
      expect(await checkFile(`${dir}/deep.conf`, { maxDepth: 2 })).toEqual([]);
    });

    it('reports unreadable files', async () => {
      const dir = await tempDir();

      const [diagnostic] = await checkFile(`${dir}/missing.conf`);

      expect(diagnostic).toMatchObject({ code: 'IO_ERROR', line: null, column: null });
    });

    it('honours parser options', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'c.conf': 'a 1; // note\n' });

      expect(await checkFile(`${dir}/c.conf`, { allowCStyleComments: true })).toEqual([]);
    });
  });

  describe('runCheck', () => {
    it('checks every config file under a directory', async () => {
      const dir = await tempDir();
      await writeFiles(dir, {
        'good.conf': GOOD,
        'bad.conf': 'a "open',
        'sub/nested.conf': 'x;',
        'node_modules/dep/ignored.conf': 'a "open',
        'notes.txt': 'a "open',
      });
      const { context, output } = createTestContext(dir);

      const code = await runCheck(['.'], { format: 'pretty', noColor: true }, context);

      expect(code).toBe(1);
      expect(output.stdout).toEqual([
        '✗ bad.conf',
        '  error  1:3  Unterminated quoted string',
        '✓ good.conf',
        `✓ ${path.join('sub', 'nested.conf')}`,
        '',
        '1 error in 1 of 3 files',
      ]);
    });

    it('exits 0 when every file is valid', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'good.conf': GOOD });
      const { context, output } = createTestContext(dir);

      expect(await runCheck(['good.conf'], { format: 'pretty', noColor: true }, context)).toBe(0);
      expect(output.stdout).toEqual(['✓ good.conf', '', '1 file ok']);
    });

    it('prints nothing for valid files when quiet', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'good.conf': GOOD, 'bad.conf': 'a }' });
      const { context, output } = createTestContext(dir);

      await runCheck(['.'], { format: 'pretty', noColor: true, quiet: true }, context);

      expect(output.stdout).toEqual([
        '✗ bad.conf',
        "  error  1:3  Unexpected '}' with no matching '{'",
        '',
        '1 error in 1 of 2 files',
      ]);
    });

    it('reports missing paths', async () => {
      const dir = await tempDir();
      const { context, output } = createTestContext(dir);

      expect(await runCheck(['nope.conf'], { format: 'pretty', noColor: true }, context)).toBe(1);
      expect(output.stdout).toEqual(['✗ nope.conf', '  error  Path not found: nope.conf', '', '1 error in 1 of 1 files']);
    });

    it('says so when there is nothing to check', async () => {
      const dir = await tempDir();
      const { context, output } = createTestContext(dir);

      expect(await runCheck(['.'], { format: 'pretty' }, context)).toBe(0);
      expect(output.stdout).toEqual(['No files found to check']);
    });

    it('writes a JSON report', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'good.conf': GOOD, 'bad.conf': 'a "open' });
      const { context, output } = createTestContext(dir);

      await runCheck(['.'], { format: 'json' }, context);

      expect(output.stdout).toHaveLength(1);
      expect(JSON.parse(output.stdout[0])).toEqual({
        summary: { files: 2, failed: 1, errors: 1 },
        files: [
          {
            path: 'bad.conf',
            diagnostics: [{ code: 'LEX_ERROR', message: 'Unterminated quoted string', line: 1, column: 3 }],
          },
          { path: 'good.conf', diagnostics: [] },
        ],
      });
    });

    it('logs each file', async () => {
      const dir = await tempDir();
      await writeFiles(dir, { 'bad.conf': 'a "open' });
      const { context, logger } = createTestContext(dir);

      await runCheck(['.'], { format: 'json' }, context);

      expect(logger.debug).toHaveBeenCalledWith('file_checked', { path: 'bad.conf', errors: 1 });
      expect(logger.info).toHaveBeenCalledWith('file_failed', {
        path: 'bad.conf',
        code: 'LEX_ERROR',
        message: 'Unterminated quoted string',
      });
    });
  });
});
