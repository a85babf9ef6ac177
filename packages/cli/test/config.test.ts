import { describe, expect, it } from 'vitest';
import { loadConfig, parseEnvFile, parseIndent } from '../src/config';
import { useTempDirs, writeFiles } from './helpers';

describe('parseEnvFile', () => {
  it('reads key-value pairs', () => {
    expect(parseEnvFile('A=1\nB = two\r\n')).toEqual({ A: '1', B: 'two' });
  });

  it('skips comments, blank lines and lines without =', () => {
    expect(parseEnvFile('# comment\n\nNOPE\nA=1')).toEqual({ A: '1' });
  });

  it('strips matching quotes', () => {
    expect(parseEnvFile(`A="x y"\nB='z'\nC="unbalanced`)).toEqual({ A: 'x y', B: 'z', C: '"unbalanced' });
  });
});

describe('parseIndent', () => {
  it('reads a number of spaces', () => {
    expect(parseIndent('4')).toBe('    ');
    expect(parseIndent('0')).toBe('');
  });

  it('reads tab', () => {
    expect(parseIndent('tab')).toBe('\t');
  });

  it('rejects anything else', () => {
    expect(() => parseIndent('17')).toThrow("Invalid indent '17'");
    expect(() => parseIndent('two')).toThrow("Invalid indent 'two'");
  });
});

describe('loadConfig', () => {
  const tempDir = useTempDirs();

  it('loads the nearest .env file', async () => {
    const dir = await tempDir();
    await writeFiles(dir, {
      '.env': "# settings\nDIRCONF_LOG_LEVEL=debug\nDIRCONF_ENV='development'\nDIRCONF_INDENT=tab\n",
      'nested/deeper/.keep': '',
    });

    expect(loadConfig(`${dir}/nested/deeper`, {})).toEqual({
      logLevel: 'debug',
      environment: 'development',
      indent: '\t',
    });
  });

  it('lets the process environment win', async () => {
    const dir = await tempDir();
    await writeFiles(dir, { '.env': 'DIRCONF_LOG_LEVEL=debug\nDIRCONF_INDENT=4\n' });

    expect(loadConfig(dir, { DIRCONF_LOG_LEVEL: 'error' })).toEqual({ logLevel: 'error', indent: '    ' });
  });

  it('rejects unknown values', async () => {
    const dir = await tempDir();
    await writeFiles(dir, { '.env': '' });

    expect(() => loadConfig(dir, { DIRCONF_ENV: 'staging' })).toThrow("Invalid DIRCONF_ENV 'staging'");
    expect(() => loadConfig(dir, { DIRCONF_LOG_LEVEL: 'loud' })).toThrow("Invalid DIRCONF_LOG_LEVEL 'loud'");
  });
});
