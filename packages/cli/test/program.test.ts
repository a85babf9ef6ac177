import { describe, expect, it } from 'vitest';
import { parserOptionsFrom, parsePositiveInteger } from '../src/commands/shared';
import { createProgram, VERSION } from '../src/program';

describe('program', () => {
  it('registers the commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('dirconf');
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(['check', 'format']);
  });

  it('gives both commands the parser flags', () => {
    for (const command of createProgram().commands) {
      expect(command.options.map((option) => option.long)).toEqual(
        expect.arrayContaining(['--c-style-comments', '--expressions', '--require-semicolons', '--max-depth']),
      );
    }
  });

  it('validates numeric options', () => {
    expect(parsePositiveInteger('12')).toBe(12);
    expect(() => parsePositiveInteger('0')).toThrow('Expected a positive integer.');
    expect(() => parsePositiveInteger('1.5')).toThrow('Expected a positive integer.');
  });

  it('maps flags to parser options', () => {
    expect(parserOptionsFrom({})).toEqual({});
    expect(parserOptionsFrom({ cStyleComments: true, expressions: true, requireSemicolons: true, maxDepth: 5 })).toEqual({
      maxDepth: 5,
      allowCStyleComments: true,
      allowExpressionArguments: true,
      requireSemicolons: true,
    });
  });
});
