import { describe, expect, it } from 'vitest';
import {
  createArgument,
  createDirective,
  createDocument,
  parse,
  requiresQuotes,
  resolveParserOptions,
  serialize,
  SerializeError,
  Serializer,
  type ParserOptions,
} from '../src/index';
import { catchError } from './helpers';

function line(...args: Parameters<typeof createArgument>): string {
  return serialize(createDirective('a', { arguments: [createArgument(...args)] }));
}

describe('Serializer', () => {
  describe('layout', () => {
    it('renders nested blocks with two-space indentation', () => {
      const doc = parse('server "main" {\nlisten 8080\nroot /var/www\n}');
      expect(serialize(doc)).toBe('server "main" {\n  listen 8080;\n  root /var/www;\n}\n');
    });

    it('renders an empty document as an empty string', () => {
      expect(serialize(createDocument())).toBe('');
    });

    it('keeps empty blocks distinct from leaf directives', () => {
      expect(serialize(parse('a {}'))).toBe('a {}\n');
      expect(serialize(parse('a'))).toBe('a;\n');
    });

    it('uses the configured indentation', () => {
      const doc = parse('a { b { c; } }');
      expect(serialize(doc, { indent: '\t' })).toBe('a {\n\tb {\n\t\tc;\n\t}\n}\n');
    });

    it('rejects indentation that is not whitespace', () => {
      expect(() => new Serializer({ indent: '--' })).toThrow(SerializeError);
    });

    it('serializes a single directive', () => {
      const directive = createDirective('listen', { arguments: ['80'] });
      expect(serialize(directive)).toBe('listen 80;\n');
    });

    it('never emits argument separators', () => {
      expect(serialize(parse('a 1, 2, 3,;'))).toBe('a 1 2 3;\n');
    });
  });

  describe('quoting', () => {
    it('quotes words that would not read back as one word', () => {
      const directive = createDirective('a', {
        arguments: ['hello world', '', 'semi;colon', 'brace{', 'f(x)', 'a,b', 'plain'],
      });
      expect(serialize(directive)).toBe('a "hello world" "" "semi;colon" "brace{" "f(x)" "a,b" plain;\n');
    });

    it('quotes quoted arguments even when they are plain words', () => {
      expect(line('8080', 'quoted')).toBe('a "8080";\n');
    });

    it('quotes names that need it', () => {
      expect(serialize(createDirective(createArgument('my key', 'quoted')))).toBe('"my key";\n');
    });

    it('escapes special characters', () => {
      expect(line('line\nbreak "q" back\\slash')).toBe('a "line\\nbreak \\"q\\" back\\\\slash";\n');
    });

    it('escapes forbidden characters as unicode escapes', () => {
      expect(line('\u202e')).toBe('a "\\u202e";\n');
      expect(line('bell\u0007')).toBe('a "bell\\u0007";\n');
    });

    it('follows the separator setting for commas', () => {
      const options = { parserOptions: { allowArgumentSeparators: false } };
      expect(serialize(createDirective('a', { arguments: ['a,b'] }), options)).toBe('a a,b;\n');
    });

    it('quotes comment openers only when C-style comments are enabled', () => {
      const directive = createDirective('url', { arguments: ['http://x'] });
      expect(serialize(directive)).toBe('url http://x;\n');
      expect(serialize(directive, { parserOptions: { allowCStyleComments: true } })).toBe(
        'url "http://x";\n',
      );
    });
  });

  describe('triple-quoted strings', () => {
    it('keeps newlines and lone quotes literal', () => {
      expect(line('say "hi"\nnext', 'triple-quoted')).toBe('a """say "hi"\nnext""";\n');
    });

    it('escapes quotes that could close the string', () => {
      expect(line('end"', 'triple-quoted')).toBe('a """end\\"""";\n');
      expect(line('a""b', 'triple-quoted')).toBe('a """a\\""b""";\n');
    });

    it('falls back to plain quotes when triple quotes are disabled', () => {
      const directive = createDirective('a', { arguments: [createArgument('say "hi"\nnext', 'triple-quoted')] });
      expect(serialize(directive, { parserOptions: { allowTripleQuotes: false } })).toBe(
        'a "say \\"hi\\"\\nnext";\n',
      );
    });

    it('reads back the same value', () => {
      for (const value of ['end"', 'a""b', '"""', 'x\\y\n"z"']) {
        const text = line(value, 'triple-quoted');
        expect(parse(text).children[0].arguments[0].value).toBe(value);
      }
    });
  });

  describe('punctuators and expressions', () => {
    it('writes configured punctuators bare', () => {
      const options = { parserOptions: { customPunctuators: ['='] } };
      const doc = parse('key = value;', options.parserOptions);
      expect(serialize(doc, options)).toBe('key = value;\n');
    });

    it('rejects punctuators that are not configured', () => {
      const error = catchError(() => line('=', 'punctuator'), SerializeError);
      expect(error.message).toBe("'=' is not a configured punctuator (at a)");
      expect(error.path).toBe('a');
    });

    it('rejects a punctuator as directive name', () => {
      const directive = createDirective(createArgument('=', 'punctuator'));
      expect(() => serialize(directive)).toThrow("A directive name cannot be of kind 'punctuator' (at =)");
    });

    it('writes expressions in parentheses', () => {
      const parserOptions = { allowExpressionArguments: true };
      const doc = parse('a (b, (c d)) e;', parserOptions);
      expect(serialize(doc, { parserOptions })).toBe('a (b (c d)) e;\n');
    });

    it('rejects expressions when they are disabled', () => {
      const directive = createDirective('a', {
        children: [createDirective('b', { arguments: [createArgument('x', 'expression')] })],
      });
      expect(() => serialize(directive)).toThrow('Expression arguments are not enabled (at a.b)');
    });

    it('rejects expressions that would not read back', () => {
      const parserOptions = { allowExpressionArguments: true };
      for (const value of ['b)', '(b', 'b; c', 'b } c']) {
        const directive = createDirective('a', { arguments: [createArgument(value, 'expression')] });
        expect(() => serialize(directive, { parserOptions })).toThrow(`Expression '${value}' is not balanced`);
      }
    });
  });

  describe('round-trip stability', () => {
    const samples: Array<[string, Partial<ParserOptions>]> = [
      ['server "main" {\n listen 8080\n root /var/www\n}', {}],
      ['a 1, 2, 3; b {} c { d "x y" """multi\nline""" }', {}],
      ['"quoted name" "" "\\u0007"; # comment', {}],
      ['a /* c */ b // d\ne f', { allowCStyleComments: true }],
      ['a (b (c, d)) = e;', { allowExpressionArguments: true, customPunctuators: ['='] }],
      ['a 1\n 2; b { c; }', { requireSemicolons: true }],
    ];

    it.each(samples)('serializes %j stably', (input, parserOptions) => {
      const first = serialize(parse(input, parserOptions), { parserOptions });
      const second = serialize(parse(first, parserOptions), { parserOptions });
      expect(second).toBe(first);
    });
  });
});

describe('requiresQuotes', () => {
  const options = resolveParserOptions();

  it('accepts plain words', () => {
    expect(requiresQuotes('localhost', options)).toBe(false);
    expect(requiresQuotes('8080', options)).toBe(false);
    expect(requiresQuotes('/var/www', options)).toBe(false);
  });

  it('requires quotes for empty text and grammar characters', () => {
    for (const value of ['', 'a b', 'a;', 'a#', '"', '{', '}', 'a\\b', '[x]', 'a,b', 'a\nb']) {
      expect(requiresQuotes(value, options)).toBe(true);
    }
  });
});
