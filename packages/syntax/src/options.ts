/**
 * Parser configuration
 *
 * Every syntax extension is toggled independently. Limits guard against
 * pathological or adversarial input and are enforced while parsing.
 */

/**
 * Default resource limits (set to Infinity to disable)
 */
export const DEFAULT_LIMITS = {
  /** Maximum nesting of blocks and expression arguments */
  maxDepth: 100,
  /** Maximum number of directives in one document */
  maxDirectives: 100_000,
  /** Maximum number of arguments on a single directive */
  maxArguments: 10_000,
  /** Maximum source length in characters */
  maxInputLength: 10_000_000,
} as const;

export interface ParserOptions {
  /** Accept `//` line comments and `/* ... *\/` block comments */
  allowCStyleComments: boolean;
  /** Accept `"""..."""` strings */
  allowTripleQuotes: boolean;
  /** Accept a backslash before a newline outside quotes */
  allowLineContinuations: boolean;
  /** Treat `,` as a cosmetic argument separator instead of a word character */
  allowArgumentSeparators: boolean;
  /** Accept parenthesized expression arguments */
  allowExpressionArguments: boolean;
  /** Single characters emitted as punctuator tokens */
  customPunctuators: readonly string[];
  /** Newlines no longer end a directive; a directive without a block needs `;` */
  requireSemicolons: boolean;
  /** Reject raw bidirectional formatting characters */
  forbidBidiCharacters: boolean;
  maxDepth: number;
  maxDirectives: number;
  maxArguments: number;
  maxInputLength: number;
}

export const DEFAULT_PARSER_OPTIONS: Readonly<ParserOptions> = Object.freeze({
  allowCStyleComments: false,
  allowTripleQuotes: true,
  allowLineContinuations: true,
  allowArgumentSeparators: true,
  allowExpressionArguments: false,
  customPunctuators: [],
  requireSemicolons: false,
  forbidBidiCharacters: true,
  ...DEFAULT_LIMITS,
});

/** Characters that always carry grammar meaning and can never be punctuators */
const STRUCTURAL_CHARACTERS = new Set(['"', '{', '}', ';', '#', '\\', '\n', '\r']);

/**
 * Merge partial options over the defaults and validate them
 */
export function resolveParserOptions(options: Partial<ParserOptions> = {}): ParserOptions {
  const resolved: ParserOptions = { ...DEFAULT_PARSER_OPTIONS, ...options };

  for (const punctuator of resolved.customPunctuators) {
    if (punctuator.length !== 1) {
      throw new Error(`Custom punctuator '${punctuator}' must be a single character`);
    }
    if (STRUCTURAL_CHARACTERS.has(punctuator) || /\s/.test(punctuator)) {
      throw new Error(`Character '${punctuator}' is reserved by the grammar and cannot be a punctuator`);
    }
    if (punctuator === ',' && resolved.allowArgumentSeparators) {
      throw new Error("',' is already the argument separator; disable allowArgumentSeparators first");
    }
    if ((punctuator === '(' || punctuator === ')') && resolved.allowExpressionArguments) {
      throw new Error(`'${punctuator}' is already claimed by expression arguments`);
    }
  }

  for (const limit of ['maxDepth', 'maxDirectives', 'maxArguments', 'maxInputLength'] as const) {
    if (!(resolved[limit] >= 0)) {
      throw new Error(`${limit} must be a non-negative number`);
    }
  }

  return resolved;
}
