import type { SourceLocation } from '../lexer/token';

/**
 * Base interface for all tree nodes
 */
interface BaseNode {
  /** Source location for error reporting (null for nodes built in code) */
  readonly loc: SourceLocation | null;
}

/**
 * How an argument was written in the source
 */
export type ArgumentKind = 'word' | 'quoted' | 'triple-quoted' | 'punctuator' | 'expression';

/**
 * A single decoded value: a directive name or one of its arguments
 */
export interface Argument extends BaseNode {
  readonly type: 'Argument';
  /** Decoded text (escapes processed, quotes removed) */
  readonly value: string;
  readonly kind: ArgumentKind;
}

/**
 * Named entry with ordered arguments and an optional block of children
 */
export interface Directive extends BaseNode {
  readonly type: 'Directive';
  readonly name: Argument;
  readonly arguments: readonly Argument[];
  /** null when the directive has no block; an empty array for `{}` */
  readonly children: readonly Directive[] | null;
}

/**
 * Comment preserved from the source
 */
export interface Comment extends BaseNode {
  readonly type: 'Comment';
  /** Comment text without its markers */
  readonly text: string;
  /** true for `/* ... *\/` comments */
  readonly multiLine: boolean;
}

/**
 * The implicit unnamed root directive of a parsed document
 */
export interface Document {
  readonly type: 'Document';
  readonly children: readonly Directive[];
  readonly comments: readonly Comment[];
}

/**
 * Anything that holds child directives
 */
export type DirectiveParent = Document | Directive;

export function createArgument(
  value: string,
  kind: ArgumentKind = 'word',
  loc: SourceLocation | null = null,
): Argument {
  const argument: Argument = { type: 'Argument', value, kind, loc };
  return Object.freeze(argument);
}

export interface CreateDirectiveInit {
  arguments?: readonly (Argument | string)[];
  children?: readonly Directive[] | null;
  loc?: SourceLocation | null;
}

/**
 * Build a directive. Plain strings become word arguments.
 *
 * @example
 * ```ts
 * createDirective('server', {
 *   arguments: ['main'],
 *   children: [createDirective('port', { arguments: ['8080'] })],
 * });
 * // server main { port 8080; }
 * ```
 */
export function createDirective(name: Argument | string, init: CreateDirectiveInit = {}): Directive {
  const toArgument = (value: Argument | string): Argument =>
    typeof value === 'string' ? createArgument(value) : value;

  const directive: Directive = {
    type: 'Directive',
    name: toArgument(name),
    arguments: Object.freeze((init.arguments ?? []).map(toArgument)),
    children: init.children ? Object.freeze([...init.children]) : null,
    loc: init.loc ?? null,
  };
  return Object.freeze(directive);
}

export function createDocument(
  children: readonly Directive[] = [],
  comments: readonly Comment[] = [],
): Document {
  const document: Document = {
    type: 'Document',
    children: Object.freeze([...children]),
    comments: Object.freeze([...comments]),
  };
  return Object.freeze(document);
}

/**
 * First child directive with the given name
 */
export function findDirective(parent: DirectiveParent, name: string): Directive | undefined {
  return (parent.children ?? []).find((child) => child.name.value === name);
}

/**
 * All child directives with the given name, in source order
 */
export function findDirectives(parent: DirectiveParent, name: string): Directive[] {
  return (parent.children ?? []).filter((child) => child.name.value === name);
}
