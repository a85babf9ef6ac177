import { resolveParserOptions, type ParserOptions } from '../options';
import type { Directive, Document } from '../parser/ast';
import { formatArgument } from './format';
import { SerializeError } from './serialize-error';

export interface SerializeOptions {
  /** Indentation per nesting level (default: two spaces) */
  indent?: string;
  /** Syntax the output must be readable with (default: parser defaults) */
  parserOptions?: Partial<ParserOptions>;
}

export const DEFAULT_INDENT = '  ';

/**
 * Renders directive trees as text
 *
 * Output shape:
 *
 *   name arg1 arg2;
 *   name arg {
 *     child value;
 *   }
 *   name {}
 *
 * A directive with an empty block keeps its `{}` so it reads back as a block.
 */
export class Serializer {
  private readonly indent: string;
  private readonly options: ParserOptions;

  constructor(options: SerializeOptions = {}) {
    this.indent = options.indent ?? DEFAULT_INDENT;
    this.options = resolveParserOptions(options.parserOptions);

    if (/[^ \t]/.test(this.indent)) {
      throw new SerializeError('Indentation may only contain spaces and tabs');
    }
  }

  /**
   * Serialize a whole document or a single directive
   */
  serialize(node: Document | Directive): string {
    const lines: string[] = [];
    const roots = node.type === 'Document' ? node.children : [node];
    for (const directive of roots) {
      this.writeDirective(directive, 0, '', lines);
    }
    return lines.length > 0 ? `${lines.join('\n')}\n` : '';
  }

  private writeDirective(directive: Directive, depth: number, parentPath: string, lines: string[]): void {
    const path = parentPath ? `${parentPath}.${directive.name.value}` : directive.name.value;
    const prefix = this.indent.repeat(depth);

    if (directive.name.kind === 'punctuator' || directive.name.kind === 'expression') {
      throw new SerializeError(`A directive name cannot be of kind '${directive.name.kind}'`, path);
    }

    const head = [directive.name, ...directive.arguments]
      .map((argument) => formatArgument(argument, this.options, path))
      .join(' ');

    if (directive.children === null) {
      lines.push(`${prefix}${head};`);
      return;
    }

    if (directive.children.length === 0) {
      lines.push(`${prefix}${head} {}`);
      return;
    }

    lines.push(`${prefix}${head} {`);
    for (const child of directive.children) {
      this.writeDirective(child, depth + 1, path, lines);
    }
    lines.push(`${prefix}}`);
  }
}

/**
 * Serialize a document or directive with one-off options
 */
export function serialize(node: Document | Directive, options: SerializeOptions = {}): string {
  return new Serializer(options).serialize(node);
}
