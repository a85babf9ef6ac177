/**
 * Field descriptors: how one property of a record is stored in directives
 */

import {
  createArgument,
  createDirective,
  findDirective,
  findDirectives,
  type Argument,
  type Directive,
} from '@dirconf/syntax';
import type { ConverterName, ConverterTypeMap, ValueConverter } from './converters';
import { ConversionError, MissingFieldError } from './errors';
import { joinPath, type Mapping, type MappingContext } from './mapping';

/**
 * What encoding one field contributes to its record's directive
 */
export type FieldOutput =
  | { readonly kind: 'directives'; readonly directives: readonly Directive[] }
  | { readonly kind: 'argument'; readonly index: number; readonly argument: Argument };

/**
 * Reads and writes one field. `context.path` is the path of the record's directive.
 */
export interface FieldCodec<T> {
  /** Argument index for positional fields, null for fields stored in child directives */
  readonly position: number | null;
  /** undefined when the field is absent */
  decode(source: Directive, key: string, context: MappingContext): T | undefined;
  encode(value: T, key: string, context: MappingContext): FieldOutput;
}

/**
 * A property descriptor. `T` is the property's value type; `O` marks properties
 * that may be left out of the record.
 */
export class Field<T, O extends boolean = false> {
  constructor(
    readonly codec: FieldCodec<unknown>,
    readonly isOptional: O,
    /** Directive name override; bypasses the naming policy */
    readonly name: string | null = null,
    readonly defaultValue: { readonly value: T } | null = null,
  ) {}

  named(name: string): Field<T, O> {
    return new Field(this.codec, this.isOptional, name, this.defaultValue);
  }

  /**
   * Absent values are left out of the record instead of failing
   */
  optional(): Field<T, true> {
    return new Field<T, true>(this.codec, true, this.name, this.defaultValue);
  }

  /**
   * Value used when the field is absent
   */
  default(value: T): Field<T, O> {
    return new Field(this.codec, this.isOptional, this.name, { value });
  }
}

/**
 * A single value stored as the first argument of a child directive
 */
export class ScalarField<T> extends Field<T, false> {
  constructor(private readonly converter: ConverterRef) {
    super(childScalarCodec(converter), false);
  }

  /**
   * Read the value from an argument of the record's own directive instead
   *
   * @example
   * ```ts
   * const User = defineRecord('user', { login: scalar('text').at(0) });
   * // user alice { ... }
   * ```
   */
  at(index: number): Field<T, false> {
    if (!Number.isInteger(index) || index < 0) {
      throw new Error(`Argument index must be a non-negative integer, got ${index}`);
    }
    return new Field<T, false>(positionalCodec(this.converter, index), false);
  }
}

export type ListStyle = 'arguments' | 'directives';

export interface ListOptions {
  /**
   * `arguments`: all items as arguments of one child directive (default).
   * `directives`: one child directive per item.
   */
  style?: ListStyle;
}

type ConverterRef = ConverterName | ValueConverter<unknown>;

function resolveConverter(ref: ConverterRef, context: MappingContext): ValueConverter<unknown> {
  if (typeof ref !== 'string') {
    return ref;
  }
  const converter = context.converters.get(ref);
  if (!converter) {
    throw new Error(`No converter registered for '${ref}'`);
  }
  return converter;
}

function parseValue(converter: ValueConverter<unknown>, text: string, key: string, path: string): unknown {
  try {
    return converter.parse(text);
  } catch (error) {
    throw new ConversionError(key, path, error);
  }
}

function renderValue(converter: ValueConverter<unknown>, value: unknown, key: string, path: string): Argument {
  try {
    const text = converter.render(value);
    return createArgument(text, converter.quote?.(value) ? 'quoted' : 'word');
  } catch (error) {
    throw new ConversionError(key, path, error);
  }
}

function childScalarCodec(ref: ConverterRef): FieldCodec<unknown> {
  return {
    position: null,
    decode(source, key, context) {
      // The first directive wins when a scalar is repeated; one without an argument is absent
      const argument: Argument | undefined = findDirective(source, key)?.arguments[0];
      if (argument === undefined) return undefined;
      return parseValue(resolveConverter(ref, context), argument.value, key, joinPath(context.path, key));
    },
    encode(value, key, context) {
      const argument = renderValue(resolveConverter(ref, context), value, key, joinPath(context.path, key));
      return { kind: 'directives', directives: [createDirective(key, { arguments: [argument] })] };
    },
  };
}

function positionalCodec(ref: ConverterRef, index: number): FieldCodec<unknown> {
  return {
    position: index,
    decode(source, key, context) {
      const argument: Argument | undefined = source.arguments[index];
      if (argument === undefined) return undefined;
      return parseValue(resolveConverter(ref, context), argument.value, key, joinPath(context.path, key));
    },
    encode(value, key, context) {
      const argument = renderValue(resolveConverter(ref, context), value, key, joinPath(context.path, key));
      return { kind: 'argument', index, argument };
    },
  };
}

function listCodec(ref: ConverterRef, style: ListStyle): FieldCodec<unknown[]> {
  return {
    position: null,
    decode(source, key, context) {
      const path = joinPath(context.path, key);
      const converter = resolveConverter(ref, context);

      if (style === 'directives') {
        return findDirectives(source, key).map((directive) => {
          const argument: Argument | undefined = directive.arguments[0];
          if (argument === undefined) {
            throw new MissingFieldError(key, path);
          }
          return parseValue(converter, argument.value, key, path);
        });
      }
      const directive = findDirective(source, key);
      if (!directive) return [];
      return directive.arguments.map((argument) => parseValue(converter, argument.value, key, path));
    },
    encode(values, key, context) {
      const path = joinPath(context.path, key);
      const converter = resolveConverter(ref, context);
      const items = values.map((value) => renderValue(converter, value, key, path));

      if (style === 'directives') {
        return {
          kind: 'directives',
          directives: items.map((argument) => createDirective(key, { arguments: [argument] })),
        };
      }
      // An empty list writes nothing and reads back as []
      return {
        kind: 'directives',
        directives: items.length > 0 ? [createDirective(key, { arguments: items })] : [],
      };
    },
  };
}

/**
 * Write a nested value under the field's key, whatever name its mapping uses
 */
function renameTo(key: string, directive: Directive): Directive {
  if (directive.name.value === key) return directive;
  return createDirective(key, { arguments: directive.arguments, children: directive.children });
}

function nestedCodec<T>(mapping: Mapping<T>): FieldCodec<T> {
  return {
    position: null,
    decode(source, key, context) {
      const directive = findDirective(source, key);
      return directive ? mapping.fromDirective(directive, context) : undefined;
    },
    encode(value, key, context) {
      const directive = mapping.toDirective(value, { ...context, name: key });
      return { kind: 'directives', directives: [renameTo(key, directive)] };
    },
  };
}

function nestedListCodec<T>(mapping: Mapping<T>): FieldCodec<T[]> {
  return {
    position: null,
    decode(source, key, context) {
      return findDirectives(source, key).map((directive) => mapping.fromDirective(directive, context));
    },
    encode(values, key, context) {
      return {
        kind: 'directives',
        directives: values.map((value) => renameTo(key, mapping.toDirective(value, { ...context, name: key }))),
      };
    },
  };
}

/**
 * A value converted by a named or custom converter
 *
 * @example
 * ```ts
 * scalar('integer') // port 8080;
 * ```
 */
export function scalar<K extends ConverterName>(type: K): ScalarField<ConverterTypeMap[K]>;
export function scalar<T>(converter: ValueConverter<T>): ScalarField<T>;
export function scalar(type: ConverterRef): ScalarField<unknown> {
  return new ScalarField(type);
}

/**
 * A homogeneous list. A missing list reads as `[]`.
 *
 * @example
 * ```ts
 * list('text') // tags web api;
 * list('text', { style: 'directives' }) // tag web; tag api;
 * ```
 */
export function list<K extends ConverterName>(type: K, options?: ListOptions): Field<ConverterTypeMap[K][]>;
export function list<T>(converter: ValueConverter<T>, options?: ListOptions): Field<T[]>;
export function list(type: ConverterRef, options: ListOptions = {}): Field<unknown[]> {
  return new Field<unknown[]>(listCodec(type, options.style ?? 'arguments'), false);
}

/**
 * A child directive with a block, read by another mapping
 */
export function nested<T>(mapping: Mapping<T>): Field<T> {
  return new Field<T>(nestedCodec(mapping), false);
}

/**
 * Repeated child directives, each read by another mapping
 */
export function nestedList<T>(mapping: Mapping<T>): Field<T[]> {
  return new Field<T[]>(nestedListCodec(mapping), false);
}
