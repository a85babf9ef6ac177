import { createDirective, type Argument, type Directive } from '@dirconf/syntax';
import { ArgumentGapError, MissingFieldError, UnknownFieldError } from './errors';
import type { Field } from './fields';
import { createMappingContext, joinPath, type Mapping, type MappingContext } from './mapping';

export type AnyField = Field<unknown, boolean>;

export type FieldMap = Record<string, AnyField>;

type FieldValue<F> = F extends Field<infer T, boolean> ? T : never;

type OptionalKeys<F> = { [K in keyof F]: F[K] extends Field<unknown, true> ? K : never }[keyof F];

type RequiredKeys<F> = Exclude<keyof F, OptionalKeys<F>>;

type Simplify<T> = { [K in keyof T]: T[K] };

/**
 * Record type described by a field map
 */
export type InferFields<F extends FieldMap> = Simplify<
  { [K in RequiredKeys<F>]: FieldValue<F[K]> } & { [K in OptionalKeys<F>]?: FieldValue<F[K]> }
>;

/**
 * Mapping between a directive with a block and a plain object, one field per property
 */
export class RecordMapping<F extends FieldMap> implements Mapping<InferFields<F>> {
  private readonly entries: Array<[string, AnyField]>;

  constructor(
    readonly name: string,
    readonly fields: F,
  ) {
    this.entries = Object.entries<AnyField>(fields);
    checkPositions(name, this.entries);
  }

  fromDirective(directive: Directive, context: MappingContext = createMappingContext()): InferFields<F> {
    const path = joinPath(context.path, directive.name.value);
    const scoped: MappingContext = { ...context, path, name: undefined };

    const keys = this.entries.map(([property, field]) => [property, this.keyOf(property, field, context)] as const);
    this.checkUnknown(directive, keys, scoped);

    const result: Record<string, unknown> = {};
    for (const [index, [property, field]] of this.entries.entries()) {
      const key = keys[index][1];
      const value = field.codec.decode(directive, key, scoped);

      if (value !== undefined) {
        result[property] = value;
      } else if (field.defaultValue) {
        result[property] = field.defaultValue.value;
      } else if (!field.isOptional) {
        throw new MissingFieldError(key, joinPath(path, key));
      }
    }

    // Every required property was assigned by its field above
    return result as InferFields<F>;
  }

  toDirective(value: InferFields<F>, context: MappingContext = createMappingContext()): Directive {
    const name = context.name ?? this.name;
    const path = joinPath(context.path, name);
    const scoped: MappingContext = { ...context, path, name: undefined };
    const values = new Map<string, unknown>(Object.entries(value));

    const positional: Array<{ index: number; key: string; argument: Argument }> = [];
    const children: Directive[] = [];
    let hasBlock = false;

    for (const [property, field] of this.entries) {
      const key = this.keyOf(property, field, context);
      if (field.codec.position === null) hasBlock = true;

      const item = values.get(property);
      if (item === undefined) {
        if (field.isOptional || field.defaultValue) continue;
        throw new MissingFieldError(key, joinPath(path, key));
      }

      const output = field.codec.encode(item, key, scoped);
      if (output.kind === 'argument') {
        positional.push({ index: output.index, key, argument: output.argument });
      } else {
        children.push(...output.directives);
      }
    }

    positional.sort((a, b) => a.index - b.index);
    for (const [slot, entry] of positional.entries()) {
      if (entry.index !== slot) {
        throw new ArgumentGapError(entry.key, joinPath(path, entry.key), slot);
      }
    }

    return createDirective(name, {
      arguments: positional.map((entry) => entry.argument),
      children: hasBlock ? children : null,
    });
  }

  private keyOf(property: string, field: AnyField, context: MappingContext): string {
    return field.name ?? context.naming(property);
  }

  private checkUnknown(
    directive: Directive,
    keys: ReadonlyArray<readonly [string, string]>,
    context: MappingContext,
  ): void {
    const known = new Set<string>();
    for (const [index, [, field]] of this.entries.entries()) {
      if (field.codec.position === null) known.add(keys[index][1]);
    }

    for (const child of directive.children ?? []) {
      const name = child.name.value;
      if (known.has(name)) continue;

      const path = joinPath(context.path, name);
      if (context.strict) {
        throw new UnknownFieldError(name, path);
      }
      context.logger?.debug('unknown_directive_ignored', { path });
    }
  }
}

/**
 * Positional fields must take the indices 0..n-1 once each, and only trailing
 * ones may be left out
 */
function checkPositions(name: string, entries: ReadonlyArray<[string, AnyField]>): void {
  const positional: Array<{ property: string; field: AnyField; index: number }> = [];
  for (const [property, field] of entries) {
    if (field.codec.position !== null) {
      positional.push({ property, field, index: field.codec.position });
    }
  }
  positional.sort((a, b) => a.index - b.index);

  let omittable: string | null = null;
  for (const [slot, { property, field, index }] of positional.entries()) {
    if (index !== slot) {
      const problem = index < slot ? `shares argument ${index}` : `leaves argument ${slot} unassigned`;
      throw new Error(`Field '${property}' of '${name}' ${problem}`);
    }
    if (field.isOptional || field.defaultValue) {
      omittable = property;
    } else if (omittable !== null) {
      throw new Error(`Required field '${property}' of '${name}' follows optional positional field '${omittable}'`);
    }
  }
}

/**
 * Describe a record type by its fields
 *
 * @example
 * ```ts
 * const Server = defineRecord('server', {
 *   host: scalar('text'),
 *   port: scalar('integer').default(80),
 *   aliases: list('text'),
 * });
 * type Server = Infer<typeof Server>;
 * // { host: string; port: number; aliases: string[] }
 * ```
 */
export function defineRecord<F extends FieldMap>(name: string, fields: F): RecordMapping<F> {
  return new RecordMapping(name, fields);
}
