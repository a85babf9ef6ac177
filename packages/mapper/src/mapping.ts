import type { Logger } from '@dirconf/logger';
import type { Directive } from '@dirconf/syntax';
import { createConverterRegistry, type ConverterRegistry } from './converters';
import { resolveNaming, type NamingFunction, type NamingPolicy } from './naming';

/**
 * Settings shared by every step of one mapping run
 */
export interface MappingContext {
  /** Dotted path of the parent directive ('' at the top level) */
  readonly path: string;
  /** Directive name to write in place of the mapping name (set for nested fields) */
  readonly name?: string;
  readonly converters: ConverterRegistry;
  readonly naming: NamingFunction;
  /** Reject child directives that match no field */
  readonly strict: boolean;
  readonly logger: Logger | null;
}

export interface MappingContextInit {
  converters?: ConverterRegistry;
  naming?: NamingPolicy;
  strict?: boolean;
  logger?: Logger | null;
}

export function createMappingContext(init: MappingContextInit = {}): MappingContext {
  return {
    path: '',
    converters: init.converters ?? createConverterRegistry(),
    naming: resolveNaming(init.naming ?? 'preserve'),
    strict: init.strict ?? false,
    logger: init.logger ?? null,
  };
}

/**
 * Two-way conversion between a directive and a typed value.
 *
 * Records built with `defineRecord` implement it; so can hand-written mappings
 * for types that need a custom directive layout.
 */
export interface Mapping<T> {
  /** Name of the directive holding the value at the top level of a document */
  readonly name: string;
  fromDirective(directive: Directive, context: MappingContext): T;
  toDirective(value: T, context: MappingContext): Directive;
}

/**
 * Value type of a mapping
 */
export type Infer<M> = M extends Mapping<infer T> ? T : never;

export function joinPath(parent: string, name: string): string {
  return parent ? `${parent}.${name}` : name;
}
