import type { Logger } from '@dirconf/logger';
import {
  createDocument,
  DEFAULT_INDENT,
  findDirective,
  Parser,
  SerializeError,
  Serializer,
  type Directive,
  type Document,
  type ParserOptions,
} from '@dirconf/syntax';
import { createConverterRegistry, type ConverterRegistry, type ValueConverter } from './converters';
import { MapperError, MissingFieldError, SerializationError } from './errors';
import { createMappingContext, type Mapping, type MappingContext } from './mapping';
import type { NamingPolicy } from './naming';

export interface MapperOptions {
  /** How property names become directive names (default: 'preserve') */
  naming?: NamingPolicy;
  /** Indentation used by `toText` */
  indent?: string;
  /** Syntax used by `fromText`, and respected by `toText` when quoting */
  parser?: Partial<ParserOptions>;
  /** Reject child directives that match no field */
  strict?: boolean;
  /** Converters available by name; defaults to a fresh registry of the built-ins */
  converters?: ConverterRegistry;
  /** Receives a debug entry for every ignored directive */
  logger?: Logger;
}

interface MapperDefaults {
  naming: NamingPolicy;
  indent: string;
  strict: boolean;
}

const defaults: MapperDefaults = {
  naming: 'preserve',
  indent: DEFAULT_INDENT,
  strict: false,
};

export const DEFAULT_MAPPER_OPTIONS: Readonly<MapperDefaults> = Object.freeze(defaults);

export type MapResult<T> = { success: true; value: T } | { success: false; error: MapperError };

/**
 * Converts between documents, text and typed values
 *
 * @example
 * ```ts
 * const Config = defineRecord('Config', { host: scalar('text'), port: scalar('integer') });
 * const mapper = new Mapper();
 * mapper.fromText(Config, 'Config { host "localhost"; port 8080; }');
 * // => { host: 'localhost', port: 8080 }
 * ```
 */
export class Mapper {
  private readonly converters: ConverterRegistry;
  private readonly parser: Parser;
  private readonly serializer: Serializer;
  private readonly context: MappingContext;

  constructor(options: MapperOptions = {}) {
    this.converters = options.converters ?? createConverterRegistry();
    this.parser = new Parser(options.parser);
    this.serializer = new Serializer({
      indent: options.indent ?? DEFAULT_MAPPER_OPTIONS.indent,
      parserOptions: options.parser,
    });
    this.context = createMappingContext({
      converters: this.converters,
      naming: options.naming ?? DEFAULT_MAPPER_OPTIONS.naming,
      strict: options.strict ?? DEFAULT_MAPPER_OPTIONS.strict,
      logger: options.logger ?? null,
    });
  }

  /**
   * Make a custom converter available by name
   */
  register<T>(converter: ValueConverter<T>): this {
    this.converters.register(converter);
    return this;
  }

  fromDirective<T>(mapping: Mapping<T>, directive: Directive): T {
    return mapping.fromDirective(directive, this.context);
  }

  toDirective<T>(mapping: Mapping<T>, value: T): Directive {
    return mapping.toDirective(value, this.context);
  }

  /**
   * Read the first top-level directive named like the mapping
   *
   * @throws {MissingFieldError} If the document has no such directive
   */
  fromDocument<T>(mapping: Mapping<T>, document: Document): T {
    const directive = findDirective(document, mapping.name);
    if (!directive) {
      throw new MissingFieldError(mapping.name, mapping.name);
    }
    return this.fromDirective(mapping, directive);
  }

  toDocument<T>(mapping: Mapping<T>, value: T): Document {
    return createDocument([this.toDirective(mapping, value)]);
  }

  /**
   * @throws {LexError | ParseError} If the text is not valid syntax
   * @throws {MapperError} If the document does not match the mapping
   */
  fromText<T>(mapping: Mapping<T>, text: string): T {
    return this.fromDocument(mapping, this.parser.parse(text));
  }

  /**
   * @throws {MapperError} If the value does not match the mapping or cannot be written as text
   */
  toText<T>(mapping: Mapping<T>, value: T): string {
    const document = this.toDocument(mapping, value);
    try {
      return this.serializer.serialize(document);
    } catch (error) {
      if (error instanceof SerializeError) {
        throw new SerializationError(error.path ?? mapping.name, error);
      }
      throw error;
    }
  }

  /**
   * Like `fromDocument`, with mapping failures returned as values
   */
  tryFromDocument<T>(mapping: Mapping<T>, document: Document): MapResult<T> {
    try {
      return { success: true, value: this.fromDocument(mapping, document) };
    } catch (error) {
      if (error instanceof MapperError) {
        return { success: false, error };
      }
      throw error;
    }
  }
}

export function mapFrom<T>(mapping: Mapping<T>, document: Document, options: MapperOptions = {}): T {
  return new Mapper(options).fromDocument(mapping, document);
}

export function mapTo<T>(mapping: Mapping<T>, value: T, options: MapperOptions = {}): Document {
  return new Mapper(options).toDocument(mapping, value);
}
