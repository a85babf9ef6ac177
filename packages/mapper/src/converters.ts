/**
 * Value conversion between argument text and typed values
 */

/**
 * Converts one argument's text to a value and back.
 *
 * `render` must produce text that `parse` reads back to an equal value.
 * `parse` and `render` throw on values they cannot handle; the mapper reports
 * the failure as a ConversionError.
 */
export interface ValueConverter<T> {
  readonly name: string;
  parse(text: string): T;
  render(value: T): string;
  /** Whether the rendered text must be written quoted */
  quote?(value: T): boolean;
}

/**
 * Value types of converters referenced by name. Extend it through module
 * augmentation when registering custom converters:
 *
 * ```ts
 * declare module '@dirconf/mapper' {
 *   interface ConverterTypeMap {
 *     duration: number;
 *   }
 * }
 * ```
 */
export interface ConverterTypeMap {
  text: string;
  integer: number;
  number: number;
  boolean: boolean;
}

export type ConverterName = keyof ConverterTypeMap;

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

function isBooleanWord(text: string): boolean {
  const normalized = text.toLowerCase();
  return TRUE_WORDS.has(normalized) || FALSE_WORDS.has(normalized);
}

export const textConverter: ValueConverter<string> = {
  name: 'text',
  parse: (text) => text,
  render: (value) => value,
  // Text that reads like a number or boolean keeps its quotes
  quote: (value) => NUMBER_PATTERN.test(value) || isBooleanWord(value),
};

export const integerConverter: ValueConverter<number> = {
  name: 'integer',
  parse(text) {
    if (!INTEGER_PATTERN.test(text)) {
      throw new Error(`'${text}' is not an integer`);
    }
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw new Error(`'${text}' is outside the safe integer range`);
    }
    return value;
  },
  render(value) {
    if (!Number.isSafeInteger(value)) {
      throw new Error(`${value} is not a safe integer`);
    }
    return String(value);
  },
};

export const numberConverter: ValueConverter<number> = {
  name: 'number',
  parse(text) {
    const value = Number(text);
    if (!NUMBER_PATTERN.test(text) || !Number.isFinite(value)) {
      throw new Error(`'${text}' is not a finite number`);
    }
    return value;
  },
  render(value) {
    if (!Number.isFinite(value)) {
      throw new Error(`${value} is not a finite number`);
    }
    return String(value);
  },
};

export const booleanConverter: ValueConverter<boolean> = {
  name: 'boolean',
  parse(text) {
    const normalized = text.toLowerCase();
    if (TRUE_WORDS.has(normalized)) return true;
    if (FALSE_WORDS.has(normalized)) return false;
    throw new Error(`'${text}' is not a boolean (expected true/false, yes/no, on/off or 1/0)`);
  },
  render: (value) => (value ? 'true' : 'false'),
};

/**
 * Converters by name
 */
export class ConverterRegistry {
  private converters = new Map<string, ValueConverter<unknown>>();

  register<T>(converter: ValueConverter<T>): void {
    if (this.converters.has(converter.name)) {
      throw new Error(`Converter '${converter.name}' is already registered`);
    }
    this.converters.set(converter.name, converter);
  }

  get(name: string): ValueConverter<unknown> | undefined {
    return this.converters.get(name);
  }

  has(name: string): boolean {
    return this.converters.has(name);
  }

  getAll(): Map<string, ValueConverter<unknown>> {
    return new Map(this.converters);
  }
}

/**
 * A registry holding the built-in converters: text, integer, number, boolean
 */
export function createConverterRegistry(): ConverterRegistry {
  const registry = new ConverterRegistry();
  registry.register(textConverter);
  registry.register(integerConverter);
  registry.register(numberConverter);
  registry.register(booleanConverter);
  return registry;
}
