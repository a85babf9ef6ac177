/**
 * @dirconf/mapper
 *
 * Typed records over dirconf directive trees.
 */

export {
  booleanConverter,
  ConverterRegistry,
  createConverterRegistry,
  integerConverter,
  numberConverter,
  textConverter,
  type ConverterName,
  type ConverterTypeMap,
  type ValueConverter,
} from './converters';
export {
  ArgumentGapError,
  ConversionError,
  MapperError,
  MissingFieldError,
  SerializationError,
  UnknownFieldError,
  type MapperErrorCode,
} from './errors';
export {
  Field,
  list,
  nested,
  nestedList,
  scalar,
  ScalarField,
  type FieldCodec,
  type FieldOutput,
  type ListOptions,
  type ListStyle,
} from './fields';
export { DEFAULT_MAPPER_OPTIONS, mapFrom, Mapper, mapTo, type MapperOptions, type MapResult } from './mapper';
export {
  createMappingContext,
  joinPath,
  type Infer,
  type Mapping,
  type MappingContext,
  type MappingContextInit,
} from './mapping';
export {
  resolveNaming,
  toCamelCase,
  toKebabCase,
  toSnakeCase,
  words,
  type NamingFunction,
  type NamingPolicy,
} from './naming';
export { defineRecord, RecordMapping, type AnyField, type FieldMap, type InferFields } from './record';
