export { formatArgument, quote, tripleQuote } from './format';
export { SerializeError } from './serialize-error';
export { DEFAULT_INDENT, Serializer, serialize, type SerializeOptions } from './serializer';
