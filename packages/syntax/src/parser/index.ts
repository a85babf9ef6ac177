export type {
  Argument,
  ArgumentKind,
  Comment,
  CreateDirectiveInit,
  Directive,
  DirectiveParent,
  Document,
} from './ast';
export { createArgument, createDirective, createDocument, findDirective, findDirectives } from './ast';
export { Parser } from './parser';
export { ParseError, ResourceLimitExceededError, type ResourceLimit } from './parser-error';
