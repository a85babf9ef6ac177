import type { Directive, Document } from '../src/index';

/**
 * Run `fn`, expecting it to throw an instance of `ErrorClass`, and return the error
 */
export function catchError<T>(fn: () => unknown, ErrorClass: new (...args: never[]) => T): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof ErrorClass) return error;
    throw error;
  }
  throw new Error('Expected function to throw');
}

/**
 * Plain shape of a tree without source locations, for structural comparison
 */
export interface Shape {
  name: string;
  args: string[];
  children: Shape[] | null;
}

export function shape(node: Document | Directive): Shape[] {
  const children = node.children ?? [];
  return children.map((child) => ({
    name: child.name.value,
    args: child.arguments.map((argument) => argument.value),
    children: child.children === null ? null : shape(child),
  }));
}
