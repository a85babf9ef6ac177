/**
 * File helpers that report file-system failures as IoError and leave parser
 * and mapper errors untouched
 */

import { Mapper, type Mapping, type MapperOptions } from '@dirconf/mapper';
import { readFile, writeFile } from 'node:fs/promises';

export type IoOperation = 'read' | 'write';

export class IoError extends Error {
  readonly path: string;
  readonly operation: IoOperation;

  constructor(path: string, operation: IoOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Cannot ${operation} ${path}: ${reason}`, { cause });
    this.name = 'IoError';
    this.path = path;
    this.operation = operation;
  }
}

export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new IoError(path, 'read', error);
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  try {
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new IoError(path, 'write', error);
  }
}

/**
 * Read a record from a file
 *
 * @throws {IoError} If the file cannot be read
 * @throws {LexError | ParseError} If the file is not valid syntax
 * @throws {MapperError} If the document does not match the mapping
 */
export async function loadRecord<T>(mapping: Mapping<T>, path: string, options: MapperOptions = {}): Promise<T> {
  const text = await readTextFile(path);
  return new Mapper(options).fromText(mapping, text);
}

/**
 * Write a record to a file, replacing its contents
 */
export async function saveRecord<T>(
  mapping: Mapping<T>,
  value: T,
  path: string,
  options: MapperOptions = {},
): Promise<void> {
  const text = new Mapper(options).toText(mapping, value);
  await writeTextFile(path, text);
}
