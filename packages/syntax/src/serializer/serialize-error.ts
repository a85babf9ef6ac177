/**
 * Thrown when a directive tree cannot be rendered as text that parses back to the same tree
 */
export class SerializeError extends Error {
  /** Dotted directive path of the offending node, when known */
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(path ? `${message} (at ${path})` : message);
    this.name = 'SerializeError';
    this.path = path;
  }
}
