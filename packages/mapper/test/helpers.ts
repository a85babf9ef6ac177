/**
 * Run `fn` and return what it throws, failing unless it is an `ErrorClass`
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
