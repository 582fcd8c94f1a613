/**
 * Thrown when the input document cannot be read at all.
 */
export class InputReadError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read input file ${filePath}: ${reason}`);
    this.name = 'InputReadError';
  }
}
