/**
 * An unrecoverable condition. Resolvers and the lifecycle controller throw it;
 * only the entry point turns it into a fatal log line and a non-zero exit.
 */
export class FatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalError';
  }
}

export function isFatalError(err: unknown): err is FatalError {
  return err instanceof FatalError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
