/**
 * Raised by a drawing surface when the backend cannot complete an operation
 * (for example, it cannot allocate a drawing context). This is the only
 * error the panel composer reports to its caller.
 */
export class SurfaceError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
    this.name = "SurfaceError";
    this.operation = operation;
  }
}

export function isSurfaceError(error: unknown): error is SurfaceError {
  return error instanceof SurfaceError;
}
