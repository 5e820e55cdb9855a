// This module provides a typed application error that can be mapped into HTTP responses and tool failures.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(statusCode: number, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This helper reads the client-error status Fastify attaches to its own parser and routing errors.
function readClientStatus(error: Error): number | null {
  const status: unknown = Reflect.get(error, 'statusCode');
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }

  return null;
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    const clientStatus = readClientStatus(error);
    if (clientStatus !== null) {
      const code: unknown = Reflect.get(error, 'code');
      return new AppError(clientStatus, typeof code === 'string' ? code : 'bad_request', error.message);
    }

    return new AppError(500, 'internal_error', error.message);
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}

// This helper extracts a human-readable message from any thrown value.
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'An unexpected error occurred.';
}
