import { ZodError, z } from 'zod';
import type { MoveResponse } from '@arcade/shared';

export class ArcadeError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class InvalidInputError extends ArcadeError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class InvalidMoveError extends ArcadeError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UnauthorizedError extends ArcadeError {
  constructor(message: string) {
    super(message, 403);
  }
}

/**
 * Raised when the score store cannot persist a record. The game round that
 * produced the score still stands, so the move result travels with the error.
 */
export class StorageError extends ArcadeError {
  readonly result: MoveResponse | undefined;

  constructor(message: string, options: { cause?: unknown; result?: MoveResponse } = {}) {
    super(message, 500);
    this.cause = options.cause;
    this.result = options.result;
  }

  withResult(result: MoveResponse): StorageError {
    return new StorageError(this.message, { cause: this.cause, result });
  }
}

const describeZodError = (error: ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

// Shape of the client errors raised by express body parsing (http-errors).
const ExposedHttpErrorSchema = z.object({
  status: z.number().int().min(400).max(499),
  expose: z.literal(true),
  type: z.string().optional()
});

export const toArcadeError = (error: unknown): ArcadeError => {
  if (error instanceof ArcadeError) {
    return error;
  }

  if (error instanceof ZodError) {
    return new InvalidInputError(describeZodError(error));
  }

  const httpError = ExposedHttpErrorSchema.safeParse(error);
  if (httpError.success && error instanceof Error) {
    if (httpError.data.type === 'entity.parse.failed') {
      return new InvalidInputError('Request body is not valid JSON');
    }
    return new ArcadeError(error.message, httpError.data.status);
  }

  const message = error instanceof Error ? error.message : 'Internal server error';
  const wrapped = new ArcadeError(message, 500);
  wrapped.cause = error;
  return wrapped;
};
