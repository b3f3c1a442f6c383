import { z, ZodError } from 'zod';

/**
 * Raised when input fails a zod schema. The full zod error is kept for
 * callers that need every issue.
 */
export class ValidationError extends Error {
  public readonly zodError: ZodError;

  constructor(message: string, zodError: ZodError) {
    super(message);
    this.name = 'ValidationError';
    this.zodError = zodError;
  }
}

/**
 * Synchronous validation that throws a ValidationError carrying the
 * first issue's message
 */
export const parseOrThrow = <T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.output<T> => {
  const result = schema.safeParse(data);
  if (!result.success) {
    const first = result.error.errors[0];
    throw new ValidationError(first?.message ?? 'Validation failed', result.error);
  }
  return result.data;
};
