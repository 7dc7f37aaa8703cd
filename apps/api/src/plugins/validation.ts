import { type z } from 'zod';
import { AppError, ErrorCode } from '@tasknest/shared';

/** Parses request input, throwing a VALIDATION error that lists every issue. */
export function parseRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  message: string,
): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new AppError(ErrorCode.VALIDATION, message, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return parsed.data;
}
