import { z } from 'zod';
import { parseLanguage } from '../../config/app-config.js';
import { ValidationError } from '../../utils/errors.js';

/** Accepts FR, EN or TN in any case. */
export const LanguageSchema = z.string().transform((value, ctx) => {
  const language = parseLanguage(value);
  if (!language) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'language must be FR, EN or TN' });
    return z.NEVER;
  }
  return language;
});

/**
 * Parse a request body (or query) or throw a ValidationError naming the
 * first problem.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`Invalid request: ${where}${issue?.message ?? 'malformed body'}`, 'INVALID_INPUT');
  }
  return result.data;
}
