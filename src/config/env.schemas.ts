import { z } from 'zod';
import { ConfigurationError } from '../common/errors';

/**
 * Shared zod helpers for reading environment variables.
 * Every variable arrives as a string (or undefined); these coerce and
 * apply defaults so the registered config values are fully typed.
 */
export const intFromEnv = (defaultValue: number, min = 0) =>
  z.coerce.number().int().min(min).default(defaultValue);

export const booleanFromEnv = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(defaultValue ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

export const listFromEnv = () =>
  z
    .string()
    .default('')
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    );

function parseJsonOrUndefined(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export const headersFromEnv = () =>
  z
    .string()
    .default('{}')
    .transform((value, ctx): Record<string, string> => {
      const parsed = z
        .record(z.string(), z.string())
        .safeParse(parseJsonOrUndefined(value));
      if (parsed.success) {
        return parsed.data;
      }
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Expected a JSON object of string header values',
      });
      return z.NEVER;
    });

/**
 * Parse a config section, turning zod issues into one readable error.
 */
export function parseConfigSection<T extends z.ZodTypeAny>(
  section: string,
  schema: T,
  env: NodeJS.ProcessEnv,
): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${section} configuration: ${issues}`);
  }
  return result.data;
}
