import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Ensures credentials and endpoint settings are present before a client is built
 */

export const DEFAULT_API_BASE_URL = 'https://api.fastly.com';
export const DEFAULT_TIMEOUT_MS = 30000;

const HttpsUrlSchema = z
  .string()
  .url()
  .refine((value) => value.startsWith('https://'), { message: 'must use https' });

export const FastlyEnvSchema = z
  .object({
    FASTLY_API_KEY: z.string().min(1, 'FASTLY_API_KEY is required'),
    FASTLY_USER: z.string().min(1).optional(),
    FASTLY_PASSWORD: z.string().min(1).optional(),
    FASTLY_API_BASE_URL: HttpsUrlSchema.default(DEFAULT_API_BASE_URL),
    FASTLY_TIMEOUT_MS: z
      .string()
      .regex(/^\d+$/, 'must be a whole number of milliseconds')
      .optional()
      .transform((v) => (v ? parseInt(v, 10) : DEFAULT_TIMEOUT_MS)),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
  })
  .refine((env) => (env.FASTLY_USER === undefined) === (env.FASTLY_PASSWORD === undefined), {
    message: 'FASTLY_USER and FASTLY_PASSWORD must be set together',
    path: ['FASTLY_PASSWORD'],
  });

export type FastlyEnv = z.infer<typeof FastlyEnvSchema>;

/**
 * Format zod issues as "PATH: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate environment variables
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadFastlyEnv(env: NodeJS.ProcessEnv = process.env): FastlyEnv {
  const result = FastlyEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
