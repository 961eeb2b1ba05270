import { z } from 'zod';

/**
 * Control-plane client configuration
 */
export const FastlyClientConfigSchema = z.object({
  apiKey: z.string().min(1, 'API key is required'),
  baseUrl: z
    .string()
    .url()
    .refine((url) => url.startsWith('https://'), {
      message: 'baseUrl must use https',
    })
    .transform((url) => url.replace(/\/+$/, ''))
    .default('https://api.fastly.com'),
  timeoutMs: z.number().int().min(1).max(300000).default(30000),
  userAgent: z.string().min(1).optional(),
});

export type FastlyClientConfig = z.infer<typeof FastlyClientConfigSchema>;
export type FastlyClientOptions = z.input<typeof FastlyClientConfigSchema>;

export const LoginCredentialsSchema = z.object({
  user: z.string().min(1, 'user is required'),
  password: z.string().min(1, 'password is required'),
});
export type LoginCredentials = z.infer<typeof LoginCredentialsSchema>;
