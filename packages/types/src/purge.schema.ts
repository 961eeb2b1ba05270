/**
 * Purge records
 *
 * Purges are not part of any version. Their status is eventually
 * consistent: a short server list means "still propagating".
 */

import { z } from 'zod';

import { OptionalIntegerSchema, OptionalTextSchema } from './common.schema.js';

export const PurgeResultSchema = z.object({
  status: z.string(),
  id: z.union([z.string(), z.number()]).transform(String),
});
export type PurgeResult = z.infer<typeof PurgeResultSchema>;

export const PurgeStatusSchema = z.object({
  server: z.string(),
  timestamp: z.union([z.string(), z.number()]).transform(String),
});
export type PurgeStatus = z.infer<typeof PurgeStatusSchema>;

/**
 * Surrogate keys are header tokens: no whitespace, no slashes
 */
export const SurrogateKeySchema = z
  .string()
  .min(1)
  .max(1024)
  .regex(/^[^\s/]+$/, 'surrogate key must not contain whitespace or "/"');

/**
 * One POP's view of a URL from `/content/edge_check`
 */
export const EdgeCheckSchema = z.object({
  pop: OptionalTextSchema,
  server: OptionalTextSchema,
  hash: OptionalTextSchema,
  request: z.record(z.unknown()).optional(),
  response: z
    .object({
      status: OptionalIntegerSchema,
      headers: z.record(z.string()).optional(),
    })
    .optional(),
});
export type EdgeCheck = z.infer<typeof EdgeCheckSchema>;
