/**
 * Wire primitives shared by every control-plane schema
 *
 * The API is loose about scalar encodings: flags come back as booleans,
 * 0/1 or "0"/"1"; counts and ports as numbers or numeric strings; absent
 * values as null. These schemas normalize all of that at the boundary so
 * the rest of the code sees `boolean`, `number` and `string | undefined`.
 */

import { z } from 'zod';

// =============================================================================
// SCALAR NORMALIZATION
// =============================================================================

// Number('') is 0; blank text is not a number here
function numberFromText(text: string): number {
  const trimmed = text.trim();
  return trimmed === '' ? Number.NaN : Number(trimmed);
}

function toInteger(value: number | string, ctx: z.RefinementCtx): number {
  const parsed = typeof value === 'number' ? value : numberFromText(value);
  if (!Number.isInteger(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected integer, received "${value}"` });
    return z.NEVER;
  }
  return parsed;
}

/**
 * Boolean flag in any of the API's encodings. Absent means false.
 */
export const ApiFlagSchema = z
  .union([z.boolean(), z.number(), z.string()])
  .nullish()
  .transform((value) => value === true || value === 1 || value === '1' || value === 'true');

/**
 * Required integer, accepting numeric strings
 */
export const ApiIntegerSchema = z.union([z.number(), z.string()]).transform(toInteger);

/**
 * Optional integer; null and "" read as absent
 */
export const OptionalIntegerSchema = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx) =>
    value === null || value === undefined || value === '' ? undefined : toInteger(value, ctx)
  );

/**
 * Optional text; null reads as absent, numbers are stringified
 */
export const OptionalTextSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? undefined : String(value)));

/**
 * Human-assigned object name, unique within its (service, version) scope
 */
export const ObjectNameSchema = z.string().min(1).max(255);

/**
 * Service identifier as issued by the API
 */
export const ServiceIdSchema = z.string().min(1);

/**
 * Version number: positive, assigned by the server
 */
export const VersionNumberSchema = z.number().int().positive();

// =============================================================================
// STATUS PAYLOAD
// =============================================================================

/**
 * `{ status, msg, detail }` returned by delete, purge, validate and on failure
 */
export const ApiStatusSchema = z.object({
  status: z.string(),
  msg: OptionalTextSchema,
  detail: OptionalTextSchema,
});
export type ApiStatus = z.infer<typeof ApiStatusSchema>;

// =============================================================================
// DATE STAMPS
// =============================================================================

/**
 * Timestamps carried by most entities. Older payloads use `created`/`updated`/
 * `deleted` instead of the `_at` forms; both are accepted.
 */
export const DateStampFields = {
  created_at: OptionalTextSchema,
  updated_at: OptionalTextSchema,
  deleted_at: OptionalTextSchema,
  created: OptionalTextSchema,
  updated: OptionalTextSchema,
  deleted: OptionalTextSchema,
};

export interface DateStamped {
  created_at?: string | undefined;
  updated_at?: string | undefined;
  deleted_at?: string | undefined;
  created?: string | undefined;
  updated?: string | undefined;
  deleted?: string | undefined;
}

export interface EntityDates {
  created?: Date | undefined;
  updated?: Date | undefined;
  deleted?: Date | undefined;
}

function parseApiDate(value: string | undefined): Date | undefined {
  if (!value) return undefined;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Resolve an entity's timestamps, preferring the `_at` fields
 */
export function entityDates(entity: DateStamped): EntityDates {
  return {
    created: parseApiDate(entity.created_at ?? entity.created),
    updated: parseApiDate(entity.updated_at ?? entity.updated),
    deleted: parseApiDate(entity.deleted_at ?? entity.deleted),
  };
}
