/**
 * Service configuration versions
 *
 * A version is a snapshot of a service's configuration. It is freely
 * editable as a draft, and becomes locked once activated (or locked
 * explicitly). At most one version per service is active.
 */

import { z } from 'zod';

import {
  ApiFlagSchema,
  ApiIntegerSchema,
  DateStampFields,
  OptionalTextSchema,
  ServiceIdSchema,
  VersionNumberSchema,
} from './common.schema.js';

export const VersionSchema = z.object({
  number: ApiIntegerSchema.pipe(VersionNumberSchema),
  service_id: ServiceIdSchema,
  active: ApiFlagSchema,
  locked: ApiFlagSchema,
  deployed: ApiFlagSchema,
  staging: ApiFlagSchema,
  testing: ApiFlagSchema,
  comment: OptionalTextSchema,
  inherit_service_id: OptionalTextSchema,
  ...DateStampFields,
});
export type Version = z.infer<typeof VersionSchema>;

/**
 * Lifecycle state derived from the `locked`/`active` flags
 */
export type VersionState = 'draft' | 'locked' | 'active';

export function versionState(version: Pick<Version, 'active' | 'locked'>): VersionState {
  if (version.active) return 'active';
  if (version.locked) return 'locked';
  return 'draft';
}

/**
 * A version accepts writes only while it is a draft
 */
export function isMutable(version: Pick<Version, 'active' | 'locked'>): boolean {
  return versionState(version) === 'draft';
}

export const CreateVersionInputSchema = z.object({
  inherit_service_id: ServiceIdSchema.optional(),
  comment: z.string().max(65535).optional(),
});
export type CreateVersionInput = z.input<typeof CreateVersionInputSchema>;

export const UpdateVersionInputSchema = z.object({
  comment: z.string().max(65535).optional(),
});
export type UpdateVersionInput = z.input<typeof UpdateVersionInputSchema>;

/**
 * Result of `GET .../validate`
 */
export const VersionValidationSchema = z.object({
  status: z.string(),
  msg: OptionalTextSchema,
  detail: OptionalTextSchema,
  errors: z.array(z.string()).nullish().transform((v) => v ?? []),
  warnings: z.array(z.string()).nullish().transform((v) => v ?? []),
});
export type VersionValidation = z.infer<typeof VersionValidationSchema>;

/**
 * Version-level settings (`/service/{id}/version/{n}/settings`)
 */
export const VersionSettingsSchema = z.object({
  service_id: z.string(),
  version: ApiIntegerSchema,
  'general.default_ttl': z
    .union([z.number(), z.string()])
    .nullish()
    .transform((v) => (v === null || v === undefined ? undefined : Number(v))),
  'general.default_host': OptionalTextSchema,
});
export type VersionSettings = z.infer<typeof VersionSettingsSchema>;

export const UpdateVersionSettingsInputSchema = z.object({
  'general.default_ttl': z.number().int().min(0).optional(),
  'general.default_host': z.string().optional(),
});
export type UpdateVersionSettingsInput = z.input<typeof UpdateVersionSettingsInputSchema>;
