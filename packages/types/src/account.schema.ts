/**
 * Account-level entities: services, customers, users, sessions and event logs.
 * None of these are version-scoped.
 */

import { z } from 'zod';

import {
  ApiFlagSchema,
  DateStampFields,
  OptionalIntegerSchema,
  OptionalTextSchema,
} from './common.schema.js';
import { VersionSchema, type Version } from './version.schema.js';

// =============================================================================
// SERVICE
// =============================================================================

export const ServiceSchema = z.object({
  id: z.string(),
  name: z.string(),
  customer_id: OptionalTextSchema,
  comment: OptionalTextSchema,
  publish_key: OptionalTextSchema,
  /** Active version number, when the listing includes it */
  version: OptionalIntegerSchema,
  versions: z
    .array(VersionSchema)
    .nullish()
    .transform((v) => v ?? []),
  ...DateStampFields,
});
export type Service = z.infer<typeof ServiceSchema>;

/**
 * The service's active version, if its payload carried the version list
 */
export function activeVersionOf(service: Pick<Service, 'versions'>): Version | undefined {
  return service.versions.find((version) => version.active);
}

export const CreateServiceInputSchema = z.object({
  customer_id: z.string().min(1),
  name: z.string().min(1).max(255),
  publish_key: z.string().optional(),
  comment: z.string().optional(),
});
export type CreateServiceInput = z.input<typeof CreateServiceInputSchema>;

export const UpdateServiceInputSchema = CreateServiceInputSchema.omit({ customer_id: true })
  .partial();
export type UpdateServiceInput = z.input<typeof UpdateServiceInputSchema>;

// =============================================================================
// CUSTOMER
// =============================================================================

export const CustomerSchema = z.object({
  id: z.string(),
  name: z.string(),
  owner_id: OptionalTextSchema,
  pricing_plan: OptionalTextSchema,
  can_configure_wordpress: ApiFlagSchema,
  can_edit_matches: ApiFlagSchema,
  can_stream_syslog: ApiFlagSchema,
  can_upload_vcl: ApiFlagSchema,
  can_reset_passwords: ApiFlagSchema,
  has_config_panel: ApiFlagSchema,
  has_billing_panel: ApiFlagSchema,
  ...DateStampFields,
});
export type Customer = z.infer<typeof CustomerSchema>;

export const UpdateCustomerInputSchema = z
  .object({
    name: z.string().min(1),
    owner_id: z.string().min(1),
    pricing_plan: z.string(),
    can_configure_wordpress: z.boolean(),
    can_edit_matches: z.boolean(),
    can_stream_syslog: z.boolean(),
    can_upload_vcl: z.boolean(),
    can_reset_passwords: z.boolean(),
    has_config_panel: z.boolean(),
    has_billing_panel: z.boolean(),
  })
  .partial();
export type UpdateCustomerInput = z.input<typeof UpdateCustomerInputSchema>;

// =============================================================================
// USER
// =============================================================================

export const UserRoleSchema = z.enum(['user', 'billing', 'engineer', 'superuser']);
export type UserRole = z.infer<typeof UserRoleSchema>;

export const UserSchema = z.object({
  id: z.string(),
  name: OptionalTextSchema,
  login: OptionalTextSchema,
  role: OptionalTextSchema,
  customer_id: OptionalTextSchema,
  email_hash: OptionalTextSchema,
  require_new_password: ApiFlagSchema,
  ...DateStampFields,
});
export type User = z.infer<typeof UserSchema>;

export const CreateUserInputSchema = z.object({
  customer_id: z.string().min(1),
  name: z.string().min(1),
  login: z.string().min(1),
  password: z.string().min(1),
  role: UserRoleSchema.default('user'),
  require_new_password: z.boolean().default(true),
});
export type CreateUserInput = z.input<typeof CreateUserInputSchema>;

export const UpdateUserInputSchema = z
  .object({
    name: z.string().min(1),
    login: z.string().min(1),
    role: UserRoleSchema,
    require_new_password: z.boolean(),
  })
  .partial();
export type UpdateUserInput = z.input<typeof UpdateUserInputSchema>;

export const CustomerDetailsSchema = z.object({
  customer: CustomerSchema,
  owner: UserSchema.nullish().transform((v) => v ?? undefined),
  billing_contact: UserSchema.nullish().transform((v) => v ?? undefined),
});
export type CustomerDetails = z.infer<typeof CustomerDetailsSchema>;

// =============================================================================
// SESSION
// =============================================================================

/**
 * Body of a successful `POST /login`
 */
export const SessionSchema = z.object({
  customer: CustomerSchema,
  user: UserSchema,
});
export type Session = z.infer<typeof SessionSchema>;

// =============================================================================
// EVENT LOG & STATS
// =============================================================================

export const EventLogSchema = z.object({
  id: z.string(),
  object_type: OptionalTextSchema,
  message: OptionalTextSchema,
  details: z.unknown().optional(),
  level: OptionalTextSchema,
  timestamp: OptionalTextSchema,
  system: OptionalTextSchema,
  subsystem: OptionalTextSchema,
});
export type EventLog = z.infer<typeof EventLogSchema>;

export const StatsTypeSchema = z.enum(['all', 'daily', 'hourly', 'minutely']);
export type StatsType = z.infer<typeof StatsTypeSchema>;

/**
 * Stats payloads are open-ended aggregates; they are passed through as records
 */
export const StatsSchema = z.record(z.unknown());
export type Stats = z.infer<typeof StatsSchema>;
