/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                     VERSION-SCOPED CONFIGURATION OBJECTS                      ║
 * ║                                                                               ║
 * ║  Backends, domains, headers, conditions, healthchecks, cache settings,       ║
 * ║  directors, request settings, response objects, syslogs, VCL files and       ║
 * ║  wordpress paths. Each belongs to exactly one (service, version) pair and    ║
 * ║  is identified by a name unique within that scope.                           ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 *
 * Every `Create*InputSchema` below is the closed allow-list of fields the
 * client will transmit for that kind. Its `.default()`s are the documented
 * defaults sent when the caller leaves a field out. Update inputs are the
 * same field set, all optional, with no defaults applied.
 */

import { z } from 'zod';

import {
  ApiFlagSchema,
  ApiIntegerSchema,
  DateStampFields,
  ObjectNameSchema,
  OptionalIntegerSchema,
  OptionalTextSchema,
} from './common.schema.js';

// =============================================================================
// ENUMERATIONS
// =============================================================================

export const CacheSettingsActionSchema = z.enum(['cache', 'pass', 'restart']);
export type CacheSettingsAction = z.infer<typeof CacheSettingsActionSchema>;

export const ConditionTypeSchema = z.enum(['request', 'cache', 'response', 'fetch']);
export type ConditionType = z.infer<typeof ConditionTypeSchema>;

export const HeaderActionSchema = z.enum(['set', 'append', 'delete', 'regex', 'regex_repeat']);
export type HeaderAction = z.infer<typeof HeaderActionSchema>;

export const HeaderTypeSchema = z.enum(['request', 'fetch', 'cache', 'response']);
export type HeaderType = z.infer<typeof HeaderTypeSchema>;

export const RequestSettingsActionSchema = z.enum(['lookup', 'pass']);
export type RequestSettingsAction = z.infer<typeof RequestSettingsActionSchema>;

export const ForwardedForActionSchema = z.enum([
  'clear',
  'leave',
  'append',
  'append_all',
  'overwrite',
]);
export type ForwardedForAction = z.infer<typeof ForwardedForActionSchema>;

/**
 * Director balancing strategy: 1 random, 2 round robin, 3 hash, 4 client
 */
export const DirectorType = {
  RANDOM: 1,
  ROUND_ROBIN: 2,
  HASH: 3,
  CLIENT: 4,
} as const;
export const DirectorTypeSchema = z.union([
  z.literal(DirectorType.RANDOM),
  z.literal(DirectorType.ROUND_ROBIN),
  z.literal(DirectorType.HASH),
  z.literal(DirectorType.CLIENT),
]);
export type DirectorTypeValue = z.infer<typeof DirectorTypeSchema>;

const PortSchema = z.number().int().min(1).max(65535);
const MillisecondsSchema = z.number().int().min(0);
const PrioritySchema = z.number().int().min(0);

// =============================================================================
// SCOPE
// =============================================================================

/**
 * Fields every version-scoped object carries in responses
 */
const VersionScopedFields = {
  service_id: z.string(),
  version: ApiIntegerSchema,
  name: z.string(),
  ...DateStampFields,
};

// =============================================================================
// BACKEND
// =============================================================================

export const BackendSchema = z.object({
  ...VersionScopedFields,
  address: OptionalTextSchema,
  port: OptionalIntegerSchema,
  use_ssl: ApiFlagSchema,
  connect_timeout: OptionalIntegerSchema,
  first_byte_timeout: OptionalIntegerSchema,
  between_bytes_timeout: OptionalIntegerSchema,
  error_threshold: OptionalIntegerSchema,
  max_conn: OptionalIntegerSchema,
  weight: OptionalIntegerSchema,
  auto_loadbalance: ApiFlagSchema,
  shield: OptionalTextSchema,
  request_condition: OptionalTextSchema,
  healthcheck: OptionalTextSchema,
  comment: OptionalTextSchema,
});
export type Backend = z.infer<typeof BackendSchema>;

export const CreateBackendInputSchema = z.object({
  name: ObjectNameSchema,
  address: z.string().min(1),
  port: PortSchema.default(80),
  use_ssl: z.boolean().default(false),
  connect_timeout: MillisecondsSchema.default(1000),
  first_byte_timeout: MillisecondsSchema.default(15000),
  between_bytes_timeout: MillisecondsSchema.default(10000),
  error_threshold: z.number().int().min(0).default(0),
  max_conn: z.number().int().min(1).default(20),
  weight: z.number().int().min(1).max(100).default(100),
  auto_loadbalance: z.boolean().default(false),
  shield: z.string().optional(),
  request_condition: z.string().optional(),
  healthcheck: z.string().optional(),
  comment: z.string().optional(),
});
export type CreateBackendInput = z.input<typeof CreateBackendInputSchema>;

export const UpdateBackendInputSchema = CreateBackendInputSchema.partial();
export type UpdateBackendInput = z.input<typeof UpdateBackendInputSchema>;

// =============================================================================
// CACHE SETTINGS
// =============================================================================

export const CacheSettingsSchema = z.object({
  ...VersionScopedFields,
  action: OptionalTextSchema,
  ttl: OptionalIntegerSchema,
  stale_ttl: OptionalIntegerSchema,
  cache_condition: OptionalTextSchema,
});
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;

export const CreateCacheSettingsInputSchema = z.object({
  name: ObjectNameSchema,
  action: CacheSettingsActionSchema,
  ttl: z.number().int().min(0).optional(),
  stale_ttl: z.number().int().min(0).optional(),
  cache_condition: z.string().optional(),
});
export type CreateCacheSettingsInput = z.input<typeof CreateCacheSettingsInputSchema>;

export const UpdateCacheSettingsInputSchema = CreateCacheSettingsInputSchema.partial();
export type UpdateCacheSettingsInput = z.input<typeof UpdateCacheSettingsInputSchema>;

// =============================================================================
// CONDITION
// =============================================================================

/**
 * Named boolean expression. Other objects reference it by name only; the
 * server checks those references at activation, not when they are written.
 */
export const ConditionSchema = z.object({
  ...VersionScopedFields,
  type: OptionalTextSchema,
  statement: OptionalTextSchema,
  priority: OptionalIntegerSchema,
  comment: OptionalTextSchema,
});
export type Condition = z.infer<typeof ConditionSchema>;

export const CreateConditionInputSchema = z.object({
  name: ObjectNameSchema,
  type: ConditionTypeSchema,
  statement: z.string().min(1),
  priority: PrioritySchema.default(10),
  comment: z.string().optional(),
});
export type CreateConditionInput = z.input<typeof CreateConditionInputSchema>;

export const UpdateConditionInputSchema = CreateConditionInputSchema.partial();
export type UpdateConditionInput = z.input<typeof UpdateConditionInputSchema>;

// =============================================================================
// DIRECTOR
// =============================================================================

export const DirectorSchema = z.object({
  ...VersionScopedFields,
  quorum: OptionalIntegerSchema,
  type: OptionalIntegerSchema,
  retries: OptionalIntegerSchema,
  shield: OptionalTextSchema,
  capacity: OptionalIntegerSchema,
  comment: OptionalTextSchema,
  backends: z
    .array(z.string())
    .nullish()
    .transform((v) => v ?? []),
});
export type Director = z.infer<typeof DirectorSchema>;

export const CreateDirectorInputSchema = z.object({
  name: ObjectNameSchema,
  quorum: z.number().int().min(0).max(100).default(75),
  type: DirectorTypeSchema.default(DirectorType.RANDOM),
  retries: z.number().int().min(0).default(5),
  shield: z.string().optional(),
  capacity: z.number().int().min(0).optional(),
  comment: z.string().optional(),
});
export type CreateDirectorInput = z.input<typeof CreateDirectorInputSchema>;

export const UpdateDirectorInputSchema = CreateDirectorInputSchema.partial();
export type UpdateDirectorInput = z.input<typeof UpdateDirectorInputSchema>;

/**
 * Membership of one backend in one director. A backend may belong to any
 * number of directors, but appears at most once in each.
 */
export const DirectorBackendSchema = z.object({
  service_id: z.string(),
  version: ApiIntegerSchema,
  director: z.string(),
  backend: z.string(),
  ...DateStampFields,
});
export type DirectorBackend = z.infer<typeof DirectorBackendSchema>;

// =============================================================================
// DOMAIN
// =============================================================================

export const DomainSchema = z.object({
  ...VersionScopedFields,
  comment: OptionalTextSchema,
});
export type Domain = z.infer<typeof DomainSchema>;

export const CreateDomainInputSchema = z.object({
  name: ObjectNameSchema,
  comment: z.string().optional(),
});
export type CreateDomainInput = z.input<typeof CreateDomainInputSchema>;

export const UpdateDomainInputSchema = CreateDomainInputSchema.partial();
export type UpdateDomainInput = z.input<typeof UpdateDomainInputSchema>;

/**
 * `[domain, cname, ok]` as returned by the DNS check endpoints
 */
export const DomainCheckSchema = z
  .tuple([DomainSchema, z.string().nullable(), z.boolean()])
  .transform(([domain, cname, ok]) => ({ domain, cname: cname ?? undefined, ok }));
export type DomainCheck = z.infer<typeof DomainCheckSchema>;

// =============================================================================
// HEADER
// =============================================================================

export const HeaderSchema = z.object({
  ...VersionScopedFields,
  dst: OptionalTextSchema,
  src: OptionalTextSchema,
  type: OptionalTextSchema,
  action: OptionalTextSchema,
  regex: OptionalTextSchema,
  substitution: OptionalTextSchema,
  ignore_if_set: ApiFlagSchema,
  priority: OptionalIntegerSchema,
  response_condition: OptionalTextSchema,
  request_condition: OptionalTextSchema,
  cache_condition: OptionalTextSchema,
});
export type Header = z.infer<typeof HeaderSchema>;

export const CreateHeaderInputSchema = z.object({
  name: ObjectNameSchema,
  dst: z.string().min(1),
  src: z.string(),
  type: HeaderTypeSchema.default('response'),
  action: HeaderActionSchema.default('set'),
  regex: z.string().optional(),
  substitution: z.string().optional(),
  ignore_if_set: z.boolean().optional(),
  priority: PrioritySchema.default(10),
  response_condition: z.string().optional(),
  request_condition: z.string().optional(),
  cache_condition: z.string().optional(),
});
export type CreateHeaderInput = z.input<typeof CreateHeaderInputSchema>;

export const UpdateHeaderInputSchema = CreateHeaderInputSchema.partial();
export type UpdateHeaderInput = z.input<typeof UpdateHeaderInputSchema>;

// =============================================================================
// HEALTHCHECK
// =============================================================================

export const HealthcheckSchema = z.object({
  ...VersionScopedFields,
  method: OptionalTextSchema,
  host: OptionalTextSchema,
  path: OptionalTextSchema,
  http_version: OptionalTextSchema,
  timeout: OptionalIntegerSchema,
  check_interval: OptionalIntegerSchema,
  expected_response: OptionalIntegerSchema,
  window: OptionalIntegerSchema,
  threshold: OptionalIntegerSchema,
  initial: OptionalIntegerSchema,
  comment: OptionalTextSchema,
});
export type Healthcheck = z.infer<typeof HealthcheckSchema>;

export const CreateHealthcheckInputSchema = z.object({
  name: ObjectNameSchema,
  host: z.string().min(1),
  method: z.string().min(1).default('HEAD'),
  path: z.string().startsWith('/').default('/'),
  http_version: z.string().default('1.1'),
  timeout: MillisecondsSchema.default(1000),
  check_interval: MillisecondsSchema.default(5000),
  expected_response: z.number().int().min(100).max(599).default(200),
  window: z.number().int().min(1).default(5),
  threshold: z.number().int().min(1).default(3),
  initial: z.number().int().min(0).default(1),
  comment: z.string().optional(),
});
export type CreateHealthcheckInput = z.input<typeof CreateHealthcheckInputSchema>;

export const UpdateHealthcheckInputSchema = CreateHealthcheckInputSchema.partial();
export type UpdateHealthcheckInput = z.input<typeof UpdateHealthcheckInputSchema>;

// =============================================================================
// REQUEST SETTINGS
// =============================================================================

export const RequestSettingsSchema = z.object({
  ...VersionScopedFields,
  default_host: OptionalTextSchema,
  force_miss: ApiFlagSchema,
  force_ssl: ApiFlagSchema,
  action: OptionalTextSchema,
  bypass_busy_wait: ApiFlagSchema,
  max_stale_age: OptionalIntegerSchema,
  hash_keys: OptionalTextSchema,
  xff: OptionalTextSchema,
  timer_support: ApiFlagSchema,
  geo_headers: ApiFlagSchema,
  request_condition: OptionalTextSchema,
});
export type RequestSettings = z.infer<typeof RequestSettingsSchema>;

export const CreateRequestSettingsInputSchema = z.object({
  name: ObjectNameSchema,
  default_host: z.string().optional(),
  force_miss: z.boolean().optional(),
  force_ssl: z.boolean().optional(),
  action: RequestSettingsActionSchema.optional(),
  bypass_busy_wait: z.boolean().optional(),
  max_stale_age: z.number().int().min(0).optional(),
  hash_keys: z.string().optional(),
  xff: ForwardedForActionSchema.optional(),
  timer_support: z.boolean().optional(),
  geo_headers: z.boolean().optional(),
  request_condition: z.string().optional(),
});
export type CreateRequestSettingsInput = z.input<typeof CreateRequestSettingsInputSchema>;

export const UpdateRequestSettingsInputSchema = CreateRequestSettingsInputSchema.partial();
export type UpdateRequestSettingsInput = z.input<typeof UpdateRequestSettingsInputSchema>;

// =============================================================================
// RESPONSE OBJECT
// =============================================================================

export const ResponseObjectSchema = z.object({
  ...VersionScopedFields,
  status: OptionalIntegerSchema,
  response: OptionalTextSchema,
  content: OptionalTextSchema,
  request_condition: OptionalTextSchema,
  cache_condition: OptionalTextSchema,
});
export type ResponseObject = z.infer<typeof ResponseObjectSchema>;

export const CreateResponseObjectInputSchema = z.object({
  name: ObjectNameSchema,
  status: z.number().int().min(100).max(599).default(200),
  response: z.string().default('OK'),
  content: z.string().default(''),
  request_condition: z.string().optional(),
  cache_condition: z.string().optional(),
});
export type CreateResponseObjectInput = z.input<typeof CreateResponseObjectInputSchema>;

export const UpdateResponseObjectInputSchema = CreateResponseObjectInputSchema.partial();
export type UpdateResponseObjectInput = z.input<typeof UpdateResponseObjectInputSchema>;

// =============================================================================
// SYSLOG
// =============================================================================

export const SyslogSchema = z.object({
  ...VersionScopedFields,
  address: OptionalTextSchema,
  port: OptionalIntegerSchema,
  use_tls: ApiFlagSchema,
  tls_ca_cert: OptionalTextSchema,
  token: OptionalTextSchema,
  format: OptionalTextSchema,
  response_condition: OptionalTextSchema,
});
export type Syslog = z.infer<typeof SyslogSchema>;

export const CreateSyslogInputSchema = z.object({
  name: ObjectNameSchema,
  address: z.string().min(1),
  port: PortSchema.default(514),
  use_tls: z.boolean().default(false),
  tls_ca_cert: z.string().optional(),
  token: z.string().optional(),
  format: z.string().optional(),
  response_condition: z.string().optional(),
});
export type CreateSyslogInput = z.input<typeof CreateSyslogInputSchema>;

export const UpdateSyslogInputSchema = CreateSyslogInputSchema.partial();
export type UpdateSyslogInput = z.input<typeof UpdateSyslogInputSchema>;

// =============================================================================
// VCL
// =============================================================================

export const VclSchema = z.object({
  ...VersionScopedFields,
  content: OptionalTextSchema,
  main: ApiFlagSchema,
  generation: OptionalIntegerSchema,
  md5: OptionalTextSchema,
  comment: OptionalTextSchema,
});
export type Vcl = z.infer<typeof VclSchema>;

export const CreateVclInputSchema = z.object({
  name: ObjectNameSchema,
  content: z.string(),
  main: z.boolean().optional(),
  comment: z.string().optional(),
});
export type CreateVclInput = z.input<typeof CreateVclInputSchema>;

export const UpdateVclInputSchema = CreateVclInputSchema.partial();
export type UpdateVclInput = z.input<typeof UpdateVclInputSchema>;

/**
 * Generated VCL has no name of its own
 */
export const GeneratedVclSchema = z.object({
  service_id: z.string(),
  version: ApiIntegerSchema,
  content: OptionalTextSchema,
});
export type GeneratedVcl = z.infer<typeof GeneratedVclSchema>;

/**
 * VCL source rendered as syntax-highlighted HTML
 */
export const VclContentSchema = z.object({
  content: OptionalTextSchema,
});
export type VclContent = z.infer<typeof VclContentSchema>;

// =============================================================================
// WORDPRESS
// =============================================================================

export const WordpressSchema = z.object({
  ...VersionScopedFields,
  path: OptionalTextSchema,
  comment: OptionalTextSchema,
});
export type Wordpress = z.infer<typeof WordpressSchema>;

export const CreateWordpressInputSchema = z.object({
  name: ObjectNameSchema,
  path: z.string().startsWith('/'),
  comment: z.string().optional(),
});
export type CreateWordpressInput = z.input<typeof CreateWordpressInputSchema>;

export const UpdateWordpressInputSchema = CreateWordpressInputSchema.partial();
export type UpdateWordpressInput = z.input<typeof UpdateWordpressInputSchema>;

// =============================================================================
// BACKEND HEALTH
// =============================================================================

/**
 * `[backend, request, response]` triples from `backend/check_all`
 */
export const BackendCheckSchema = z
  .tuple([BackendSchema, z.record(z.unknown()), z.record(z.unknown())])
  .transform(([backend, request, response]) => ({ backend, request, response }));
export type BackendCheck = z.infer<typeof BackendCheckSchema>;
