/**
 * @edgeconf/types
 *
 * Zod schemas and inferred types for every control-plane wire object.
 * Response schemas normalize the API's loose scalar encodings; `Create*Input`
 * schemas are the closed field allow-lists the client transmits.
 */

export {
  ApiFlagSchema,
  ApiIntegerSchema,
  OptionalIntegerSchema,
  OptionalTextSchema,
  ObjectNameSchema,
  ServiceIdSchema,
  VersionNumberSchema,
  ApiStatusSchema,
  DateStampFields,
  entityDates,
  type ApiStatus,
  type DateStamped,
  type EntityDates,
} from './common.schema.js';

export {
  VersionSchema,
  CreateVersionInputSchema,
  UpdateVersionInputSchema,
  VersionValidationSchema,
  VersionSettingsSchema,
  UpdateVersionSettingsInputSchema,
  versionState,
  isMutable,
  type Version,
  type VersionState,
  type CreateVersionInput,
  type UpdateVersionInput,
  type VersionValidation,
  type VersionSettings,
  type UpdateVersionSettingsInput,
} from './version.schema.js';

export {
  CacheSettingsActionSchema,
  ConditionTypeSchema,
  HeaderActionSchema,
  HeaderTypeSchema,
  RequestSettingsActionSchema,
  ForwardedForActionSchema,
  DirectorType,
  DirectorTypeSchema,
  BackendSchema,
  CreateBackendInputSchema,
  UpdateBackendInputSchema,
  CacheSettingsSchema,
  CreateCacheSettingsInputSchema,
  UpdateCacheSettingsInputSchema,
  ConditionSchema,
  CreateConditionInputSchema,
  UpdateConditionInputSchema,
  DirectorSchema,
  CreateDirectorInputSchema,
  UpdateDirectorInputSchema,
  DirectorBackendSchema,
  DomainSchema,
  CreateDomainInputSchema,
  UpdateDomainInputSchema,
  DomainCheckSchema,
  HeaderSchema,
  CreateHeaderInputSchema,
  UpdateHeaderInputSchema,
  HealthcheckSchema,
  CreateHealthcheckInputSchema,
  UpdateHealthcheckInputSchema,
  RequestSettingsSchema,
  CreateRequestSettingsInputSchema,
  UpdateRequestSettingsInputSchema,
  ResponseObjectSchema,
  CreateResponseObjectInputSchema,
  UpdateResponseObjectInputSchema,
  SyslogSchema,
  CreateSyslogInputSchema,
  UpdateSyslogInputSchema,
  VclSchema,
  CreateVclInputSchema,
  UpdateVclInputSchema,
  GeneratedVclSchema,
  VclContentSchema,
  WordpressSchema,
  CreateWordpressInputSchema,
  UpdateWordpressInputSchema,
  BackendCheckSchema,
  type CacheSettingsAction,
  type ConditionType,
  type HeaderAction,
  type HeaderType,
  type RequestSettingsAction,
  type ForwardedForAction,
  type DirectorTypeValue,
  type Backend,
  type CreateBackendInput,
  type UpdateBackendInput,
  type CacheSettings,
  type CreateCacheSettingsInput,
  type UpdateCacheSettingsInput,
  type Condition,
  type CreateConditionInput,
  type UpdateConditionInput,
  type Director,
  type CreateDirectorInput,
  type UpdateDirectorInput,
  type DirectorBackend,
  type Domain,
  type CreateDomainInput,
  type UpdateDomainInput,
  type DomainCheck,
  type Header,
  type CreateHeaderInput,
  type UpdateHeaderInput,
  type Healthcheck,
  type CreateHealthcheckInput,
  type UpdateHealthcheckInput,
  type RequestSettings,
  type CreateRequestSettingsInput,
  type UpdateRequestSettingsInput,
  type ResponseObject,
  type CreateResponseObjectInput,
  type UpdateResponseObjectInput,
  type Syslog,
  type CreateSyslogInput,
  type UpdateSyslogInput,
  type Vcl,
  type CreateVclInput,
  type UpdateVclInput,
  type GeneratedVcl,
  type VclContent,
  type Wordpress,
  type CreateWordpressInput,
  type UpdateWordpressInput,
  type BackendCheck,
} from './config-object.schema.js';

export {
  ServiceSchema,
  CreateServiceInputSchema,
  UpdateServiceInputSchema,
  CustomerSchema,
  UpdateCustomerInputSchema,
  CustomerDetailsSchema,
  UserRoleSchema,
  UserSchema,
  CreateUserInputSchema,
  UpdateUserInputSchema,
  SessionSchema,
  EventLogSchema,
  StatsTypeSchema,
  StatsSchema,
  activeVersionOf,
  type Service,
  type CreateServiceInput,
  type UpdateServiceInput,
  type Customer,
  type UpdateCustomerInput,
  type CustomerDetails,
  type UserRole,
  type User,
  type CreateUserInput,
  type UpdateUserInput,
  type Session,
  type EventLog,
  type StatsType,
  type Stats,
} from './account.schema.js';

export {
  PurgeResultSchema,
  PurgeStatusSchema,
  SurrogateKeySchema,
  EdgeCheckSchema,
  type PurgeResult,
  type PurgeStatus,
  type EdgeCheck,
} from './purge.schema.js';

export {
  FastlyClientConfigSchema,
  LoginCredentialsSchema,
  type FastlyClientConfig,
  type FastlyClientOptions,
  type LoginCredentials,
} from './client-config.schema.js';
