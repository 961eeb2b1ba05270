import {
  BackendSchema,
  CacheSettingsSchema,
  ConditionSchema,
  CreateBackendInputSchema,
  CreateCacheSettingsInputSchema,
  CreateConditionInputSchema,
  CreateDirectorInputSchema,
  CreateDomainInputSchema,
  CreateHeaderInputSchema,
  CreateHealthcheckInputSchema,
  CreateRequestSettingsInputSchema,
  CreateResponseObjectInputSchema,
  CreateSyslogInputSchema,
  CreateVclInputSchema,
  CreateWordpressInputSchema,
  DirectorSchema,
  DomainSchema,
  HeaderSchema,
  HealthcheckSchema,
  RequestSettingsSchema,
  ResponseObjectSchema,
  SyslogSchema,
  UpdateBackendInputSchema,
  UpdateCacheSettingsInputSchema,
  UpdateConditionInputSchema,
  UpdateDirectorInputSchema,
  UpdateDomainInputSchema,
  UpdateHeaderInputSchema,
  UpdateHealthcheckInputSchema,
  UpdateRequestSettingsInputSchema,
  UpdateResponseObjectInputSchema,
  UpdateSyslogInputSchema,
  UpdateVclInputSchema,
  UpdateWordpressInputSchema,
  VclSchema,
  WordpressSchema,
} from '@edgeconf/types';

import { VersionedResource } from './versioned-resource.js';
import type { FastlyTransport } from '../transport.js';

// =============================================================================
// DEFINITIONS
// =============================================================================

export const backendDefinition = {
  segment: 'backend',
  label: 'backend',
  schema: BackendSchema,
  createSchema: CreateBackendInputSchema,
  updateSchema: UpdateBackendInputSchema,
};

export const cacheSettingsDefinition = {
  segment: 'cache_settings',
  label: 'cache settings',
  schema: CacheSettingsSchema,
  createSchema: CreateCacheSettingsInputSchema,
  updateSchema: UpdateCacheSettingsInputSchema,
};

export const conditionDefinition = {
  segment: 'condition',
  label: 'condition',
  schema: ConditionSchema,
  createSchema: CreateConditionInputSchema,
  updateSchema: UpdateConditionInputSchema,
};

export const directorDefinition = {
  segment: 'director',
  label: 'director',
  schema: DirectorSchema,
  createSchema: CreateDirectorInputSchema,
  updateSchema: UpdateDirectorInputSchema,
};

export const domainDefinition = {
  segment: 'domain',
  label: 'domain',
  schema: DomainSchema,
  createSchema: CreateDomainInputSchema,
  updateSchema: UpdateDomainInputSchema,
};

export const headerDefinition = {
  segment: 'header',
  label: 'header',
  schema: HeaderSchema,
  createSchema: CreateHeaderInputSchema,
  updateSchema: UpdateHeaderInputSchema,
};

export const healthcheckDefinition = {
  segment: 'healthcheck',
  label: 'healthcheck',
  schema: HealthcheckSchema,
  createSchema: CreateHealthcheckInputSchema,
  updateSchema: UpdateHealthcheckInputSchema,
};

export const requestSettingsDefinition = {
  segment: 'request_settings',
  label: 'request settings',
  schema: RequestSettingsSchema,
  createSchema: CreateRequestSettingsInputSchema,
  updateSchema: UpdateRequestSettingsInputSchema,
};

export const responseObjectDefinition = {
  segment: 'response_object',
  label: 'response object',
  schema: ResponseObjectSchema,
  createSchema: CreateResponseObjectInputSchema,
  updateSchema: UpdateResponseObjectInputSchema,
};

export const syslogDefinition = {
  segment: 'syslog',
  label: 'syslog',
  schema: SyslogSchema,
  createSchema: CreateSyslogInputSchema,
  updateSchema: UpdateSyslogInputSchema,
};

export const vclDefinition = {
  segment: 'vcl',
  label: 'VCL',
  schema: VclSchema,
  createSchema: CreateVclInputSchema,
  updateSchema: UpdateVclInputSchema,
};

export const wordpressDefinition = {
  segment: 'wordpress',
  label: 'wordpress',
  schema: WordpressSchema,
  createSchema: CreateWordpressInputSchema,
  updateSchema: UpdateWordpressInputSchema,
};

// =============================================================================
// PLAIN REPOSITORIES
// =============================================================================

export type CacheSettingsRepository = VersionedResource<
  typeof CacheSettingsSchema,
  typeof CreateCacheSettingsInputSchema,
  typeof UpdateCacheSettingsInputSchema
>;
export type ConditionRepository = VersionedResource<
  typeof ConditionSchema,
  typeof CreateConditionInputSchema,
  typeof UpdateConditionInputSchema
>;
export type HeaderRepository = VersionedResource<
  typeof HeaderSchema,
  typeof CreateHeaderInputSchema,
  typeof UpdateHeaderInputSchema
>;
export type HealthcheckRepository = VersionedResource<
  typeof HealthcheckSchema,
  typeof CreateHealthcheckInputSchema,
  typeof UpdateHealthcheckInputSchema
>;
export type RequestSettingsRepository = VersionedResource<
  typeof RequestSettingsSchema,
  typeof CreateRequestSettingsInputSchema,
  typeof UpdateRequestSettingsInputSchema
>;
export type ResponseObjectRepository = VersionedResource<
  typeof ResponseObjectSchema,
  typeof CreateResponseObjectInputSchema,
  typeof UpdateResponseObjectInputSchema
>;
export type SyslogRepository = VersionedResource<
  typeof SyslogSchema,
  typeof CreateSyslogInputSchema,
  typeof UpdateSyslogInputSchema
>;
export type WordpressRepository = VersionedResource<
  typeof WordpressSchema,
  typeof CreateWordpressInputSchema,
  typeof UpdateWordpressInputSchema
>;

/**
 * Repositories for the kinds that need nothing beyond CRUD
 */
export function createPlainRepositories(transport: FastlyTransport): {
  cacheSettings: CacheSettingsRepository;
  conditions: ConditionRepository;
  headers: HeaderRepository;
  healthchecks: HealthcheckRepository;
  requestSettings: RequestSettingsRepository;
  responseObjects: ResponseObjectRepository;
  syslogs: SyslogRepository;
  wordpress: WordpressRepository;
} {
  return {
    cacheSettings: new VersionedResource(transport, cacheSettingsDefinition),
    conditions: new VersionedResource(transport, conditionDefinition),
    headers: new VersionedResource(transport, headerDefinition),
    healthchecks: new VersionedResource(transport, healthcheckDefinition),
    requestSettings: new VersionedResource(transport, requestSettingsDefinition),
    responseObjects: new VersionedResource(transport, responseObjectDefinition),
    syslogs: new VersionedResource(transport, syslogDefinition),
    wordpress: new VersionedResource(transport, wordpressDefinition),
  };
}
