/**
 * @edgeconf/client
 *
 * Control-plane API client: versioned service configuration, purging and
 * account management.
 */

export {
  createFastlyClient,
  connect,
  getFastlyCredentials,
  type FastlyClient,
  type FastlyCredentials,
} from './fastly-client.js';

export {
  FastlyTransport,
  API_KEY_HEADER,
  SESSION_COOKIE_PATTERN,
  errorFromResponse,
  assertStatusOk,
  failureStatusOf,
  type HttpMethod,
  type RequestOptions,
} from './transport.js';

export { encodeForm, apiPath, versionPath, type FormFields } from './form.js';

export { VersionApi, type ValidationReport } from './versions/version-api.js';
export {
  VersionLifecycleManager,
  latestVersion,
  type MutableVersion,
} from './versions/lifecycle.js';
export { VersionSettingsRepository } from './versions/settings.js';

export { VersionedResource, type ResourceDefinition } from './resources/versioned-resource.js';
export {
  backendDefinition,
  cacheSettingsDefinition,
  conditionDefinition,
  directorDefinition,
  domainDefinition,
  headerDefinition,
  healthcheckDefinition,
  requestSettingsDefinition,
  responseObjectDefinition,
  syslogDefinition,
  vclDefinition,
  wordpressDefinition,
  createPlainRepositories,
  type CacheSettingsRepository,
  type ConditionRepository,
  type HeaderRepository,
  type HealthcheckRepository,
  type RequestSettingsRepository,
  type ResponseObjectRepository,
  type SyslogRepository,
  type WordpressRepository,
} from './resources/definitions.js';
export { BackendRepository } from './resources/backends.js';
export { DirectorRepository } from './resources/directors.js';
export { DomainRepository } from './resources/domains.js';
export { VclRepository, type GetVclOptions } from './resources/vcls.js';

export { PurgeController } from './purge.js';

export { ServiceDirectory } from './directory/services.js';
export { CustomerDirectory } from './directory/customers.js';
export { UserDirectory } from './directory/users.js';
export { EventLogReader, StatsReader, ContentInspector } from './directory/insights.js';

export {
  deployVcl,
  DeployVclOptionsSchema,
  type DeployVclOptions,
  type DeployVclResult,
} from './workflows/deploy-vcl.js';
