/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                          CONTROL-PLANE CLIENT                                 ║
 * ║                                                                               ║
 * ║  One transport shared by the version lifecycle manager, a repository per     ║
 * ║  configuration kind, the purge controller and the account directory.         ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 */

import { loadFastlyEnv } from '@edgeconf/core';
import type { FastlyClientOptions, LoginCredentials } from '@edgeconf/types';

import { ContentInspector, EventLogReader, StatsReader } from './directory/insights.js';
import { CustomerDirectory } from './directory/customers.js';
import { ServiceDirectory } from './directory/services.js';
import { UserDirectory } from './directory/users.js';
import { PurgeController } from './purge.js';
import { BackendRepository } from './resources/backends.js';
import {
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
import { DirectorRepository } from './resources/directors.js';
import { DomainRepository } from './resources/domains.js';
import { VclRepository } from './resources/vcls.js';
import { FastlyTransport } from './transport.js';
import { VersionLifecycleManager } from './versions/lifecycle.js';
import { VersionSettingsRepository } from './versions/settings.js';
import { VersionApi } from './versions/version-api.js';

export interface FastlyClient {
  transport: FastlyTransport;
  versions: VersionLifecycleManager;
  settings: VersionSettingsRepository;

  backends: BackendRepository;
  cacheSettings: CacheSettingsRepository;
  conditions: ConditionRepository;
  directors: DirectorRepository;
  domains: DomainRepository;
  headers: HeaderRepository;
  healthchecks: HealthcheckRepository;
  requestSettings: RequestSettingsRepository;
  responseObjects: ResponseObjectRepository;
  syslogs: SyslogRepository;
  vcls: VclRepository;
  wordpress: WordpressRepository;

  purge: PurgeController;
  services: ServiceDirectory;
  customers: CustomerDirectory;
  users: UserDirectory;
  events: EventLogReader;
  stats: StatsReader;
  content: ContentInspector;
}

/**
 * Create a configured client
 *
 * The client owns one transport and therefore one session. Give each
 * concurrent actor its own client instead of sharing one across workflows.
 *
 * @example
 * ```typescript
 * const client = createFastlyClient({ apiKey: process.env.FASTLY_API_KEY ?? '' });
 * const latest = await client.versions.getLatestVersion(serviceId);
 * const draft = await client.versions.ensureMutable(serviceId, latest);
 * await client.backends.create(serviceId, draft.number, { name: 'origin', address: '10.0.0.1' });
 * await client.versions.activate(serviceId, draft);
 * ```
 */
export function createFastlyClient(options: FastlyClientOptions): FastlyClient {
  const transport = new FastlyTransport(options);
  const vcls = new VclRepository(transport);

  return {
    transport,
    versions: new VersionLifecycleManager(new VersionApi(transport), vcls),
    settings: new VersionSettingsRepository(transport),

    backends: new BackendRepository(transport),
    directors: new DirectorRepository(transport),
    domains: new DomainRepository(transport),
    vcls,
    ...createPlainRepositories(transport),

    purge: new PurgeController(transport),
    services: new ServiceDirectory(transport),
    customers: new CustomerDirectory(transport),
    users: new UserDirectory(transport),
    events: new EventLogReader(transport),
    stats: new StatsReader(transport),
    content: new ContentInspector(transport),
  };
}

/**
 * Create a client and, when credentials are given, log in for full access
 */
export async function connect(
  apiKey: string,
  login?: LoginCredentials,
  options: Omit<FastlyClientOptions, 'apiKey'> = {}
): Promise<FastlyClient> {
  const client = createFastlyClient({ ...options, apiKey });
  if (login) {
    await client.transport.login(login);
  }
  return client;
}

export interface FastlyCredentials {
  options: FastlyClientOptions;
  login?: LoginCredentials;
}

/**
 * Get client options and optional login credentials from environment variables
 *
 * @throws ConfigurationError if required environment variables are missing or invalid
 */
export function getFastlyCredentials(env: NodeJS.ProcessEnv = process.env): FastlyCredentials {
  const parsed = loadFastlyEnv(env);

  const options: FastlyClientOptions = {
    apiKey: parsed.FASTLY_API_KEY,
    baseUrl: parsed.FASTLY_API_BASE_URL,
    timeoutMs: parsed.FASTLY_TIMEOUT_MS,
  };

  if (parsed.FASTLY_USER !== undefined && parsed.FASTLY_PASSWORD !== undefined) {
    return { options, login: { user: parsed.FASTLY_USER, password: parsed.FASTLY_PASSWORD } };
  }
  return { options };
}
