import { http, HttpResponse, type HttpHandler, type PathParams } from 'msw';

/**
 * Stateful in-process stand-in for the control-plane API
 *
 * Holds services, versions and their configuration objects in memory and
 * enforces the server-side rules the client relies on: duplicate names are
 * 409, missing records are 404, writes to locked or active versions are
 * rejected, and activation fails while any object references an undefined
 * condition.
 */

export const FAKE_API_BASE_URL = 'https://api.fastly.com';

type Fields = Record<string, string>;

interface ResolverInfo {
  request: Request;
  params: PathParams;
}

type Resolver = (info: ResolverInfo) => Response | Promise<Response>;

interface FakeVersion {
  number: number;
  active: boolean;
  locked: boolean;
  deployed: boolean;
  comment: string;
  settings: Fields;
  /** segment -> name -> fields */
  objects: Map<string, Map<string, Fields>>;
  /** director name -> member backend names */
  directorBackends: Map<string, Set<string>>;
}

interface FakeService {
  id: string;
  name: string;
  customer_id: string;
  comment: string;
  versions: FakeVersion[];
}

interface FakeUser {
  id: string;
  name: string;
  login: string;
  password: string;
  role: string;
  customer_id: string;
  require_new_password: string;
}

export interface SeedVersion {
  active?: boolean;
  locked?: boolean;
}

export interface FakeFastlyApiOptions {
  apiKey: string;
  login: string;
  password: string;
  customerId?: string;
}

export const CONFIG_SEGMENTS = [
  'backend',
  'cache_settings',
  'condition',
  'director',
  'domain',
  'header',
  'healthcheck',
  'request_settings',
  'response_object',
  'syslog',
  'vcl',
  'wordpress',
] as const;

const CONDITION_REFERENCES: Record<string, readonly string[]> = {
  backend: ['request_condition'],
  cache_settings: ['cache_condition'],
  header: ['request_condition', 'cache_condition', 'response_condition'],
  request_settings: ['request_condition'],
  response_object: ['request_condition', 'cache_condition'],
  syslog: ['response_condition'],
};

const FIXED_TIMESTAMP = '2024-01-01T00:00:00Z';

// =============================================================================
// HELPERS
// =============================================================================

function param(params: PathParams, key: string): string {
  const value = params[key];
  return typeof value === 'string' ? value : '';
}

function apiError(status: number, msg: string, detail?: string): Response {
  return HttpResponse.json({ msg, detail: detail ?? null }, { status });
}

function ok(extra: Record<string, unknown> = {}): Response {
  return HttpResponse.json({ status: 'ok', ...extra });
}

// Stands in for the server's syntax highlighting of VCL source
function highlightVcl(source: string): string {
  const escaped = source.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
  return `<pre class="vcl">${escaped}</pre>`;
}

async function readForm(request: Request): Promise<Fields> {
  const body = new URLSearchParams(await request.text());
  return Object.fromEntries(body.entries());
}

function isConfigSegment(segment: string): boolean {
  return CONFIG_SEGMENTS.some((known) => known === segment);
}

function cloneObjects(objects: Map<string, Map<string, Fields>>): Map<string, Map<string, Fields>> {
  const copy = new Map<string, Map<string, Fields>>();
  for (const [segment, byName] of objects) {
    const entries = new Map<string, Fields>();
    for (const [name, fields] of byName) {
      entries.set(name, { ...fields });
    }
    copy.set(segment, entries);
  }
  return copy;
}

// =============================================================================
// FAKE API
// =============================================================================

export class FakeFastlyApi {
  readonly baseUrl = FAKE_API_BASE_URL;
  readonly sessionCookie = 'fastly.session=test-session';

  /** `METHOD /path` of every request received, in order */
  readonly requests: string[] = [];

  private services = new Map<string, FakeService>();
  private users = new Map<string, FakeUser>();
  private purges = new Map<string, { server: string; timestamp: string }[]>();
  private nextId = 1;
  private nextUserId = 2;

  constructor(private readonly options: FakeFastlyApiOptions) {
    this.reset();
  }

  get customerId(): string {
    return this.options.customerId ?? 'cust-1';
  }

  /**
   * Drop all state and reseed the account's owner user
   */
  reset(): void {
    this.services.clear();
    this.users.clear();
    this.purges.clear();
    this.requests.length = 0;
    this.nextId = 1;
    this.nextUserId = 2;
    this.users.set('user-1', {
      id: 'user-1',
      name: 'Account Owner',
      login: this.options.login,
      password: this.options.password,
      role: 'superuser',
      customer_id: this.customerId,
      require_new_password: '0',
    });
  }

  // ===========================================================================
  // SEEDING & INSPECTION
  // ===========================================================================

  /**
   * Add a service with one version per entry of `versions` (default: one draft)
   */
  seedService(name: string, versions: SeedVersion[] = [{}]): string {
    const id = `svc-${this.nextId++}`;
    this.services.set(id, {
      id,
      name,
      customer_id: this.customerId,
      comment: '',
      versions: versions.map((seed, index) => this.newVersion(index + 1, seed)),
    });
    return id;
  }

  /**
   * Store an object directly, bypassing lock checks
   */
  seedObject(
    serviceId: string,
    versionNumber: number,
    segment: string,
    fields: Fields & { name: string }
  ): void {
    const version = this.findVersion(serviceId, versionNumber);
    if (!version) {
      throw new Error(`No version ${versionNumber} on ${serviceId}`);
    }
    this.collection(version, segment).set(fields.name, { ...fields });
  }

  /**
   * Summary of each version's flags, in version order
   */
  versionStates(serviceId: string): { number: number; active: boolean; locked: boolean }[] {
    const service = this.services.get(serviceId);
    return (service?.versions ?? []).map(({ number, active, locked }) => ({
      number,
      active,
      locked,
    }));
  }

  storedObject(
    serviceId: string,
    versionNumber: number,
    segment: string,
    name: string
  ): Fields | undefined {
    return this.findVersion(serviceId, versionNumber)?.objects.get(segment)?.get(name);
  }

  handlers(): HttpHandler[] {
    return [
      ...this.authHandlers(),
      ...this.versionHandlers(),
      ...this.objectHandlers(),
      ...this.serviceHandlers(),
      ...this.purgeHandlers(),
      ...this.accountHandlers(),
    ];
  }

  // ===========================================================================
  // ROUTING
  // ===========================================================================

  private route(
    method: 'get' | 'post' | 'put' | 'delete',
    path: string,
    resolve: Resolver,
    options: { session?: boolean; anonymous?: boolean } = {}
  ): HttpHandler {
    return http[method](`${this.baseUrl}${path}`, async ({ request, params }) => {
      const url = new URL(request.url);
      this.requests.push(`${request.method} ${url.pathname}`);

      if (!options.anonymous) {
        const denied = this.authorize(request, options.session ?? false);
        if (denied) return denied;
      }
      return resolve({ request, params });
    });
  }

  private authorize(request: Request, sessionRequired: boolean): Response | undefined {
    const hasSession = request.headers.get('cookie') === this.sessionCookie;
    const hasKey = request.headers.get('x-fastly-key') === this.options.apiKey;

    if (!hasSession && !hasKey) {
      return apiError(401, 'Provided credentials are missing or invalid');
    }
    if (sessionRequired && !hasSession) {
      return apiError(403, 'Forbidden', 'This operation requires a logged-in user');
    }
    return undefined;
  }

  // ===========================================================================
  // AUTH
  // ===========================================================================

  private authHandlers(): HttpHandler[] {
    return [
      this.route(
        'post',
        '/login',
        async ({ request }) => {
          const form = await readForm(request);
          const user = [...this.users.values()].find((candidate) => candidate.login === form.user);
          if (!user || user.password !== form.password) {
            return apiError(400, 'Invalid username or password');
          }
          return HttpResponse.json(
            { customer: this.customerJson(), user: this.userJson(user) },
            { headers: { 'Set-Cookie': `${this.sessionCookie}; Path=/; HttpOnly; Secure` } }
          );
        },
        { anonymous: true }
      ),
    ];
  }

  // ===========================================================================
  // VERSIONS
  // ===========================================================================

  private versionHandlers(): HttpHandler[] {
    const base = '/service/:serviceId/version';
    const one = `${base}/:version`;

    return [
      this.route('get', base, ({ params }) => {
        const service = this.services.get(param(params, 'serviceId'));
        if (!service) return apiError(404, 'Record not found', 'Service not found');
        return HttpResponse.json(service.versions.map((v) => this.versionJson(service, v)));
      }),

      this.route('post', base, async ({ request, params }) => {
        const service = this.services.get(param(params, 'serviceId'));
        if (!service) return apiError(404, 'Record not found', 'Service not found');
        const form = await readForm(request);
        const version = this.newVersion(this.nextVersionNumber(service), {});
        version.comment = form.comment ?? '';
        service.versions.push(version);
        return HttpResponse.json(this.versionJson(service, version));
      }),

      this.route('get', one, ({ params }) =>
        this.withVersion(params, (service, version) =>
          HttpResponse.json(this.versionJson(service, version))
        )
      ),

      this.route('put', one, ({ request, params }) =>
        this.withVersion(params, async (service, version) => {
          const form = await readForm(request);
          if (form.comment !== undefined) version.comment = form.comment;
          return HttpResponse.json(this.versionJson(service, version));
        })
      ),

      this.route('delete', one, ({ params }) =>
        this.withVersion(params, (service, version) => {
          if (version.active) {
            return apiError(400, 'Bad request', 'Cannot delete the active version');
          }
          service.versions = service.versions.filter((v) => v !== version);
          return ok();
        })
      ),

      this.route('put', `${one}/clone`, ({ params }) =>
        this.withVersion(params, (service, version) => {
          const clone = this.newVersion(this.nextVersionNumber(service), {});
          clone.comment = version.comment;
          clone.settings = { ...version.settings };
          clone.objects = cloneObjects(version.objects);
          for (const [director, members] of version.directorBackends) {
            clone.directorBackends.set(director, new Set(members));
          }
          service.versions.push(clone);
          return HttpResponse.json(this.versionJson(service, clone));
        })
      ),

      this.route('put', `${one}/activate`, ({ params }) =>
        this.withVersion(params, (service, version) => {
          const errors = this.configErrors(version);
          if (errors.length > 0) {
            return apiError(400, 'Version has errors', errors.join('; '));
          }
          for (const other of service.versions) {
            other.active = false;
          }
          version.active = true;
          version.locked = true;
          version.deployed = true;
          return HttpResponse.json(this.versionJson(service, version));
        })
      ),

      this.route('put', `${one}/deactivate`, ({ params }) =>
        this.withVersion(params, (service, version) => {
          version.active = false;
          return HttpResponse.json(this.versionJson(service, version));
        })
      ),

      this.route(
        'put',
        `${one}/lock`,
        ({ params }) =>
          this.withVersion(params, (service, version) => {
            version.locked = true;
            return HttpResponse.json(this.versionJson(service, version));
          }),
        { session: true }
      ),

      this.route('get', `${one}/validate`, ({ params }) =>
        this.withVersion(params, (_service, version) => {
          const errors = this.configErrors(version);
          if (errors.length > 0) {
            return HttpResponse.json({
              status: 'error',
              msg: 'Version has errors',
              detail: null,
              errors,
              warnings: [],
            });
          }
          return HttpResponse.json({ status: 'ok', msg: null, errors: [], warnings: [] });
        })
      ),

      this.route('get', `${one}/settings`, ({ params }) =>
        this.withVersion(params, (service, version) =>
          HttpResponse.json(this.settingsJson(service, version))
        )
      ),

      this.route('put', `${one}/settings`, ({ request, params }) =>
        this.withVersion(params, async (service, version) => {
          if (!this.isWritable(version)) return this.lockedError(service, version);
          version.settings = { ...version.settings, ...(await readForm(request)) };
          return HttpResponse.json(this.settingsJson(service, version));
        })
      ),

      this.route('get', `${one}/generated_vcl`, ({ params }) =>
        this.withVersion(params, (service, version) =>
          HttpResponse.json({
            service_id: service.id,
            version: version.number,
            content: `# generated for ${service.id} version ${version.number}`,
          })
        )
      ),

      this.route('get', `${one}/generated_vcl/content`, ({ params }) =>
        this.withVersion(params, (service, version) =>
          HttpResponse.json({
            content: highlightVcl(`# generated for ${service.id} version ${version.number}`),
          })
        )
      ),
    ];
  }

  // ===========================================================================
  // CONFIGURATION OBJECTS
  // ===========================================================================

  private objectHandlers(): HttpHandler[] {
    const one = '/service/:serviceId/version/:version';

    return [
      this.route('get', `${one}/backend/check_all`, ({ params }) =>
        this.withVersion(params, (service, version) =>
          HttpResponse.json(
            [...this.collection(version, 'backend').values()].map((fields) => [
              this.objectJson(service, version, 'backend', fields),
              { host: fields.address ?? '' },
              { status: 200 },
            ])
          )
        )
      ),

      this.route('get', `${one}/domain/check_all`, ({ params }) =>
        this.withVersion(params, (service, version) =>
          HttpResponse.json(
            [...this.collection(version, 'domain').values()].map((fields) =>
              this.domainCheckJson(service, version, fields)
            )
          )
        )
      ),

      this.route('get', `${one}/domain/:name/check`, ({ params }) =>
        this.withObject(params, 'domain', (service, version, fields) =>
          HttpResponse.json(this.domainCheckJson(service, version, fields))
        )
      ),

      this.route('get', `${one}/vcl/:name/content`, ({ params }) =>
        this.withObject(params, 'vcl', (_service, _version, fields) =>
          HttpResponse.json({ content: highlightVcl(fields.content ?? '') })
        )
      ),

      this.route('put', `${one}/vcl/:name/main`, ({ params }) =>
        this.withObject(params, 'vcl', (service, version, fields) => {
          if (!this.isWritable(version)) return this.lockedError(service, version);
          for (const other of this.collection(version, 'vcl').values()) {
            other.main = '0';
          }
          fields.main = '1';
          return HttpResponse.json(this.objectJson(service, version, 'vcl', fields));
        })
      ),

      ...this.directorBackendHandlers(),

      this.route('get', `${one}/:segment`, ({ params }) =>
        this.withVersion(params, (service, version) => {
          const segment = param(params, 'segment');
          if (!isConfigSegment(segment)) return apiError(404, 'Not found');
          return HttpResponse.json(
            [...this.collection(version, segment).values()].map((fields) =>
              this.objectJson(service, version, segment, fields)
            )
          );
        })
      ),

      this.route('post', `${one}/:segment`, ({ request, params }) =>
        this.withVersion(params, async (service, version) => {
          const segment = param(params, 'segment');
          if (!isConfigSegment(segment)) return apiError(404, 'Not found');
          if (!this.isWritable(version)) return this.lockedError(service, version);

          const fields = await readForm(request);
          const name = fields.name;
          if (!name) return apiError(400, 'Bad request', 'name is required');

          const objects = this.collection(version, segment);
          if (objects.has(name)) {
            return apiError(409, 'Duplicate record', `Duplicate ${segment}: '${name}'`);
          }
          if (segment === 'vcl' && fields.main === '1') {
            for (const other of objects.values()) other.main = '0';
          }
          objects.set(name, fields);
          return HttpResponse.json(this.objectJson(service, version, segment, fields));
        })
      ),

      this.route('get', `${one}/:segment/:name`, ({ request, params }) =>
        this.withObject(params, param(params, 'segment'), (service, version, fields) => {
          const segment = param(params, 'segment');
          const body = this.objectJson(service, version, segment, fields);
          const includeContent = new URL(request.url).searchParams.get('include_content');
          if (segment === 'vcl' && includeContent === '0') {
            return HttpResponse.json(
              Object.fromEntries(Object.entries(body).filter(([key]) => key !== 'content'))
            );
          }
          return HttpResponse.json(body);
        })
      ),

      this.route('put', `${one}/:segment/:name`, ({ request, params }) =>
        this.withObject(params, param(params, 'segment'), async (service, version, fields) => {
          if (!this.isWritable(version)) return this.lockedError(service, version);
          const segment = param(params, 'segment');
          const changes = await readForm(request);
          const objects = this.collection(version, segment);

          const currentName = param(params, 'name');
          const nextName = changes.name ?? currentName;
          if (nextName !== currentName && objects.has(nextName)) {
            return apiError(409, 'Duplicate record', `Duplicate ${segment}: '${nextName}'`);
          }

          const updated = { ...fields, ...changes, name: nextName };
          objects.delete(currentName);
          objects.set(nextName, updated);
          return HttpResponse.json(this.objectJson(service, version, segment, updated));
        })
      ),

      this.route('delete', `${one}/:segment/:name`, ({ params }) =>
        this.withObject(params, param(params, 'segment'), (service, version) => {
          if (!this.isWritable(version)) return this.lockedError(service, version);
          const segment = param(params, 'segment');
          const name = param(params, 'name');
          this.collection(version, segment).delete(name);
          if (segment === 'backend') {
            for (const members of version.directorBackends.values()) members.delete(name);
          }
          if (segment === 'director') {
            version.directorBackends.delete(name);
          }
          return ok();
        })
      ),
    ];
  }

  private directorBackendHandlers(): HttpHandler[] {
    const path = '/service/:serviceId/version/:version/director/:name/backend/:backend';

    const membership = (
      params: PathParams,
      respond: (
        service: FakeService,
        version: FakeVersion,
        members: Set<string>,
        backend: string
      ) => Response
    ): Response | Promise<Response> =>
      this.withObject(params, 'director', (service, version) => {
        const backend = param(params, 'backend');
        if (!this.collection(version, 'backend').has(backend)) {
          return apiError(404, 'Record not found', `Couldn't find backend '${backend}'`);
        }
        const director = param(params, 'name');
        const members = version.directorBackends.get(director) ?? new Set<string>();
        version.directorBackends.set(director, members);
        return respond(service, version, members, backend);
      });

    const memberJson = (
      service: FakeService,
      version: FakeVersion,
      backend: string,
      params: PathParams
    ): Record<string, unknown> => ({
      service_id: service.id,
      version: version.number,
      director: param(params, 'name'),
      backend,
      created_at: FIXED_TIMESTAMP,
    });

    return [
      this.route('get', path, ({ params }) =>
        membership(params, (service, version, members, backend) => {
          if (!members.has(backend)) {
            return apiError(404, 'Record not found', `Backend '${backend}' is not in director`);
          }
          return HttpResponse.json(memberJson(service, version, backend, params));
        })
      ),

      this.route('post', path, ({ params }) =>
        membership(params, (service, version, members, backend) => {
          if (!this.isWritable(version)) return this.lockedError(service, version);
          if (members.has(backend)) {
            return apiError(409, 'Duplicate record', `Backend '${backend}' is already in director`);
          }
          members.add(backend);
          return HttpResponse.json(memberJson(service, version, backend, params));
        })
      ),

      this.route('delete', path, ({ params }) =>
        membership(params, (service, version, members, backend) => {
          if (!this.isWritable(version)) return this.lockedError(service, version);
          if (!members.delete(backend)) {
            return apiError(404, 'Record not found', `Backend '${backend}' is not in director`);
          }
          return ok();
        })
      ),
    ];
  }

  // ===========================================================================
  // SERVICES
  // ===========================================================================

  private serviceHandlers(): HttpHandler[] {
    return [
      this.route('get', '/service/search', ({ request }) => {
        const name = new URL(request.url).searchParams.get('name');
        const service = [...this.services.values()].find((candidate) => candidate.name === name);
        if (!service) return apiError(404, 'Record not found', `Couldn't find service '${name}'`);
        return HttpResponse.json(this.serviceJson(service));
      }),

      this.route('get', '/service', () =>
        HttpResponse.json([...this.services.values()].map((service) => this.serviceJson(service)))
      ),

      this.route('post', '/service', async ({ request }) => {
        const form = await readForm(request);
        if (!form.name) return apiError(400, 'Bad request', 'name is required');
        const id = this.seedService(form.name);
        const service = this.services.get(id);
        if (!service) return apiError(500, 'Internal error');
        service.comment = form.comment ?? '';
        return HttpResponse.json(this.serviceJson(service));
      }),

      this.route('get', '/service/:serviceId', ({ params }) =>
        this.withService(params, (service) => HttpResponse.json(this.serviceJson(service)))
      ),

      this.route('get', '/service/:serviceId/details', ({ params }) =>
        this.withService(params, (service) => HttpResponse.json(this.serviceJson(service)))
      ),

      this.route('put', '/service/:serviceId', ({ request, params }) =>
        this.withService(params, async (service) => {
          const form = await readForm(request);
          if (form.name !== undefined) service.name = form.name;
          if (form.comment !== undefined) service.comment = form.comment;
          return HttpResponse.json(this.serviceJson(service));
        })
      ),

      this.route('delete', '/service/:serviceId', ({ params }) =>
        this.withService(params, (service) => {
          this.services.delete(service.id);
          return ok();
        })
      ),

      this.route('get', '/service/:serviceId/domain', ({ params }) =>
        this.withService(params, (service) =>
          HttpResponse.json(
            service.versions.flatMap((version) =>
              [...this.collection(version, 'domain').values()].map((fields) =>
                this.objectJson(service, version, 'domain', fields)
              )
            )
          )
        )
      ),

      this.route('get', '/service/:serviceId/stats/:type', ({ params }) =>
        this.withService(params, (service) =>
          HttpResponse.json({
            service_id: service.id,
            type: param(params, 'type'),
            requests: 0,
            hits: 0,
            miss: 0,
          })
        )
      ),
    ];
  }

  // ===========================================================================
  // PURGE
  // ===========================================================================

  private purgeHandlers(): HttpHandler[] {
    return [
      this.route('post', '/service/:serviceId/purge_all', ({ params }) =>
        this.withService(params, () => ok())
      ),

      this.route('post', '/service/:serviceId/purge/:key', ({ params }) =>
        this.withService(params, () => {
          const id = `purge-${this.nextId++}`;
          this.purges.set(id, [{ server: 'cache-edge-1', timestamp: FIXED_TIMESTAMP }]);
          return ok({ id, key: param(params, 'key') });
        })
      ),

      this.route('get', '/purge', ({ request }) => {
        const id = new URL(request.url).searchParams.get('id') ?? '';
        return HttpResponse.json(this.purges.get(id) ?? []);
      }),
    ];
  }

  // ===========================================================================
  // ACCOUNT
  // ===========================================================================

  private accountHandlers(): HttpHandler[] {
    return [
      this.route('get', '/current_customer', () => HttpResponse.json(this.customerJson())),

      this.route('get', '/customer/details/:customerId', ({ params }) =>
        this.withCustomer(params, () =>
          HttpResponse.json({
            customer: this.customerJson(),
            owner: this.userJson(this.ownerUser()),
            billing_contact: null,
          })
        )
      ),

      this.route('get', '/customer/users/:customerId', ({ params }) =>
        this.withCustomer(params, () =>
          HttpResponse.json([...this.users.values()].map((user) => this.userJson(user)))
        )
      ),

      this.route('get', '/customer/:customerId', ({ params }) =>
        this.withCustomer(params, () => HttpResponse.json(this.customerJson()))
      ),

      this.route(
        'put',
        '/customer/:customerId',
        ({ request, params }) =>
          this.withCustomer(params, async () => {
            const form = await readForm(request);
            return HttpResponse.json({ ...this.customerJson(), ...form });
          }),
        { session: true }
      ),

      this.route(
        'delete',
        '/customer/:customerId',
        ({ params }) => this.withCustomer(params, () => ok()),
        { session: true }
      ),

      this.route('get', '/current_user', () => HttpResponse.json(this.userJson(this.ownerUser()))),

      this.route(
        'post',
        '/current_user/password',
        async ({ request }) => {
          const form = await readForm(request);
          const owner = this.ownerUser();
          if (form.old_password !== owner.password) {
            return apiError(400, 'Old password is incorrect');
          }
          owner.password = form.password ?? owner.password;
          return HttpResponse.json(this.userJson(owner));
        },
        { session: true }
      ),

      this.route(
        'post',
        '/user',
        async ({ request }) => {
          const form = await readForm(request);
          if ([...this.users.values()].some((user) => user.login === form.login)) {
            return apiError(409, 'Duplicate record', `Login '${form.login}' is taken`);
          }
          const user: FakeUser = {
            id: `user-${this.nextUserId++}`,
            name: form.name ?? '',
            login: form.login ?? '',
            password: form.password ?? '',
            role: form.role ?? 'user',
            customer_id: form.customer_id ?? this.customerId,
            require_new_password: form.require_new_password ?? '1',
          };
          this.users.set(user.id, user);
          return HttpResponse.json(this.userJson(user));
        },
        { session: true }
      ),

      this.route('get', '/user/:userId', ({ params }) =>
        this.withUser(params, (user) => HttpResponse.json(this.userJson(user)))
      ),

      this.route(
        'put',
        '/user/:userId',
        ({ request, params }) =>
          this.withUser(params, async (user) => {
            const form = await readForm(request);
            if (form.name !== undefined) user.name = form.name;
            if (form.login !== undefined) user.login = form.login;
            if (form.role !== undefined) user.role = form.role;
            if (form.require_new_password !== undefined) {
              user.require_new_password = form.require_new_password;
            }
            return HttpResponse.json(this.userJson(user));
          }),
        { session: true }
      ),

      this.route(
        'delete',
        '/user/:userId',
        ({ params }) =>
          this.withUser(params, (user) => {
            this.users.delete(user.id);
            return ok();
          }),
        { session: true }
      ),

      this.route('post', '/user/:userId/password/request_reset', ({ params }) =>
        this.withUser(params, () => ok())
      ),

      this.route('get', '/event_log/:eventId', ({ params }) =>
        HttpResponse.json({
          id: param(params, 'eventId'),
          object_type: 'version',
          message: 'Version activated',
          level: 'info',
          timestamp: FIXED_TIMESTAMP,
          system: 'control-plane',
          subsystem: 'versions',
        })
      ),

      this.route('get', '/content/edge_check/*', ({ request }) => {
        const target = new URL(request.url).pathname.replace('/content/edge_check/', '');
        return HttpResponse.json([
          {
            pop: 'FRA',
            server: 'cache-fra-1',
            hash: `hash-of-${target}`,
            response: { status: 200, headers: { 'content-type': 'text/html' } },
          },
        ]);
      }),
    ];
  }

  // ===========================================================================
  // STATE ACCESS
  // ===========================================================================

  private newVersion(number: number, seed: SeedVersion): FakeVersion {
    return {
      number,
      active: seed.active ?? false,
      locked: (seed.locked ?? false) || (seed.active ?? false),
      deployed: seed.active ?? false,
      comment: '',
      settings: { 'general.default_ttl': '3600', 'general.default_host': '' },
      objects: new Map(),
      directorBackends: new Map(),
    };
  }

  private nextVersionNumber(service: FakeService): number {
    return service.versions.reduce((max, version) => Math.max(max, version.number), 0) + 1;
  }

  private findVersion(serviceId: string, versionNumber: number): FakeVersion | undefined {
    return this.services.get(serviceId)?.versions.find((v) => v.number === versionNumber);
  }

  private collection(version: FakeVersion, segment: string): Map<string, Fields> {
    const existing = version.objects.get(segment);
    if (existing) return existing;
    const created = new Map<string, Fields>();
    version.objects.set(segment, created);
    return created;
  }

  private ownerUser(): FakeUser {
    const owner = this.users.get('user-1');
    if (!owner) throw new Error('Owner user missing from fake state');
    return owner;
  }

  private isWritable(version: FakeVersion): boolean {
    return !version.locked && !version.active;
  }

  private lockedError(service: FakeService, version: FakeVersion): Response {
    return apiError(
      400,
      'Version locked',
      `Version ${version.number} of service ${service.id} is locked and cannot be edited`
    );
  }

  private configErrors(version: FakeVersion): string[] {
    const conditions = this.collection(version, 'condition');
    const errors: string[] = [];

    for (const [segment, fieldNames] of Object.entries(CONDITION_REFERENCES)) {
      for (const [name, fields] of this.collection(version, segment)) {
        for (const fieldName of fieldNames) {
          const reference = fields[fieldName];
          if (reference && !conditions.has(reference)) {
            errors.push(
              `Condition '${reference}' referenced by ${segment} '${name}' does not exist`
            );
          }
        }
      }
    }
    return errors;
  }

  private withService(
    params: PathParams,
    respond: (service: FakeService) => Response | Promise<Response>
  ): Response | Promise<Response> {
    const serviceId = param(params, 'serviceId');
    const service = this.services.get(serviceId);
    if (!service) return apiError(404, 'Record not found', `Couldn't find service '${serviceId}'`);
    return respond(service);
  }

  private withVersion(
    params: PathParams,
    respond: (service: FakeService, version: FakeVersion) => Response | Promise<Response>
  ): Response | Promise<Response> {
    return this.withService(params, (service) => {
      const versionNumber = Number(param(params, 'version'));
      const version = service.versions.find((v) => v.number === versionNumber);
      if (!version) {
        return apiError(404, 'Record not found', `Couldn't find version ${versionNumber}`);
      }
      return respond(service, version);
    });
  }

  private withObject(
    params: PathParams,
    segment: string,
    respond: (
      service: FakeService,
      version: FakeVersion,
      fields: Fields
    ) => Response | Promise<Response>
  ): Response | Promise<Response> {
    return this.withVersion(params, (service, version) => {
      if (!isConfigSegment(segment)) return apiError(404, 'Not found');
      const name = param(params, 'name');
      const fields = this.collection(version, segment).get(name);
      if (!fields) {
        return apiError(404, 'Record not found', `Couldn't find ${segment} '${name}'`);
      }
      return respond(service, version, fields);
    });
  }

  private withCustomer(
    params: PathParams,
    respond: () => Response | Promise<Response>
  ): Response | Promise<Response> {
    const customerId = param(params, 'customerId');
    if (customerId !== this.customerId) {
      return apiError(404, 'Record not found', `Couldn't find customer '${customerId}'`);
    }
    return respond();
  }

  private withUser(
    params: PathParams,
    respond: (user: FakeUser) => Response | Promise<Response>
  ): Response | Promise<Response> {
    const userId = param(params, 'userId');
    const user = this.users.get(userId);
    if (!user) return apiError(404, 'Record not found', `Couldn't find user '${userId}'`);
    return respond(user);
  }

  // ===========================================================================
  // SERIALIZATION
  // ===========================================================================

  private versionJson(service: FakeService, version: FakeVersion): Record<string, unknown> {
    return {
      number: version.number,
      service_id: service.id,
      active: version.active,
      locked: version.locked,
      deployed: version.deployed,
      staging: false,
      testing: false,
      comment: version.comment,
      created_at: FIXED_TIMESTAMP,
      updated_at: FIXED_TIMESTAMP,
    };
  }

  private settingsJson(service: FakeService, version: FakeVersion): Record<string, unknown> {
    return { ...version.settings, service_id: service.id, version: version.number };
  }

  private objectJson(
    service: FakeService,
    version: FakeVersion,
    segment: string,
    fields: Fields
  ): Record<string, unknown> {
    const body: Record<string, unknown> = {
      ...fields,
      service_id: service.id,
      version: version.number,
      created_at: FIXED_TIMESTAMP,
    };
    if (segment === 'director') {
      body.backends = [...(version.directorBackends.get(fields.name ?? '') ?? [])];
    }
    return body;
  }

  private domainCheckJson(service: FakeService, version: FakeVersion, fields: Fields): unknown[] {
    return [
      this.objectJson(service, version, 'domain', fields),
      'global.prod.fastly.net',
      true,
    ];
  }

  private serviceJson(service: FakeService): Record<string, unknown> {
    const active = service.versions.find((version) => version.active);
    return {
      id: service.id,
      name: service.name,
      customer_id: service.customer_id,
      comment: service.comment,
      version: active?.number ?? null,
      versions: service.versions.map((version) => this.versionJson(service, version)),
      created_at: FIXED_TIMESTAMP,
    };
  }

  private customerJson(): Record<string, unknown> {
    return {
      id: this.customerId,
      name: 'Example Co',
      owner_id: 'user-1',
      pricing_plan: 'developer',
      can_upload_vcl: true,
      can_stream_syslog: 1,
      has_config_panel: '1',
      created_at: FIXED_TIMESTAMP,
    };
  }

  private userJson(user: FakeUser): Record<string, unknown> {
    return {
      id: user.id,
      name: user.name,
      login: user.login,
      role: user.role,
      customer_id: user.customer_id,
      require_new_password: user.require_new_password,
      created_at: FIXED_TIMESTAMP,
    };
  }
}
