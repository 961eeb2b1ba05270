/**
 * Configuration object CRUD against the in-process fake API
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import { ApiError, ConflictError, NotFoundError, TransportError } from '@edgeconf/core';
import { createFastlyClient, type FastlyClient } from '../fastly-client.js';
import { fakeApi, server, testFixtures } from '../__mocks__/setup.js';

describe('VersionedResource', () => {
  let client: FastlyClient;
  let serviceId: string;

  beforeEach(() => {
    client = createFastlyClient({ apiKey: testFixtures.apiKey });
    serviceId = fakeApi.seedService('www', [{ active: true }, {}]);
  });

  describe('create', () => {
    it('should send documented defaults for fields left out', async () => {
      const backend = await client.backends.create(serviceId, 2, {
        name: 'origin',
        address: '10.0.0.1',
      });

      expect(backend.name).toBe('origin');
      expect(backend.port).toBe(80);
      expect(backend.use_ssl).toBe(false);
      expect(backend.weight).toBe(100);
      expect(fakeApi.storedObject(serviceId, 2, 'backend', 'origin')).toEqual({
        name: 'origin',
        address: '10.0.0.1',
        port: '80',
        use_ssl: '0',
        connect_timeout: '1000',
        first_byte_timeout: '15000',
        between_bytes_timeout: '10000',
        error_threshold: '0',
        max_conn: '20',
        weight: '100',
        auto_loadbalance: '0',
      });
    });

    it('should round-trip through get', async () => {
      await client.conditions.create(serviceId, 2, {
        name: 'is-api',
        type: 'request',
        statement: 'req.url ~ "^/api"',
      });

      const condition = await client.conditions.get(serviceId, 2, 'is-api');

      expect(condition).toMatchObject({
        service_id: serviceId,
        version: 2,
        name: 'is-api',
        type: 'request',
        statement: 'req.url ~ "^/api"',
        priority: 10,
      });
    });

    it('should raise ConflictError for a duplicate name and leave the original intact', async () => {
      await client.headers.create(serviceId, 2, {
        name: 'x-served-by',
        action: 'set',
        type: 'response',
        dst: 'http.X-Served-By',
        src: '"edge"',
      });

      const duplicate = client.headers.create(serviceId, 2, {
        name: 'x-served-by',
        action: 'delete',
        type: 'response',
        dst: 'http.X-Other',
        src: '',
      });

      await expect(duplicate).rejects.toBeInstanceOf(ConflictError);
      expect(fakeApi.storedObject(serviceId, 2, 'header', 'x-served-by')).toMatchObject({
        action: 'set',
        dst: 'http.X-Served-By',
      });
    });

    it('should raise ConflictError when the version is active', async () => {
      const create = client.domains.create(serviceId, 1, { name: 'www.example.com' });

      await expect(create).rejects.toBeInstanceOf(ConflictError);
      await expect(create).rejects.toThrow('Version locked');
      expect(fakeApi.storedObject(serviceId, 1, 'domain', 'www.example.com')).toBeUndefined();
    });

    it('should validate input before sending anything', async () => {
      const create = client.backends.create(serviceId, 2, {
        name: 'origin',
        address: '10.0.0.1',
        port: 0,
      });

      await expect(create).rejects.toThrow();
      expect(fakeApi.requests).toEqual([]);
    });
  });

  describe('get', () => {
    it('should surface a failure status in a 200 body with the server message', async () => {
      server.use(
        http.get(`${testFixtures.baseUrl}/service/:serviceId/version/:version/backend/:name`, () =>
          HttpResponse.json({ status: 'error', msg: 'Version locked by admin', detail: 'x' })
        )
      );

      const error = await client.backends.get(serviceId, 1, 'b1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).not.toBeInstanceOf(TransportError);
      if (error instanceof ApiError) {
        expect(error.serverMessage).toBe('Version locked by admin');
        expect(error.serverDetail).toBe('x');
        expect(error.message).toBe('Version locked by admin (x)');
      }
    });
  });

  describe('list', () => {
    it('should return an empty list for a version without objects', async () => {
      await expect(client.syslogs.list(serviceId, 2)).resolves.toEqual([]);
    });

    it('should list only the given version', async () => {
      fakeApi.seedObject(serviceId, 1, 'domain', { name: 'old.example.com' });
      fakeApi.seedObject(serviceId, 2, 'domain', { name: 'new.example.com' });

      const domains = await client.domains.list(serviceId, 2);

      expect(domains.map((domain) => domain.name)).toEqual(['new.example.com']);
    });
  });

  describe('update', () => {
    it('should send only the changed fields', async () => {
      fakeApi.seedObject(serviceId, 2, 'backend', {
        name: 'origin',
        address: '10.0.0.1',
        port: '443',
        use_ssl: '1',
      });

      const updated = await client.backends.update(serviceId, 2, 'origin', {
        address: '10.0.0.2',
      });

      expect(updated.address).toBe('10.0.0.2');
      expect(updated.port).toBe(443);
      expect(updated.use_ssl).toBe(true);
    });

    it('should rename when a new name is given', async () => {
      fakeApi.seedObject(serviceId, 2, 'wordpress', { name: 'blog', path: '/blog' });

      const renamed = await client.wordpress.update(serviceId, 2, 'blog', { name: 'news' });

      expect(renamed.name).toBe('news');
      expect(renamed.path).toBe('/blog');
      await expect(client.wordpress.get(serviceId, 2, 'blog')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should raise NotFoundError for a missing name', async () => {
      await expect(
        client.healthchecks.update(serviceId, 2, 'missing', { path: '/health' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('delete', () => {
    it('should delete by name', async () => {
      fakeApi.seedObject(serviceId, 2, 'response_object', { name: 'maintenance' });

      await expect(client.responseObjects.delete(serviceId, 2, 'maintenance')).resolves.toBe(true);
      expect(fakeApi.storedObject(serviceId, 2, 'response_object', 'maintenance')).toBeUndefined();
    });

    it('should raise NotFoundError for a missing name', async () => {
      const deletion = client.cacheSettings.delete(serviceId, 2, 'missing');

      await expect(deletion).rejects.toBeInstanceOf(NotFoundError);
      await expect(deletion).rejects.toThrow(
        "Record not found (Couldn't find cache_settings 'missing')"
      );
    });
  });

  describe('kind', () => {
    it('should expose the human-readable kind', () => {
      expect(client.requestSettings.kind).toBe('request settings');
      expect(client.vcls.kind).toBe('VCL');
    });
  });
});

describe('specialized repositories', () => {
  let client: FastlyClient;
  let serviceId: string;

  beforeEach(() => {
    client = createFastlyClient({ apiKey: testFixtures.apiKey });
    serviceId = fakeApi.seedService('www');
  });

  it('should report backend health for every backend', async () => {
    fakeApi.seedObject(serviceId, 1, 'backend', { name: 'origin', address: '10.0.0.1' });

    const checks = await client.backends.checkAll(serviceId, 1);

    expect(checks).toHaveLength(1);
    expect(checks[0]?.backend.name).toBe('origin');
    expect(checks[0]?.request).toEqual({ host: '10.0.0.1' });
    expect(checks[0]?.response).toEqual({ status: 200 });
  });

  it('should check domain DNS', async () => {
    fakeApi.seedObject(serviceId, 1, 'domain', { name: 'www.example.com' });

    const check = await client.domains.check(serviceId, 1, 'www.example.com');
    const all = await client.domains.checkAll(serviceId, 1);

    expect(check.domain.name).toBe('www.example.com');
    expect(check.cname).toBe('global.prod.fastly.net');
    expect(check.ok).toBe(true);
    expect(all).toHaveLength(1);
  });

  describe('directors', () => {
    beforeEach(async () => {
      await client.backends.create(serviceId, 1, { name: 'b1', address: '10.0.0.1' });
      await client.directors.create(serviceId, 1, { name: 'pool' });
    });

    it('should add and list members', async () => {
      const member = await client.directors.addBackend(serviceId, 1, 'pool', 'b1');
      const director = await client.directors.get(serviceId, 1, 'pool');

      expect(member).toMatchObject({ director: 'pool', backend: 'b1', version: 1 });
      expect(director.backends).toEqual(['b1']);
      expect(director.quorum).toBe(75);
      expect(director.type).toBe(1);
    });

    it('should raise ConflictError when a backend is added twice', async () => {
      await client.directors.addBackend(serviceId, 1, 'pool', 'b1');

      await expect(client.directors.addBackend(serviceId, 1, 'pool', 'b1')).rejects.toBeInstanceOf(
        ConflictError
      );
    });

    it('should raise NotFoundError for an unknown backend', async () => {
      await expect(
        client.directors.addBackend(serviceId, 1, 'pool', 'missing')
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should remove members', async () => {
      await client.directors.addBackend(serviceId, 1, 'pool', 'b1');

      await expect(client.directors.removeBackend(serviceId, 1, 'pool', 'b1')).resolves.toBe(true);
      await expect(client.directors.getBackend(serviceId, 1, 'pool', 'b1')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  describe('VCL files', () => {
    beforeEach(async () => {
      await client.vcls.create(serviceId, 1, { name: 'main', content: 'sub vcl_recv {}' });
      await client.vcls.create(serviceId, 1, { name: 'shared', content: '# shared' });
    });

    it('should include content by default', async () => {
      const vcl = await client.vcls.get(serviceId, 1, 'main');
      expect(vcl.content).toBe('sub vcl_recv {}');
    });

    it('should omit content on request', async () => {
      const vcl = await client.vcls.get(serviceId, 1, 'main', { includeContent: false });

      expect(vcl.name).toBe('main');
      expect(vcl.content).toBeUndefined();
    });

    it('should keep a single main file', async () => {
      await client.vcls.setMain(serviceId, 1, 'main');
      await client.vcls.setMain(serviceId, 1, 'shared');

      const files = await client.vcls.list(serviceId, 1);

      expect(files.filter((file) => file.main).map((file) => file.name)).toEqual(['shared']);
    });

    it('should fetch the generated VCL', async () => {
      const generated = await client.vcls.getGenerated(serviceId, 1);
      expect(generated.content).toBe(`# generated for ${serviceId} version 1`);
    });

    it('should fetch a file as highlighted HTML', async () => {
      await client.vcls.create(serviceId, 1, { name: 'guard', content: 'if (a < b && c > d) {}' });

      await expect(client.vcls.getContent(serviceId, 1, 'main')).resolves.toBe(
        '<pre class="vcl">sub vcl_recv {}</pre>'
      );
      await expect(client.vcls.getContent(serviceId, 1, 'guard')).resolves.toBe(
        '<pre class="vcl">if (a &lt; b &amp;&amp; c &gt; d) {}</pre>'
      );
    });

    it('should raise NotFoundError for the content of an unknown file', async () => {
      await expect(client.vcls.getContent(serviceId, 1, 'missing')).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('should fetch the generated VCL as highlighted HTML', async () => {
      await expect(client.vcls.getGeneratedContent(serviceId, 1)).resolves.toBe(
        `<pre class="vcl"># generated for ${serviceId} version 1</pre>`
      );
    });
  });

  describe('version settings', () => {
    it('should read and update the default TTL', async () => {
      const before = await client.settings.get(serviceId, 1);
      const after = await client.settings.update(serviceId, 1, { 'general.default_ttl': 600 });

      expect(before['general.default_ttl']).toBe(3600);
      expect(after['general.default_ttl']).toBe(600);
      expect(after['general.default_host']).toBe('');
    });
  });
});
