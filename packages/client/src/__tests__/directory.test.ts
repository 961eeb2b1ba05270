/**
 * Services, customers, users and the read-only insight endpoints
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ApiError, AuthenticationError, ConflictError, NotFoundError } from '@edgeconf/core';
import { activeVersionOf } from '@edgeconf/types';
import { createFastlyClient, type FastlyClient } from '../fastly-client.js';
import { fakeApi, testFixtures } from '../__mocks__/setup.js';

let client: FastlyClient;

beforeEach(() => {
  client = createFastlyClient({ apiKey: testFixtures.apiKey });
});

async function logIn(): Promise<void> {
  await client.transport.login({ user: testFixtures.login, password: testFixtures.password });
}

describe('ServiceDirectory', () => {
  it('should list services', async () => {
    fakeApi.seedService('www');
    fakeApi.seedService('api');

    const services = await client.services.list();

    expect(services.map((service) => service.name)).toEqual(['www', 'api']);
  });

  it('should find a service by exact name', async () => {
    const serviceId = fakeApi.seedService('www');

    const service = await client.services.getByName('www');

    expect(service.id).toBe(serviceId);
  });

  it('should raise NotFoundError for an unknown name', async () => {
    const lookup = client.services.getByName('missing');

    await expect(lookup).rejects.toBeInstanceOf(NotFoundError);
    await expect(lookup).rejects.toThrow("Record not found (Couldn't find service 'missing')");
  });

  it('should include the version list in details', async () => {
    const serviceId = fakeApi.seedService('www', [{ locked: true }, { active: true }]);

    const service = await client.services.getDetails(serviceId);

    expect(service.versions.map((version) => version.number)).toEqual([1, 2]);
    expect(service.version).toBe(2);
    expect(activeVersionOf(service)?.number).toBe(2);
  });

  it('should create, update and delete a service', async () => {
    const created = await client.services.create({ customer_id: 'cust-1', name: 'api' });
    const updated = await client.services.update(created.id, { comment: 'public API' });

    expect(created.name).toBe('api');
    expect(created.versions).toHaveLength(1);
    expect(updated.comment).toBe('public API');

    await expect(client.services.delete(created.id)).resolves.toBe(true);
    await expect(client.services.get(created.id)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should list domains across every version', async () => {
    const serviceId = fakeApi.seedService('www', [{ active: true }, {}]);
    fakeApi.seedObject(serviceId, 1, 'domain', { name: 'www.example.com' });
    fakeApi.seedObject(serviceId, 2, 'domain', { name: 'www.example.com' });

    const domains = await client.services.listDomains(serviceId);

    expect(domains.map((domain) => domain.version)).toEqual([1, 2]);
  });
});

describe('CustomerDirectory', () => {
  it('should return the current customer with normalized flags', async () => {
    const customer = await client.customers.getCurrent();

    expect(customer.id).toBe('cust-1');
    expect(customer.name).toBe('Example Co');
    expect(customer.can_upload_vcl).toBe(true);
    expect(customer.can_stream_syslog).toBe(true);
    expect(customer.has_config_panel).toBe(true);
    expect(customer.has_billing_panel).toBe(false);
  });

  it('should return details with the owner', async () => {
    const details = await client.customers.getDetails('cust-1');

    expect(details.customer.id).toBe('cust-1');
    expect(details.owner?.id).toBe('user-1');
    expect(details.billing_contact).toBeUndefined();
  });

  it('should list the customer users', async () => {
    const users = await client.customers.listUsers('cust-1');
    expect(users.map((user) => user.login)).toEqual(['ops@example.com']);
  });

  it('should raise NotFoundError for another customer', async () => {
    await expect(client.customers.get('cust-2')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should require a session to update', async () => {
    await expect(client.customers.update('cust-1', { name: 'Renamed Co' })).rejects.toBeInstanceOf(
      AuthenticationError
    );
  });

  it('should update and delete once logged in', async () => {
    await logIn();

    const updated = await client.customers.update('cust-1', { name: 'Renamed Co' });

    expect(updated.name).toBe('Renamed Co');
    await expect(client.customers.delete('cust-1')).resolves.toBe(true);
  });
});

describe('UserDirectory', () => {
  it('should return the current user', async () => {
    const user = await client.users.getCurrent();

    expect(user.id).toBe('user-1');
    expect(user.require_new_password).toBe(false);
  });

  it('should require a session to create users', async () => {
    const create = client.users.create({
      customer_id: 'cust-1',
      name: 'Dev',
      login: 'dev@example.com',
      password: 'test-password',
    });

    await expect(create).rejects.toBeInstanceOf(AuthenticationError);
  });

  describe('once logged in', () => {
    beforeEach(async () => {
      await logIn();
    });

    it('should create a user with default role and a forced password change', async () => {
      const user = await client.users.create({
        customer_id: 'cust-1',
        name: 'Dev',
        login: 'dev@example.com',
        password: 'test-password',
      });

      expect(user.id).toBe('user-2');
      expect(user.role).toBe('user');
      expect(user.require_new_password).toBe(true);
    });

    it('should raise ConflictError for a taken login', async () => {
      const create = client.users.create({
        customer_id: 'cust-1',
        name: 'Copy',
        login: testFixtures.login,
        password: 'test-password',
      });

      await expect(create).rejects.toBeInstanceOf(ConflictError);
    });

    it('should update and delete a user', async () => {
      const user = await client.users.create({
        customer_id: 'cust-1',
        name: 'Dev',
        login: 'dev@example.com',
        password: 'test-password',
      });

      const updated = await client.users.update(user.id, { role: 'engineer' });

      expect(updated.role).toBe('engineer');
      await expect(client.users.delete(user.id)).resolves.toBe(true);
      await expect(client.users.get(user.id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should change the password when the old one matches', async () => {
      await client.users.changePassword(testFixtures.password, 'new-test-password');

      const relogin = createFastlyClient({ apiKey: testFixtures.apiKey });
      const session = await relogin.transport.login({
        user: testFixtures.login,
        password: 'new-test-password',
      });
      expect(session.user.id).toBe('user-1');
    });

    it('should reject a wrong old password', async () => {
      const change = client.users.changePassword('wrong-password', 'new-test-password');

      await expect(change).rejects.toBeInstanceOf(ApiError);
      await expect(change).rejects.toThrow('Old password is incorrect');
    });
  });

  it('should request a password reset', async () => {
    await expect(client.users.requestPasswordReset('user-1')).resolves.toBe(true);
    expect(fakeApi.requests).toEqual(['POST /user/user-1/password/request_reset']);
  });
});

describe('insight readers', () => {
  it('should read an event log entry', async () => {
    const event = await client.events.get('evt-1');

    expect(event.id).toBe('evt-1');
    expect(event.message).toBe('Version activated');
  });

  it('should read service stats of the requested type', async () => {
    const serviceId = fakeApi.seedService('www');

    const all = await client.stats.get(serviceId);
    const daily = await client.stats.get(serviceId, 'daily');

    expect(all).toEqual({ service_id: serviceId, type: 'all', requests: 0, hits: 0, miss: 0 });
    expect(daily.type).toBe('daily');
  });

  it('should check a URL at the edge without its scheme', async () => {
    const checks = await client.content.edgeCheck('https://www.example.com/index.html');

    expect(fakeApi.requests).toEqual(['GET /content/edge_check/www.example.com/index.html']);
    expect(checks).toHaveLength(1);
    expect(checks[0]?.pop).toBe('FRA');
    expect(checks[0]?.hash).toBe('hash-of-www.example.com/index.html');
    expect(checks[0]?.response?.status).toBe(200);
  });
});
