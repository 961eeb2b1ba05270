import { http, HttpResponse } from 'msw';

import { FAKE_API_BASE_URL, FakeFastlyApi } from './fake-fastly-api.js';

/**
 * MSW Handlers for the control-plane API
 * Backed by one stateful fake, reset after every test by vitest.setup.ts
 */

// =============================================================================
// Test Fixtures
// =============================================================================

export const testFixtures = {
  apiKey: 'test-api-key',
  login: 'ops@example.com',
  password: 'test-password',
  customerId: 'cust-1',
  baseUrl: FAKE_API_BASE_URL,
};

export const fakeApi = new FakeFastlyApi({
  apiKey: testFixtures.apiKey,
  login: testFixtures.login,
  password: testFixtures.password,
  customerId: testFixtures.customerId,
});

// =============================================================================
// Failure Handlers
// =============================================================================

/**
 * Creates a handler that answers 429 with a Retry-After header
 */
export function createRateLimitedHandler(
  path: string,
  method: 'get' | 'post' | 'put' | 'delete' = 'get',
  retryAfter = 5
) {
  return http[method](`${FAKE_API_BASE_URL}${path}`, () =>
    HttpResponse.json(
      { msg: 'Too many requests', detail: 'Rate limit exceeded' },
      { status: 429, headers: { 'Retry-After': String(retryAfter) } }
    )
  );
}

/**
 * Creates a handler that fails with an HTML error page
 */
export function createFailingHandler(
  path: string,
  method: 'get' | 'post' | 'put' | 'delete' = 'get',
  errorStatus = 503
) {
  return http[method](
    `${FAKE_API_BASE_URL}${path}`,
    () =>
      new HttpResponse('<html><body>Service Unavailable</body></html>', {
        status: errorStatus,
        headers: { 'Content-Type': 'text/html' },
      })
  );
}

// =============================================================================
// Export all handlers
// =============================================================================

export const handlers = fakeApi.handlers();
