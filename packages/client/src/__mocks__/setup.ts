/**
 * MSW Test Utilities
 *
 * Re-exports the MSW server and the fake control-plane API for tests.
 * Lifecycle management (beforeAll/afterEach/afterAll) is handled by vitest.setup.ts
 * which is configured as a global setup file in vitest.config.ts.
 *
 * Test files should import from this module:
 * ```typescript
 * import { server, fakeApi, testFixtures } from '../__mocks__/setup.js';
 * ```
 *
 * The server instance can be used for per-test handler overrides:
 * ```typescript
 * server.use(createRateLimitedHandler('/service/svc-1/version'));
 * ```
 */

export { server } from './server.js';
export {
  handlers,
  fakeApi,
  testFixtures,
  createRateLimitedHandler,
  createFailingHandler,
} from './handlers.js';
export {
  FakeFastlyApi,
  FAKE_API_BASE_URL,
  CONFIG_SEGMENTS,
  type SeedVersion,
  type FakeFastlyApiOptions,
} from './fake-fastly-api.js';
