/**
 * Vitest Setup File
 * Global test configuration and the fake control-plane API lifecycle
 */

import { beforeAll, afterEach, afterAll } from 'vitest';
import { fakeApi, server } from './packages/client/src/__mocks__/setup.js';

// Mock environment variables for tests
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';

// Start MSW server before all tests; any request the fake does not know fails the test
beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' });
});

// Reset handlers and fake state after each test
afterEach(() => {
  server.resetHandlers();
  fakeApi.reset();
});

// Clean up after all tests
afterAll(() => {
  server.close();
});
