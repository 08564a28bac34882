import { Deta } from '../../src/client/deta.js';
import type { DetaConfig } from '../../src/client/config.js';
import { createFakeBaseService } from './fake-base-service.js';
import type { FakeBaseService } from './fake-base-service.js';

export const TEST_KEY = 'a0test_test-secret';
export const TEST_ENDPOINT = 'http://deta.test/v1';

export interface TestContext {
  service: FakeBaseService;
  deta: Deta;
}

/** Fake service plus a client wired to it; call `service.close()` when done. */
export async function startService(
  overrides: Partial<Omit<DetaConfig, 'fetch'>> = {},
): Promise<TestContext> {
  const service = createFakeBaseService(TEST_KEY);
  await service.app.ready();
  const deta = new Deta({
    projectKey: TEST_KEY,
    endpoint: TEST_ENDPOINT,
    fetch: service.fetch,
    retryDelayMs: 0,
    onRetry: () => undefined,
    ...overrides,
  });
  return { service, deta };
}
