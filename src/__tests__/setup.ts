/**
 * Global Test Setup for BRAHMS Sync
 *
 * Tests never reach the network: fetch is replaced before every test and
 * any request not stubbed by the test itself fails loudly.
 */

import { afterEach, beforeEach, vi } from 'vitest';

beforeEach(() => {
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: unknown) => {
      throw new Error(`Unexpected network request in test: ${String(input)}`);
    })
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});
