/**
 * Shared test fixtures.
 */

import { vi } from 'vitest';
import { MockHttpClient, createMockFetch } from '../src/__mocks__/index.js';
import { resolveConfig } from '../src/config/index.js';
import type { ResolvedSessionConfig, SessionConfig } from '../src/config/index.js';
import { NoopLogger } from '../src/observability/logging.js';
import type { Logger } from '../src/observability/logging.js';
import type { Candidate, GenerateContentResponse } from '../src/types/index.js';

export const BASE = 'https://generativelanguage.googleapis.com';

/** Resolved config talking to a mock client, with polling shortened. */
export function testConfig(mockClient: MockHttpClient, overrides: SessionConfig = {}): ResolvedSessionConfig {
  return resolveConfig({
    apiKey: 'test-key',
    logger: new NoopLogger(),
    fetch: createMockFetch(mockClient),
    filePollInterval: 1,
    ...overrides,
  });
}

/** A logger whose methods are spies. */
export function spyLogger(): Logger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
} {
  return {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** A one-candidate model reply. */
export function textResponse(text: string, candidate: Partial<Candidate> = {}): GenerateContentResponse {
  return {
    candidates: [
      {
        content: { role: 'model', parts: [{ text }] },
        finishReason: 'STOP',
        index: 0,
        ...candidate,
      },
    ],
  };
}

/** Collects every element of an async iterable. */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
