/**
 * Test setup and utilities for Vitest
 */

import { afterAll, afterEach, beforeAll, vi } from 'vitest';
import type { Logger } from '../src/logger.js';

// Mock fetch globally
global.fetch = async () => {
  throw new Error('Unmocked fetch call - use vi.fn() in your test');
};

beforeAll(() => {
  delete process.env.VECTORDB_BASE_URL;
  delete process.env.VECTORDB_TIMEOUT_MS;
  delete process.env.VECTORDB_DEBUG;
});

// Cleanup after each test
afterEach(() => {
  vi.clearAllMocks();
});

afterAll(() => {
  delete process.env.VECTORDB_BASE_URL;
  delete process.env.VECTORDB_TIMEOUT_MS;
  delete process.env.VECTORDB_DEBUG;
});

/**
 * Create a mock Response whose body arrives in chunks of `chunkSize` bytes
 */
export function createMockResponse(body: string, status = 200, chunkSize = 4): Response {
  const bytes = new TextEncoder().encode(body);
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (let offset = 0; offset < bytes.length; offset += chunkSize) {
        controller.enqueue(bytes.slice(offset, offset + chunkSize));
      }
      controller.close();
    },
  });

  return new Response(stream, {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Create the error Node's fetch raises when nothing listens on the port
 */
export function createConnectionError(): TypeError {
  return new TypeError('fetch failed', {
    cause: new Error('connect ECONNREFUSED 127.0.0.1:8000'),
  });
}

/**
 * Logger whose methods are spies
 */
export function createMockLogger() {
  return {
    debug: vi.fn<[string, ...unknown[]], void>(),
    info: vi.fn<[string, ...unknown[]], void>(),
    warn: vi.fn<[string, ...unknown[]], void>(),
    error: vi.fn<[string, ...unknown[]], void>(),
  } satisfies Logger;
}
