import { vi } from 'vitest';
import type { Logger } from '../core/logger.js';
import { DEFAULT_CONFIG, type AppConfig } from '../core/config.js';

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/** Lets every pending promise chain and zero-delay timer run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...DEFAULT_CONFIG, maxPayloadBytes: 1024, syncWaitMs: 2000, ...overrides };
}

export function signal(): AbortSignal {
  return new AbortController().signal;
}
