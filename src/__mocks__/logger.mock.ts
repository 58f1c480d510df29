import { vi, type Mock } from 'vitest';
import type { Logger } from '../resilience/hooks.js';

export interface MockLogger extends Logger {
  debug: Mock<unknown[], void>;
  info: Mock<unknown[], void>;
  warn: Mock<unknown[], void>;
  error: Mock<unknown[], void>;
}

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn<unknown[], void>(),
    info: vi.fn<unknown[], void>(),
    warn: vi.fn<unknown[], void>(),
    error: vi.fn<unknown[], void>(),
  };
}
