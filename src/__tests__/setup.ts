// Global test setup for Vitest
import { vi, afterEach } from 'vitest';

// Mock console methods to reduce noise in test output
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

afterEach(() => {
  vi.clearAllMocks();
  vi.restoreAllMocks();
});

/** Builds an argv whose first entry is the program name */
export function argv(...args: string[]): string[] {
  return ['prog', ...args];
}
