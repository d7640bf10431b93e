/**
 * Recording logger for assertions on diagnostics
 */

import { vi, type Mock } from 'vitest';

type LogFn = Mock<(message: string, context?: Record<string, unknown>) => void>;

export interface MockLogger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Create a logger whose levels are spies
 */
export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Messages logged at one level, in order
 */
export function loggedMessages(logger: MockLogger, level: keyof MockLogger): string[] {
  return logger[level].mock.calls.map(([message]) => message);
}
