import { vi } from 'vitest';
import type { Logger, PplacesEvent } from '@pplaces/shared';

export function createMockLogger() {
  const events: PplacesEvent[] = [];
  const logger = {
    log: vi.fn((event: PplacesEvent) => {
      events.push(event);
    }),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
  return { logger, events };
}
