import { afterEach, vi } from 'vitest';

// Quiet logs unless a run asks for them
process.env.LOG_LEVEL ??= 'silent';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
