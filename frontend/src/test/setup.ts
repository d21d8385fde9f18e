import { afterEach, vi } from 'vitest';

// Clean up after each test
afterEach(() => {
  vi.restoreAllMocks();
});
