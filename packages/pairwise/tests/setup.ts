import { beforeEach, vi } from 'vitest';

beforeEach(() => {
  // progress logs are noise in test output
  vi.spyOn(console, 'info').mockImplementation(() => {});
});
