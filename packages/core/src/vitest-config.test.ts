import { describe, it, expect } from 'vitest';
import config from '../vitest.config.js';

describe('package vitest config', () => {
  it('loads the shared settings from the workspace sources', () => {
    expect(config.test?.globals).toBe(true);
    expect(config.test?.include).toEqual(['src/**/*.test.ts']);
  });
});
