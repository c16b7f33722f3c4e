import { defineConfig, mergeConfig } from 'vitest/config';
import baseConfig from '../vitest.base.js';

export default mergeConfig(baseConfig, defineConfig({
  test: {
    // Subprocess-heavy suites: keep files sequential so timing assertions hold
    fileParallelism: false,
  },
}));
