import os from 'node:os';
import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    env: {
      PHARMASCOPE_LOG_DIR: path.join(os.tmpdir(), 'pharmascope-test-logs'),
      PHARMASCOPE_CONFIG_PATH: path.join(os.tmpdir(), 'pharmascope-test-config-does-not-exist.json'),
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'json-summary'],
      reportsDirectory: 'coverage',
      thresholds: {
        lines: 60,
        functions: 60,
        branches: 50,
        statements: 60,
      },
    },
  },
});
