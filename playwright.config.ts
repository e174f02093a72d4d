import { defineConfig } from '@playwright/test';

// Unit and pipeline tests only; no browser projects are configured.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.test.ts',
  fullyParallel: true,
  timeout: 30000,
});
