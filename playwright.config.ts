// Root-level Playwright config: `npm test` runs the unit project, `npm run test:api` the live service suite

import { defineConfig } from '@playwright/test';
import dotenv from 'dotenv';
import { allureConfig } from './src/allure/allure.config.js';
import { resolveConfig } from './src/config/bookstore.config.js';
import { currentRunId, htmlReportFolder } from './src/reporting/report.sink.js';

dotenv.config();

const isCI = process.env['CI'] === 'true';
const { reportPath, requestTimeout } = resolveConfig();

export default defineConfig({
  testDir: './src/framework/tests',
  // One worker, no retries: scenarios create and delete shared remote data
  fullyParallel: false,
  forbidOnly: isCI,
  retries: 0,
  workers: 1,
  reporter: [
    ['list'],
    ['html', { outputFolder: htmlReportFolder(reportPath, currentRunId()), open: 'never' }],
    ['allure-playwright', {
      detail: true,
      resultsDir: allureConfig.resultsDir,
      suiteTitle: true,
    }],
  ],
  projects: [
    {
      name: 'unit',
      testDir: './src/framework/tests/unit',
    },
    {
      name: 'api',
      testMatch: /(books|authors)\/.*\.api\.spec\.ts/,
    },
  ],
  outputDir: 'test-results',
  timeout: parseInt(process.env['PLAYWRIGHT_TIMEOUT'] ?? String(requestTimeout * 2), 10),
});
