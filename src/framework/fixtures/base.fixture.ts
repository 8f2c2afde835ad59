// ============================================================
// Bookstore API Tests — Base Fixture
// Extended Playwright test with the suite lifecycle baked in
// ============================================================

import { test as base, expect } from '@playwright/test';
import type { TestInfo } from '@playwright/test';
import path from 'path';
import { allureConfig } from '../../allure/allure.config.js';
import { resolveConfig } from '../../config/bookstore.config.js';
import { ReportSink, currentRunId, type ReportEntry } from '../../reporting/report.sink.js';
import type { AuthorsApiClient } from '../clients/authors-api.client.js';
import type { BooksApiClient } from '../clients/books-api.client.js';
import { testData, type TestDataGenerator } from '../helpers/test-data.generator.js';
import type { BookstoreConfig, ReportOutcome } from '../../types/index.js';
import { SuiteLifecycle, type TestOutcome } from './suite.lifecycle.js';

export type BookstoreTestFixtures = {
  /** Report entry of the running test; always created, even when unused */
  report: ReportEntry;
  config: BookstoreConfig;
  booksApi: BooksApiClient;
  authorsApi: AuthorsApiClient;
  data: TestDataGenerator;
};

export type BookstoreWorkerFixtures = {
  suite: SuiteLifecycle;
};

/** `describe` title when there is one, otherwise the spec file name */
export function owningSuiteName(testInfo: Pick<TestInfo, 'titlePath' | 'file'>): string {
  const [, describeTitle] = testInfo.titlePath;
  if (testInfo.titlePath.length > 2 && describeTitle) return describeTitle;
  return path.basename(testInfo.file).replace(/\.spec\.ts$/, '');
}

export function testOutcome(testInfo: Pick<TestInfo, 'status' | 'error'>): TestOutcome {
  const status: ReportOutcome =
    testInfo.status === 'passed' ? 'passed' : testInfo.status === 'skipped' ? 'skipped' : 'failed';
  return { status, message: testInfo.error?.message };
}

export const test = base.extend<BookstoreTestFixtures, BookstoreWorkerFixtures>({
  suite: [
    async ({ playwright }, use) => {
      const config = resolveConfig();
      const sink = new ReportSink({
        directory: config.reportPath,
        runId: currentRunId(),
        allureResultsDir: allureConfig.resultsDir,
      });
      const suite = new SuiteLifecycle({
        sink,
        requestFactory: options => playwright.request.newContext(options),
      });
      await suite.setupSuite();
      await use(suite);
      await suite.teardownSuite();
    },
    { scope: 'worker' },
  ],

  report: [
    async ({ suite }, use, testInfo) => {
      const description = testInfo.annotations.find(a => a.type === 'description')?.description;
      const entry = await suite.setupTest({
        title: testInfo.title,
        className: owningSuiteName(testInfo),
        description,
      });
      await use(entry);
      const record = suite.teardownTest(entry, testOutcome(testInfo));
      await testInfo.attach('report-entry', {
        body: JSON.stringify(record, null, 2),
        contentType: 'application/json',
      });
    },
    { auto: true },
  ],

  config: async ({ suite }, use) => {
    await use((await suite.ensureContext()).config);
  },

  booksApi: async ({ suite }, use) => {
    await use((await suite.ensureContext()).clients.books);
  },

  authorsApi: async ({ suite }, use) => {
    await use((await suite.ensureContext()).clients.authors);
  },

  data: async ({}, use) => {
    await use(testData());
  },
});

export { expect };
