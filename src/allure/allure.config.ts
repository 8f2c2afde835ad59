// ============================================================
// Bookstore API Tests — Allure Configuration & Helpers
// ============================================================

import fs from 'fs';
import path from 'path';
import type { ReportSummary } from '../types/index.js';

export const allureConfig = {
  resultsDir: process.env['ALLURE_RESULTS_DIR'] ?? 'allure-results',
  reportName: 'Bookstore API Automation Test Results',
};

/**
 * environment.properties feeds Allure's "Environment" tab;
 * executor.json sets the report name and build title.
 */
export function writeAllureRunInfo(resultsDir: string, summary: ReportSummary): void {
  fs.mkdirSync(resultsDir, { recursive: true });

  const envProps = [
    `Environment=${summary.environment}`,
    `API_Base_URL=${summary.apiBaseUrl}`,
    `Run=${summary.runId}`,
    `Passed=${summary.passed}`,
    `Failed=${summary.failed}`,
    `Skipped=${summary.skipped}`,
    `Duration=${Math.round(summary.durationMs / 1000)}s`,
    `Node_Version=${process.version}`,
    `OS=${process.platform}`,
  ].join('\n');
  fs.writeFileSync(path.join(resultsDir, 'environment.properties'), envProps);

  const executorJson = {
    name: 'Bookstore API Tests',
    type: 'custom',
    buildName: `${summary.runId} (${summary.environment})`,
    reportName: allureConfig.reportName,
  };
  fs.writeFileSync(path.join(resultsDir, 'executor.json'), JSON.stringify(executorJson, null, 2));
}
