// ============================================================
// Bookstore API Tests — Reporting Sink
// Per-test report entries, persisted as they finish and summarised on flush.
// The HTML artefact itself comes from Playwright's html reporter.
// ============================================================

import fs from 'fs';
import path from 'path';
import { writeAllureRunInfo } from '../allure/allure.config.js';
import { errorMessage } from '../framework/errors.js';
import { createLogger, type Logger } from '../framework/helpers/log.helper.js';
import {
  ReportRecordSchema,
  type ReportEvent,
  type ReportOutcome,
  type ReportRecord,
  type ReportStatus,
  type ReportSummary,
} from '../types/index.js';

export const RUN_ID_ENV = 'BOOKSTORE_RUN_ID';

const pad = (n: number): string => String(n).padStart(2, '0');

/** `yyyy-MM-dd_HH-mm-ss` in local time */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * Run id shared by the runner process and its workers. The first caller
 * stamps it into the environment, which forked workers inherit.
 */
export function currentRunId(env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): string {
  const existing = env[RUN_ID_ENV];
  if (existing) return existing;
  const runId = formatRunTimestamp(now);
  env[RUN_ID_ENV] = runId;
  return runId;
}

export function htmlReportFolder(reportPath: string, runId: string): string {
  return path.join(reportPath, `BookstoreAPI_TestReport_${runId}`);
}

export class ReportEntry {
  readonly categories: string[] = [];
  readonly authors: string[] = [];
  readonly events: ReportEvent[] = [];
  readonly startedAt: Date;

  constructor(
    readonly name: string,
    readonly description: string,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.startedAt = clock();
  }

  log(status: ReportStatus, message: string): void {
    this.events.push({ status, message, timestamp: this.clock().toISOString() });
  }

  info(message: string): void {
    this.log('info', message);
  }

  pass(message: string): void {
    this.log('pass', message);
  }

  fail(message: string): void {
    this.log('fail', message);
  }

  warning(message: string): void {
    this.log('warning', message);
  }

  skip(message: string): void {
    this.log('skip', message);
  }

  assignCategory(category: string): void {
    if (!this.categories.includes(category)) this.categories.push(category);
  }

  assignAuthor(author: string): void {
    if (!this.authors.includes(author)) this.authors.push(author);
  }

  /** Named step, written to the entry and the console */
  step(name: string, description: string): void {
    this.info(`${name} - ${description}`);
    this.logger.info(`Step: ${name} - ${description}`);
  }

  detail(name: string, content: string): void {
    this.info(`${name}: ${content}`);
  }

  note(message: string): void {
    this.logger.info(message);
    this.info(message);
  }

  warn(message: string): void {
    this.logger.warn(message);
    this.warning(message);
  }

  error(message: string, err: unknown): void {
    this.logger.error(`${message}: ${errorMessage(err)}`);
    this.fail(`${message}\n${errorMessage(err)}`);
  }

  toRecord(outcome: ReportOutcome): ReportRecord {
    return {
      name: this.name,
      description: this.description,
      categories: [...this.categories],
      authors: [...this.authors],
      events: [...this.events],
      outcome,
      startedAt: this.startedAt.toISOString(),
      durationMs: Math.max(0, this.clock().getTime() - this.startedAt.getTime()),
    };
  }
}

export interface ReportSinkOptions {
  /** Parent directory; entries land in `<directory>/runs/<runId>` */
  directory: string;
  runId: string;
  /** When set, flush also writes Allure environment.properties / executor.json here */
  allureResultsDir?: string;
  logger?: Logger;
  clock?: () => Date;
}

export interface FlushContext {
  environment: string;
  apiBaseUrl: string;
}

export function summarize(runId: string, context: FlushContext, records: ReportRecord[]): ReportSummary {
  const summary: ReportSummary = {
    runId,
    environment: context.environment,
    apiBaseUrl: context.apiBaseUrl,
    total: records.length,
    passed: 0,
    failed: 0,
    skipped: 0,
    durationMs: 0,
    categories: {},
  };
  for (const record of records) {
    summary[record.outcome]++;
    summary.durationMs += record.durationMs;
    for (const category of record.categories) {
      const counts = (summary.categories[category] ??= { passed: 0, failed: 0, skipped: 0 });
      counts[record.outcome]++;
    }
  }
  return summary;
}

export class ReportSink {
  readonly runId: string;
  readonly runDirectory: string;
  private readonly entriesFile: string;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(private readonly options: ReportSinkOptions) {
    this.runId = options.runId;
    this.runDirectory = path.join(options.directory, 'runs', options.runId);
    this.entriesFile = path.join(this.runDirectory, 'entries.jsonl');
    this.logger = options.logger ?? createLogger('ReportSink');
    this.clock = options.clock ?? (() => new Date());
  }

  /** Idempotent: a restarted worker keeps the entries already written for the run. */
  initialize(): void {
    fs.mkdirSync(this.runDirectory, { recursive: true });
  }

  createEntry(name: string, description: string): ReportEntry {
    return new ReportEntry(name, description, this.logger, this.clock);
  }

  complete(entry: ReportEntry, outcome: ReportOutcome): ReportRecord {
    const record = entry.toRecord(outcome);
    this.initialize();
    fs.appendFileSync(this.entriesFile, `${JSON.stringify(record)}\n`);
    return record;
  }

  /** Entries persisted for the run; lines that do not parse (a write cut short) are skipped. */
  records(): ReportRecord[] {
    if (!fs.existsSync(this.entriesFile)) return [];
    const records: ReportRecord[] = [];
    const lines = fs.readFileSync(this.entriesFile, 'utf-8').split('\n');
    lines.forEach((line, index) => {
      if (line.trim() === '') return;
      const record = this.parseRecord(line);
      if (record) records.push(record);
      else this.logger.warn(`Skipping malformed report entry at ${this.entriesFile}:${index + 1}`);
    });
    return records;
  }

  private parseRecord(line: string): ReportRecord | undefined {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      return undefined;
    }
    const result = ReportRecordSchema.safeParse(json);
    return result.success ? result.data : undefined;
  }

  /** Rewrites the run summary from every entry persisted so far. */
  flush(context: FlushContext): ReportSummary {
    this.initialize();
    const summary = summarize(this.runId, context, this.records());
    fs.writeFileSync(path.join(this.runDirectory, 'summary.json'), JSON.stringify(summary, null, 2));
    if (this.options.allureResultsDir) writeAllureRunInfo(this.options.allureResultsDir, summary);
    this.logger.success(
      `Report flushed to ${this.runDirectory}: ${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped`,
    );
    return summary;
  }
}
