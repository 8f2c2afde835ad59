// ============================================================
// Bookstore API Tests — Suite Lifecycle
// suite setup → per-test setup/teardown → suite teardown
// ============================================================

import { resolveConfig } from '../../config/bookstore.config.js';
import { createApiClients, type ApiClients } from '../clients/index.js';
import type { RequestFactory } from '../clients/api.client.js';
import { createLogger, type Logger } from '../helpers/log.helper.js';
import type { ReportEntry, ReportSink } from '../../reporting/report.sink.js';
import type { BookstoreConfig, ReportOutcome, ReportRecord, ReportSummary } from '../../types/index.js';

export const REPORT_AUTHOR = 'API Test Framework';

export interface SuiteLifecycleOptions {
  sink: ReportSink;
  requestFactory: RequestFactory;
  resolveConfig?: () => BookstoreConfig;
  logger?: Logger;
  clock?: () => Date;
}

export interface SuiteContext {
  readonly config: BookstoreConfig;
  readonly clients: ApiClients;
}

export interface TestIdentity {
  title: string;
  /** Owning suite, used as the report category */
  className: string;
  description?: string;
}

export interface TestOutcome {
  status: ReportOutcome;
  message?: string;
}

export class SuiteLifecycle {
  private context: SuiteContext | undefined;
  private pending: Promise<SuiteContext> | undefined;
  private readonly logger: Logger;
  private readonly resolve: () => BookstoreConfig;
  private readonly clock: () => Date;

  constructor(private readonly options: SuiteLifecycleOptions) {
    this.logger = options.logger ?? createLogger('Suite');
    this.resolve = options.resolveConfig ?? resolveConfig;
    this.clock = options.clock ?? (() => new Date());
  }

  get isSetUp(): boolean {
    return this.context !== undefined;
  }

  async setupSuite(): Promise<SuiteContext> {
    this.logger.info('=== Starting API Test Suite ===');
    this.options.sink.initialize();
    const context = await this.ensureContext();
    this.logger.info(`Configuration loaded for environment: ${context.config.environment}`);
    await this.verifyApiConnectivity(context.clients);
    this.logger.info('=== Suite Setup Complete ===');
    return context;
  }

  /** Configuration and clients, built on first request and shared afterwards. */
  async ensureContext(): Promise<SuiteContext> {
    if (this.context) return this.context;
    this.pending ??= this.buildContext();
    try {
      this.context = await this.pending;
      return this.context;
    } finally {
      this.pending = undefined;
    }
  }

  /**
   * Best-effort pre-flight probe. A failure is logged as a warning and the
   * run continues, so the real per-test failures still get recorded.
   */
  async verifyApiConnectivity(clients: ApiClients): Promise<boolean> {
    this.logger.info('Verifying API connectivity...');
    const booksReachable = await clients.books.isReachable();
    const authorsReachable = await clients.authors.isReachable();
    if (!booksReachable || !authorsReachable) {
      this.logger.warn(
        'API connectivity check failed, but continuing with tests. ' +
          `Books API: ${booksReachable ? 'OK' : 'FAILED'}, Authors API: ${authorsReachable ? 'OK' : 'FAILED'}`,
      );
      return false;
    }
    this.logger.success('API connectivity verified successfully');
    return true;
  }

  async setupTest(identity: TestIdentity): Promise<ReportEntry> {
    if (!this.context) {
      this.logger.warn('Suite setup was skipped, initializing configuration and clients for this test');
    }
    const { config } = await this.ensureContext();

    this.logger.info(`Starting test: ${identity.className}.${identity.title}`);
    const entry = this.options.sink.createEntry(identity.title, identity.description ?? `API Test: ${identity.title}`);
    entry.assignCategory(identity.className);
    entry.assignAuthor(REPORT_AUTHOR);
    entry.info(`Environment: ${config.environment}`);
    entry.info(`API Base URL: ${config.apiBaseUrl}`);
    entry.info(`Test Started at: ${this.clock().toISOString()}`);
    return entry;
  }

  teardownTest(entry: ReportEntry, outcome: TestOutcome): ReportRecord {
    switch (outcome.status) {
      case 'passed':
        entry.pass('Test passed successfully');
        break;
      case 'failed':
        entry.fail(`Test failed: ${outcome.message ?? 'Test failed with unknown error'}`);
        break;
      case 'skipped':
        entry.skip(`Test skipped: ${outcome.message ?? 'Test was skipped'}`);
        break;
    }
    const record = this.options.sink.complete(entry, outcome.status);
    this.logger.info(`Completed test: ${entry.categories[0] ?? ''}.${entry.name} (${outcome.status})`);
    return record;
  }

  async teardownSuite(): Promise<ReportSummary> {
    this.logger.info('=== Finalizing Test Suite ===');
    const config = this.context?.config ?? this.resolve();
    const context = this.context;
    this.context = undefined;
    try {
      return this.options.sink.flush({ environment: config.environment, apiBaseUrl: config.apiBaseUrl });
    } finally {
      if (context) await context.clients.dispose();
      this.logger.info('=== Test Suite Complete ===');
    }
  }

  private async buildContext(): Promise<SuiteContext> {
    const config = this.resolve();
    const clients = await createApiClients(config, this.options.requestFactory);
    return { config, clients };
  }
}
