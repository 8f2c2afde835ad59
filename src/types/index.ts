// ============================================================
// Bookstore API Tests — Core Types
// ============================================================

import { z } from 'zod';

// ------------------------------------------------------------
// Entities
// ------------------------------------------------------------

/**
 * Book as exchanged with the Books endpoints. Nothing is required on the
 * client side: the service's own validation is what the suite probes, so any
 * field may be missing or null. Absent fields are left out of the JSON body.
 */
export interface Book {
  id?: number;
  title?: string | null;
  description?: string | null;
  pageCount?: number | null;
  excerpt?: string | null;
  /** ISO-8601 date-time */
  publishDate?: string | null;
}

export interface Author {
  id?: number;
  idBook?: number | null;
  firstName?: string | null;
  lastName?: string | null;
}

export const BookSchema = z.object({
  id: z.number().int().optional(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  pageCount: z.number().int().nullish(),
  excerpt: z.string().nullish(),
  publishDate: z.string().nullish(),
});

export const AuthorSchema = z.object({
  id: z.number().int().optional(),
  idBook: z.number().int().nullish(),
  firstName: z.string().nullish(),
  lastName: z.string().nullish(),
});

export const BOOK_FIELDS = ['id', 'title', 'description', 'pageCount', 'excerpt', 'publishDate'] as const;
export const AUTHOR_FIELDS = ['id', 'idBook', 'firstName', 'lastName'] as const;

/** First and last name joined by a space; a missing part is left empty. */
export function authorFullName(author: Author): string {
  return `${author.firstName ?? ''} ${author.lastName ?? ''}`;
}

// ------------------------------------------------------------
// Configuration
// ------------------------------------------------------------

export const CONFIG_KEYS = [
  'api.base.url',
  'api.version',
  'api.request.timeout',
  'api.connection.timeout',
  'test.environment',
  'test.logging.enabled',
  'test.report.path',
  'debug.mode',
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export type PropertyMap = Readonly<Record<string, string>>;

/** Largest delay Node's timers accept */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const BookstoreConfigSchema = z.object({
  baseUrl: z.string().url(),
  apiVersion: z.string().min(1),
  requestTimeout: z.number().int().positive().max(MAX_TIMEOUT_MS),
  connectionTimeout: z.number().int().positive().max(MAX_TIMEOUT_MS),
  environment: z.string().min(1),
  loggingEnabled: z.boolean(),
  reportPath: z.string().min(1),
  debugMode: z.boolean(),
});

export type BookstoreSettings = z.infer<typeof BookstoreConfigSchema>;

/** Effective configuration: resolved once, frozen, shared by reference. */
export interface BookstoreConfig extends Readonly<BookstoreSettings> {
  readonly apiBaseUrl: string;
  readonly booksEndpoint: string;
  readonly authorsEndpoint: string;
  readonly properties: PropertyMap;
  getProperty(key: string, defaultValue?: string): string | undefined;
}

// ------------------------------------------------------------
// Reporting
// ------------------------------------------------------------

export const ReportStatusSchema = z.enum(['info', 'pass', 'fail', 'warning', 'skip']);
export type ReportStatus = z.infer<typeof ReportStatusSchema>;

export const ReportOutcomeSchema = z.enum(['passed', 'failed', 'skipped']);
export type ReportOutcome = z.infer<typeof ReportOutcomeSchema>;

export const ReportEventSchema = z.object({
  status: ReportStatusSchema,
  message: z.string(),
  timestamp: z.string(),
});
export type ReportEvent = z.infer<typeof ReportEventSchema>;

export const ReportRecordSchema = z.object({
  name: z.string(),
  description: z.string(),
  categories: z.array(z.string()),
  authors: z.array(z.string()),
  events: z.array(ReportEventSchema),
  outcome: ReportOutcomeSchema,
  startedAt: z.string(),
  durationMs: z.number(),
});
export type ReportRecord = z.infer<typeof ReportRecordSchema>;

export interface ReportSummary {
  runId: string;
  environment: string;
  apiBaseUrl: string;
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  durationMs: number;
  categories: Record<string, { passed: number; failed: number; skipped: number }>;
}
