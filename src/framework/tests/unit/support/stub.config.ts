import { request } from '@playwright/test';
import { buildConfig } from '../../../../config/bookstore.config.js';
import type { RequestFactory } from '../../../clients/api.client.js';
import type { BookstoreConfig } from '../../../../types/index.js';

/** Effective configuration aimed at a locally bound stub, HTTP detail logging off */
export function stubConfig(baseUrl: string, extra: Record<string, string> = {}): BookstoreConfig {
  return buildConfig({
    'api.base.url': baseUrl,
    'api.request.timeout': '5000',
    'api.connection.timeout': '2000',
    'test.environment': 'test',
    'test.logging.enabled': 'false',
    ...extra,
  });
}

export const newContext: RequestFactory = options => request.newContext(options);
