// ============================================================
// Bookstore API Tests — Client Registry
// Both resource clients, built once from the effective configuration
// ============================================================

import { AuthorsApiClient } from './authors-api.client.js';
import { BooksApiClient } from './books-api.client.js';
import { requestContextOptions, type RequestFactory } from './api.client.js';
import type { BookstoreConfig } from '../../types/index.js';

export interface ApiClients {
  readonly books: BooksApiClient;
  readonly authors: AuthorsApiClient;
  dispose(): Promise<void>;
}

export async function createApiClients(config: BookstoreConfig, factory: RequestFactory): Promise<ApiClients> {
  const books = new BooksApiClient(await factory(requestContextOptions(config)), config);
  const authors = new AuthorsApiClient(await factory(requestContextOptions(config)), config);
  return {
    books,
    authors,
    async dispose(): Promise<void> {
      await Promise.all([books.dispose(), authors.dispose()]);
    },
  };
}

export { ApiResponse, asEntity, asEntityList, readJsonPath } from './api-response.js';
export { BaseApiClient, bearerAuthHeaders, DEFAULT_HEADERS, USER_AGENT } from './api.client.js';
export type { HttpMethod, RequestFactory, ResourceId, SendOptions } from './api.client.js';
export { BooksApiClient, AuthorsApiClient };
