// ============================================================
// Bookstore API Tests — Authors API Client
// ============================================================

import { BaseApiClient, type ResourceId } from './api.client.js';
import { asEntity, asEntityList, type ApiResponse } from './api-response.js';
import { AuthorSchema, authorFullName, type Author } from '../../types/index.js';

export class AuthorsApiClient extends BaseApiClient {
  get endpoint(): string {
    return this.config.authorsEndpoint;
  }

  byBookUrl(bookId: ResourceId): string {
    return `${this.endpoint}/authors/books/${bookId}`;
  }

  async listAll(): Promise<ApiResponse> {
    this.logger.info('Fetching all authors');
    return await this.send('GET', this.endpoint);
  }

  async getById(id: ResourceId): Promise<ApiResponse> {
    this.logger.info(`Fetching author with ID: ${id}`);
    return await this.send('GET', this.itemUrl(id));
  }

  async listByBookId(bookId: ResourceId): Promise<ApiResponse> {
    this.logger.info(`Fetching authors for book ID: ${bookId}`);
    return await this.send('GET', this.byBookUrl(bookId));
  }

  async create(author: Author): Promise<ApiResponse> {
    this.logger.info(`Creating new author: ${authorFullName(author)}`);
    return await this.send('POST', this.endpoint, { data: author });
  }

  async update(id: ResourceId, author: Author): Promise<ApiResponse> {
    this.logger.info(`Updating author with ID: ${id} to name: ${authorFullName(author)}`);
    return await this.send('PUT', this.itemUrl(id), { data: author });
  }

  async delete(id: ResourceId): Promise<ApiResponse> {
    this.logger.info(`Deleting author with ID: ${id}`);
    return await this.send('DELETE', this.itemUrl(id));
  }

  async listAllAsObjects(): Promise<Author[]> {
    return asEntityList(await this.listAll(), AuthorSchema);
  }

  async getByIdAsObject(id: ResourceId): Promise<Author | null> {
    return asEntity(await this.getById(id), AuthorSchema);
  }

  async listByBookIdAsObjects(bookId: ResourceId): Promise<Author[]> {
    return asEntityList(await this.listByBookId(bookId), AuthorSchema);
  }

  async exists(id: ResourceId): Promise<boolean> {
    return (await this.getById(id)).status === 200;
  }
}
