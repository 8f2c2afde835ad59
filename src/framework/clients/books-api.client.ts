// ============================================================
// Bookstore API Tests — Books API Client
// ============================================================

import { BaseApiClient, type ResourceId } from './api.client.js';
import { asEntity, asEntityList, type ApiResponse } from './api-response.js';
import { BookSchema, type Book } from '../../types/index.js';

export class BooksApiClient extends BaseApiClient {
  get endpoint(): string {
    return this.config.booksEndpoint;
  }

  async listAll(): Promise<ApiResponse> {
    this.logger.info('Fetching all books');
    return await this.send('GET', this.endpoint);
  }

  async getById(id: ResourceId): Promise<ApiResponse> {
    this.logger.info(`Fetching book with ID: ${id}`);
    return await this.send('GET', this.itemUrl(id));
  }

  async create(book: Book): Promise<ApiResponse> {
    this.logger.info(`Creating new book: ${book.title}`);
    return await this.send('POST', this.endpoint, { data: book });
  }

  async update(id: ResourceId, book: Book): Promise<ApiResponse> {
    this.logger.info(`Updating book with ID: ${id} to title: ${book.title}`);
    return await this.send('PUT', this.itemUrl(id), { data: book });
  }

  async delete(id: ResourceId): Promise<ApiResponse> {
    this.logger.info(`Deleting book with ID: ${id}`);
    return await this.send('DELETE', this.itemUrl(id));
  }

  async listAllAsObjects(): Promise<Book[]> {
    return asEntityList(await this.listAll(), BookSchema);
  }

  /** `null` unless the service answers 200 with a book */
  async getByIdAsObject(id: ResourceId): Promise<Book | null> {
    return asEntity(await this.getById(id), BookSchema);
  }

  async exists(id: ResourceId): Promise<boolean> {
    return (await this.getById(id)).status === 200;
  }
}
