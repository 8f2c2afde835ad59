import { test, expect } from '../../fixtures/base.fixture.js';
import { AuthorSchema } from '../../../types/index.js';
import { asEntity, asEntityList } from '../../clients/index.js';
import {
  validateAuthorResponse,
  validateBadRequest,
  validateJsonArray,
  validateJsonContentType,
  validateResponseTime,
  validateStatusCode,
  validateStatusIn,
} from '../../helpers/response.validator.js';

/**
 * @feature Authors API
 * @story Retrieve authors
 */

test.describe('Authors API - GET', () => {
  test('@api GET all authors returns a JSON array', {
    annotation: { type: 'description', description: 'Verify getting all authors returns successful response' },
  }, async ({ authorsApi, report }) => {
    // Given
    report.assignCategory('Authors API');
    report.note('Starting test to retrieve all authors');
    report.step('Send GET request', 'Retrieving all authors from the API');

    // When
    const response = await authorsApi.listAll();

    // Then
    report.step('Validate response', 'Checking response status and structure');
    validateStatusCode(response, 200);
    validateJsonContentType(response);
    validateJsonArray(response);
    validateResponseTime(response, 5000);

    const authors = asEntityList(response, AuthorSchema);
    report.detail('Authors Count', String(authors.length));
    const [first] = authors;
    if (first) {
      expect(first.id, 'First author id').toBeDefined();
      expect(first.firstName ?? null, 'First author first name').not.toBeNull();
      expect(first.lastName ?? null, 'First author last name').not.toBeNull();
      report.pass('All authors retrieved successfully');
    }
  });

  test('@api GET author by valid id returns that author', {
    annotation: { type: 'description', description: 'Verify getting a specific author by valid ID returns correct author' },
  }, async ({ authorsApi }) => {
    const authorId = 1;

    const response = await authorsApi.getById(authorId);

    validateAuthorResponse(response);
    validateResponseTime(response, 3000);

    const author = asEntity(response, AuthorSchema);
    expect(author?.id, 'Author id').toBe(authorId);
    expect(author?.firstName ?? '', 'First name').not.toBe('');
    expect(author?.lastName ?? '', 'Last name').not.toBe('');
    expect(author?.idBook ?? null, 'Book id').not.toBeNull();
  });

  test('@api GET author by non-existent id returns 404', {
    annotation: { type: 'description', description: 'Verify getting author with non-existent ID returns 404' },
  }, async ({ authorsApi }) => {
    const response = await authorsApi.getById(999999);

    validateStatusCode(response, 404);
    validateResponseTime(response, 3000);
  });

  test('@api GET authors of a book returns only that book\'s authors', {
    annotation: { type: 'description', description: 'Verify getting authors by book ID returns associated authors' },
  }, async ({ authorsApi }) => {
    const bookId = 1;

    const response = await authorsApi.listByBookId(bookId);

    validateStatusCode(response, 200);
    validateJsonContentType(response);
    validateJsonArray(response);
    validateResponseTime(response, 3000);
    for (const author of asEntityList(response, AuthorSchema)) {
      expect(author.idBook, 'Author should be associated with requested book ID').toBe(bookId);
    }
  });

  test('@api GET authors of a non-existent book', {
    annotation: { type: 'description', description: 'Verify getting authors by non-existent book ID returns empty or 404' },
  }, async ({ authorsApi, report }) => {
    const response = await authorsApi.listByBookId(999999);

    validateStatusIn(response, [200, 404], 'Should return appropriate status for non-existent book');
    validateResponseTime(response, 3000);
    if (response.status === 200) {
      report.detail('Authors for non-existent book', String(asEntityList(response, AuthorSchema).length));
    }
  });

  test('@api GET author with a non-numeric id returns 400', {
    annotation: { type: 'description', description: 'Verify getting author with invalid ID format returns appropriate error' },
  }, async ({ authorsApi }) => {
    const response = await authorsApi.getById('abc');

    validateBadRequest(response);
    validateResponseTime(response, 3000);
  });

  test('@api GET all authors exposes well-typed fields', {
    annotation: { type: 'description', description: 'Verify response structure and data types for all authors' },
  }, async ({ authorsApi }) => {
    const response = await authorsApi.listAll();

    validateStatusCode(response, 200);
    validateJsonArray(response);

    const [sample] = asEntityList(response, AuthorSchema);
    if (sample) {
      expect(sample.id ?? 0, 'Author ID should be a positive integer').toBeGreaterThan(0);
      expect(sample.idBook ?? 0, 'Book ID should be a positive integer').toBeGreaterThan(0);
      expect(sample.firstName ?? null, 'First name should not be null').not.toBeNull();
      expect(sample.lastName ?? null, 'Last name should not be null').not.toBeNull();
    }
  });

  test('@api GET authors of a negative book id', {
    annotation: { type: 'description', description: 'Verify getting authors by negative book ID' },
  }, async ({ authorsApi }) => {
    const response = await authorsApi.listByBookId(-1);

    validateStatusIn(response, [200, 400, 404], 'Should return appropriate status for negative book ID');
    validateResponseTime(response, 3000);
  });
});
