// ============================================================
// Bookstore API Tests — Response Validator
// Named checks over an ApiResponse. Each failure message opens with the
// check's own description, so a report line says which contract broke.
// ============================================================

import { expect } from '@playwright/test';
import type { ApiResponse } from '../clients/api-response.js';
import { AUTHOR_FIELDS, BOOK_FIELDS } from '../../types/index.js';

function rootArrayLength(response: ApiResponse): number | undefined {
  const root = response.parseJson();
  return Array.isArray(root) ? root.length : undefined;
}

export function validateStatusCode(response: ApiResponse, expectedStatusCode: number): void {
  expect(response.status, 'Response status code').toBe(expectedStatusCode);
}

/** Passes when the status is any of `expectedStatusCodes`. */
export function validateStatusIn(response: ApiResponse, expectedStatusCodes: readonly number[], description?: string): void {
  expect(
    expectedStatusCodes,
    description ?? `Response status code should be one of ${expectedStatusCodes.join(', ')}`,
  ).toContain(response.status);
}

export function validateResponseTime(response: ApiResponse, maxResponseTimeMs: number): void {
  expect(response.elapsedMs, 'Response time should be within acceptable limits').toBeLessThanOrEqual(maxResponseTimeMs);
}

export function validateHeader(response: ApiResponse, headerName: string, expectedValue: string): void {
  expect(response.header(headerName), `Header '${headerName}' value`).toBe(expectedValue);
}

export function validateJsonContentType(response: ApiResponse): void {
  expect(response.header('content-type') ?? '', 'Content-Type header should indicate JSON').toMatch(/application\/json/i);
}

export function validateResponseBodyNotEmpty(response: ApiResponse): void {
  expect(response.body, 'Response body should not be empty').not.toBe('');
}

export function validateResponseBodyEmpty(response: ApiResponse): void {
  expect(response.body, 'Response body should be empty').toBe('');
}

/** A field holding `null` counts as missing. */
export function validateJsonFieldExists(response: ApiResponse, jsonPath: string): void {
  expect(response.jsonPath(jsonPath) ?? null, `JSON field '${jsonPath}' should exist`).not.toBeNull();
}

export function validateJsonFieldValue(response: ApiResponse, jsonPath: string, expectedValue: unknown): void {
  expect(response.jsonPath(jsonPath), `JSON field '${jsonPath}' value`).toEqual(expectedValue);
}

export function validateJsonArray(response: ApiResponse): void {
  expect(response.body.trim(), 'Response should be a JSON array').toMatch(/^\[[\s\S]*\]$/);
}

export function validateJsonArraySize(response: ApiResponse, expectedSize: number): void {
  expect(rootArrayLength(response), 'JSON array size').toBe(expectedSize);
}

export function validateJsonArrayNotEmpty(response: ApiResponse): void {
  expect(rootArrayLength(response) ?? 0, 'JSON array should not be empty').toBeGreaterThan(0);
}

export function validateSuccessfulResponse(response: ApiResponse): void {
  expect(response.status, 'Response should be successful (2xx)').toBeGreaterThanOrEqual(200);
  expect(response.status, 'Response should be successful (2xx)').toBeLessThanOrEqual(299);
}

export function validateClientError(response: ApiResponse): void {
  expect(response.status, 'Response should be a client error (4xx)').toBeGreaterThanOrEqual(400);
  expect(response.status, 'Response should be a client error (4xx)').toBeLessThanOrEqual(499);
}

export function validateBadRequest(response: ApiResponse): void {
  expect(response.status, 'Response should be 400 Bad Request for invalid input data').toBe(400);
}

export function validateNotFound(response: ApiResponse): void {
  expect(response.status, 'Response should be 404 Not Found for non-existent resource').toBe(404);
}

export function validateUnprocessableEntity(response: ApiResponse): void {
  expect(response.status, 'Response should be 422 Unprocessable Entity for logically invalid data').toBe(422);
}

/** Shape contract for a single book: 2xx, JSON, every book field present. */
export function validateBookResponse(response: ApiResponse): void {
  validateSuccessfulResponse(response);
  validateJsonContentType(response);
  for (const field of BOOK_FIELDS) validateJsonFieldExists(response, field);
}

/** Shape contract for a single author: 2xx, JSON, every author field present. */
export function validateAuthorResponse(response: ApiResponse): void {
  validateSuccessfulResponse(response);
  validateJsonContentType(response);
  for (const field of AUTHOR_FIELDS) validateJsonFieldExists(response, field);
}
