import { test, expect } from '@playwright/test';
import { ApiResponse, asEntity, asEntityList, readJsonPath } from '../../clients/api-response.js';
import { BookSchema } from '../../../types/index.js';

function response(status: number, body: string, headers: Record<string, string> = {}): ApiResponse {
  return new ApiResponse({ method: 'GET', url: 'http://books.test/api/v1/Books', status, body, headers, elapsedMs: 12 });
}

test.describe('Response handle', () => {
  test('readJsonPath walks dotted paths and array indexes', () => {
    const root = { items: [{ title: 'A' }, { title: 'B', tags: ['x', 'y'] }], count: 2 };
    expect(readJsonPath(root, 'count')).toBe(2);
    expect(readJsonPath(root, 'items[1].title')).toBe('B');
    expect(readJsonPath(root, 'items[1].tags[0]')).toBe('x');
    expect(readJsonPath(root, 'items.0.title')).toBe('A');
    expect(readJsonPath(root, '')).toBe(root);
    expect(readJsonPath(root, 'items[5].title')).toBeUndefined();
    expect(readJsonPath(root, 'items.first')).toBeUndefined();
    expect(readJsonPath(root, 'toString')).toBeUndefined();
    expect(readJsonPath(null, 'a')).toBeUndefined();
  });

  test('header names are matched case-insensitively', () => {
    const r = response(200, '{}', { 'Content-Type': 'application/json; charset=utf-8' });
    expect(r.headers).toEqual({ 'content-type': 'application/json; charset=utf-8' });
    expect(r.header('CONTENT-TYPE')).toBe('application/json; charset=utf-8');
    expect(r.header('x-missing')).toBeUndefined();
  });

  test('json throws on malformed bodies while parseJson returns undefined', () => {
    const r = response(200, 'not json');
    expect(() => r.json()).toThrow(SyntaxError);
    expect(r.parseJson()).toBeUndefined();
    expect(response(200, '   ').parseJson()).toBeUndefined();
    expect(response(200, '[1,2]').jsonPath('[1]')).toBe(2);
  });

  test('ok covers exactly the 2xx range', () => {
    expect(response(200, '').ok).toBe(true);
    expect(response(299, '').ok).toBe(true);
    expect(response(300, '').ok).toBe(false);
    expect(response(199, '').ok).toBe(false);
  });

  test('toString summarises the exchange', () => {
    expect(response(404, '').toString()).toBe('GET http://books.test/api/v1/Books → 404 (12ms)');
  });

  test('asEntity returns null unless the status is 200 and the body is a book', () => {
    const body = JSON.stringify({ id: 7, title: 'T', pageCount: 10 });
    expect(asEntity(response(200, body), BookSchema)).toEqual({ id: 7, title: 'T', pageCount: 10 });
    expect(asEntity(response(201, body), BookSchema)).toBeNull();
    expect(asEntity(response(200, '{"pageCount":"many"}'), BookSchema)).toBeNull();
    expect(asEntity(response(200, ''), BookSchema)).toBeNull();
  });

  test('asEntityList keeps matching elements of a 200 array only', () => {
    const body = JSON.stringify([{ id: 1, title: 'One' }, { id: 'two' }, { id: 3 }]);
    expect(asEntityList(response(200, body), BookSchema)).toEqual([{ id: 1, title: 'One' }, { id: 3 }]);
    expect(asEntityList(response(404, body), BookSchema)).toEqual([]);
    expect(asEntityList(response(200, '{"id":1}'), BookSchema)).toEqual([]);
  });
});
