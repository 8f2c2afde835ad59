// ============================================================
// Bookstore API Tests — Response Handle
// One completed HTTP exchange: status, headers, body text, timing
// ============================================================

import type { APIResponse } from '@playwright/test';
import type { z } from 'zod';

export interface ApiResponseInit {
  method: string;
  url: string;
  status: number;
  statusText?: string;
  headers?: Record<string, string>;
  body?: string;
  elapsedMs?: number;
}

/**
 * Reads a dotted path with `[n]` indexes (`items[0].title`) out of parsed JSON.
 * The empty path is the root value. Missing segments yield `undefined`.
 */
export function readJsonPath(root: unknown, jsonPath: string): unknown {
  const tokens = jsonPath.match(/[^.[\]]+/g) ?? [];
  let current: unknown = root;
  for (const token of tokens) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(token)) return undefined;
      current = current[Number(token)];
    } else if (current !== null && typeof current === 'object' && Object.hasOwn(current, token)) {
      current = Reflect.get(current, token);
    } else {
      return undefined;
    }
  }
  return current;
}

export class ApiResponse {
  readonly method: string;
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  /** Header names are lower-cased */
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly elapsedMs: number;

  constructor(init: ApiResponseInit) {
    this.method = init.method;
    this.url = init.url;
    this.status = init.status;
    this.statusText = init.statusText ?? '';
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(init.headers ?? {})) headers[name.toLowerCase()] = value;
    this.headers = headers;
    this.body = init.body ?? '';
    this.elapsedMs = init.elapsedMs ?? 0;
  }

  static async from(method: string, response: APIResponse, elapsedMs: number): Promise<ApiResponse> {
    return new ApiResponse({
      method,
      url: response.url(),
      status: response.status(),
      statusText: response.statusText(),
      headers: response.headers(),
      body: await response.text(),
      elapsedMs,
    });
  }

  get ok(): boolean {
    return this.status >= 200 && this.status <= 299;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  /** Parsed body; throws SyntaxError when the body is not JSON. */
  json(): unknown {
    return JSON.parse(this.body);
  }

  /** Parsed body, or `undefined` when the body is empty or not JSON. */
  parseJson(): unknown {
    if (this.body.trim() === '') return undefined;
    try {
      return this.json();
    } catch {
      return undefined;
    }
  }

  jsonPath(jsonPath: string): unknown {
    return readJsonPath(this.parseJson(), jsonPath);
  }

  toString(): string {
    return `${this.method} ${this.url} → ${this.status} (${this.elapsedMs}ms)`;
  }
}

/** Body as a single entity, or `null` unless the status is 200 and the body matches the schema. */
export function asEntity<S extends z.ZodTypeAny>(response: ApiResponse, schema: S): z.infer<S> | null {
  if (response.status !== 200) return null;
  const parsed = schema.safeParse(response.parseJson());
  return parsed.success ? parsed.data : null;
}

/**
 * Body as a list of entities. Anything other than a 200 with a JSON array gives
 * an empty list; elements that do not match the schema are dropped.
 */
export function asEntityList<S extends z.ZodTypeAny>(response: ApiResponse, schema: S): Array<z.infer<S>> {
  if (response.status !== 200) return [];
  const items = response.parseJson();
  if (!Array.isArray(items)) return [];
  const out: Array<z.infer<S>> = [];
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) out.push(parsed.data);
  }
  return out;
}
