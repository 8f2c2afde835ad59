// ============================================================
// Bookstore API Tests — Test Data Generator
// Valid, boundary and deliberately invalid Book/Author payloads
// ============================================================

import fs from 'fs';
import { z } from 'zod';
import type { Author, Book } from '../../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const MAX_INT32 = 2_147_483_647;

const SamplePoolsSchema = z.object({
  bookTitles: z.array(z.string()).nonempty(),
  bookDescriptions: z.array(z.string()).nonempty(),
  bookExcerpts: z.array(z.string()).nonempty(),
  firstNames: z.array(z.string()).nonempty(),
  lastNames: z.array(z.string()).nonempty(),
});

export type SamplePools = z.infer<typeof SamplePoolsSchema>;

type Pool = [string, ...string[]];

let bundledPools: SamplePools | undefined;

export function loadSamplePools(): SamplePools {
  if (!bundledPools) {
    const raw = fs.readFileSync(new URL('../data/sample-pools.json', import.meta.url), 'utf-8');
    bundledPools = SamplePoolsSchema.parse(JSON.parse(raw));
  }
  return bundledPools;
}

export interface TestDataGeneratorOptions {
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: () => number;
  now?: () => Date;
  pools?: SamplePools;
}

/**
 * Payload factory. The id counters (books from 1000, authors from 2000) only
 * label in-memory samples; creation payloads carry no id so the service
 * assigns one.
 */
export class TestDataGenerator {
  private bookCounter = 1000;
  private authorCounter = 2000;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly pools: SamplePools;

  constructor(options: TestDataGeneratorOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.pools = options.pools ?? loadSamplePools();
  }

  // ------------------------------------------------------------
  // Books
  // ------------------------------------------------------------

  randomBook(): Book {
    return {
      id: this.bookCounter++,
      title: this.pick(this.pools.bookTitles),
      description: this.pick(this.pools.bookDescriptions),
      pageCount: this.randomInt(50, 550),
      excerpt: this.pick(this.pools.bookExcerpts),
      publishDate: this.randomDate(),
    };
  }

  bookWithTitle(title: string): Book {
    return {
      title,
      description: `Auto-generated description for: ${title}`,
      pageCount: this.randomInt(100, 500),
      excerpt: `This is an excerpt from ${title}`,
      publishDate: this.randomDate(),
    };
  }

  bookForCreation(): Book {
    const now = this.now();
    return {
      title: `${this.pick(this.pools.bookTitles)} ${now.getTime()}`,
      description: this.pick(this.pools.bookDescriptions),
      pageCount: this.randomInt(100, 500),
      excerpt: this.pick(this.pools.bookExcerpts),
      publishDate: now.toISOString(),
    };
  }

  /** Empty strings, negative numbers, absent description and publish date */
  invalidBook(): Book {
    return {
      id: -1,
      title: '',
      pageCount: -10,
      excerpt: '',
    };
  }

  boundaryBook(): Book {
    return {
      title: this.longString('Very Long Title ', 100),
      description: this.longString('Very long description content ', 1000),
      pageCount: MAX_INT32,
      excerpt: this.pick(this.pools.bookExcerpts),
      publishDate: this.randomDate(),
    };
  }

  sampleBook(): Book {
    return {
      id: 1,
      title: 'Test Book Title',
      description: 'This is a test book description',
      pageCount: 250,
      excerpt: 'This is a test excerpt from the book...',
      publishDate: this.now().toISOString(),
    };
  }

  // ------------------------------------------------------------
  // Authors
  // ------------------------------------------------------------

  randomAuthor(): Author {
    return {
      id: this.authorCounter++,
      idBook: this.randomInt(1, 101),
      firstName: this.pick(this.pools.firstNames),
      lastName: this.pick(this.pools.lastNames),
    };
  }

  authorForBook(bookId: number): Author {
    return {
      id: this.authorCounter++,
      idBook: bookId,
      firstName: this.pick(this.pools.firstNames),
      lastName: this.pick(this.pools.lastNames),
    };
  }

  authorForCreation(): Author {
    return {
      idBook: this.randomInt(1, 101),
      firstName: this.pick(this.pools.firstNames),
      lastName: this.pick(this.pools.lastNames),
    };
  }

  authorWithNames(firstName: string, lastName: string): Author {
    return {
      id: this.authorCounter++,
      idBook: this.randomInt(1, 101),
      firstName,
      lastName,
    };
  }

  /** Empty first name, absent last name, negative ids */
  invalidAuthor(): Author {
    return {
      id: -1,
      idBook: -1,
      firstName: '',
    };
  }

  boundaryAuthor(length = 1000): Author {
    return {
      idBook: 1,
      firstName: 'a'.repeat(length),
      lastName: 'a'.repeat(length),
    };
  }

  sampleAuthor(): Author {
    return { id: 1, idBook: 1, firstName: 'John', lastName: 'Doe' };
  }

  // ------------------------------------------------------------
  // Utilities
  // ------------------------------------------------------------

  uniqueString(prefix: string): string {
    return `${prefix}_${this.now().getTime()}`;
  }

  /** Integer in [min, max) */
  randomInt(min: number, max: number): number {
    return Math.floor(this.random() * (max - min)) + min;
  }

  longString(unit: string, times: number): string {
    return unit.repeat(times);
  }

  /** UTC midnight of a uniformly chosen day within the past 10 years */
  randomDate(): string {
    const now = this.now();
    const tenYearsAgo = new Date(now.getTime());
    tenYearsAgo.setUTCFullYear(tenYearsAgo.getUTCFullYear() - 10);
    const minDay = Math.floor(tenYearsAgo.getTime() / DAY_MS);
    const maxDay = Math.floor(now.getTime() / DAY_MS);
    return new Date(this.randomInt(minDay, maxDay) * DAY_MS).toISOString();
  }

  private pick(pool: Pool): string {
    return pool[Math.floor(this.random() * pool.length)] ?? pool[0];
  }
}

let defaultGenerator: TestDataGenerator | undefined;

/** Shared generator, so counters keep increasing across the run. */
export function testData(): TestDataGenerator {
  defaultGenerator ??= new TestDataGenerator();
  return defaultGenerator;
}
