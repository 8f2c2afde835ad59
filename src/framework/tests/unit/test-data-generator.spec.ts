import { test, expect } from '@playwright/test';
import { MAX_INT32, TestDataGenerator, loadSamplePools, testData } from '../../helpers/test-data.generator.js';

const NOW = new Date('2024-06-15T12:00:00.000Z');

function generator(random: number): TestDataGenerator {
  return new TestDataGenerator({ random: () => random, now: () => NOW });
}

test.describe('Test data generator', () => {
  test('randomBook draws from the first pool entries when random is 0', () => {
    const data = generator(0);
    expect(data.randomBook()).toEqual({
      id: 1000,
      title: 'The Great Adventure',
      description: 'A captivating story that will keep you on the edge of your seat',
      pageCount: 50,
      excerpt: 'In the beginning, there was darkness. Then came the light...',
      publishDate: '2014-06-15T00:00:00.000Z',
    });
    expect(data.randomBook().id).toBe(1001);
  });

  test('randomBook stays inside its ranges at the top of the random interval', () => {
    const book = generator(0.999).randomBook();
    expect(book.pageCount).toBe(549);
    expect(book.title).toBe('Beyond the Stars');
    // 3653 days in the window: floor(0.999 * 3653) = 3649, four days short of today
    expect(book.publishDate).toBe('2024-06-11T00:00:00.000Z');
  });

  test('bookWithTitle derives text from the title and carries no id', () => {
    const book = generator(0).bookWithTitle('Dune');
    expect('id' in book).toBe(false);
    expect(book.title).toBe('Dune');
    expect(book.description).toBe('Auto-generated description for: Dune');
    expect(book.excerpt).toBe('This is an excerpt from Dune');
    expect(book.pageCount).toBe(100);
  });

  test('bookForCreation stamps the title and publish date with the current time', () => {
    const book = generator(0).bookForCreation();
    expect('id' in book).toBe(false);
    expect(book.title).toBe(`The Great Adventure ${NOW.getTime()}`);
    expect(book.publishDate).toBe('2024-06-15T12:00:00.000Z');
    expect(book.pageCount).toBe(100);
  });

  test('invalidBook and invalidAuthor leave optional text out', () => {
    const data = generator(0);
    expect(data.invalidBook()).toEqual({ id: -1, title: '', pageCount: -10, excerpt: '' });
    expect('description' in data.invalidBook()).toBe(false);
    expect(data.invalidAuthor()).toEqual({ id: -1, idBook: -1, firstName: '' });
    expect('lastName' in data.invalidAuthor()).toBe(false);
  });

  test('boundary payloads push lengths and numbers to their limits', () => {
    const data = generator(0);
    const book = data.boundaryBook();
    expect(book.title?.length).toBe('Very Long Title '.length * 100);
    expect(book.description?.length).toBe('Very long description content '.length * 1000);
    expect(book.pageCount).toBe(MAX_INT32);

    const author = data.boundaryAuthor();
    expect(author.firstName).toBe('a'.repeat(1000));
    expect(author.lastName?.length).toBe(1000);
    expect(data.boundaryAuthor(5).firstName).toBe('aaaaa');
  });

  test('authors', () => {
    const data = generator(0);
    expect(data.randomAuthor()).toEqual({ id: 2000, idBook: 1, firstName: 'John', lastName: 'Smith' });
    expect(data.authorForBook(42)).toEqual({ id: 2001, idBook: 42, firstName: 'John', lastName: 'Smith' });
    expect(data.authorForCreation()).toEqual({ idBook: 1, firstName: 'John', lastName: 'Smith' });
    expect(data.authorWithNames('Ada', 'Lovelace')).toEqual({ id: 2002, idBook: 1, firstName: 'Ada', lastName: 'Lovelace' });
  });

  test('sample models are fixed', () => {
    const data = generator(0.5);
    expect(data.sampleAuthor()).toEqual({ id: 1, idBook: 1, firstName: 'John', lastName: 'Doe' });
    expect(data.sampleBook()).toMatchObject({ id: 1, title: 'Test Book Title', pageCount: 250 });
  });

  test('utilities', () => {
    const data = generator(0.5);
    expect(data.uniqueString('book')).toBe(`book_${NOW.getTime()}`);
    expect(data.randomInt(0, 10)).toBe(5);
    expect(data.randomInt(7, 8)).toBe(7);
    expect(data.longString('ab', 3)).toBe('ababab');
  });

  test('randomDate is a UTC midnight within the last ten years', () => {
    const data = new TestDataGenerator({ now: () => NOW });
    const earliest = Date.parse('2014-06-15T00:00:00.000Z');
    for (let i = 0; i < 50; i++) {
      const date = data.randomDate();
      expect(date).toMatch(/T00:00:00\.000Z$/);
      expect(Date.parse(date)).toBeGreaterThanOrEqual(earliest);
      expect(Date.parse(date)).toBeLessThan(NOW.getTime());
    }
  });

  test('pools can be injected and the bundled ones load from JSON', () => {
    const data = new TestDataGenerator({
      random: () => 0,
      now: () => NOW,
      pools: {
        bookTitles: ['Only Title'],
        bookDescriptions: ['Only Description'],
        bookExcerpts: ['Only Excerpt'],
        firstNames: ['Only'],
        lastNames: ['Name'],
      },
    });
    expect(data.randomBook().title).toBe('Only Title');
    expect(loadSamplePools().firstNames).toHaveLength(20);
    expect(testData()).toBe(testData());
  });
});
