import { TtlCache } from '@/cache/memoryCache';

describe('TtlCache (unit)', () => {
  beforeEach(() => {
    // Freeze time to make expiry deterministic
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2025-01-01T10:00:00Z'));
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('returns stored values before they expire', () => {
    const cache = new TtlCache<string>({ maxSize: 4, ttlMs: 60_000 });

    cache.set('a', 'alpha');
    jest.advanceTimersByTime(59_999);

    expect(cache.get('a')).toBe('alpha');
    expect(cache.has('a')).toBe(true);
  });

  /**
   * Purpose:
   * Verifies TTL behavior:
   * - an entry is never returned at or after its deadline
   * - expired entries are dropped on read
   */
  test('expires entries after the TTL', () => {
    const cache = new TtlCache<string>({ maxSize: 4, ttlMs: 30_000 });

    cache.set('a', 'alpha');
    jest.advanceTimersByTime(30_000);

    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test('re-setting a key restarts its TTL', () => {
    const cache = new TtlCache<string>({ maxSize: 4, ttlMs: 1_000 });

    cache.set('a', 'one');
    jest.advanceTimersByTime(800);
    cache.set('a', 'two');
    jest.advanceTimersByTime(800);

    expect(cache.get('a')).toBe('two');
  });

  /**
   * Purpose:
   * Verifies capacity bound:
   * - least recently used entry is evicted first
   */
  test('evicts the least recently used entry when full', () => {
    const cache = new TtlCache<number>({ maxSize: 2, ttlMs: 60_000 });

    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toBe(1);
    expect(cache.get('c')).toBe(3);
    expect(cache.size).toBe(2);
  });

  test('clear and delete remove entries', () => {
    const cache = new TtlCache<number>({ maxSize: 3, ttlMs: 60_000 });

    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);

    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.get('b')).toBeUndefined();
  });

  test('rejects invalid sizing', () => {
    expect(() => new TtlCache({ maxSize: 0, ttlMs: 1_000 })).toThrow(RangeError);
    expect(() => new TtlCache({ maxSize: 1.5, ttlMs: 1_000 })).toThrow(RangeError);
    expect(() => new TtlCache({ maxSize: 1, ttlMs: 0 })).toThrow(RangeError);
  });

  /**
   * Purpose:
   * Verifies per-entry lifetime:
   * - a shorter TTL expires the entry early
   * - a longer TTL is capped at the cache TTL
   * - a non-positive TTL stores nothing
   */
  test('bounds per-entry lifetimes by the cache TTL', () => {
    const cache = new TtlCache<string>({ maxSize: 3, ttlMs: 10_000 });

    cache.set('short', 's', 2_000);
    cache.set('long', 'l', 50_000);
    cache.set('none', 'n', 0);

    expect(cache.get('none')).toBeUndefined();

    jest.advanceTimersByTime(2_000);
    expect(cache.get('short')).toBeUndefined();
    expect(cache.get('long')).toBe('l');

    jest.advanceTimersByTime(8_000);
    expect(cache.get('long')).toBeUndefined();
  });
});
