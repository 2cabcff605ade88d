import { describe, it, expect } from 'vitest';
import { LruCache } from '../../src/engine/cache.js';

describe('LruCache', () => {
  it('rejects a capacity that is not a positive integer', () => {
    expect(() => new LruCache(0)).toThrow('Cache capacity must be a positive integer, got 0');
    expect(() => new LruCache(1.5)).toThrow(RangeError);
  });

  it('evicts the least recently used entry', () => {
    const cache = new LruCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    cache.get('a');
    cache.set('c', 3);
    expect(cache.keys()).toEqual(['a', 'c']);
    expect(cache.get('b')).toBeUndefined();
  });

  it('does not refresh recency on has', () => {
    const cache = new LruCache<string, number>(2);
    cache.set('a', 1);
    cache.set('b', 2);
    expect(cache.has('a')).toBe(true);
    cache.set('c', 3);
    expect(cache.has('a')).toBe(false);
  });

  it('computes once and counts hits and misses', () => {
    const cache = new LruCache<string, number>(10);
    let calls = 0;
    const compute = () => ++calls;
    expect(cache.getOrSet('k', compute)).toBe(1);
    expect(cache.getOrSet('k', compute)).toBe(1);
    expect(calls).toBe(1);
    expect(cache.stats).toEqual({ size: 1, capacity: 10, hits: 1, misses: 1 });
  });

  it('stores nothing when compute throws', () => {
    const cache = new LruCache<string, number>(10);
    expect(() =>
      cache.getOrSet('k', () => {
        throw new Error('failed');
      }),
    ).toThrow('failed');
    expect(cache.has('k')).toBe(false);
  });

  it('caches falsy values', () => {
    const cache = new LruCache<string, number>(10);
    cache.set('zero', 0);
    expect(cache.getOrSet('zero', () => 1)).toBe(0);
  });

  it('overwrites, deletes and clears', () => {
    const cache = new LruCache<string, number>(10);
    cache.set('a', 1);
    cache.set('a', 2);
    expect(cache.get('a')).toBe(2);
    expect(cache.size).toBe(1);
    expect(cache.delete('a')).toBe(true);
    expect(cache.delete('a')).toBe(false);
    cache.getOrSet('b', () => 3);
    cache.clear();
    expect(cache.stats).toEqual({ size: 0, capacity: 10, hits: 0, misses: 0 });
  });
});
