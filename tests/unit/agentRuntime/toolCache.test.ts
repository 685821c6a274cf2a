import { describe, expect, it } from 'vitest';
import { ToolResultCache, buildToolCacheKey } from '../../../src/core/agentRuntime/toolCache';

describe('toolCache', () => {
  it('builds stable keys for nested args regardless of key order', () => {
    const a = buildToolCacheKey('parallel_search', { objective: 'x', filters: { b: 2, a: 1 } });
    const b = buildToolCacheKey('parallel_search', { filters: { a: 1, b: 2 }, objective: 'x' });
    expect(a).toBe(b);
    expect(a).toBe('parallel_search::{"filters":{"a":1,"b":2},"objective":"x"}');
  });

  it('stores results and counts hits', () => {
    const cache = new ToolResultCache(3);
    cache.set('parallel_search', { objective: 'solar' }, { results: [] });

    expect(cache.get('parallel_search', { objective: 'solar' })?.result).toEqual({ results: [] });
    expect(cache.get('parallel_search', { objective: 'wind' })).toBeNull();
    expect(cache.hits).toBe(1);
  });

  it('evicts the oldest entry past capacity', () => {
    const cache = new ToolResultCache(2);
    cache.set('a', {}, 1);
    cache.set('b', {}, 2);
    cache.set('c', {}, 3);

    expect(cache.size).toBe(2);
    expect(cache.get('a', {})).toBeNull();
    expect(cache.get('b', {})?.result).toBe(2);
    expect(cache.get('c', {})?.result).toBe(3);
  });
});
