import { describe, it, expect } from 'vitest';
import { EntityCache } from '../../src/cache/entityCache';

type Item = { id: string; name: string; tags: string[] };

const makeCache = () => new EntityCache<Item>({ name: 'Item', naturalKey: i => i.name.toLowerCase() });

describe('EntityCache', () => {
  it('returns what was put, as an independent copy', () => {
    const cache = makeCache();
    const item = { id: 'a', name: 'Crane', tags: ['form'] };
    cache.put(item);
    item.tags.push('mutated');

    const got = cache.get('a');
    expect(got).toEqual({ id: 'a', name: 'Crane', tags: ['form'] });
    got?.tags.push('again');
    expect(cache.get('a')?.tags).toEqual(['form']);
  });

  it('misses without consulting anything else', () => {
    expect(makeCache().get('nope')).toBeUndefined();
  });

  it('indexes several ids under one natural key', () => {
    const cache = makeCache();
    cache.put({ id: 'a', name: 'Crane', tags: [] });
    cache.put({ id: 'b', name: 'CRANE', tags: [] });
    expect(cache.getByKey('crane').map(i => i.id).sort()).toEqual(['a', 'b']);
  });

  it('moves an entity to its new key when it is re-put under a different one', () => {
    const cache = makeCache();
    cache.put({ id: 'a', name: 'Crane', tags: [] });
    cache.put({ id: 'a', name: 'Tiger', tags: [] });
    expect(cache.getByKey('crane')).toEqual([]);
    expect(cache.getByKey('tiger').map(i => i.id)).toEqual(['a']);
    expect(cache.size).toBe(1);
  });

  it('put is idempotent', () => {
    const cache = makeCache();
    const item = { id: 'a', name: 'Crane', tags: [] };
    cache.put(item);
    cache.put(item);
    expect(cache.size).toBe(1);
    expect(cache.getByKey('crane')).toHaveLength(1);
  });

  it('remove drops the entity from both indexes', () => {
    const cache = makeCache();
    cache.put({ id: 'a', name: 'Crane', tags: [] });
    expect(cache.remove('a')).toBe(true);
    expect(cache.get('a')).toBeUndefined();
    expect(cache.getByKey('crane')).toEqual([]);
    expect(cache.remove('a')).toBe(false);
  });

  it('findBy scans cached entities', () => {
    const cache = makeCache();
    cache.put({ id: 'a', name: 'Crane', tags: ['form'] });
    cache.put({ id: 'b', name: 'Tiger', tags: ['drill'] });
    cache.put({ id: 'c', name: 'Snake', tags: ['form'] });
    expect(cache.findBy(i => i.tags.includes('form')).map(i => i.id).sort()).toEqual(['a', 'c']);
  });

  it('clear empties everything', () => {
    const cache = makeCache();
    cache.put({ id: 'a', name: 'Crane', tags: [] });
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.values()).toEqual([]);
    expect(cache.getByKey('crane')).toEqual([]);
  });
});
