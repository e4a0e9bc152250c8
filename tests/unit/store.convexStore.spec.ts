import { describe, it, expect, beforeEach } from 'vitest';
import { ConvexError } from 'convex/values';
import { makeConvex } from '../../src/lib/convex';
import { ConvexStore, toStoreError } from '../../src/store/convexStore';
import { StoreError, where } from '../../src/store/types';
import { convexMockCalls, convexMockUrls, resetConvexMock, setConvexMockBehavior } from '../setup.vitest';

describe('ConvexStore', () => {
  let store: ConvexStore;

  beforeEach(() => {
    resetConvexMock();
    store = new ConvexStore('shared', makeConvex('https://shared.example.convex.cloud'));
  });

  it('creates the client against the configured url', () => {
    expect(convexMockUrls()).toEqual(['https://shared.example.convex.cloud']);
  });

  it('getDocument calls documents:get and decodes the result', async () => {
    setConvexMockBehavior({ queryReturn: { id: 'p1', fields: { name: 'Tai Chi', ranks: [{ id: 'r1' }] } } });
    const doc = await store.getDocument('programs', 'p1');
    expect(doc).toEqual({ id: 'p1', fields: { name: 'Tai Chi', ranks: [{ id: 'r1' }] } });
    expect(convexMockCalls()).toEqual([{ kind: 'query', name: 'documents:get', args: { collection: 'programs', id: 'p1' } }]);
  });

  it('getDocument maps a null response and a NotFound error to null', async () => {
    setConvexMockBehavior({ queryReturn: null });
    expect(await store.getDocument('programs', 'gone')).toBeNull();
    setConvexMockBehavior({ queryThrow: new ConvexError({ code: 'NotFound' }) });
    expect(await store.getDocument('programs', 'gone')).toBeNull();
  });

  it('query forwards predicates and paging options', async () => {
    setConvexMockBehavior({ queryReturn: { documents: [{ id: 'e1', fields: { userId: 'u1' } }], nextCursor: 'e1' } });
    const page = await store.query('enrollments', [where('userId', '==', 'u1')], { orderBy: { field: 'enrollmentDate' }, limit: 1 });
    expect(page).toEqual({ documents: [{ id: 'e1', fields: { userId: 'u1' } }], nextCursor: 'e1' });
    expect(convexMockCalls()[0]).toEqual({
      kind: 'query',
      name: 'documents:query',
      args: {
        collection: 'enrollments',
        predicates: [{ field: 'userId', op: '==', value: 'u1' }],
        orderBy: { field: 'enrollmentDate', direction: 'asc' },
        limit: 1,
      },
    });
  });

  it('rejects a malformed response as Unknown', async () => {
    setConvexMockBehavior({ queryReturn: { documents: 'nope' } });
    await expect(store.query('programs', [])).rejects.toMatchObject({ name: 'StoreError', code: 'Unknown' });
  });

  it('setDocument and deleteDocument call the mutations', async () => {
    await store.setDocument('rankProgress', 'u1_p1_r1', { overallProgress: 0.5 }, { merge: true });
    await store.deleteDocument('programs', 'p1');
    expect(convexMockCalls()).toEqual([
      {
        kind: 'mutation',
        name: 'documents:set',
        args: { collection: 'rankProgress', id: 'u1_p1_r1', fields: { overallProgress: 0.5 }, merge: true },
      },
      { kind: 'mutation', name: 'documents:remove', args: { collection: 'programs', id: 'p1' } },
    ]);
  });

  it('normalizes network failures to Unavailable', async () => {
    setConvexMockBehavior({ mutationThrow: new TypeError('fetch failed') });
    await expect(store.setDocument('programs', 'p1', {})).rejects.toMatchObject({ code: 'Unavailable' });
  });

  it('treats deleting a missing document as done', async () => {
    setConvexMockBehavior({ mutationThrow: new ConvexError({ code: 'NotFound' }) });
    await expect(store.deleteDocument('programs', 'gone')).resolves.toBeUndefined();
  });
});

describe('toStoreError', () => {
  it('maps ConvexError codes', () => {
    expect(toStoreError(new ConvexError({ code: 'PermissionDenied' })).code).toBe('PermissionDenied');
    expect(toStoreError(new ConvexError({ code: 'Unavailable' })).code).toBe('Unavailable');
    expect(toStoreError(new ConvexError('NOT_FOUND')).code).toBe('NotFound');
    expect(toStoreError(new ConvexError({ code: 'Exploded' })).code).toBe('Unknown');
  });

  it('passes StoreErrors through and wraps anything else as Unknown', () => {
    const original = new StoreError('PermissionDenied', 'no');
    expect(toStoreError(original)).toBe(original);
    const wrapped = toStoreError(new Error('boom'));
    expect(wrapped.code).toBe('Unknown');
    expect(wrapped.message).toBe('boom');
  });

  it('recognizes connection errors by message', () => {
    expect(toStoreError(new Error('connect ECONNREFUSED 127.0.0.1:3210')).code).toBe('Unavailable');
  });
});
