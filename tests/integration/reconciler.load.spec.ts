import { describe, it, expect, vi } from 'vitest';
import { NetworkError, NotFoundError } from '../../src/lib/errors';
import { metrics } from '../../src/lib/metrics';
import { PrimaryCollections, SharedCollections } from '../../src/models/collections';
import { InMemoryStore } from '../../src/store/memoryStore';
import { makeTestEngine, programDraft, seedMembership, seedProfile, T0 } from '../helpers/fixtures';

async function persistFailures() {
  const metric = await metrics.denormalizedPersistFailuresTotal.get();
  return metric.values[0]?.value ?? 0;
}

describe('ProfileReconciler.load', () => {
  it('resolves the profile by auth id and publishes the composite', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'p1');
    const changes = engine.subscribeToProfileChanges();

    const composite = await engine.load({ authId: 'auth-p1' });

    expect(composite).toEqual({
      id: 'p1',
      userId: 'auth-p1',
      authId: 'auth-p1',
      name: 'Mei Lin',
      email: 'mei@example.com',
      roles: ['student'],
      accessLevel: 'free',
      photoUrl: null,
      programs: {},
      subscription: null,
      studioMembership: null,
      stale: false,
    });
    expect(engine.reconciler.state).toBe('ready');
    expect(changes.drain().map(e => e.type)).toEqual(['created']);
    // Nothing to denormalize.
    expect(primary.writesTo(PrimaryCollections.profiles)).toHaveLength(0);
  });

  it('falls back to the profile id for legacy records without an auth id', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'legacy-1', { authId: null });

    const composite = await engine.load({ authId: 'auth-new', userId: 'legacy-1' });

    expect(composite.id).toBe('legacy-1');
    expect(composite.authId).toBeNull();
    expect(composite.userId).toBe('legacy-1');
  });

  it('uses the auth id as profile id when no user id is given', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'auth-9', { authId: null });

    const composite = await engine.load({ authId: 'auth-9' });

    expect(composite.id).toBe('auth-9');
  });

  it('requests onboarding and polls until the profile appears', async () => {
    const primary = new InMemoryStore('primary');
    const waits: number[] = [];
    const requestProfile = vi.fn(async () => {});
    const { engine } = makeTestEngine({
      primary,
      onboarding: { requestProfile },
      sleep: async (ms: number) => {
        waits.push(ms);
        if (waits.length === 2) seedProfile(primary, 'p-new', { authId: 'auth-new' });
      },
    });

    const composite = await engine.load({ authId: 'auth-new', email: 'new@example.com' });

    expect(requestProfile).toHaveBeenCalledWith({ authId: 'auth-new', email: 'new@example.com' });
    expect(waits).toEqual([3000, 3000]);
    expect(composite.id).toBe('p-new');
  });

  it('fails with NotFound once polling is exhausted', async () => {
    const requestProfile = vi.fn(async () => {});
    const { engine, sleeps } = makeTestEngine({ onboarding: { requestProfile } });

    const result = engine.load({ authId: 'auth-ghost' });

    await expect(result).rejects.toBeInstanceOf(NotFoundError);
    await expect(result).rejects.toThrow('Profile not found: auth-ghost');
    expect(sleeps).toEqual([3000, 3000]);
    expect(engine.reconciler.state).toBe('failed');
    expect(engine.reconciler.current).toBeNull();
  });

  it('follows the configured polling schedule', async () => {
    const { engine, sleeps } = makeTestEngine({ config: { profilePollAttempts: 3, profilePollIntervalMs: 500 } });

    await expect(engine.load({ authId: 'auth-ghost' })).rejects.toBeInstanceOf(NotFoundError);
    expect(sleeps).toEqual([500, 500, 500]);
  });

  it('fails the pass when the primary store is unavailable', async () => {
    const { engine, primary, sleeps } = makeTestEngine();
    primary.inject({ op: 'query', code: 'Unavailable' });

    await expect(engine.load({ authId: 'auth-p1' })).rejects.toBeInstanceOf(NetworkError);
    expect(engine.reconciler.state).toBe('failed');
    expect(sleeps).toEqual([]);
  });

  it('marks the composite stale when a shared-store fragment cannot be fetched', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1');
    seedMembership(shared, 'auth-p1');
    shared.inject({ collection: SharedCollections.subscriptions, code: 'Unavailable' });

    const composite = await engine.load({ authId: 'auth-p1' });

    expect(composite.stale).toBe(true);
    expect(composite.subscription).toBeNull();
    expect(composite.studioMembership?.id).toBe('m-auth-p1');
    expect(engine.reconciler.state).toBe('ready');
  });

  it('serves the denormalized copy when the shared store is down', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1', {
      programs: {
        prog1: { programId: 'prog1', programName: 'Tai Chi Basics', enrolled: true, enrollmentDate: T0, isActive: true },
      },
    });
    shared.inject({ code: 'Unavailable' });

    const composite = await engine.load({ authId: 'auth-p1' });

    expect(composite.stale).toBe(true);
    expect(composite.programs.prog1?.programName).toBe('Tai Chi Basics');
    expect(shared.writesTo(SharedCollections.memberships)).toHaveLength(0);
  });

  it('summarizes enrollments with program names', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'p1');
    const program = await engine.repositories.programs.create(programDraft());
    await engine.repositories.enrollments.enroll('auth-p1', program.id);

    const composite = await engine.load({ authId: 'auth-p1' });

    expect(composite.programs).toEqual({
      [program.id]: {
        programId: program.id,
        programName: 'Northern Long Fist',
        enrolled: true,
        enrollmentDate: T0,
        currentRankId: 'white',
        rankDate: T0,
        membershipType: 'student',
        isActive: true,
      },
    });
  });

  it('backfills a studio membership and subscription for enrolled users without one', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1');
    const program = await engine.repositories.programs.create(programDraft());
    await engine.repositories.enrollments.enroll('auth-p1', program.id);

    const composite = await engine.load({ authId: 'auth-p1' });

    expect(composite.studioMembership).toMatchObject({
      id: 'membership_auth-p1',
      userId: 'auth-p1',
      studioId: 'home',
      studioName: 'Home Studio',
      membershipNumber: 'SM-auth-p1',
      membershipType: 'student',
      programIds: [program.id],
      startDate: T0,
      isActive: true,
      discountPercentage: 25,
      source: 'enrollment_backfill',
    });
    expect(composite.subscription).toMatchObject({
      id: 'subscription_auth-p1',
      type: 'studio_member',
      status: 'active',
      startDate: T0,
      studioMembershipId: 'membership_auth-p1',
    });
    expect(composite.stale).toBe(false);
    expect(shared.peek(SharedCollections.memberships, 'membership_auth-p1')?.source).toBe('enrollment_backfill');
  });

  it('does not backfill twice', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1');
    const program = await engine.repositories.programs.create(programDraft());
    await engine.repositories.enrollments.enroll('auth-p1', program.id);

    const loaded = await engine.load({ authId: 'auth-p1' });
    engine.clearCaches();
    const refreshed = await engine.refresh();

    expect(refreshed).toEqual(loaded);
    expect(shared.writesTo(SharedCollections.memberships)).toHaveLength(1);
    expect(shared.writesTo(SharedCollections.subscriptions)).toHaveLength(1);
  });

  it('skips backfill when the user has no active enrollment', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1');

    await engine.load({ authId: 'auth-p1' });

    expect(shared.writesTo(SharedCollections.memberships)).toHaveLength(0);
    expect(shared.writesTo(SharedCollections.subscriptions)).toHaveLength(0);
  });

  it('writes the reconciled fragments back to the primary profile once', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1');
    seedMembership(shared, 'auth-p1');

    await engine.load({ authId: 'auth-p1' });
    await engine.refresh();

    expect(primary.writesTo(PrimaryCollections.profiles)).toHaveLength(1);
    expect(primary.peek(PrimaryCollections.profiles, 'p1')?.studioMembership).toMatchObject({
      id: 'm-auth-p1',
      studioName: 'Riverside Kwoon',
    });
  });

  it('still returns the composite when the denormalized write fails', async () => {
    const { engine, primary, shared } = makeTestEngine();
    seedProfile(primary, 'p1');
    seedMembership(shared, 'auth-p1');
    primary.inject({ op: 'set', code: 'Unavailable' });
    const before = await persistFailures();

    const composite = await engine.load({ authId: 'auth-p1' });

    expect(composite.studioMembership?.id).toBe('m-auth-p1');
    expect(composite.stale).toBe(false);
    expect(engine.reconciler.state).toBe('ready');
    expect(primary.peek(PrimaryCollections.profiles, 'p1')?.studioMembership).toBeUndefined();
    expect(await persistFailures()).toBe(before + 1);
  });

  it('joins concurrent loads into one pass', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'p1');

    const [a, b] = await Promise.all([engine.load({ authId: 'auth-p1' }), engine.load({ authId: 'auth-p1' })]);

    expect(a).toEqual(b);
    expect(primary.calls.filter(c => c.op === 'query')).toHaveLength(1);
  });

  it('runs a load for another user after the running one instead of sharing its result', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'p1');
    seedProfile(primary, 'p2', { name: 'Wei Chen' });

    const [a, b] = await Promise.all([engine.load({ authId: 'auth-p1' }), engine.load({ authId: 'auth-p2' })]);

    expect(a.id).toBe('p1');
    expect(b.id).toBe('p2');
    expect(b.name).toBe('Wei Chen');
    expect(engine.reconciler.current?.id).toBe('p2');
  });

  it('does not let a failed load block the next one', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'p1');

    const [ghost, real] = await Promise.allSettled([engine.load({ authId: 'auth-ghost' }), engine.load({ authId: 'auth-p1' })]);

    expect(ghost.status).toBe('rejected');
    expect(real).toMatchObject({ status: 'fulfilled', value: { id: 'p1' } });
    expect(engine.reconciler.state).toBe('ready');
  });

  it('queues a refresh behind a running load', async () => {
    const { engine, primary } = makeTestEngine();
    seedProfile(primary, 'p1');

    const [loaded, refreshed] = await Promise.all([engine.load({ authId: 'auth-p1' }), engine.refresh()]);

    expect(refreshed).toEqual(loaded);
  });
});
