import { createEngine, type EngineOptions } from '../../src/engine';
import { loadConfig, type EngineConfig } from '../../src/lib/config';
import { silentLogger } from '../../src/lib/log';
import { PrimaryCollections, SharedCollections } from '../../src/models/collections';
import type { ProgramDraft } from '../../src/models/program';
import { InMemoryStore } from '../../src/store/memoryStore';
import type { DocumentFields } from '../../src/store/types';

// 2024-01-15T10:00:00.000Z
export const T0 = Date.UTC(2024, 0, 15, 10, 0, 0);

export function makeClock(start = T0) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

export function sequentialIds(prefix = 'id') {
  let n = 0;
  return () => `${prefix}_${++n}`;
}

export const beltRanks = [
  { id: 'white', name: 'White Sash', ordinal: 0, color: '#ffffff' },
  { id: 'yellow', name: 'Yellow Sash', ordinal: 1, color: '#ffd700' },
  { id: 'green', name: 'Green Sash', ordinal: 2, color: '#228b22' },
  { id: 'black', name: 'Black Sash', ordinal: 3, color: '#000000', requirements: ['form-12', 'sparring-3'] },
];

export function programDraft(overrides: Partial<ProgramDraft> = {}): ProgramDraft {
  return {
    name: 'Northern Long Fist',
    description: 'Traditional long-range forms',
    category: 'kung_fu',
    ranks: beltRanks,
    ...overrides,
  };
}

export type TestEngineOptions = Omit<EngineOptions, 'config' | 'primaryStore' | 'sharedStore'> & {
  config?: Partial<EngineConfig>;
  primary?: InMemoryStore;
  shared?: InMemoryStore;
};

export function makeTestEngine(options: TestEngineOptions = {}) {
  const primary = options.primary ?? new InMemoryStore('primary');
  const shared = options.shared ?? new InMemoryStore('shared');
  const clock = makeClock();
  const sleeps: number[] = [];
  const engine = createEngine({
    logger: silentLogger,
    clock: clock.now,
    newId: sequentialIds(),
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
    ...options,
    config: { ...loadConfig({}), ...options.config },
    primaryStore: primary,
    sharedStore: shared,
  });
  return { engine, primary, shared, clock, sleeps };
}

export function seedProfile(primary: InMemoryStore, id: string, fields: DocumentFields = {}) {
  primary.seed(PrimaryCollections.profiles, id, {
    authId: `auth-${id}`,
    name: 'Mei Lin',
    email: 'mei@example.com',
    roles: ['student'],
    accessLevel: 'free',
    createdAt: T0 - 86_400_000,
    updatedAt: T0 - 86_400_000,
    ...fields,
  });
}

export function seedMembership(shared: InMemoryStore, userId: string, fields: DocumentFields = {}) {
  shared.seed(SharedCollections.memberships, `m-${userId}`, {
    userId,
    studioId: 'studio-1',
    studioName: 'Riverside Kwoon',
    membershipNumber: 'RK-100',
    membershipType: 'student',
    programIds: [],
    startDate: T0 - 30 * 86_400_000,
    endDate: null,
    isActive: true,
    discountPercentage: 10,
    source: 'studio_import',
    createdAt: T0 - 30 * 86_400_000,
    updatedAt: T0 - 30 * 86_400_000,
    ...fields,
  });
}
