import { describe, it, expect, beforeEach } from 'vitest';
import { ConflictError, NotFoundError } from '../../src/lib/errors';
import { SharedCollections } from '../../src/models/collections';
import type { Program } from '../../src/models/program';
import { makeTestEngine, programDraft, T0 } from '../helpers/fixtures';

describe('ProgressRepository', () => {
  let ctx: ReturnType<typeof makeTestEngine>;
  let program: Program;

  beforeEach(async () => {
    ctx = makeTestEngine();
    program = await ctx.engine.repositories.programs.create(programDraft());
    await ctx.engine.repositories.enrollments.enroll('u1', program.id);
  });

  const progress = () => ctx.engine.repositories.progress;

  it('requires an active enrollment', async () => {
    await expect(progress().record({ userId: 'u2', programId: program.id })).rejects.toMatchObject({
      entityKind: 'Enrollment',
      id: `u2:${program.id}`,
    });
    expect(ctx.shared.count(SharedCollections.progress)).toBe(0);
  });

  it('stamps the record time and fills defaults', async () => {
    const rec = await progress().record({ userId: 'u1', programId: program.id, formId: 'form-1', progressType: 'form', durationSec: 900 });
    expect(rec).toMatchObject({
      progressType: 'form',
      formId: 'form-1',
      sessionId: null,
      durationSec: 900,
      score: null,
      notes: '',
      timestamp: T0,
    });
  });

  it('lists newest first and returns the latest', async () => {
    for (const minutes of [10, 20, 30]) {
      await progress().record({ userId: 'u1', programId: program.id, durationSec: minutes * 60 });
      ctx.clock.advance(3_600_000);
    }
    const listed = await progress().listForUser('u1', program.id);
    expect(listed.map(r => r.durationSec)).toEqual([1800, 1200, 600]);
    expect((await progress().latest('u1', program.id))?.durationSec).toBe(1800);
    expect(await progress().latest('u9', program.id)).toBeNull();
  });

  it('never rewrites a record in place', async () => {
    const rec = await progress().record({ userId: 'u1', programId: program.id, score: 6 });
    await expect(progress().update({ ...rec, score: 9 })).rejects.toBeInstanceOf(ConflictError);
    expect(ctx.shared.peek(SharedCollections.progress, rec.id)?.score).toBe(6);
  });

  it('records a correction as a new entry', async () => {
    const rec = await progress().record({ userId: 'u1', programId: program.id, score: 6, notes: 'first pass' });
    ctx.clock.advance(1000);
    const corrected = await progress().recordUpdate(rec.id, { score: 8 });

    expect(corrected.id).not.toBe(rec.id);
    expect(corrected).toMatchObject({ score: 8, notes: 'first pass', timestamp: T0 + 1000 });
    expect(await progress().getById(rec.id)).toEqual(rec);
    expect(ctx.shared.count(SharedCollections.progress)).toBe(2);
    await expect(progress().recordUpdate('missing', { score: 1 })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('filters program activity by time range', async () => {
    await progress().record({ userId: 'u1', programId: program.id, timestamp: T0 - 1000 });
    await progress().record({ userId: 'u1', programId: program.id, timestamp: T0 });
    await progress().record({ userId: 'u1', programId: program.id, timestamp: T0 + 1000 });
    const ranged = await progress().listForProgram(program.id, { from: T0, to: T0 + 1000 });
    expect(ranged.map(r => r.timestamp)).toEqual([T0]);
  });
});

describe('RankProgressRepository', () => {
  let ctx: ReturnType<typeof makeTestEngine>;
  let program: Program;

  beforeEach(async () => {
    ctx = makeTestEngine();
    program = await ctx.engine.repositories.programs.create(programDraft());
    await ctx.engine.repositories.enrollments.enroll('u1', program.id);
  });

  const rankProgress = () => ctx.engine.repositories.rankProgress;

  it('creates a row keyed by user, program and rank', async () => {
    const row = await rankProgress().upsert('u1', program.id, 'white', { overallProgress: 0.25, itemCompletion: { 'stance-1': 1 } });
    expect(row).toEqual({
      id: `u1_${program.id}_white`,
      userId: 'u1',
      programId: program.id,
      rankId: 'white',
      overallProgress: 0.25,
      itemCompletion: { 'stance-1': 1 },
      itemNotes: {},
      createdAt: T0,
      updatedAt: T0,
    });
  });

  it('merges partial updates by field and by item', async () => {
    const events = ctx.engine.hub.channels.rankProgress.subscribe();
    await rankProgress().upsert('u1', program.id, 'white', { itemCompletion: { 'stance-1': 1 }, itemNotes: { 'stance-1': 'solid' } });
    ctx.clock.advance(5000);
    const row = await rankProgress().upsert('u1', program.id, 'white', { overallProgress: 0.5, itemCompletion: { 'kick-2': 0.5 } });

    expect(row.itemCompletion).toEqual({ 'stance-1': 1, 'kick-2': 0.5 });
    expect(row.itemNotes).toEqual({ 'stance-1': 'solid' });
    expect(row.overallProgress).toBe(0.5);
    expect(row.createdAt).toBe(T0);
    expect(row.updatedAt).toBe(T0 + 5000);
    expect(await rankProgress().get('u1', program.id, 'white')).toEqual(row);
    expect(events.drain().map(e => e.type)).toEqual(['created', 'updated']);
  });

  it('validates fractions, ranks and enrollment', async () => {
    await expect(rankProgress().upsert('u1', program.id, 'white', { overallProgress: 1.5 })).rejects.toMatchObject({
      field: 'overallProgress',
    });
    await expect(rankProgress().upsert('u1', program.id, 'purple', {})).rejects.toMatchObject({ field: 'rankId' });
    await expect(rankProgress().upsert('u2', program.id, 'white', {})).rejects.toBeInstanceOf(NotFoundError);
    expect(ctx.shared.count(SharedCollections.rankProgress)).toBe(0);
  });
});
