import { ConflictError, NotFoundError } from "../lib/errors";
import { SharedCollections } from "../models/collections";
import { enrollmentKey } from "../models/enrollment";
import { programProgressSchema, type ProgramProgress, type ProgramProgressDraft } from "../models/progress";
import { where, type Predicate } from "../store/types";
import type { EnrollmentRepository } from "./enrollmentRepository";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";
import type { ProgramDependent } from "./programRepository";

export type ProgressRepositoryDeps = RepositoryDeps<ProgramProgress> & {
  enrollments: Pick<EnrollmentRepository, "findActive">;
};

export type TimeRange = { from?: number; to?: number };

/** Append-only practice log. Nothing is rewritten in place; a correction is a new record. */
export class ProgressRepository extends EntityRepository<ProgramProgress, ProgramProgressDraft> implements ProgramDependent {
  private readonly enrollments: Pick<EnrollmentRepository, "findActive">;

  constructor(deps: ProgressRepositoryDeps) {
    super({ kind: "ProgramProgress", collection: SharedCollections.progress, schema: programProgressSchema }, deps);
    this.enrollments = deps.enrollments;
  }

  record(draft: ProgramProgressDraft): Promise<ProgramProgress> {
    return this.create({ ...draft, timestamp: draft.timestamp ?? this.clock() });
  }

  /** Inserts a new record carrying `changes` over the fields of `progressId`. The original is left as it was. */
  async recordUpdate(progressId: string, changes: Partial<ProgramProgressDraft>): Promise<ProgramProgress> {
    const original = await this.getById(progressId);
    if (!original) throw new NotFoundError(this.kind, progressId);
    const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, timestamp: _timestamp, ...carried } = original;
    return this.record({ ...carried, ...changes, id: undefined, timestamp: changes.timestamp ?? this.clock() });
  }

  /** Newest first. */
  listForUser(userId: string, programId: string, limit?: number): Promise<ProgramProgress[]> {
    return this.list({
      predicates: [where("userId", "==", userId), where("programId", "==", programId)],
      orderBy: { field: "timestamp", direction: "desc" },
      limit,
    });
  }

  async latest(userId: string, programId: string): Promise<ProgramProgress | null> {
    const [newest] = await this.listForUser(userId, programId, 1);
    return newest ?? null;
  }

  listForProgram(programId: string, range: TimeRange = {}): Promise<ProgramProgress[]> {
    const predicates: Predicate[] = [where("programId", "==", programId)];
    if (range.from !== undefined) predicates.push(where("timestamp", ">=", range.from));
    if (range.to !== undefined) predicates.push(where("timestamp", "<", range.to));
    return this.list({ predicates, orderBy: { field: "timestamp", direction: "desc" } });
  }

  purgeForProgram(programId: string): Promise<number> {
    return this.purgeWhere([where("programId", "==", programId)]);
  }

  protected async beforeCreate(candidate: ProgramProgress): Promise<void> {
    const enrollment = await this.enrollments.findActive(candidate.userId, candidate.programId);
    if (!enrollment) throw new NotFoundError("Enrollment", enrollmentKey(candidate.userId, candidate.programId));
  }

  protected async beforeUpdate(next: ProgramProgress): Promise<void> {
    throw new ConflictError(this.kind, next.id, "progress records are append-only");
  }
}
