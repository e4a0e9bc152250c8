import { ConflictError, DuplicateError, NotFoundError, ValidationError } from "../lib/errors";
import { KeyedMutex } from "../lib/keyedMutex";
import { SharedCollections } from "../models/collections";
import { enrollmentKey, enrollmentSchema, type Enrollment, type EnrollmentDraft, type MembershipType } from "../models/enrollment";
import { sortedRanks, type Program } from "../models/program";
import { where } from "../store/types";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";
import type { ProgramDependent } from "./programRepository";

export interface ProgramLookup {
  getById(programId: string): Promise<Program | null>;
}

export type EnrollmentRepositoryDeps = RepositoryDeps<Enrollment> & { programs: ProgramLookup };

export class EnrollmentRepository extends EntityRepository<Enrollment, EnrollmentDraft> implements ProgramDependent {
  private readonly programs: ProgramLookup;
  // Serializes the check-then-write for one (userId, programId) pair within this process.
  private readonly locks = new KeyedMutex();

  constructor(deps: EnrollmentRepositoryDeps) {
    super(
      {
        kind: "Enrollment",
        collection: SharedCollections.enrollments,
        schema: enrollmentSchema,
        naturalKey: e => enrollmentKey(e.userId, e.programId),
      },
      deps,
    );
    this.programs = deps.programs;
  }

  create(draft: EnrollmentDraft): Promise<Enrollment> {
    return this.locks.run(enrollmentKey(draft.userId, draft.programId), () => super.create(draft));
  }

  update(enrollment: Enrollment): Promise<Enrollment> {
    return this.locks.run(enrollmentKey(enrollment.userId, enrollment.programId), () => super.update(enrollment));
  }

  /** Enrolls a user at `startingRankId`, or at the program's lowest rank when none is given. */
  enroll(userId: string, programId: string, startingRankId?: string, membershipType: MembershipType = "student"): Promise<Enrollment> {
    return this.locks.run(enrollmentKey(userId, programId), async () => {
      const program = await this.requireProgram(programId);
      if (!program.isActive) throw new ConflictError("Program", programId, "program is not active");
      const rankId = startingRankId ?? sortedRanks(program)[0]?.id ?? null;
      const now = this.clock();
      const enrollment = await super.create({
        userId,
        programId,
        enrolled: true,
        enrollmentDate: now,
        currentRankId: rankId,
        rankDate: rankId === null ? null : now,
        isActive: true,
        membershipType,
      });
      this.logger.info("user_enrolled", { userId, programId, enrollmentId: enrollment.id, rankId });
      return enrollment;
    });
  }

  async unenroll(userId: string, programId: string): Promise<Enrollment> {
    const active = await this.findActive(userId, programId);
    if (!active) throw new NotFoundError(this.kind, enrollmentKey(userId, programId));
    return this.update({ ...active, enrolled: false, isActive: false });
  }

  async changeRank(enrollmentId: string, rankId: string): Promise<Enrollment> {
    const enrollment = await this.getById(enrollmentId);
    if (!enrollment) throw new NotFoundError(this.kind, enrollmentId);
    return this.update({ ...enrollment, currentRankId: rankId, rankDate: this.clock() });
  }

  /** The user's enrolled record for a program, if any. Served from cache when present. */
  async findActive(userId: string, programId: string): Promise<Enrollment | null> {
    const cached = this.cache.getByKey(enrollmentKey(userId, programId)).find(e => e.enrolled);
    if (cached) return cached;
    return this.queryFirst([where("userId", "==", userId), where("programId", "==", programId), where("enrolled", "==", true)]);
  }

  listForUser(userId: string): Promise<Enrollment[]> {
    return this.list({ predicates: [where("userId", "==", userId)], orderBy: { field: "enrollmentDate" } });
  }

  listForProgram(programId: string): Promise<Enrollment[]> {
    return this.list({ predicates: [where("programId", "==", programId)], orderBy: { field: "enrollmentDate" } });
  }

  /** Administrative hard delete. */
  deleteEnrollment(id: string): Promise<void> {
    return this.delete(id);
  }

  async blocksProgramDelete(programId: string): Promise<boolean> {
    const enrolled = await this.queryFirst([where("programId", "==", programId), where("enrolled", "==", true)]);
    return enrolled !== null;
  }

  purgeForProgram(programId: string): Promise<number> {
    return this.purgeWhere([where("programId", "==", programId)]);
  }

  protected async beforeCreate(candidate: Enrollment): Promise<void> {
    const program = await this.requireProgram(candidate.programId);
    this.checkRank(program, candidate.currentRankId);
  }

  // Ranks are only checked when they change, so records keep working after a rank is retired.
  protected async beforeUpdate(next: Enrollment, existing: Enrollment): Promise<void> {
    if (next.userId !== existing.userId || next.programId !== existing.programId) {
      throw new ConflictError(this.kind, next.id, "userId and programId cannot change");
    }
    const reenrolling = next.enrolled && !existing.enrolled;
    if (reenrolling || next.currentRankId !== existing.currentRankId) {
      const program = await this.requireProgram(next.programId);
      this.checkRank(program, next.currentRankId);
    }
    if (reenrolling && (await this.findDuplicate(next))) {
      throw new DuplicateError(this.kind, enrollmentKey(next.userId, next.programId));
    }
  }

  protected occupiesKey(enrollment: Enrollment): boolean {
    return enrollment.enrolled;
  }

  protected async findRemoteByNaturalKey(candidate: Enrollment): Promise<Enrollment | null> {
    if (!candidate.enrolled) return null;
    return this.queryFirst([
      where("userId", "==", candidate.userId),
      where("programId", "==", candidate.programId),
      where("enrolled", "==", true),
    ]);
  }

  private async requireProgram(programId: string): Promise<Program> {
    const program = await this.programs.getById(programId);
    if (!program) throw new NotFoundError("Program", programId);
    return program;
  }

  private checkRank(program: Program, rankId: string | null): void {
    if (rankId !== null && !program.ranks.some(r => r.id === rankId)) {
      throw new ValidationError("currentRankId", `rank ${rankId} is not part of program ${program.id}`);
    }
  }
}
