import { NotFoundError, ValidationError } from "../lib/errors";
import { SharedCollections } from "../models/collections";
import { enrollmentKey } from "../models/enrollment";
import { parseValue } from "../models/entity";
import {
  rankProgressId,
  rankProgressPatchSchema,
  rankProgressSchema,
  type RankProgress,
  type RankProgressPatch,
} from "../models/progress";
import { where, type DocumentFields } from "../store/types";
import type { EnrollmentRepository, ProgramLookup } from "./enrollmentRepository";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";
import type { ProgramDependent } from "./programRepository";

export type RankProgressRepositoryDeps = RepositoryDeps<RankProgress> & {
  programs: ProgramLookup;
  enrollments: Pick<EnrollmentRepository, "findActive">;
};

type RankProgressFields = Omit<RankProgress, "id">;

export class RankProgressRepository extends EntityRepository<RankProgress, RankProgressFields> implements ProgramDependent {
  private readonly programs: ProgramLookup;
  private readonly enrollments: Pick<EnrollmentRepository, "findActive">;

  constructor(deps: RankProgressRepositoryDeps) {
    super({ kind: "RankProgress", collection: SharedCollections.rankProgress, schema: rankProgressSchema }, deps);
    this.programs = deps.programs;
    this.enrollments = deps.enrollments;
  }

  /**
   * Merge-writes a partial update. Item maps merge by key, so two callers touching different items
   * both keep their changes. Returns the record as stored after the write.
   */
  async upsert(userId: string, programId: string, rankId: string, patch: RankProgressPatch): Promise<RankProgress> {
    const changes = parseValue(rankProgressPatchSchema, patch);
    const enrollment = await this.enrollments.findActive(userId, programId);
    if (!enrollment) throw new NotFoundError("Enrollment", enrollmentKey(userId, programId));
    const program = await this.programs.getById(programId);
    if (!program) throw new NotFoundError("Program", programId);
    if (!program.ranks.some(r => r.id === rankId)) {
      throw new ValidationError("rankId", `rank ${rankId} is not part of program ${programId}`);
    }

    const id = rankProgressId(userId, programId, rankId);
    const existing = await this.fetchRemote(id);
    const now = this.clock();
    const fields: DocumentFields = { userId, programId, rankId, updatedAt: now };
    if (!existing) fields.createdAt = now;
    if (changes.overallProgress !== undefined) fields.overallProgress = changes.overallProgress;
    if (changes.itemCompletion) fields.itemCompletion = changes.itemCompletion;
    if (changes.itemNotes) fields.itemNotes = changes.itemNotes;
    await this.writeMerge(id, fields);

    const stored = await this.fetchRemote(id);
    if (!stored) throw new NotFoundError(this.kind, id);
    this.cache.put(stored);
    this.publish(existing ? "updated" : "created", stored);
    return stored;
  }

  get(userId: string, programId: string, rankId: string): Promise<RankProgress | null> {
    return this.getById(rankProgressId(userId, programId, rankId));
  }

  listForEnrollment(userId: string, programId: string): Promise<RankProgress[]> {
    return this.list({ predicates: [where("userId", "==", userId), where("programId", "==", programId)] });
  }

  purgeForProgram(programId: string): Promise<number> {
    return this.purgeWhere([where("programId", "==", programId)]);
  }
}
