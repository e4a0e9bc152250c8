import { CascadeError, ConflictError, NotFoundError } from "../lib/errors";
import { SharedCollections } from "../models/collections";
import { parseValue } from "../models/entity";
import {
  programSchema,
  rankSchema,
  sortedRanks,
  type Program,
  type ProgramCategory,
  type ProgramDraft,
  type Rank,
  type RankInput,
} from "../models/program";
import { where, type Predicate } from "../store/types";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";

/** A collection holding rows that reference a program. Purged in registration order when the program is deleted. */
export interface ProgramDependent {
  readonly collection: string;
  /** Resolves true when the program must not be deleted yet. */
  blocksProgramDelete?(programId: string): Promise<boolean>;
  purgeForProgram(programId: string): Promise<number>;
}

export type ProgramListFilter = {
  category?: ProgramCategory;
  activeOnly?: boolean;
  text?: string;
  limit?: number;
};

export type PurgeReport = Record<string, number>;

export class ProgramRepository extends EntityRepository<Program, ProgramDraft> {
  private dependents: ProgramDependent[] = [];

  constructor(deps: RepositoryDeps<Program>) {
    super(
      {
        kind: "Program",
        collection: SharedCollections.programs,
        schema: programSchema,
        // Names are trimmed by the schema and compared exactly, the same way the store query compares them.
        naturalKey: p => p.name,
        searchText: p => `${p.name} ${p.description}`,
      },
      deps,
    );
  }

  registerDependents(dependents: ProgramDependent[]): void {
    this.dependents.push(...dependents);
  }

  async listPrograms(filter: ProgramListFilter = {}): Promise<Program[]> {
    const predicates: Predicate[] = [];
    if (filter.activeOnly ?? true) predicates.push(where("isActive", "==", true));
    if (filter.category) predicates.push(where("category", "==", filter.category));
    return this.list({ predicates, orderBy: { field: "name" }, text: filter.text, limit: filter.limit });
  }

  searchPrograms(text: string, limit = 20): Promise<Program[]> {
    return this.listPrograms({ text, limit });
  }

  async getRanks(programId: string): Promise<Rank[]> {
    return sortedRanks(await this.require(programId));
  }

  /** The rank one ordinal step above `rankId`, or null when `rankId` is already the highest. */
  async getNextRank(programId: string, rankId: string): Promise<Rank | null> {
    const ranks = await this.getRanks(programId);
    const index = ranks.findIndex(r => r.id === rankId);
    if (index < 0) throw new NotFoundError("Rank", rankId);
    return ranks[index + 1] ?? null;
  }

  async addRank(programId: string, rank: RankInput): Promise<Program> {
    const program = await this.require(programId);
    return this.update({ ...program, ranks: [...program.ranks, parseValue(rankSchema, rank)] });
  }

  async updateRank(programId: string, rank: RankInput): Promise<Program> {
    const program = await this.require(programId);
    if (!program.ranks.some(r => r.id === rank.id)) throw new NotFoundError("Rank", rank.id);
    const replacement = parseValue(rankSchema, rank);
    return this.update({ ...program, ranks: program.ranks.map(r => (r.id === rank.id ? replacement : r)) });
  }

  async removeRank(programId: string, rankId: string): Promise<Program> {
    const program = await this.require(programId);
    if (!program.ranks.some(r => r.id === rankId)) throw new NotFoundError("Rank", rankId);
    return this.update({ ...program, ranks: program.ranks.filter(r => r.id !== rankId) });
  }

  /**
   * Removes every dependent row of a program, continuing past failures. Safe to call again after a
   * CascadeError; collections already purged are simply empty the second time.
   */
  async purgeDependents(programId: string): Promise<PurgeReport> {
    const report: PurgeReport = {};
    const failed: string[] = [];
    const causes: unknown[] = [];
    for (const dependent of this.dependents) {
      try {
        report[dependent.collection] = await dependent.purgeForProgram(programId);
      } catch (err) {
        failed.push(dependent.collection);
        causes.push(err);
        this.logger.warn("cascade_purge_failed", { programId, collection: dependent.collection, error: err });
      }
    }
    if (failed.length > 0) throw new CascadeError(this.kind, programId, failed, causes);
    return report;
  }

  protected async findRemoteByNaturalKey(candidate: Program): Promise<Program | null> {
    return this.queryFirst([where("name", "==", candidate.name), where("isActive", "==", true)]);
  }

  protected occupiesKey(program: Program): boolean {
    return program.isActive;
  }

  protected async beforeDelete(program: Program): Promise<void> {
    for (const dependent of this.dependents) {
      if (dependent.blocksProgramDelete && (await dependent.blocksProgramDelete(program.id))) {
        throw new ConflictError(this.kind, program.id, `has dependents in ${dependent.collection}`);
      }
    }
  }

  protected async afterDelete(program: Program): Promise<void> {
    const report = await this.purgeDependents(program.id);
    this.logger.info("program_deleted", { programId: program.id, purged: report });
  }

  private async require(programId: string): Promise<Program> {
    const program = await this.getById(programId);
    if (!program) throw new NotFoundError(this.kind, programId);
    return program;
  }
}
