import { NotFoundError } from "../lib/errors";
import { SharedCollections } from "../models/collections";
import { memberRecordSchema, type MemberRecord, type MemberRecordDraft } from "../models/profile";
import { where } from "../store/types";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";

/** The studio member directory in the shared store. */
export class MemberRepository extends EntityRepository<MemberRecord, MemberRecordDraft> {
  constructor(deps: RepositoryDeps<MemberRecord>) {
    super({ kind: "Member", collection: SharedCollections.members, schema: memberRecordSchema, naturalKey: m => m.email }, deps);
  }

  /**
   * Exact match on the stored email first. Imported records do not normalize case, so a miss falls back to
   * scanning the directory case-insensitively.
   */
  async findByEmail(email: string): Promise<MemberRecord | null> {
    const trimmed = email.trim();
    if (!trimmed) return null;
    const exact = await this.queryFirst([where("email", "==", trimmed)]);
    if (exact) return exact;
    const target = trimmed.toLowerCase();
    const [match] = await this.list({ where: m => m.email.toLowerCase() === target, limit: 1 });
    return match ?? null;
  }

  async linkAuthId(memberId: string, authId: string): Promise<MemberRecord> {
    const member = await this.getById(memberId);
    if (!member) throw new NotFoundError(this.kind, memberId);
    return this.update({ ...member, authId });
  }
}
