import { SharedCollections } from "../models/collections";
import { studioMembershipSchema, type StudioMembership, type StudioMembershipDraft } from "../models/profile";
import { where } from "../store/types";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";

export class StudioMembershipRepository extends EntityRepository<StudioMembership, StudioMembershipDraft> {
  constructor(deps: RepositoryDeps<StudioMembership>) {
    super(
      { kind: "StudioMembership", collection: SharedCollections.memberships, schema: studioMembershipSchema, naturalKey: m => m.userId },
      deps,
    );
  }

  async findForUser(userId: string): Promise<StudioMembership | null> {
    const all = await this.list({ predicates: [where("userId", "==", userId)], orderBy: { field: "startDate", direction: "desc" } });
    return all.find(m => m.isActive) ?? all[0] ?? null;
  }

  protected async findRemoteByNaturalKey(candidate: StudioMembership): Promise<StudioMembership | null> {
    return this.queryFirst([where("userId", "==", candidate.userId)]);
  }
}
