import { NotFoundError } from "../lib/errors";
import { PrimaryCollections } from "../models/collections";
import { primaryProfileSchema, type MemberFields, type PrimaryProfile, type ProfileFragments } from "../models/profile";
import { where, type DocumentFields } from "../store/types";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";

type ProfileDraft = Omit<PrimaryProfile, "id" | "createdAt" | "updatedAt">;

/** User profiles in the primary store. Records are created by onboarding; this side reads them and keeps their denormalized fragments. */
export class ProfileRepository extends EntityRepository<PrimaryProfile, ProfileDraft> {
  constructor(deps: RepositoryDeps<PrimaryProfile>) {
    super(
      {
        kind: "Profile",
        collection: PrimaryCollections.profiles,
        schema: primaryProfileSchema,
        naturalKey: p => p.authId,
      },
      deps,
    );
  }

  async findByAuthId(authId: string): Promise<PrimaryProfile | null> {
    const cached = this.cache.getByKey(authId)[0];
    if (cached) return cached;
    return this.queryFirst([where("authId", "==", authId)]);
  }

  saveDenormalized(profileId: string, fragments: ProfileFragments): Promise<PrimaryProfile> {
    return this.mergeAndReload(profileId, {
      programs: fragments.programs,
      subscription: fragments.subscription,
      studioMembership: fragments.studioMembership,
    });
  }

  saveMemberFields(profileId: string, member: MemberFields): Promise<PrimaryProfile> {
    return this.mergeAndReload(profileId, {
      name: member.name,
      email: member.email,
      roles: member.roles,
      photoUrl: member.photoUrl,
      programs: member.programs,
      subscription: member.subscription,
      studioMembership: member.studioMembership,
    });
  }

  protected async findRemoteByNaturalKey(candidate: PrimaryProfile): Promise<PrimaryProfile | null> {
    return candidate.authId ? this.queryFirst([where("authId", "==", candidate.authId)]) : null;
  }

  private async mergeAndReload(profileId: string, fields: DocumentFields): Promise<PrimaryProfile> {
    await this.writeMerge(profileId, { ...fields, updatedAt: this.clock() });
    const stored = await this.fetchRemote(profileId);
    if (!stored) throw new NotFoundError(this.kind, profileId);
    this.cache.put(stored);
    this.publish("updated", stored);
    return stored;
  }
}
