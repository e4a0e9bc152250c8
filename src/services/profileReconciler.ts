import { ConflictError, DuplicateError, NotFoundError } from "../lib/errors";
import type { Logger } from "../lib/log";
import { metrics } from "../lib/metrics";
import { pollUntil, type PollOptions } from "../lib/retry";
import type { Enrollment } from "../models/enrollment";
import {
  PUBLIC_ROLE,
  sharedUserId,
  type CompositeProfile,
  type MemberFields,
  type MemberRecord,
  type PrimaryProfile,
  type ProfileFragments,
  type ProgramEnrollmentSummary,
  type StudioMembership,
  type Subscription,
} from "../models/profile";
import type { ChangeNotifier } from "../notify/changeNotifier";
import type { EnrollmentRepository, ProgramLookup } from "../repositories/enrollmentRepository";
import type { MemberRepository } from "../repositories/memberRepository";
import type { StudioMembershipRepository } from "../repositories/membershipRepository";
import type { ProfileRepository } from "../repositories/profileRepository";
import type { SubscriptionRepository } from "../repositories/subscriptionRepository";
import type { OnboardingCollaborator, SessionIdentity } from "./onboarding";

export type ReconcilerState = "uninitialized" | "loading" | "ready" | "refreshing" | "failed";

export type BackfillSettings = {
  studioId: string;
  studioName: string;
  discountPercentage: number;
};

export type ProfileReconcilerDeps = {
  profiles: ProfileRepository;
  subscriptions: SubscriptionRepository;
  memberships: StudioMembershipRepository;
  members: Pick<MemberRepository, "findByEmail" | "linkAuthId">;
  enrollments: EnrollmentRepository;
  programs: ProgramLookup;
  notifier: ChangeNotifier<CompositeProfile>;
  onboarding: OnboardingCollaborator;
  logger: Logger;
  poll: PollOptions;
  backfill: BackfillSettings;
  clock?: () => number;
};

type Fetched<T> = { ok: true; value: T } | { ok: false; error: unknown };

type ReconcileMode = "load" | "refresh" | "memberStatus";

function settle<T>(result: PromiseSettledResult<T>): Fetched<T> {
  return result.status === "fulfilled" ? { ok: true, value: result.value } : { ok: false, error: result.reason };
}

// Key-order-independent serialization, for change detection.
function canonical(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === null || typeof v !== "object" || Array.isArray(v)) return v;
    return Object.fromEntries(Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  });
}

const membershipIdFor = (userId: string) => `membership_${userId}`;
const subscriptionIdFor = (userId: string) => `subscription_${userId}`;

// Another writer got there first; its record is what the next read returns.
async function ignoreDuplicate(write: Promise<unknown>): Promise<void> {
  try {
    await write;
  } catch (err) {
    if (!(err instanceof DuplicateError)) throw err;
  }
}

function hasActiveEnrollment(programs: Record<string, ProgramEnrollmentSummary>): boolean {
  return Object.values(programs).some(p => p.enrolled && p.isActive);
}

function preferred(candidate: Enrollment, current: Enrollment): boolean {
  if (candidate.enrolled !== current.enrolled) return candidate.enrolled;
  return candidate.updatedAt > current.updatedAt;
}

/**
 * Builds and keeps current the composite profile of one user session.
 *
 * Identity comes from the primary store and a failure there fails the pass. Program, subscription and
 * membership fragments come from the shared store; when one of those fetches fails the last known value
 * is kept and the composite is flagged `stale`.
 *
 * Concurrent calls for the same request join one pass; different requests queue behind it.
 */
export class ProfileReconciler {
  private stateValue: ReconcilerState = "uninitialized";
  private profile: PrimaryProfile | null = null;
  private composite: CompositeProfile | null = null;
  private latest: { key: string; pass: Promise<CompositeProfile> } | null = null;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private readonly deps: ProfileReconcilerDeps) {
    this.logger = deps.logger.child({ component: "ProfileReconciler" });
    this.clock = deps.clock ?? Date.now;
  }

  get state(): ReconcilerState {
    return this.stateValue;
  }

  get current(): CompositeProfile | null {
    return this.composite ? structuredClone(this.composite) : null;
  }

  load(identity: SessionIdentity): Promise<CompositeProfile> {
    const key = JSON.stringify(["load", identity.authId, identity.userId ?? null]);
    return this.exclusive(key, () => this.runLoad(identity));
  }

  refresh(): Promise<CompositeProfile> {
    return this.exclusive("refresh", () => {
      const profile = this.profile;
      if (!profile) {
        return Promise.reject(new ConflictError("ProfileReconciler", "session", "refresh requires a completed load"));
      }
      return this.runPass("refresh", profile);
    });
  }

  /**
   * Upgrades a public user whose email has since appeared in the shared member directory. The member's
   * identity and fragments are copied into the primary profile and the member record is linked to the
   * session's auth id. Resolves the current composite unchanged when there is nothing to upgrade.
   */
  checkMemberStatus(): Promise<CompositeProfile> {
    return this.exclusive("memberStatus", async () => {
      const profile = this.profile;
      const composite = this.composite;
      if (!profile || !composite) {
        throw new ConflictError("ProfileReconciler", "session", "member status check requires a completed load");
      }
      if (!profile.roles.includes(PUBLIC_ROLE)) return structuredClone(composite);
      const member = await this.deps.members.findByEmail(profile.email);
      if (!member) {
        this.logger.debug("member_not_found", { profileId: profile.id });
        return structuredClone(composite);
      }
      return this.promote(profile, composite, member);
    });
  }

  /**
   * Passes run one at a time. A call for the same request as the last scheduled pass shares its result;
   * any other call waits for that pass to settle and then runs its own.
   */
  private exclusive(key: string, run: () => Promise<CompositeProfile>): Promise<CompositeProfile> {
    const latest = this.latest;
    if (latest && latest.key === key) return latest.pass;
    // The earlier pass's failure belongs to its own caller.
    const settled = latest ? latest.pass.then(() => undefined, () => undefined) : Promise.resolve();
    const pass: Promise<CompositeProfile> = settled.then(run).finally(() => {
      if (this.latest?.pass === pass) this.latest = null;
    });
    this.latest = { key, pass };
    return pass;
  }

  private async runLoad(identity: SessionIdentity): Promise<CompositeProfile> {
    this.stateValue = "loading";
    let profile: PrimaryProfile;
    try {
      profile = await this.resolveProfile(identity);
    } catch (err) {
      this.fail("load", err);
      throw err;
    }
    if (this.profile && this.profile.id !== profile.id) this.composite = null;
    this.profile = profile;
    return this.runPass("load", profile);
  }

  private async runPass(mode: ReconcileMode, profile: PrimaryProfile, base?: ProfileFragments): Promise<CompositeProfile> {
    if (mode !== "load") this.stateValue = "refreshing";
    try {
      const composite = await this.reconcile(profile, base ?? this.baseFragments(profile));
      this.stateValue = "ready";
      metrics.reconcilePassesTotal.inc({ mode, outcome: composite.stale ? "stale" : "ok" });
      this.logger.info("profile_reconciled", {
        mode,
        userId: composite.userId,
        stale: composite.stale,
        programs: Object.keys(composite.programs).length,
      });
      return structuredClone(composite);
    } catch (err) {
      this.fail(mode, err);
      throw err;
    }
  }

  private fail(mode: ReconcileMode, err: unknown): void {
    this.stateValue = "failed";
    metrics.reconcilePassesTotal.inc({ mode, outcome: "failed" });
    this.logger.error("profile_reconcile_failed", { mode, error: err });
  }

  private async resolveProfile(identity: SessionIdentity): Promise<PrimaryProfile> {
    const existing = await this.lookup(identity);
    if (existing) return existing;

    this.logger.info("profile_missing", { authId: identity.authId });
    await this.deps.onboarding.requestProfile(identity);
    const created = await pollUntil(() => this.lookup(identity), {
      ...this.deps.poll,
      onAttempt: attempt => this.logger.debug("profile_poll", { authId: identity.authId, attempt }),
    });
    if (!created) throw new NotFoundError("Profile", identity.authId);
    return created;
  }

  /** By auth id, then by direct id for legacy records. The first strategy that finds a profile wins. */
  private async lookup(identity: SessionIdentity): Promise<PrimaryProfile | null> {
    const { profiles } = this.deps;
    const strategies: Array<[string, () => Promise<PrimaryProfile | null>]> = [
      ["authId", () => profiles.findByAuthId(identity.authId)],
      ["id", () => profiles.getById(identity.userId ?? identity.authId)],
    ];
    let failure: { error: unknown } | null = null;
    for (const [strategy, find] of strategies) {
      try {
        const found = await find();
        if (found) return found;
      } catch (err) {
        failure = failure ?? { error: err };
        this.logger.warn("profile_lookup_failed", { strategy, authId: identity.authId, error: err });
      }
    }
    if (failure) throw failure.error;
    return null;
  }

  private async reconcile(profile: PrimaryProfile, base: ProfileFragments): Promise<CompositeProfile> {
    const { subscriptions, memberships, enrollments } = this.deps;
    const userId = sharedUserId(profile);

    const [subscriptionResult, membershipResult, enrollmentResult] = await Promise.allSettled([
      subscriptions.findForUser(userId),
      memberships.findForUser(userId),
      enrollments.listForUser(userId),
    ]);
    const fetchedSubscription = settle(subscriptionResult);
    const fetchedMembership = settle(membershipResult);
    const fetchedEnrollments = settle(enrollmentResult);

    let stale = false;
    for (const [fragment, fetched] of [
      ["subscription", fetchedSubscription],
      ["studioMembership", fetchedMembership],
      ["enrollments", fetchedEnrollments],
    ] as const) {
      if (!fetched.ok) {
        stale = true;
        this.logger.warn("secondary_fetch_failed", { fragment, userId, error: fetched.error });
      }
    }

    let programs = base.programs;
    if (fetchedEnrollments.ok && fetchedEnrollments.value.length > 0) {
      const summarized = await this.summarize(fetchedEnrollments.value, base.programs);
      if (summarized.incomplete) stale = true;
      programs = { ...base.programs, ...summarized.programs };
    }

    let membership = fetchedMembership.ok ? fetchedMembership.value : null;
    let subscription = fetchedSubscription.ok ? fetchedSubscription.value : null;

    if (fetchedMembership.ok && !membership && hasActiveEnrollment(programs)) {
      try {
        membership = await this.backfillMembership(userId, programs);
        if (membership && fetchedSubscription.ok && !subscription) {
          subscription = await this.backfillSubscription(userId, membership);
        }
      } catch (err) {
        stale = true;
        this.logger.warn("backfill_failed", { userId, error: err });
      }
    }

    const fragments: ProfileFragments = {
      programs,
      subscription: subscription ?? base.subscription,
      studioMembership: membership ?? base.studioMembership,
    };

    await this.persist(profile, fragments);

    const composite: CompositeProfile = {
      id: profile.id,
      userId,
      authId: profile.authId,
      name: profile.name,
      email: profile.email,
      roles: profile.roles,
      accessLevel: profile.accessLevel,
      photoUrl: profile.photoUrl,
      ...fragments,
      stale,
    };

    const previous = this.composite;
    if (!previous || canonical(previous) !== canonical(composite)) {
      this.composite = composite;
      this.deps.notifier.publish(previous ? "updated" : "created", composite);
    }
    return composite;
  }

  private async promote(profile: PrimaryProfile, composite: CompositeProfile, member: MemberRecord): Promise<CompositeProfile> {
    const fields: MemberFields = {
      name: member.name || profile.name,
      email: member.email,
      roles: member.roles,
      photoUrl: member.photoUrl ?? profile.photoUrl,
      programs: { ...profile.programs, ...member.programs },
      subscription: member.subscription ?? profile.subscription,
      studioMembership: member.studioMembership ?? profile.studioMembership,
    };
    let upgraded: PrimaryProfile = { ...profile, ...fields };
    try {
      upgraded = await this.deps.profiles.saveMemberFields(profile.id, fields);
    } catch (err) {
      // The session goes on as a member; the stored profile stays public and the next load upgrades it again.
      this.logger.warn("member_upgrade_persist_failed", { profileId: profile.id, memberId: member.id, error: err });
    }
    this.profile = upgraded;

    if (profile.authId && member.authId !== profile.authId) {
      try {
        await this.deps.members.linkAuthId(member.id, profile.authId);
      } catch (err) {
        this.logger.warn("member_link_failed", { memberId: member.id, authId: profile.authId, error: err });
      }
    }
    try {
      await this.importMemberFragments(sharedUserId(upgraded), member);
    } catch (err) {
      this.logger.warn("member_import_failed", { memberId: member.id, error: err });
    }
    this.logger.info("member_status_upgraded", { profileId: profile.id, memberId: member.id, roles: member.roles });

    // Member fragments stand in for what the session knew; live shared-store records still take precedence.
    return this.runPass("memberStatus", upgraded, {
      programs: { ...composite.programs, ...member.programs },
      subscription: member.subscription ?? composite.subscription,
      studioMembership: member.studioMembership ?? composite.studioMembership,
    });
  }

  // Copies the member's membership and subscription into the shared store under the session's user id,
  // unless the user already has records there.
  private async importMemberFragments(userId: string, member: MemberRecord): Promise<void> {
    const { memberships, subscriptions } = this.deps;
    if (member.studioMembership && !(await memberships.findForUser(userId))) {
      const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...membership } = member.studioMembership;
      await ignoreDuplicate(memberships.create({ ...membership, id: membershipIdFor(userId), userId, source: "studio_import" }));
    }
    if (member.subscription && !(await subscriptions.findForUser(userId))) {
      const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...subscription } = member.subscription;
      await ignoreDuplicate(
        subscriptions.create({
          ...subscription,
          id: subscriptionIdFor(userId),
          userId,
          studioMembershipId: member.studioMembership ? membershipIdFor(userId) : subscription.studioMembershipId,
        }),
      );
    }
  }

  // What is already known: the last composite of this session, or the denormalized copy in the primary store.
  private baseFragments(profile: PrimaryProfile): ProfileFragments {
    const known = this.composite && this.composite.id === profile.id ? this.composite : profile;
    return { programs: known.programs, subscription: known.subscription, studioMembership: known.studioMembership };
  }

  private async summarize(
    records: Enrollment[],
    known: Record<string, ProgramEnrollmentSummary>,
  ): Promise<{ programs: Record<string, ProgramEnrollmentSummary>; incomplete: boolean }> {
    const chosen = new Map<string, Enrollment>();
    for (const record of records) {
      const current = chosen.get(record.programId);
      if (!current || preferred(record, current)) chosen.set(record.programId, record);
    }

    const ids = [...chosen.keys()];
    const lookups = await Promise.allSettled(ids.map(id => this.deps.programs.getById(id)));
    const programs: Record<string, ProgramEnrollmentSummary> = {};
    let incomplete = false;
    ids.forEach((programId, i) => {
      const enrollment = chosen.get(programId);
      if (!enrollment) return;
      const lookup = lookups[i];
      let programName = known[programId]?.programName ?? "";
      if (lookup.status === "fulfilled") {
        programName = lookup.value?.name ?? programName;
      } else {
        incomplete = true;
        this.logger.warn("program_name_lookup_failed", { programId, error: lookup.reason });
      }
      programs[programId] = {
        programId,
        programName,
        enrolled: enrollment.enrolled,
        enrollmentDate: enrollment.enrollmentDate,
        currentRankId: enrollment.currentRankId,
        rankDate: enrollment.rankDate,
        membershipType: enrollment.membershipType,
        isActive: enrollment.isActive,
      };
    });
    return { programs, incomplete };
  }

  private async backfillMembership(
    userId: string,
    programs: Record<string, ProgramEnrollmentSummary>,
  ): Promise<StudioMembership | null> {
    const { memberships, backfill } = this.deps;
    const active = Object.values(programs).filter(p => p.enrolled && p.isActive);
    const dates = active.map(p => p.enrollmentDate).filter((d): d is number => d !== null);
    const membershipType = active.some(p => p.membershipType === "instructor")
      ? "instructor"
      : active.some(p => p.membershipType === "assistant")
        ? "assistant"
        : "student";
    try {
      const created = await memberships.create({
        id: membershipIdFor(userId),
        userId,
        studioId: backfill.studioId,
        studioName: backfill.studioName,
        membershipNumber: `SM-${userId}`,
        membershipType,
        programIds: active.map(p => p.programId).sort(),
        startDate: dates.length > 0 ? Math.min(...dates) : this.clock(),
        endDate: null,
        isActive: true,
        discountPercentage: backfill.discountPercentage,
        source: "enrollment_backfill",
      });
      metrics.backfillWritesTotal.inc({ fragment: "studioMembership" });
      this.logger.info("membership_backfilled", { userId, membershipId: created.id, programs: created.programIds.length });
      return created;
    } catch (err) {
      if (err instanceof DuplicateError) return memberships.findForUser(userId);
      throw err;
    }
  }

  private async backfillSubscription(userId: string, membership: StudioMembership): Promise<Subscription | null> {
    const { subscriptions } = this.deps;
    try {
      const created = await subscriptions.create({
        id: subscriptionIdFor(userId),
        userId,
        type: "studio_member",
        status: "active",
        startDate: membership.startDate,
        endDate: null,
        autoRenew: false,
        studioMembershipId: membership.id,
      });
      metrics.backfillWritesTotal.inc({ fragment: "subscription" });
      this.logger.info("subscription_backfilled", { userId, subscriptionId: created.id });
      return created;
    } catch (err) {
      if (err instanceof DuplicateError) return subscriptions.findForUser(userId);
      throw err;
    }
  }

  // The denormalized copy only serves offline reads; failing to write it does not fail the pass.
  private async persist(profile: PrimaryProfile, fragments: ProfileFragments): Promise<void> {
    const stored: ProfileFragments = {
      programs: profile.programs,
      subscription: profile.subscription,
      studioMembership: profile.studioMembership,
    };
    if (canonical(stored) === canonical(fragments)) return;
    try {
      this.profile = await this.deps.profiles.saveDenormalized(profile.id, fragments);
    } catch (err) {
      metrics.denormalizedPersistFailuresTotal.inc();
      this.logger.warn("denormalized_persist_failed", { profileId: profile.id, error: err });
    }
  }
}
