import { z } from "zod";
import { MEMBERSHIP_TYPES } from "./enrollment";
import { idField, timestamp, type Draft } from "./entity";

export const USER_ACCESS_LEVELS = ["free", "subscriber", "instructor", "admin"] as const;
export type UserAccessLevel = (typeof USER_ACCESS_LEVELS)[number];

export const SUBSCRIPTION_TYPES = ["free", "monthly", "annual", "studio_member"] as const;
export const SUBSCRIPTION_STATUSES = ["active", "expired", "cancelled", "pending"] as const;
export const MEMBERSHIP_SOURCES = ["enrollment_backfill", "studio_import", "manual"] as const;

export const subscriptionSchema = z.object({
  id: idField,
  userId: idField,
  type: z.enum(SUBSCRIPTION_TYPES),
  status: z.enum(SUBSCRIPTION_STATUSES).default("active"),
  startDate: timestamp,
  endDate: timestamp.nullable().default(null),
  autoRenew: z.boolean().default(false),
  studioMembershipId: z.string().nullable().default(null),
  createdAt: timestamp,
  updatedAt: timestamp,
});

export type Subscription = z.infer<typeof subscriptionSchema>;
export type SubscriptionDraft = Draft<typeof subscriptionSchema>;

export const studioMembershipSchema = z.object({
  id: idField,
  userId: idField,
  studioId: z.string().default(""),
  studioName: z.string().trim().min(1),
  membershipNumber: z.string().default(""),
  membershipType: z.enum(MEMBERSHIP_TYPES).default("student"),
  programIds: z.array(z.string()).default([]),
  startDate: timestamp,
  endDate: timestamp.nullable().default(null),
  isActive: z.boolean().default(true),
  discountPercentage: z.number().min(0).max(100).default(0),
  source: z.enum(MEMBERSHIP_SOURCES).default("manual"),
  createdAt: timestamp,
  updatedAt: timestamp,
});

export type StudioMembership = z.infer<typeof studioMembershipSchema>;
export type StudioMembershipDraft = Draft<typeof studioMembershipSchema>;

export const programEnrollmentSummarySchema = z.object({
  programId: idField,
  programName: z.string().default(""),
  enrolled: z.boolean(),
  enrollmentDate: timestamp.nullable().default(null),
  currentRankId: z.string().nullable().default(null),
  rankDate: timestamp.nullable().default(null),
  membershipType: z.enum(MEMBERSHIP_TYPES).default("student"),
  isActive: z.boolean().default(true),
});

export type ProgramEnrollmentSummary = z.infer<typeof programEnrollmentSummarySchema>;

export const primaryProfileSchema = z.object({
  id: idField,
  // External auth provider id; absent on legacy records keyed only by id.
  authId: z.string().nullable().default(null),
  name: z.string().default(""),
  email: z.string().default(""),
  roles: z.array(z.string()).default([]),
  accessLevel: z.enum(USER_ACCESS_LEVELS).default("free"),
  photoUrl: z.string().nullable().default(null),
  // Denormalized copies of secondary-store fragments, kept for offline reads.
  programs: z.record(programEnrollmentSummarySchema).default({}),
  subscription: subscriptionSchema.nullable().default(null),
  studioMembership: studioMembershipSchema.nullable().default(null),
  createdAt: timestamp.default(0),
  updatedAt: timestamp.default(0),
});

export type PrimaryProfile = z.infer<typeof primaryProfileSchema>;

export type ProfileFragments = Pick<PrimaryProfile, "programs" | "subscription" | "studioMembership">;

// A user who has only signed up, as opposed to a studio member.
export const PUBLIC_ROLE = "public";

/** A studio's record of one member, imported into the shared store and matched to accounts by email. */
export const memberRecordSchema = z.object({
  id: idField,
  email: z.string().trim().min(1),
  // Set once an account has been matched to this member.
  authId: z.string().nullable().default(null),
  name: z.string().default(""),
  roles: z.array(z.string()).default([]),
  photoUrl: z.string().nullable().default(null),
  programs: z.record(programEnrollmentSummarySchema).default({}),
  subscription: subscriptionSchema.nullable().default(null),
  studioMembership: studioMembershipSchema.nullable().default(null),
  createdAt: timestamp.default(0),
  updatedAt: timestamp.default(0),
});

export type MemberRecord = z.infer<typeof memberRecordSchema>;
export type MemberRecordDraft = Draft<typeof memberRecordSchema>;

/** Profile fields taken over from a member record when a public user turns out to be a member. */
export type MemberFields = Pick<
  PrimaryProfile,
  "name" | "email" | "roles" | "photoUrl" | "programs" | "subscription" | "studioMembership"
>;

/** The reconciled read model for one user session. `id` is the primary profile id. */
export type CompositeProfile = {
  id: string;
  userId: string;
  authId: string | null;
  name: string;
  email: string;
  roles: string[];
  accessLevel: UserAccessLevel;
  photoUrl: string | null;
  programs: Record<string, ProgramEnrollmentSummary>;
  subscription: Subscription | null;
  studioMembership: StudioMembership | null;
  // True when at least one secondary fragment could not be fetched in the last pass.
  stale: boolean;
};

/** Id used for a user's records in the shared store. */
export const sharedUserId = (profile: Pick<PrimaryProfile, "id" | "authId">) => profile.authId || profile.id;
