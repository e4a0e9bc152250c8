import type { CompositeProfile } from "../models/profile";
import type { Program } from "../models/program";

export type UserType = "free_user" | "paid_user" | "student" | "instructor" | "admin";

export function hasActiveSubscription(profile: CompositeProfile): boolean {
  return profile.subscription?.status === "active";
}

export function hasActiveMembership(profile: CompositeProfile): boolean {
  return profile.studioMembership?.isActive === true;
}

export function enrolledProgramIds(profile: CompositeProfile): string[] {
  return Object.values(profile.programs)
    .filter(p => p.enrolled && p.isActive)
    .map(p => p.programId);
}

export function userType(profile: CompositeProfile): UserType {
  if (profile.accessLevel === "admin") return "admin";
  if (profile.accessLevel === "instructor") return "instructor";
  if (enrolledProgramIds(profile).length > 0) return "student";
  if (hasActiveSubscription(profile) || profile.accessLevel === "subscriber") return "paid_user";
  return "free_user";
}

export function canAccessProgram(profile: CompositeProfile | null, program: Program): boolean {
  switch (program.accessLevel) {
    case "free_public":
      return true;
    case "subscription_required":
      if (!profile) return false;
      return hasActiveSubscription(profile) || hasActiveMembership(profile) || enrolledProgramIds(profile).includes(program.id);
    case "studio_member_discount":
      return profile !== null && hasActiveSubscription(profile) && hasActiveMembership(profile);
    case "user_private":
      return false;
  }
}
