// Collection names per backing store.

export const PrimaryCollections = {
  profiles: "users_profile",
} as const;

export const SharedCollections = {
  programs: "programs",
  enrollments: "enrollments",
  progress: "programProgress",
  rankProgress: "rankProgress",
  subscriptions: "subscriptions",
  memberships: "studio_memberships",
  members: "members",
} as const;
