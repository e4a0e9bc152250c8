import type { Logger } from "../lib/log";

export type SessionIdentity = {
  authId: string;
  // Primary profile id for legacy records created before auth ids were stored.
  userId?: string;
  email?: string;
  name?: string;
};

/** Creates the primary profile for a first-time user. Completion is observed by polling, not by callback. */
export interface OnboardingCollaborator {
  requestProfile(identity: SessionIdentity): Promise<void>;
}

export const loggingOnboarding = (logger: Logger): OnboardingCollaborator => ({
  async requestProfile(identity) {
    logger.info("onboarding_requested", { authId: identity.authId });
  },
});
