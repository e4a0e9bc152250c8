import { loadConfig, type EngineConfig } from "./lib/config";
import { makeConvex } from "./lib/convex";
import { createLogger, type Logger } from "./lib/log";
import { sleep as defaultSleep } from "./lib/retry";
import type { Enrollment } from "./models/enrollment";
import type { CompositeProfile, PrimaryProfile } from "./models/profile";
import type { Program } from "./models/program";
import type { ProgramProgress } from "./models/progress";
import { ChangeHub } from "./notify/changeHub";
import type { ChangeStream, SubscribeOptions } from "./notify/changeNotifier";
import { EnrollmentRepository } from "./repositories/enrollmentRepository";
import { MemberRepository } from "./repositories/memberRepository";
import { StudioMembershipRepository } from "./repositories/membershipRepository";
import { ProfileRepository } from "./repositories/profileRepository";
import { ProgramRepository } from "./repositories/programRepository";
import { ProgressRepository } from "./repositories/progressRepository";
import { RankProgressRepository } from "./repositories/rankProgressRepository";
import { SubscriptionRepository } from "./repositories/subscriptionRepository";
import { canAccessProgram } from "./services/access";
import { ProgressAnalytics } from "./services/analytics";
import { loggingOnboarding, type OnboardingCollaborator, type SessionIdentity } from "./services/onboarding";
import { ProfileReconciler } from "./services/profileReconciler";
import { ConvexStore } from "./store/convexStore";
import { InstrumentedStore } from "./store/instrumentedStore";
import { InMemoryStore } from "./store/memoryStore";
import type { RemoteStoreClient } from "./store/types";

export type EngineOptions = {
  config?: EngineConfig;
  primaryStore?: RemoteStoreClient;
  sharedStore?: RemoteStoreClient;
  onboarding?: OnboardingCollaborator;
  logger?: Logger;
  clock?: () => number;
  newId?: () => string;
  sleep?: (ms: number) => Promise<void>;
};

export type Engine = ReturnType<typeof createEngine>;

function defaultStore(name: string, url: string, config: EngineConfig): RemoteStoreClient {
  return config.mockConvex ? new InMemoryStore(name) : new ConvexStore(name, makeConvex(url));
}

/** Builds every component once and wires them together. Nothing here is a global. */
export function createEngine(options: EngineOptions = {}) {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel, { service: "dojo-journal-engine" });
  const clock = options.clock ?? Date.now;

  const primary = new InstrumentedStore(options.primaryStore ?? defaultStore("primary", config.primaryConvexUrl, config), logger);
  const shared = new InstrumentedStore(options.sharedStore ?? defaultStore("shared", config.sharedConvexUrl, config), logger);

  const hub = new ChangeHub(config.notifierBufferSize, logger, clock);
  const common = { logger, clock, newId: options.newId, pageSize: config.listPageSize };

  const programs = new ProgramRepository({ ...common, store: shared, notifier: hub.channels.program });
  const enrollments = new EnrollmentRepository({ ...common, store: shared, notifier: hub.channels.enrollment, programs });
  const progress = new ProgressRepository({ ...common, store: shared, notifier: hub.channels.progress, enrollments });
  const rankProgress = new RankProgressRepository({
    ...common,
    store: shared,
    notifier: hub.channels.rankProgress,
    programs,
    enrollments,
  });
  programs.registerDependents([enrollments, progress, rankProgress]);

  const profiles = new ProfileRepository({ ...common, store: primary, notifier: hub.channels.profile });
  const subscriptions = new SubscriptionRepository({ ...common, store: shared, notifier: hub.channels.subscription });
  const memberships = new StudioMembershipRepository({ ...common, store: shared, notifier: hub.channels.studioMembership });
  const members = new MemberRepository({ ...common, store: shared, notifier: hub.channels.member });

  const reconciler = new ProfileReconciler({
    profiles,
    subscriptions,
    memberships,
    members,
    enrollments,
    programs,
    notifier: hub.channels.composite,
    onboarding: options.onboarding ?? loggingOnboarding(logger),
    logger,
    clock,
    poll: {
      attempts: config.profilePollAttempts,
      intervalMs: config.profilePollIntervalMs,
      sleep: options.sleep ?? defaultSleep,
    },
    backfill: {
      studioId: config.backfillStudioId,
      studioName: config.backfillStudioName,
      discountPercentage: config.backfillDiscountPercent,
    },
  });

  const analytics = new ProgressAnalytics({ enrollments, progress, rankProgress });
  const repositories = { programs, enrollments, progress, rankProgress, profiles, subscriptions, memberships, members };

  return {
    config,
    hub,
    reconciler,
    analytics,
    repositories,

    load: (identity: SessionIdentity): Promise<CompositeProfile> => reconciler.load(identity),
    refresh: (): Promise<CompositeProfile> => reconciler.refresh(),
    checkMemberStatus: (): Promise<CompositeProfile> => reconciler.checkMemberStatus(),
    getProgram: (programId: string): Promise<Program | null> => programs.getById(programId),
    getEnrollment: (userId: string, programId: string): Promise<Enrollment | null> => enrollments.findActive(userId, programId),
    canAccessProgram: (program: Program): boolean => canAccessProgram(reconciler.current, program),

    subscribeToProgramChanges: (opts?: SubscribeOptions): ChangeStream<Program> => hub.channels.program.subscribe(opts),
    subscribeToEnrollmentChanges: (opts?: SubscribeOptions): ChangeStream<Enrollment> => hub.channels.enrollment.subscribe(opts),
    subscribeToProgressChanges: (opts?: SubscribeOptions): ChangeStream<ProgramProgress> => hub.channels.progress.subscribe(opts),
    subscribeToProfileChanges: (opts?: SubscribeOptions): ChangeStream<CompositeProfile> => hub.channels.composite.subscribe(opts),
    subscribeToPrimaryProfileChanges: (opts?: SubscribeOptions): ChangeStream<PrimaryProfile> => hub.channels.profile.subscribe(opts),

    clearCaches(): void {
      for (const repo of Object.values(repositories)) repo.clearCache();
    },

    close(): void {
      hub.closeAll();
    },
  };
}
