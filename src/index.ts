export { createEngine, type Engine, type EngineOptions } from "./engine";
export { loadConfig, type EngineConfig } from "./lib/config";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/log";
export { promRegistry } from "./lib/metrics";
export {
  CascadeError,
  ConflictError,
  DuplicateError,
  EngineError,
  NetworkError,
  NotFoundError,
  PermissionDeniedError,
  UnknownError,
  ValidationError,
  isRetryable,
  type EngineErrorCode,
} from "./lib/errors";
export type { RemoteStoreClient, DocumentFields, Predicate, QueryOptions, QueryPage, StoreErrorCode } from "./store/types";
export { StoreError } from "./store/types";
export { InMemoryStore } from "./store/memoryStore";
export { ConvexStore } from "./store/convexStore";
export type { ChangeEvent, ChangeStream, ChangeType } from "./notify/changeNotifier";
export type { Program, Rank, ProgramDraft, ProgramCategory, ProgramAccessLevel } from "./models/program";
export type { Enrollment, MembershipType } from "./models/enrollment";
export type { ProgramProgress, RankProgress, RankProgressPatch } from "./models/progress";
export type { CompositeProfile, MemberRecord, PrimaryProfile, Subscription, StudioMembership } from "./models/profile";
export type { OnboardingCollaborator, SessionIdentity } from "./services/onboarding";
export type { ReconcilerState } from "./services/profileReconciler";
export { canAccessProgram, userType, type UserType } from "./services/access";
