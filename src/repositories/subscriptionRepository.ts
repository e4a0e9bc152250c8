import { SharedCollections } from "../models/collections";
import { subscriptionSchema, type Subscription, type SubscriptionDraft } from "../models/profile";
import { where } from "../store/types";
import { EntityRepository, type RepositoryDeps } from "./entityRepository";

export class SubscriptionRepository extends EntityRepository<Subscription, SubscriptionDraft> {
  constructor(deps: RepositoryDeps<Subscription>) {
    super(
      { kind: "Subscription", collection: SharedCollections.subscriptions, schema: subscriptionSchema, naturalKey: s => s.userId },
      deps,
    );
  }

  /** The user's current subscription: an active one if any, otherwise the most recent. */
  async findForUser(userId: string): Promise<Subscription | null> {
    const all = await this.list({ predicates: [where("userId", "==", userId)], orderBy: { field: "startDate", direction: "desc" } });
    return all.find(s => s.status === "active") ?? all[0] ?? null;
  }

  protected async findRemoteByNaturalKey(candidate: Subscription): Promise<Subscription | null> {
    return this.queryFirst([where("userId", "==", candidate.userId)]);
  }
}
