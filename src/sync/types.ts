import type { ApplyItemError } from "../errors";

/**
 * An aggregator-side subscription. `identifier` is the feed URL with the
 * aggregator's own prefix stripped, and is the diff key.
 */
export type Subscription = {
  readonly identifier: string;
  readonly title: string;
  readonly label: string | null;
};

/**
 * A feed produced by a subscription source. `url` is already normalised by
 * the provider and compares directly against `Subscription.identifier`.
 */
export type RemoteFeed = {
  readonly title: string;
  readonly url: string;
};

/** identifier -> title, in insertion order */
export type FeedMap = ReadonlyMap<string, string>;

export type ReconciliationResult = {
  readonly toRemove: FeedMap;
  readonly toAdd: FeedMap;
};

export const APPLY_MODES = ["none", "old", "new", "all"] as const;
export type ApplyMode = (typeof APPLY_MODES)[number];

export type MutationResult =
  | { readonly success: true }
  | { readonly success: false; readonly error: string };

/**
 * Write access to the aggregator's subscription store.
 * `addSubscription` and `removeSubscription` report failures in their result;
 * the engine calls each at most once per identifier per run. Both act on
 * `label` alone: a feed filed under other labels stays filed there.
 */
export type AggregatorClient = {
  readonly fetchSubscriptions: () => Promise<ReadonlyArray<Subscription>>;
  readonly addSubscription: (
    feedUrl: string,
    title: string,
    label: string | null,
  ) => Promise<MutationResult>;
  readonly removeSubscription: (
    identifier: string,
    label: string | null,
  ) => Promise<MutationResult>;
};

export type ApplyOutcome = {
  readonly removed: ReadonlyArray<string>;
  readonly added: ReadonlyArray<string>;
  readonly failures: ReadonlyArray<ApplyItemError>;
};

export type ReconcileOutcome = {
  readonly diff: ReconciliationResult;
  readonly applied: ApplyOutcome;
};
