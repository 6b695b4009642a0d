export { collectRemoteFeeds } from "./diff";
export { reconcile } from "./reconcile";
export { parseExclusions } from "./exclusions";
export { APPLY_MODES } from "./types";
export type {
  AggregatorClient,
  ApplyMode,
  ApplyOutcome,
  FeedMap,
  MutationResult,
  ReconcileOutcome,
  ReconciliationResult,
  RemoteFeed,
  Subscription,
} from "./types";
