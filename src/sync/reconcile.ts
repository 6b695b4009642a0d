// pattern: Imperative Shell
import type { Logger } from "pino";
import { AggregatorError, ApplyItemError, SyncError, errorMessage } from "../errors";
import type { ApplyAction } from "../errors";
import { computeDiff } from "./diff";
import type {
  AggregatorClient,
  ApplyMode,
  ApplyOutcome,
  MutationResult,
  ReconcileOutcome,
  ReconciliationResult,
  RemoteFeed,
  Subscription,
} from "./types";

export type ReconcileParams = {
  readonly remoteItems: AsyncIterable<RemoteFeed> | Iterable<RemoteFeed>;
  readonly aggregator: AggregatorClient;
  readonly targetLabel: string | null;
  readonly exclusions: ReadonlySet<string>;
  readonly mode: ApplyMode;
};

const appliesRemovals = (mode: ApplyMode): boolean => mode === "old" || mode === "all";
const appliesAdditions = (mode: ApplyMode): boolean => mode === "new" || mode === "all";

async function attempt(
  action: ApplyAction,
  identifier: string,
  call: () => Promise<MutationResult>,
  logger: Logger,
): Promise<ApplyItemError | null> {
  let result: MutationResult;
  try {
    result = await call();
  } catch (err) {
    result = { success: false, error: errorMessage(err) };
  }

  if (result.success) {
    logger.info({ action, identifier }, "subscription updated");
    return null;
  }

  logger.error({ action, identifier, error: result.error }, "subscription update failed, skipping");
  return new ApplyItemError(action, identifier, result.error);
}

/**
 * Applies a computed diff to the aggregator, one call at a time: removals first,
 * then additions, each gated by `mode`.
 *
 * A failing item is logged and skipped; the remaining items still run. The
 * returned outcome lists what actually went through, while `diff` itself is
 * never modified.
 */
export async function applyDiff(
  client: AggregatorClient,
  diff: ReconciliationResult,
  mode: ApplyMode,
  targetLabel: string | null,
  logger: Logger,
): Promise<ApplyOutcome> {
  const removed: Array<string> = [];
  const added: Array<string> = [];
  const failures: Array<ApplyItemError> = [];

  if (appliesRemovals(mode)) {
    for (const identifier of diff.toRemove.keys()) {
      const failure = await attempt(
        "remove",
        identifier,
        () => client.removeSubscription(identifier, targetLabel),
        logger,
      );
      if (failure) failures.push(failure);
      else removed.push(identifier);
    }
  }

  if (appliesAdditions(mode)) {
    for (const [identifier, title] of diff.toAdd) {
      const failure = await attempt(
        "add",
        identifier,
        () => client.addSubscription(identifier, title, targetLabel),
        logger,
      );
      if (failure) failures.push(failure);
      else added.push(identifier);
    }
  }

  if (mode !== "none") {
    logger.info(
      { mode, removed: removed.length, added: added.length, failed: failures.length },
      "apply complete",
    );
  }

  return { removed, added, failures };
}

/**
 * Runs one reconciliation pass: reads the aggregator, diffs it against the
 * remote feeds, and applies the changes `mode` allows.
 *
 * The returned `diff` is the same for every mode given the same inputs, so dry
 * runs and applied runs report identically.
 */
export async function reconcile(
  params: ReconcileParams,
  logger: Logger,
): Promise<ReconcileOutcome> {
  let aggregatorItems: ReadonlyArray<Subscription>;
  try {
    aggregatorItems = await params.aggregator.fetchSubscriptions();
  } catch (err) {
    if (err instanceof SyncError) throw err;
    throw new AggregatorError(`fetching subscriptions failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  logger.debug({ count: aggregatorItems.length }, "aggregator subscriptions fetched");

  const diff = await computeDiff(
    {
      remoteItems: params.remoteItems,
      aggregatorItems,
      targetLabel: params.targetLabel,
      exclusions: params.exclusions,
    },
    logger,
  );

  const applied = await applyDiff(
    params.aggregator,
    diff,
    params.mode,
    params.targetLabel,
    logger,
  );

  return { diff, applied };
}
