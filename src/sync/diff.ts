// pattern: Functional Core
import type { Logger } from "pino";
import type { FeedMap, RemoteFeed, ReconciliationResult, Subscription } from "./types";

export type DiffInput = {
  readonly remoteItems: AsyncIterable<RemoteFeed> | Iterable<RemoteFeed>;
  readonly aggregatorItems: ReadonlyArray<Subscription>;
  readonly targetLabel: string | null;
  readonly exclusions: ReadonlySet<string>;
};

/**
 * Aggregator subscriptions filed under `targetLabel`, keyed by identifier.
 * Nothing outside the label is considered; no label means nothing is.
 */
export function subscriptionsUnderLabel(
  items: ReadonlyArray<Subscription>,
  targetLabel: string | null,
): Map<string, string> {
  const current = new Map<string, string>();
  if (targetLabel === null) return current;

  for (const item of items) {
    if (item.label === targetLabel) {
      current.set(item.identifier, item.title);
    }
  }
  return current;
}

/**
 * Computes which aggregator subscriptions under the target label are stale
 * (`toRemove`) and which remote feeds are missing (`toAdd`).
 *
 * Behavior:
 * - `remoteItems` is drained exactly once; it may be a lazy, non-restartable sequence.
 * - Identity is the identifier alone. A title change never produces an add or remove.
 * - A remote feed already under the label confirms it; repeated remote entries for
 *   the same identifier keep the last title seen.
 * - Excluded identifiers end up in neither mapping, whichever side they came from.
 *
 * @returns toRemove = current \ (remote ∪ exclusions), toAdd = remote \ (current ∪ exclusions)
 */
export async function computeDiff(
  input: DiffInput,
  logger: Logger,
): Promise<ReconciliationResult> {
  const current = subscriptionsUnderLabel(input.aggregatorItems, input.targetLabel);
  const toRemove = new Map(current);
  const toAdd = new Map<string, string>();

  for await (const feed of input.remoteItems) {
    const identifier = feed.url;

    if (current.has(identifier)) {
      if (input.exclusions.has(identifier)) {
        logger.debug({ identifier }, "excluded feed kept in aggregator");
      }
      toRemove.delete(identifier);
      continue;
    }

    toAdd.set(identifier, feed.title);
  }

  for (const identifier of input.exclusions) {
    if (toRemove.delete(identifier)) {
      logger.debug({ identifier }, "excluded feed kept in aggregator");
    }
    if (toAdd.delete(identifier)) {
      logger.debug({ identifier }, "excluded feed dropped from additions");
    }
  }

  logger.info(
    {
      targetLabel: input.targetLabel,
      current: current.size,
      toRemove: toRemove.size,
      toAdd: toAdd.size,
    },
    "diff computed",
  );

  return { toRemove, toAdd };
}

/**
 * Drains the remote feeds into identifier -> title, leaving out excluded ones.
 * Used when there is no aggregator to compare against.
 */
export async function collectRemoteFeeds(
  remoteItems: AsyncIterable<RemoteFeed> | Iterable<RemoteFeed>,
  exclusions: ReadonlySet<string>,
  logger: Logger,
): Promise<FeedMap> {
  const feeds = new Map<string, string>();

  for await (const feed of remoteItems) {
    if (exclusions.has(feed.url)) {
      logger.debug({ identifier: feed.url }, "excluded feed left out");
      continue;
    }
    feeds.set(feed.url, feed.title);
  }

  logger.debug({ count: feeds.size }, "remote feeds collected");
  return feeds;
}
