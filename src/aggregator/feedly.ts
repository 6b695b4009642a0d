// pattern: Imperative Shell
import { z } from "zod";
import type { Logger } from "pino";
import type { Credential } from "../config";
import { AggregatorError, AuthenticationError, HttpError, errorMessage } from "../errors";
import { getJson, sendJson } from "../http";
import type { RequestHeaders } from "../http";
import type { AggregatorClient, MutationResult, Subscription } from "../sync/types";

export const FEEDLY_HOST = "cloud.feedly.com";
const SERVICE = "feedly";
const FEED_PREFIX = "feed/";

const categorySchema = z.object({
  id: z.string(),
  label: z.string(),
});

const subscriptionSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  categories: z.array(categorySchema).optional(),
});

const profileSchema = z.object({ id: z.string().min(1) });

export type FeedlyClientOptions = {
  readonly credential: Credential;
  readonly logger: Logger;
  readonly host?: string;
};

/** Feedly feed ids are the feed URL behind a `feed/` prefix. */
export function toFeedId(feedUrl: string): string {
  return `${FEED_PREFIX}${feedUrl}`;
}

export function fromFeedId(feedId: string): string | null {
  return feedId.startsWith(FEED_PREFIX) ? feedId.slice(FEED_PREFIX.length) : null;
}

/**
 * Flattens Feedly subscriptions into one entry per category; an uncategorised
 * subscription yields a single entry with a null label. Non-feed ids (topics,
 * boards) are dropped.
 */
export function toSubscriptions(
  raw: ReadonlyArray<z.infer<typeof subscriptionSchema>>,
): ReadonlyArray<Subscription> {
  const result: Array<Subscription> = [];

  for (const item of raw) {
    const identifier = fromFeedId(item.id);
    if (identifier === null) continue;

    const title = item.title ?? identifier;
    const categories = item.categories ?? [];

    if (categories.length === 0) {
      result.push({ identifier, title, label: null });
      continue;
    }
    for (const category of categories) {
      result.push({ identifier, title, label: category.label });
    }
  }

  return result;
}

function isAuthFailure(err: unknown): boolean {
  return err instanceof HttpError && (err.status === 401 || err.status === 403);
}

type Category = z.infer<typeof categorySchema>;

type KnownFeed = {
  readonly title: string;
  readonly categories: ReadonlyArray<Category>;
};

/**
 * Feedly Cloud client. The credential's `password` is a developer access token.
 *
 * A Feedly POST replaces a subscription's categories, so the client remembers
 * every feed's full category list from `fetchSubscriptions` and only ever adds
 * or drops the one category it was asked about. A feed keeps its other folders.
 *
 * `addSubscription` and `removeSubscription` never throw: failures come back in
 * the result so the caller can skip the item and carry on.
 */
export function createFeedlyClient(options: FeedlyClientOptions): AggregatorClient {
  const { credential, logger } = options;
  const apiBase = `https://${options.host ?? FEEDLY_HOST}/v3`;
  const headers: RequestHeaders = {
    Authorization: `Bearer ${credential.password}`,
  };

  const known = new Map<string, KnownFeed>();
  let profileId: string | null = null;

  async function getProfileId(): Promise<string> {
    if (profileId === null) {
      const { data } = await getJson(`${apiBase}/profile`, headers, profileSchema);
      profileId = data.id;
      logger.debug({ profileId }, "feedly profile loaded");
    }
    return profileId;
  }

  async function mutate(
    action: string,
    identifier: string,
    call: () => Promise<void>,
  ): Promise<MutationResult> {
    try {
      await call();
      return { success: true };
    } catch (err) {
      const message = errorMessage(err);
      logger.warn({ action, identifier, error: message }, "feedly request failed");
      return { success: false, error: message };
    }
  }

  async function postFeed(feedId: string, feed: KnownFeed): Promise<void> {
    await sendJson("POST", `${apiBase}/subscriptions`, headers, {
      id: feedId,
      title: feed.title,
      categories: feed.categories,
    });
    known.set(feedId, feed);
  }

  return {
    async fetchSubscriptions() {
      let data: ReadonlyArray<z.infer<typeof subscriptionSchema>>;
      try {
        ({ data } = await getJson(
          `${apiBase}/subscriptions`,
          headers,
          z.array(subscriptionSchema),
        ));
      } catch (err) {
        if (isAuthFailure(err)) {
          throw new AuthenticationError(SERVICE, errorMessage(err), { cause: err });
        }
        throw new AggregatorError(`fetching subscriptions failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      known.clear();
      for (const item of data) {
        known.set(item.id, {
          title: item.title ?? fromFeedId(item.id) ?? item.id,
          categories: item.categories ?? [],
        });
      }
      logger.info({ count: data.length }, "feedly subscriptions fetched");
      return toSubscriptions(data);
    },

    addSubscription(feedUrl, title, label) {
      return mutate("add", feedUrl, async () => {
        const feedId = toFeedId(feedUrl);
        const existing = known.get(feedId);

        if (label === null) {
          if (existing) {
            logger.debug({ identifier: feedUrl }, "feed already subscribed, categories left as they are");
            return;
          }
          await postFeed(feedId, { title, categories: [] });
          return;
        }

        const target = { id: `user/${await getProfileId()}/category/${label}`, label };
        const others = (existing?.categories ?? []).filter((c) => c.label !== label);
        await postFeed(feedId, {
          title: existing?.title ?? title,
          categories: [...others, target],
        });
      });
    },

    removeSubscription(identifier, label) {
      return mutate("remove", identifier, async () => {
        const feedId = toFeedId(identifier);
        const existing = known.get(feedId);
        const remaining =
          label === null || !existing
            ? []
            : existing.categories.filter((c) => c.label !== label);

        if (existing && remaining.length > 0) {
          await postFeed(feedId, { title: existing.title, categories: remaining });
          return;
        }

        await sendJson(
          "DELETE",
          `${apiBase}/subscriptions/${encodeURIComponent(feedId)}`,
          headers,
        );
        known.delete(feedId);
      });
    },
  };
}
