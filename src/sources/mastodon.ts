// pattern: Imperative Shell
import { z } from "zod";
import { AuthenticationError, SourceFetchError, errorMessage } from "../errors";
import { getJson } from "../http";
import type { JsonPage, RequestHeaders } from "../http";
import type { RemoteFeed } from "../sync/types";
import type { ProviderDefinition, ProviderDeps, SubscriptionSource } from "./types";

const PROVIDER = "mastodon";
const PAGE_SIZE = 80;

const accountSchema = z.object({
  id: z.string().min(1),
  acct: z.string(),
  display_name: z.string(),
  url: z.string().url(),
});

type MastodonAccount = z.infer<typeof accountSchema>;

type Session = {
  readonly headers: RequestHeaders;
  readonly account: MastodonAccount;
};

/**
 * Every Mastodon profile publishes its public posts at `<profile url>.rss`.
 */
export function accountFeed(account: MastodonAccount): RemoteFeed {
  const title = account.display_name.trim() || account.acct;
  return { title, url: `${account.url}.rss` };
}

/**
 * Lists followed accounts on a Mastodon instance. The credential's `password`
 * is an access token with `read:accounts` and `read:follows`.
 */
export function createMastodonSource({ host, logger }: ProviderDeps): SubscriptionSource {
  const apiBase = `https://${host}/api/v1`;
  let session: Session | null = null;

  async function fetchPage(
    url: string,
    headers: RequestHeaders,
  ): Promise<JsonPage<ReadonlyArray<MastodonAccount>>> {
    try {
      return await getJson(url, headers, z.array(accountSchema));
    } catch (err) {
      throw new SourceFetchError(PROVIDER, errorMessage(err), { cause: err });
    }
  }

  return {
    name: PROVIDER,
    supportsSelfFeed: true,

    async authenticate(credential) {
      const headers: RequestHeaders = {
        Authorization: `Bearer ${credential.password}`,
      };

      let account: MastodonAccount;
      try {
        ({ data: account } = await getJson(
          `${apiBase}/accounts/verify_credentials`,
          headers,
          accountSchema,
        ));
      } catch (err) {
        throw new AuthenticationError(PROVIDER, errorMessage(err), { cause: err });
      }

      session = { headers, account };
      logger.info({ provider: PROVIDER, host, acct: account.acct }, "authenticated");
    },

    async *listSubscriptions({ includeSelf }) {
      if (!session) {
        throw new SourceFetchError(PROVIDER, "not authenticated");
      }
      const { headers, account } = session;

      if (includeSelf) {
        yield accountFeed(account);
      }

      let url: string | null = `${apiBase}/accounts/${encodeURIComponent(account.id)}/following?limit=${PAGE_SIZE}`;
      while (url) {
        const page = await fetchPage(url, headers);
        logger.debug({ url, count: page.data.length }, "following page fetched");
        for (const followed of page.data) {
          yield accountFeed(followed);
        }
        url = page.next;
      }
    },
  };
}

export const mastodonProvider: ProviderDefinition = {
  name: PROVIDER,
  description: "Accounts you follow on a Mastodon instance (RSS per profile)",
  defaultHost: "mastodon.social",
  create: createMastodonSource,
};
