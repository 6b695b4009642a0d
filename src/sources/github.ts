// pattern: Imperative Shell
import { z } from "zod";
import { AuthenticationError, SourceFetchError, errorMessage } from "../errors";
import { getJson } from "../http";
import type { JsonPage, RequestHeaders } from "../http";
import type { RemoteFeed } from "../sync/types";
import type { ProviderDefinition, ProviderDeps, SubscriptionSource } from "./types";

const PROVIDER = "github";

const userSchema = z.object({
  login: z.string().min(1),
  html_url: z.string().url(),
});

const followingSchema = z.array(userSchema);

type GithubUser = z.infer<typeof userSchema>;

type Session = {
  readonly headers: RequestHeaders;
  readonly user: GithubUser;
};

export function userFeed(user: GithubUser): RemoteFeed {
  return { title: user.login, url: `${user.html_url}.atom` };
}

/**
 * Lists the accounts a GitHub user follows as their public Atom activity feeds.
 * The credential's `password` is a personal access token.
 */
export function createGithubSource({ host, logger }: ProviderDeps): SubscriptionSource {
  const apiBase = `https://${host}`;
  let session: Session | null = null;

  async function fetchPage(
    url: string,
    headers: RequestHeaders,
  ): Promise<JsonPage<ReadonlyArray<GithubUser>>> {
    try {
      const page = await getJson(url, headers, followingSchema);
      logger.debug({ url, count: page.data.length }, "following page fetched");
      return page;
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
        Accept: "application/vnd.github+json",
      };

      let user: GithubUser;
      try {
        ({ data: user } = await getJson(`${apiBase}/user`, headers, userSchema));
      } catch (err) {
        throw new AuthenticationError(PROVIDER, errorMessage(err), { cause: err });
      }

      session = { headers, user };
      logger.info({ provider: PROVIDER, login: user.login }, "authenticated");
    },

    async *listSubscriptions({ includeSelf }) {
      if (!session) {
        throw new SourceFetchError(PROVIDER, "not authenticated");
      }
      const { headers, user } = session;

      if (includeSelf) {
        yield userFeed(user);
      }

      let url: string | null = `${apiBase}/user/following?per_page=100`;
      while (url) {
        const page = await fetchPage(url, headers);
        for (const followed of page.data) {
          yield userFeed(followed);
        }
        url = page.next;
      }
    },
  };
}

export const githubProvider: ProviderDefinition = {
  name: PROVIDER,
  description: "GitHub users you follow (public activity feeds)",
  defaultHost: "api.github.com",
  create: createGithubSource,
};
