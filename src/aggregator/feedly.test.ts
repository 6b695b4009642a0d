import { describe, it, expect, afterEach, vi } from "vitest";
import pino from "pino";
import { createFeedlyClient, fromFeedId, toFeedId, toSubscriptions } from "./feedly";
import { AggregatorError, AuthenticationError } from "../errors";
import { reconcile } from "../sync";
import { jsonResponse, remoteFeeds, routeFetch } from "../test-utils/fakes";

const logger = pino({ level: "silent" });
const credential = { login: "", password: "test-token" };
const API = "https://cloud.feedly.com/v3";

const SHARED = "https://shared.example/rss";
const ONLY_G = "https://only-g.example/rss";
const categoryF = { id: "user/u1/category/F", label: "F" };
const categoryG = { id: "user/u1/category/G", label: "G" };

const multiCategoryFeeds = [
  { id: `feed/${SHARED}`, title: "Shared", categories: [categoryF, categoryG] },
  { id: `feed/${ONLY_G}`, title: "Only G", categories: [categoryG] },
];

function stubFeedly(subscriptions: ReadonlyArray<unknown>) {
  const mockFetch = vi.fn(
    routeFetch({
      [`GET ${API}/subscriptions`]: () => jsonResponse(subscriptions),
      [`GET ${API}/profile`]: () => jsonResponse({ id: "u1" }),
      [`POST ${API}/subscriptions`]: () => jsonResponse({}),
      [`DELETE ${API}/subscriptions/${encodeURIComponent(`feed/${SHARED}`)}`]: () =>
        new Response(null, { status: 204 }),
      [`DELETE ${API}/subscriptions/${encodeURIComponent(`feed/${ONLY_G}`)}`]: () =>
        new Response(null, { status: 204 }),
    }),
  );
  vi.stubGlobal("fetch", mockFetch);

  const requests = () =>
    mockFetch.mock.calls.map(([url, init]) => `${init?.method} ${String(url)}`);
  const postedBodies = () =>
    mockFetch.mock.calls
      .filter(([, init]) => init?.method === "POST")
      .map(([, init]) => JSON.parse(String(init?.body)));

  return { requests, postedBodies };
}

describe("feed ids", () => {
  it("should add and strip the feed/ prefix", () => {
    expect(toFeedId("https://a.example/rss")).toBe("feed/https://a.example/rss");
    expect(fromFeedId("feed/https://a.example/rss")).toBe("https://a.example/rss");
    expect(fromFeedId("user/123/category/global.all")).toBeNull();
  });
});

describe("toSubscriptions", () => {
  it("should emit one entry per category and a null label when uncategorised", () => {
    const subscriptions = toSubscriptions([
      {
        id: "feed/https://a.example/rss",
        title: "A",
        categories: [
          { id: "user/u1/category/Friends", label: "Friends" },
          { id: "user/u1/category/Tech", label: "Tech" },
        ],
      },
      { id: "feed/https://b.example/rss", title: "B" },
      { id: "feed/https://c.example/rss", categories: [] },
      { id: "topic/global.ai" },
    ]);

    expect(subscriptions).toEqual([
      { identifier: "https://a.example/rss", title: "A", label: "Friends" },
      { identifier: "https://a.example/rss", title: "A", label: "Tech" },
      { identifier: "https://b.example/rss", title: "B", label: null },
      { identifier: "https://c.example/rss", title: "https://c.example/rss", label: null },
    ]);
  });
});

describe("createFeedlyClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should fetch and flatten subscriptions", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        routeFetch({
          [`GET ${API}/subscriptions`]: () =>
            jsonResponse([
              {
                id: "feed/https://a.example/rss",
                title: "A",
                categories: [{ id: "user/u1/category/Friends", label: "Friends" }],
              },
            ]),
        }),
      ),
    );
    const client = createFeedlyClient({ credential, logger });

    await expect(client.fetchSubscriptions()).resolves.toEqual([
      { identifier: "https://a.example/rss", title: "A", label: "Friends" },
    ]);
  });

  it("should raise AuthenticationError when the token is rejected", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        routeFetch({
          [`GET ${API}/subscriptions`]: () =>
            jsonResponse({}, { status: 401, statusText: "Unauthorized" }),
        }),
      ),
    );
    const client = createFeedlyClient({ credential, logger });

    await expect(client.fetchSubscriptions()).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("should raise AggregatorError on other failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        routeFetch({
          [`GET ${API}/subscriptions`]: () =>
            jsonResponse({}, { status: 503, statusText: "Service Unavailable" }),
        }),
      ),
    );
    const client = createFeedlyClient({ credential, logger });

    const attempt = client.fetchSubscriptions();
    await expect(attempt).rejects.toBeInstanceOf(AggregatorError);
    await expect(attempt).rejects.toThrow(
      "aggregator: fetching subscriptions failed: HTTP 503: Service Unavailable",
    );
  });

  it("should add a feed under a category built from the profile id", async () => {
    const mockFetch = vi.fn(
      routeFetch({
        [`GET ${API}/profile`]: () => jsonResponse({ id: "u1" }),
        [`POST ${API}/subscriptions`]: () => jsonResponse({}),
      }),
    );
    vi.stubGlobal("fetch", mockFetch);
    const client = createFeedlyClient({ credential, logger });

    const first = await client.addSubscription("https://a.example/rss", "A", "Friends");
    const second = await client.addSubscription("https://b.example/rss", "B", "Friends");

    expect(first).toEqual({ success: true });
    expect(second).toEqual({ success: true });
    const urls = mockFetch.mock.calls.map(([url, init]) => `${init?.method} ${String(url)}`);
    expect(urls).toEqual([
      `GET ${API}/profile`,
      `POST ${API}/subscriptions`,
      `POST ${API}/subscriptions`,
    ]);
    expect(JSON.parse(String(mockFetch.mock.calls[1]?.[1]?.body))).toEqual({
      id: "feed/https://a.example/rss",
      title: "A",
      categories: [{ id: "user/u1/category/Friends", label: "Friends" }],
    });
  });

  it("should add without categories and skip the profile lookup when there is no label", async () => {
    const mockFetch = vi.fn(
      routeFetch({
        [`POST ${API}/subscriptions`]: () => jsonResponse({}),
      }),
    );
    vi.stubGlobal("fetch", mockFetch);
    const client = createFeedlyClient({ credential, logger });

    await expect(client.addSubscription("https://a.example/rss", "A", null)).resolves.toEqual({
      success: true,
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(mockFetch.mock.calls[0]?.[1]?.body))).toEqual({
      id: "feed/https://a.example/rss",
      title: "A",
      categories: [],
    });
  });

  it("should delete by encoded feed id", async () => {
    const encoded = encodeURIComponent("feed/https://a.example/rss");
    vi.stubGlobal(
      "fetch",
      vi.fn(
        routeFetch({
          [`DELETE ${API}/subscriptions/${encoded}`]: () => new Response(null, { status: 204 }),
        }),
      ),
    );
    const client = createFeedlyClient({ credential, logger });

    await expect(client.removeSubscription("https://a.example/rss", "Friends")).resolves.toEqual({
      success: true,
    });
  });

  it("should report a failed mutation instead of throwing", async () => {
    vi.stubGlobal("fetch", vi.fn(routeFetch({})));
    const client = createFeedlyClient({ credential, logger });

    await expect(client.removeSubscription("https://a.example/rss", "Friends")).resolves.toEqual({
      success: false,
      error: "HTTP 404: Not Found",
    });
  });

  describe("feeds filed under several categories", () => {
    it("should drop only the target category when removing a feed that is filed elsewhere too", async () => {
      const { requests, postedBodies } = stubFeedly(multiCategoryFeeds);
      const client = createFeedlyClient({ credential, logger });
      await client.fetchSubscriptions();

      await expect(client.removeSubscription(SHARED, "F")).resolves.toEqual({ success: true });

      expect(requests()).toEqual([`GET ${API}/subscriptions`, `POST ${API}/subscriptions`]);
      expect(postedBodies()).toEqual([
        { id: `feed/${SHARED}`, title: "Shared", categories: [categoryG] },
      ]);
    });

    it("should delete the subscription when the target was its only category", async () => {
      const { requests } = stubFeedly(multiCategoryFeeds);
      const client = createFeedlyClient({ credential, logger });
      await client.fetchSubscriptions();

      await expect(client.removeSubscription(ONLY_G, "G")).resolves.toEqual({ success: true });

      expect(requests()).toEqual([
        `GET ${API}/subscriptions`,
        `DELETE ${API}/subscriptions/${encodeURIComponent(`feed/${ONLY_G}`)}`,
      ]);
    });

    it("should keep existing categories when adding a subscribed feed to the target", async () => {
      const { postedBodies } = stubFeedly(multiCategoryFeeds);
      const client = createFeedlyClient({ credential, logger });
      await client.fetchSubscriptions();

      await expect(client.addSubscription(ONLY_G, "Renamed", "F")).resolves.toEqual({
        success: true,
      });

      expect(postedBodies()).toEqual([
        { id: `feed/${ONLY_G}`, title: "Only G", categories: [categoryG, categoryF] },
      ]);
    });

    it("should leave an already subscribed feed alone when adding without a label", async () => {
      const { requests, postedBodies } = stubFeedly(multiCategoryFeeds);
      const client = createFeedlyClient({ credential, logger });
      await client.fetchSubscriptions();

      await expect(client.addSubscription(ONLY_G, "Only G", null)).resolves.toEqual({
        success: true,
      });
      await expect(
        client.addSubscription("https://new.example/rss", "New", null),
      ).resolves.toEqual({ success: true });

      expect(requests()).toEqual([`GET ${API}/subscriptions`, `POST ${API}/subscriptions`]);
      expect(postedBodies()).toEqual([
        { id: "feed/https://new.example/rss", title: "New", categories: [] },
      ]);
    });

    it("should leave other categories untouched when reconciling one folder", async () => {
      const { requests, postedBodies } = stubFeedly(multiCategoryFeeds);
      const client = createFeedlyClient({ credential, logger });

      const { applied } = await reconcile(
        {
          remoteItems: remoteFeeds([{ title: "Only G", url: ONLY_G }]),
          aggregator: client,
          targetLabel: "F",
          exclusions: new Set(),
          mode: "all",
        },
        logger,
      );

      expect(applied).toEqual({ removed: [SHARED], added: [ONLY_G], failures: [] });
      expect(requests()).toEqual([
        `GET ${API}/subscriptions`,
        `POST ${API}/subscriptions`,
        `GET ${API}/profile`,
        `POST ${API}/subscriptions`,
      ]);
      expect(postedBodies()).toEqual([
        { id: `feed/${SHARED}`, title: "Shared", categories: [categoryG] },
        { id: `feed/${ONLY_G}`, title: "Only G", categories: [categoryG, categoryF] },
      ]);
    });

    it("should not refile subscribed feeds when applying without a target label", async () => {
      const { requests } = stubFeedly(multiCategoryFeeds);
      const client = createFeedlyClient({ credential, logger });

      const { diff, applied } = await reconcile(
        {
          remoteItems: remoteFeeds([
            { title: "Shared", url: SHARED },
            { title: "Only G", url: ONLY_G },
          ]),
          aggregator: client,
          targetLabel: null,
          exclusions: new Set(),
          mode: "all",
        },
        logger,
      );

      expect(Array.from(diff.toAdd.keys())).toEqual([SHARED, ONLY_G]);
      expect(applied.failures).toEqual([]);
      expect(requests()).toEqual([`GET ${API}/subscriptions`]);
    });
  });
});
