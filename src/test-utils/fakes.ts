import { Writable } from "node:stream";
import pino from "pino";
import type { Logger } from "pino";
import type { Credential } from "../config";
import type { ProviderDefinition, SubscriptionSource } from "../sources";
import type {
  AggregatorClient,
  MutationResult,
  RemoteFeed,
  Subscription,
} from "../sync";

export type AggregatorCall =
  | { readonly action: "add"; readonly feedUrl: string; readonly title: string; readonly label: string | null }
  | { readonly action: "remove"; readonly identifier: string; readonly label: string | null };

export type FakeAggregator = AggregatorClient & {
  readonly calls: ReadonlyArray<AggregatorCall>;
  readonly fetchCount: () => number;
};

/**
 * In-memory aggregator. Identifiers listed in `failOn` make add/remove report a
 * failure; those in `throwOn` make them throw.
 */
export function createFakeAggregator(
  initial: ReadonlyArray<Subscription>,
  options: {
    readonly failOn?: ReadonlyArray<string>;
    readonly throwOn?: ReadonlyArray<string>;
  } = {},
): FakeAggregator {
  const calls: Array<AggregatorCall> = [];
  let fetches = 0;
  const failOn = new Set(options.failOn ?? []);
  const throwOn = new Set(options.throwOn ?? []);

  const outcome = (identifier: string): MutationResult => {
    if (throwOn.has(identifier)) {
      throw new Error(`connection reset while updating ${identifier}`);
    }
    return failOn.has(identifier)
      ? { success: false, error: "HTTP 500: Internal Server Error" }
      : { success: true };
  };

  return {
    calls,
    fetchCount: () => fetches,
    async fetchSubscriptions() {
      fetches++;
      return initial;
    },
    async addSubscription(feedUrl, title, label) {
      calls.push({ action: "add", feedUrl, title, label });
      return outcome(feedUrl);
    },
    async removeSubscription(identifier, label) {
      calls.push({ action: "remove", identifier, label });
      return outcome(identifier);
    },
  };
}

/**
 * A one-shot async sequence over `items`, like a provider listing.
 */
export async function* remoteFeeds(
  items: ReadonlyArray<RemoteFeed>,
): AsyncGenerator<RemoteFeed, void, undefined> {
  for (const item of items) {
    yield item;
  }
}

export type FakeSourceState = {
  authenticatedWith: Credential | null;
  listed: number;
};

export function createFakeProvider(
  name: string,
  items: ReadonlyArray<RemoteFeed>,
  options: {
    readonly defaultHost?: string;
    readonly supportsSelfFeed?: boolean;
    readonly selfFeed?: RemoteFeed;
    readonly authError?: Error;
  } = {},
): { readonly definition: ProviderDefinition; readonly state: FakeSourceState } {
  const state: FakeSourceState = { authenticatedWith: null, listed: 0 };

  const source: SubscriptionSource = {
    name,
    supportsSelfFeed: options.supportsSelfFeed ?? false,
    async authenticate(credential) {
      if (options.authError) throw options.authError;
      state.authenticatedWith = credential;
    },
    async *listSubscriptions({ includeSelf }) {
      state.listed++;
      if (includeSelf && options.selfFeed) yield options.selfFeed;
      yield* items;
    },
  };

  return {
    state,
    definition: {
      name,
      description: `${name} test provider`,
      defaultHost: options.defaultHost ?? `${name}.example.com`,
      create: () => source,
    },
  };
}

/**
 * A pino logger that keeps every emitted record for assertions.
 */
export function createCapturingLogger(level = "debug"): {
  readonly logger: Logger;
  readonly records: () => ReadonlyArray<Record<string, unknown>>;
} {
  const lines: Array<string> = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      lines.push(String(chunk));
      callback();
    },
  });

  return {
    logger: pino({ level }, stream),
    records: () =>
      lines
        .flatMap((chunk) => chunk.split("\n"))
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

export async function collect<T>(items: AsyncIterable<T>): Promise<Array<T>> {
  const result: Array<T> = [];
  for await (const item of items) {
    result.push(item);
  }
  return result;
}

export function jsonResponse(
  data: unknown,
  init: { readonly status?: number; readonly statusText?: string; readonly link?: string } = {},
): Response {
  const headers = new Headers({ "Content-Type": "application/json" });
  if (init.link) headers.set("Link", init.link);
  return new Response(JSON.stringify(data), {
    status: init.status ?? 200,
    statusText: init.statusText ?? "OK",
    headers,
  });
}

export type FetchRoute = (init: RequestInit | undefined) => Response;

/**
 * A `fetch` stand-in answering from `routes`, keyed by "METHOD url".
 * Unknown requests get a 404.
 */
export function routeFetch(routes: Readonly<Record<string, FetchRoute>>) {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    const route = routes[`${init?.method ?? "GET"} ${url}`];
    return route
      ? route(init)
      : jsonResponse({ error: "not found" }, { status: 404, statusText: "Not Found" });
  };
}
