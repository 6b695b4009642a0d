import type { Logger } from "pino";
import type { Credential } from "../config";
import type { RemoteFeed } from "../sync/types";

export type ListOptions = {
  /** Yield the authenticated user's own feed first. Ignored without `supportsSelfFeed`. */
  readonly includeSelf: boolean;
};

/**
 * A service the user follows accounts on.
 *
 * `authenticate` must succeed before `listSubscriptions` is drained. Failures
 * surface as `AuthenticationError` and `SourceFetchError` respectively, never
 * as a provider-specific error.
 */
export type SubscriptionSource = {
  readonly name: string;
  readonly supportsSelfFeed: boolean;
  readonly authenticate: (credential: Credential) => Promise<void>;
  readonly listSubscriptions: (options: ListOptions) => AsyncIterable<RemoteFeed>;
};

export type ProviderDeps = {
  readonly host: string;
  readonly logger: Logger;
};

export type ProviderDefinition = {
  readonly name: string;
  readonly description: string;
  /** Host whose credentials are looked up when no override is given. */
  readonly defaultHost: string;
  readonly create: (deps: ProviderDeps) => SubscriptionSource;
};
