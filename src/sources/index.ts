import { githubProvider } from "./github";
import { mastodonProvider } from "./mastodon";
import { createProviderRegistry } from "./registry";
import type { ProviderRegistry } from "./registry";

export function createDefaultRegistry(): ProviderRegistry {
  return createProviderRegistry([githubProvider, mastodonProvider]);
}

export { createProviderRegistry } from "./registry";
export type { ProviderRegistry } from "./registry";
export { githubProvider, createGithubSource } from "./github";
export { mastodonProvider, createMastodonSource } from "./mastodon";
export type {
  ListOptions,
  ProviderDefinition,
  ProviderDeps,
  SubscriptionSource,
} from "./types";
