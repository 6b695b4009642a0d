// pattern: Imperative Shell
import type { Logger } from "pino";
import type { Credential, CredentialStore } from "./config";
import { renderDiffReport, renderOpml } from "./output";
import type { ProviderRegistry } from "./sources";
import { collectRemoteFeeds, parseExclusions, reconcile } from "./sync";
import type { AggregatorClient, ApplyMode } from "./sync";

export type SyncOptions = {
  readonly provider: string;
  readonly host: string | null;
  readonly sort: boolean;
  readonly includeSelf: boolean;
  readonly subfolder: string | null;
  readonly diff: boolean;
  readonly apply: ApplyMode;
  readonly exclude: string | null;
};

export type AggregatorFactory = {
  /** Host whose credentials authorise the aggregator. */
  readonly host: string;
  readonly create: (credential: Credential, logger: Logger) => AggregatorClient;
};

export type SyncDeps = {
  readonly registry: ProviderRegistry;
  readonly credentials: CredentialStore;
  readonly aggregator: AggregatorFactory;
  readonly logger: Logger;
};

/**
 * A run compares against the aggregator when asked for a diff or any apply mode.
 */
export function comparesWithAggregator(options: SyncOptions): boolean {
  return options.diff || options.apply !== "none";
}

/**
 * Runs one sync and returns the text to print: a diff report when comparing
 * against the aggregator, otherwise the source's feeds as OPML.
 *
 * Every configuration lookup (provider, exclusions, credentials) happens before
 * the first network call. Network steps then run strictly in order:
 * authenticate source, fetch aggregator, drain source listing, removals, additions.
 */
export async function runSync(options: SyncOptions, deps: SyncDeps): Promise<string> {
  const { logger } = deps;

  const definition = deps.registry.get(options.provider);
  const host = options.host ?? definition.defaultHost;
  const exclusions = parseExclusions(options.exclude, logger);

  const sourceCredential = deps.credentials.lookup(host);
  const compare = comparesWithAggregator(options);
  const aggregatorCredential = compare
    ? deps.credentials.lookup(deps.aggregator.host)
    : null;

  const source = definition.create({
    host,
    logger: logger.child({ provider: definition.name }),
  });
  await source.authenticate(sourceCredential);

  if (options.includeSelf && !source.supportsSelfFeed) {
    logger.warn({ provider: source.name }, "provider has no own feed, ignoring --self");
  }
  const remoteItems = source.listSubscriptions({
    includeSelf: options.includeSelf && source.supportsSelfFeed,
  });

  if (aggregatorCredential === null) {
    const feeds = await collectRemoteFeeds(remoteItems, exclusions, logger);
    return renderOpml(feeds, {
      title: `${definition.name} subscriptions`,
      folder: options.subfolder,
      sort: options.sort,
    });
  }

  const outcome = await reconcile(
    {
      remoteItems,
      aggregator: deps.aggregator.create(aggregatorCredential, logger),
      targetLabel: options.subfolder,
      exclusions,
      mode: options.apply,
    },
    logger,
  );

  if (outcome.applied.failures.length > 0) {
    logger.warn(
      { failed: outcome.applied.failures.map((f) => f.identifier) },
      "some changes were not applied; the report lists the computed diff",
    );
  }

  return renderDiffReport(outcome.diff, { sort: options.sort });
}
