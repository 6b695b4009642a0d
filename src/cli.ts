// pattern: Imperative Shell
import { parseArgs } from "node:util";
import { z } from "zod";
import type { Logger } from "pino";
import type { CredentialStore } from "./config";
import { ConfigurationError, errorMessage } from "./errors";
import { runSync } from "./run";
import type { AggregatorFactory, SyncOptions } from "./run";
import type { ProviderRegistry } from "./sources";
import { APPLY_MODES } from "./sync";

export const USAGE = `Usage: feed-sync [options] <provider>

Sync a feed aggregator folder with the accounts you follow on another service.

Options:
  -p, --provider <name>      subscription source to read
  -l, --list-providers       list supported providers and exit
      --host <host>          override the provider's host
  -s, --sort                 sort output by feed URL
      --self                 include your own feed
  -f, --subfolder <name>     aggregator label / OPML folder to sync
  -d, --diff                 print the diff against the aggregator
  -a, --apply <mode>         apply changes: none, old, new or all (default: none)
  -o, --output <path>        write output to a file ("-" for stdout)
  -x, --exclude <list|file>  feed URLs to leave alone, inline or from a file
  -c, --credentials <path>   credentials file
  -v, --verbose              debug logging
  -h, --help                 show this help
`;

const syncArgsSchema = z.object({
  provider: z.string({ required_error: "a provider is required" }).min(1),
  host: z.string().min(1).nullable().default(null),
  sort: z.boolean().default(false),
  includeSelf: z.boolean().default(false),
  subfolder: z.string().min(1).nullable().default(null),
  diff: z.boolean().default(false),
  apply: z.enum(APPLY_MODES, {
    errorMap: () => ({ message: `expected one of ${APPLY_MODES.join(", ")}` }),
  }).default("none"),
  exclude: z.string().nullable().default(null),
  output: z.string().min(1).default("-"),
  credentials: z.string().min(1).nullable().default(null),
  verbose: z.boolean().default(false),
});

export type SyncCommand = SyncOptions & {
  readonly output: string;
  readonly credentials: string | null;
  readonly verbose: boolean;
};

export type CliCommand =
  | { readonly kind: "help" }
  | { readonly kind: "list-providers" }
  | { readonly kind: "sync"; readonly options: SyncCommand };

function parseRawArgs(argv: ReadonlyArray<string>) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        provider: { type: "string", short: "p" },
        "list-providers": { type: "boolean", short: "l" },
        host: { type: "string" },
        sort: { type: "boolean", short: "s" },
        self: { type: "boolean" },
        subfolder: { type: "string", short: "f" },
        diff: { type: "boolean", short: "d" },
        apply: { type: "string", short: "a" },
        output: { type: "string", short: "o" },
        exclude: { type: "string", short: "x" },
        credentials: { type: "string", short: "c" },
        verbose: { type: "boolean", short: "v" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new ConfigurationError(errorMessage(err), { cause: err });
  }
}

/**
 * Parses argv (without the node and script entries) into a command.
 * Throws `ConfigurationError` on unknown flags, a missing provider or a bad apply mode.
 */
export function parseCliArgs(argv: ReadonlyArray<string>): CliCommand {
  const { values, positionals } = parseRawArgs(argv);

  if (values.help) {
    return { kind: "help" };
  }
  if (values["list-providers"]) {
    return { kind: "list-providers" };
  }
  if (positionals.length > 1) {
    throw new ConfigurationError(`unexpected arguments: ${positionals.slice(1).join(" ")}`);
  }

  const result = syncArgsSchema.safeParse({
    provider: values.provider ?? positionals[0],
    host: values.host,
    sort: values.sort,
    includeSelf: values.self,
    subfolder: values.subfolder,
    diff: values.diff,
    apply: values.apply,
    exclude: values.exclude,
    output: values.output,
    credentials: values.credentials,
    verbose: values.verbose,
  });
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid arguments: ${issues}`);
  }

  return { kind: "sync", options: result.data };
}

export type CliDeps = {
  readonly registry: ProviderRegistry;
  readonly aggregator: AggregatorFactory;
  readonly loadCredentials: (path: string | null) => CredentialStore;
  readonly createLogger: (level: string | undefined) => Logger;
  readonly writeOutput: (target: string, text: string) => void;
};

/**
 * Runs the CLI and resolves to the process exit code. Any error is reported as
 * one fatal log line; nothing is rethrown.
 */
export async function runCli(argv: ReadonlyArray<string>, deps: CliDeps): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    deps.createLogger(undefined).fatal({ error: errorMessage(err) }, "invalid command line");
    return 1;
  }

  if (command.kind === "help") {
    deps.writeOutput("-", USAGE);
    return 0;
  }

  if (command.kind === "list-providers") {
    const lines = deps.registry
      .definitions()
      .map((d) => `${d.name.padEnd(12)}${d.description}`);
    deps.writeOutput("-", `${lines.join("\n")}\n`);
    return 0;
  }

  const { options } = command;
  const logger = deps.createLogger(options.verbose ? "debug" : undefined);

  try {
    const text = await runSync(options, {
      registry: deps.registry,
      credentials: deps.loadCredentials(options.credentials),
      aggregator: deps.aggregator,
      logger,
    });
    deps.writeOutput(options.output, text);
    logger.debug({ output: options.output }, "output written");
    return 0;
  } catch (err) {
    logger.fatal({ error: errorMessage(err) }, "sync failed");
    return 1;
  }
}
