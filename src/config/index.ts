import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse } from "yaml";
import { ConfigurationError, errorMessage } from "../errors";
import { credentialsFileSchema } from "./schema";
import type { Credential } from "./schema";

/**
 * Per-host login lookup backed by the credentials file.
 */
export type CredentialStore = {
  readonly lookup: (host: string) => Credential;
};

export function defaultCredentialsPath(): string {
  return (
    process.env["FEED_SYNC_CREDENTIALS"] ??
    join(homedir(), ".config", "feed-sync", "credentials.yaml")
  );
}

export function loadCredentials(credentialsPath: string): CredentialStore {
  let raw: string;
  try {
    raw = readFileSync(credentialsPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `failed to read credentials file at ${credentialsPath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `failed to parse YAML in ${credentialsPath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const result = credentialsFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new ConfigurationError(
      `invalid credentials in ${credentialsPath}:\n${issues}`,
    );
  }

  return createCredentialStore(result.data.hosts, credentialsPath);
}

export function createCredentialStore(
  entries: Readonly<Record<string, Credential>>,
  origin = "credentials",
): CredentialStore {
  const byHost = new Map(Object.entries(entries));

  return {
    lookup(host: string): Credential {
      const credential = byHost.get(host);
      if (!credential) {
        throw new ConfigurationError(`no credentials for host ${host} in ${origin}`);
      }
      return credential;
    },
  };
}

export type { Credential };
