import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { createFeedlyClient, FEEDLY_HOST } from "./aggregator";
import { runCli } from "./cli";
import { defaultCredentialsPath, loadCredentials } from "./config";
import { createLogger } from "./logger";
import { createDefaultRegistry } from "./sources";

function writeOutput(target: string, text: string): void {
  if (target === "-") {
    process.stdout.write(text);
    return;
  }
  writeFileSync(resolve(target), text, "utf-8");
}

async function main(): Promise<number> {
  return runCli(process.argv.slice(2), {
    registry: createDefaultRegistry(),
    aggregator: {
      host: FEEDLY_HOST,
      create: (credential, logger) => createFeedlyClient({ credential, logger }),
    },
    loadCredentials: (path) => loadCredentials(resolve(path ?? defaultCredentialsPath())),
    createLogger,
    writeOutput,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("fatal error:", err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
