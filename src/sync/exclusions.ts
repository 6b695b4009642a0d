import { readFileSync } from "node:fs";
import type { Logger } from "pino";
import { errorMessage } from "../errors";

export function parseExclusionList(text: string): ReadonlySet<string> {
  return new Set(text.split(/[\s,]+/).filter((token) => token.length > 0));
}

/**
 * Builds the exclusion set from either a file path or a literal list.
 *
 * A path that can be read wins over the literal interpretation; anything that
 * cannot be read is parsed as a comma/whitespace separated list.
 */
export function parseExclusions(
  input: string | null | undefined,
  logger: Logger,
): ReadonlySet<string> {
  if (!input || input.trim().length === 0) {
    return new Set();
  }

  let text: string;
  try {
    text = readFileSync(input, "utf-8");
    logger.debug({ path: input }, "exclusions read from file");
  } catch (err) {
    logger.debug(
      { error: errorMessage(err) },
      "exclusions input is not a readable file, using it as a list",
    );
    text = input;
  }

  const exclusions = parseExclusionList(text);
  logger.debug({ count: exclusions.size }, "exclusions loaded");
  return exclusions;
}
