import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import { parseExclusionList, parseExclusions } from "./exclusions";

const logger = pino({ level: "silent" });

describe("parseExclusionList", () => {
  it("should split on commas and whitespace", () => {
    const set = parseExclusionList("feedA, feedB\nfeedC\tfeedD,,feedE ");

    expect(Array.from(set)).toEqual(["feedA", "feedB", "feedC", "feedD", "feedE"]);
  });
});

describe("parseExclusions", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = join(tmpdir(), `feed-sync-exclusions-${Date.now()}`);
    mkdirSync(tmpDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should return an empty set for absent or blank input", () => {
    expect(parseExclusions(undefined, logger).size).toBe(0);
    expect(parseExclusions(null, logger).size).toBe(0);
    expect(parseExclusions("   ", logger).size).toBe(0);
  });

  it("should parse a literal list", () => {
    const set = parseExclusions("https://a.example/feed,https://b.example/feed", logger);

    expect(Array.from(set)).toEqual([
      "https://a.example/feed",
      "https://b.example/feed",
    ]);
  });

  it("should read the list from a file when the input is a readable path", () => {
    const path = join(tmpDir, "exclude.txt");
    writeFileSync(path, "https://a.example/feed\nhttps://b.example/feed\n");

    const set = parseExclusions(path, logger);

    expect(Array.from(set)).toEqual([
      "https://a.example/feed",
      "https://b.example/feed",
    ]);
  });

  it("should fall back to the literal list when the path cannot be read", () => {
    const missing = join(tmpDir, "missing.txt");

    const set = parseExclusions(missing, logger);

    expect(Array.from(set)).toEqual([missing]);
  });

  it("should treat a directory path as a literal", () => {
    expect(Array.from(parseExclusions(tmpDir, logger))).toEqual([tmpDir]);
  });
});
