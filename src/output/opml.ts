// pattern: Functional Core
import { XMLBuilder } from "fast-xml-parser";
import type { FeedMap } from "../sync/types";

export type OpmlOptions = {
  readonly title: string;
  /** When set, every outline is nested inside one folder outline of this name. */
  readonly folder: string | null;
  /** Order outlines by feed URL instead of insertion order. */
  readonly sort: boolean;
};

type OutlineNode = Record<string, string | ReadonlyArray<OutlineNode>>;

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

export function orderedEntries(
  feeds: FeedMap,
  sort: boolean,
): ReadonlyArray<readonly [string, string]> {
  const entries = Array.from(feeds.entries());
  if (sort) {
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }
  return entries;
}

/**
 * Renders feeds (url -> title) as an OPML 2.0 document.
 */
export function renderOpml(feeds: FeedMap, options: OpmlOptions): string {
  const outlines: Array<OutlineNode> = orderedEntries(feeds, options.sort).map(
    ([url, title]) => ({
      "@_type": "rss",
      "@_text": title,
      "@_title": title,
      "@_xmlUrl": url,
    }),
  );

  const body =
    options.folder === null
      ? outlines
      : [
          {
            "@_text": options.folder,
            "@_title": options.folder,
            outline: outlines,
          },
        ];

  const xml: string = builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    opml: {
      "@_version": "2.0",
      head: { title: options.title },
      body: { outline: body },
    },
  });

  return xml;
}
