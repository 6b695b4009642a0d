// pattern: Functional Core
import type { FeedMap, ReconciliationResult } from "../sync/types";
import { orderedEntries } from "./opml";

function section(label: string, feeds: FeedMap, sort: boolean): Array<string> {
  return [
    `${label}(${feeds.size}):`,
    ...orderedEntries(feeds, sort).map(([identifier, title]) => `${identifier} - ${title}`),
  ];
}

/**
 * Renders the computed diff as two labelled sections, removals first.
 *
 * The report shows what the diff called for, not what an apply pass managed to
 * change; failed items are logged separately.
 */
export function renderDiffReport(
  diff: ReconciliationResult,
  options: { readonly sort: boolean },
): string {
  return [
    ...section("Removed", diff.toRemove, options.sort),
    ...section("Added", diff.toAdd, options.sort),
  ].join("\n") + "\n";
}
