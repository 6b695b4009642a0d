export { renderOpml, orderedEntries } from "./opml";
export type { OpmlOptions } from "./opml";
export { renderDiffReport } from "./report";
