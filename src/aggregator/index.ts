export {
  FEEDLY_HOST,
  createFeedlyClient,
  fromFeedId,
  toFeedId,
  toSubscriptions,
} from "./feedly";
export type { FeedlyClientOptions } from "./feedly";
