/**
 * Port interfaces for adapters
 *
 * Venue-agnostic types shared by the feed consumer and venue adapters.
 */

export type { FeedDecodeError, FeedDecoder, FeedHandler, FeedState, FeedStatus } from "./feed-port";
