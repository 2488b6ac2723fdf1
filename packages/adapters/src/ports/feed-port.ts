/**
 * Feed Port - Interfaces for upstream stream consumption
 *
 * Venue-specific code supplies a stream URL and a decoder; the consumer owns
 * the connection lifecycle.
 */

import type { Result } from "neverthrow";

/**
 * Connection lifecycle of one feed consumer
 */
export type FeedState = "idle" | "connecting" | "connected" | "reconnecting" | "stopped";

export interface FeedStatus {
  label: string;
  state: FeedState;
  /** Completed reconnect cycles since start */
  reconnects: number;
  /** Messages handed to the handler */
  messages: number;
  /** Messages dropped by the decoder */
  dropped: number;
  lastMessageAt: Date | null;
}

/**
 * Schema mismatch on an already-parsed frame (frames that are not JSON are
 * dropped by the connection). A decode error drops the message; it never
 * closes the stream.
 */
export type FeedDecodeError = { type: "invalid_message"; message: string };

/**
 * Turns one parsed JSON frame into a typed message
 */
export type FeedDecoder<T> = (raw: unknown) => Result<T, FeedDecodeError>;

/**
 * Handles one decoded message. A throw (or rejection) is treated as a
 * connection fault: the stream is closed and reopened after the reconnect delay.
 */
export type FeedHandler<T> = (message: T) => void | Promise<void>;
