/**
 * Monitor Types
 *
 * Shared type definitions for the monitor application
 */

import type { MonitorEvent, MonitorEventType } from "@perp-pulse/core";
import type { FeedStatus } from "@perp-pulse/adapters";

/**
 * Server-side handle of one viewer connection
 */
export interface Subscriber {
  readonly id: string;
  /** Rejects when the transport cannot take the message */
  send(text: string): Promise<void>;
  close(): void;
}

/**
 * Outcome of one publish
 */
export interface PublishReport {
  type: MonitorEventType;
  delivered: number;
  /** Ids of subscribers removed because their send failed */
  dropped: string[];
}

/**
 * Anything alert producers can publish to
 */
export interface EventPublisher {
  publish(event: MonitorEvent): Promise<PublishReport>;
}

export interface HealthReport {
  status: "ok" | "degraded";
  uptimeSec: number;
  subscribers: number;
  feeds: FeedStatus[];
}
