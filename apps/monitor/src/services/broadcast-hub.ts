/**
 * Broadcast Hub
 *
 * Live registry of viewer connections and fan-out of monitor events.
 *
 * - register: adds the subscriber, then sends it one initial_data event with the
 *   full current state
 * - publish: serializes once and sends to every subscriber independently; a
 *   failed send removes that subscriber as soon as it rejects and never reaches
 *   the caller
 * - unregister: idempotent
 *
 * Registry mutations are synchronous and publish iterates over a copy taken at
 * call time, so register/unregister may run while sends are still pending.
 */

import type { MonitorEvent, MonitorSnapshot } from "@perp-pulse/core";
import { logger } from "@perp-pulse/utils";

import type { EventPublisher, PublishReport, Subscriber } from "../types";

const log = logger.child("hub");

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export class BroadcastHub implements EventPublisher {
  private readonly subscribers = new Set<Subscriber>();
  private readonly snapshot: () => MonitorSnapshot;

  /**
   * @param snapshot - Current contents of every history container
   */
  constructor(snapshot: () => MonitorSnapshot) {
    this.snapshot = snapshot;
  }

  /**
   * Add a subscriber and send it the initial state.
   * Resolves false when the initial send failed (the subscriber is removed again).
   */
  async register(subscriber: Subscriber): Promise<boolean> {
    this.subscribers.add(subscriber);
    log.info("subscriber registered", { subscriberId: subscriber.id, subscribers: this.subscribers.size });

    let message: string;
    try {
      message = JSON.stringify({ type: "initial_data", data: this.snapshot() } satisfies MonitorEvent);
    } catch (error) {
      log.error("failed to serialize initial state", { error: errorMessage(error) });
      this.drop(subscriber);
      return false;
    }

    try {
      await this.deliver(subscriber, message);
      return true;
    } catch (error) {
      log.warn("initial send failed", { subscriberId: subscriber.id, error: errorMessage(error) });
      this.drop(subscriber);
      return false;
    }
  }

  /**
   * Remove a subscriber. Returns false when it was not registered.
   */
  unregister(subscriber: Subscriber): boolean {
    const removed = this.subscribers.delete(subscriber);
    if (removed) {
      log.info("subscriber unregistered", { subscriberId: subscriber.id, subscribers: this.subscribers.size });
    }
    return removed;
  }

  /**
   * Deliver an event to every current subscriber. Never rejects.
   */
  async publish(event: MonitorEvent): Promise<PublishReport> {
    const report: PublishReport = { type: event.type, delivered: 0, dropped: [] };

    let message: string;
    try {
      message = JSON.stringify(event);
    } catch (error) {
      log.error("failed to serialize event", { type: event.type, error: errorMessage(error) });
      return report;
    }

    // Failures are handled per send, not after the whole round settles
    const targets = Array.from(this.subscribers);
    await Promise.allSettled(
      targets.map(subscriber =>
        this.deliver(subscriber, message).then(
          () => {
            report.delivered++;
          },
          (error: unknown) => {
            log.warn("send failed, dropping subscriber", {
              subscriberId: subscriber.id,
              type: event.type,
              error: errorMessage(error),
            });
            this.drop(subscriber);
            report.dropped.push(subscriber.id);
          },
        ),
      ),
    );

    return report;
  }

  has(subscriber: Subscriber): boolean {
    return this.subscribers.has(subscriber);
  }

  size(): number {
    return this.subscribers.size;
  }

  /**
   * Close and forget every subscriber (shutdown)
   */
  closeAll(): void {
    for (const subscriber of Array.from(this.subscribers)) {
      this.drop(subscriber);
    }
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  // Turns a synchronous throw from send() into a rejection
  private async deliver(subscriber: Subscriber, message: string): Promise<void> {
    await subscriber.send(message);
  }

  private drop(subscriber: Subscriber): void {
    if (!this.unregister(subscriber)) return;

    try {
      subscriber.close();
    } catch (error) {
      log.debug("close after drop failed", { subscriberId: subscriber.id, error: errorMessage(error) });
    }
  }
}
