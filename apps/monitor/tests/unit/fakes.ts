/**
 * In-process subscriber used by the monitor tests
 */

import type { MonitorEvent } from "@perp-pulse/core";

import type { EventPublisher, PublishReport, Subscriber } from "../../src/types";

export class FakeSubscriber implements Subscriber {
  readonly id: string;
  readonly received: string[] = [];
  closed = 0;
  failSends = false;
  /** Sends never settle, like a peer whose TCP buffer is full */
  stallSends = false;

  constructor(id: string) {
    this.id = id;
  }

  async send(text: string): Promise<void> {
    if (this.stallSends) {
      return new Promise<void>(() => undefined);
    }
    if (this.failSends) {
      throw new Error("broken pipe");
    }
    this.received.push(text);
  }

  close(): void {
    this.closed++;
  }

  events(): MonitorEvent[] {
    return this.received.map(text => {
      const parsed: MonitorEvent = JSON.parse(text);
      return parsed;
    });
  }
}

/**
 * Publisher that records events instead of sending them
 */
export class RecordingPublisher implements EventPublisher {
  readonly events: MonitorEvent[] = [];

  async publish(event: MonitorEvent): Promise<PublishReport> {
    this.events.push(event);
    return { type: event.type, delivered: 0, dropped: [] };
  }
}
