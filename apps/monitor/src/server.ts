/**
 * Monitor Server
 *
 * One HTTP server carries both surfaces:
 * - express: `GET /` (dashboard page) and `GET /health`
 * - ws: viewer connections on `/ws`, one SubscriberSession each
 */

import { createServer, type Server } from "node:http";
import { fileURLToPath } from "node:url";
import express, { type Express, type Request, type Response } from "express";
import { WebSocketServer } from "ws";
import type { FeedStatus } from "@perp-pulse/adapters";
import { logger } from "@perp-pulse/utils";

import { SubscriberSession, type BroadcastHub } from "./services";
import type { HealthReport } from "./types";

const log = logger.child("server");

const DASHBOARD_PATH = fileURLToPath(new URL("../public/index.html", import.meta.url));

export const WS_PATH = "/ws";

/**
 * "ok" only while every upstream feed is connected
 */
export function buildHealthReport(feeds: FeedStatus[], subscribers: number, uptimeSec: number): HealthReport {
  const allConnected = feeds.every(feed => feed.state === "connected");
  return {
    status: allConnected ? "ok" : "degraded",
    uptimeSec,
    subscribers,
    feeds,
  };
}

export interface MonitorServerOptions {
  hub: BroadcastHub;
  feedStatuses: () => FeedStatus[];
  startedAtMs?: number;
}

export function createApp(options: MonitorServerOptions): Express {
  const { hub, feedStatuses } = options;
  const startedAtMs = options.startedAtMs ?? Date.now();
  const app = express();

  app.get("/", (_req: Request, res: Response) => {
    res.sendFile(DASHBOARD_PATH);
  });

  app.get("/health", (_req: Request, res: Response) => {
    const uptimeSec = Math.floor((Date.now() - startedAtMs) / 1000);
    res.json(buildHealthReport(feedStatuses(), hub.size(), uptimeSec));
  });

  return app;
}

export class MonitorServer {
  private readonly hub: BroadcastHub;
  private readonly server: Server;
  private readonly wss: WebSocketServer;

  constructor(options: MonitorServerOptions) {
    this.hub = options.hub;
    this.server = createServer(createApp(options));
    this.wss = new WebSocketServer({ server: this.server, path: WS_PATH });

    this.wss.on("connection", (socket, req) => {
      const session = new SubscriberSession(socket, this.hub, req.socket.remoteAddress);
      void session.open();
    });
  }

  /**
   * Bind and start accepting connections. Rejects when the port cannot be bound.
   */
  listen(port: number, host: string): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.server.once("error", onError);
      this.server.listen(port, host, () => {
        this.server.off("error", onError);
        log.info("listening", { host, port, ws: WS_PATH });
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    await new Promise<void>(resolve => {
      this.wss.close(() => resolve());
    });
    await new Promise<void>((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
    });
    log.info("server closed");
  }
}
