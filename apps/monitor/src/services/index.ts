/**
 * Monitor Services
 *
 * Export all service modules
 */

export { BroadcastHub } from "./broadcast-hub";
export { AlertPipeline, type AlertPipelineOptions, type PipelineCounters } from "./alert-pipeline";
export { FeedSupervisor, createReconnectStrategy, type FeedSupervisorOptions, type ReconnectStrategyName } from "./feed-supervisor";
export { SubscriberSession, WsSubscriber, type SubscriberSocket, type SessionEndReason } from "./subscriber-session";
