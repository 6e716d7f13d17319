// Main exports for the heartbeat agent package

export type { AgentOptions, AgentOptionsInput, GameServerAgentDeps } from "./agent";
export { AgentOptionsSchema, GameServerAgent } from "./agent";
export * from "./codec";
export * from "./config";
export type { OperationDispatcherOptions } from "./dispatcher";
export { OperationDispatcher } from "./dispatcher";
export * as Hostbeat from "./global";
export type { AgentLogging } from "./logging";
export { createAgentLogging } from "./logging";
export type { HeartbeatSchedulerOptions } from "./scheduler";
export { HeartbeatScheduler } from "./scheduler";
export { ActivationLatch, HeartbeatSignal, SharedHeartbeatState } from "./state";
export type { FetchTransportOptions, HeartbeatTransport, TransportReply } from "./transport";
export { buildHeartbeatUrl, FetchHeartbeatTransport } from "./transport";
export * from "./types";
