export { ActivationLatch } from "./activation-latch";
export { SharedHeartbeatState } from "./heartbeat-state";
export { HeartbeatSignal } from "./signal";
