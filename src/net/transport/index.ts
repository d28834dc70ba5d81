export { QueuedTransport } from "./queued-transport";
export { WebSocketTransport } from "./websocket-transport";
export { InProcessNetwork, InProcessTransport } from "./in-process-transport";
