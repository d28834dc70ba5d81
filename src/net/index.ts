/**
 * @module net
 *
 * Poll-based connection tracking and typed message exchange.
 *
 * A NetworkManager runs a client transport, a server transport, or both
 * (host mode), and exposes the same API over each side.
 *
 * @example
 * ```typescript
 * const network = await NetworkManager.create<GameMessage>({ role: NetRole.SERVER, port: 8080 });
 * network.registerMessageTypes(PlayerInputMsg, PlayerUpdateMsg);
 *
 * network.onDisconnection(({ connectionId }) => removePlayer(connectionId));
 *
 * // Each tick
 * network.update();
 * for (const msg of network.getMessages()) {
 *   applyInput(msg.connectionId, msg);
 * }
 * ```
 */

export { NetRole, hasRole, resolveNetworkConfig, DEFAULT_HOST, DEFAULT_PORT } from "./types";
export type {
	ConnectionEvent,
	InboundFrame,
	NetworkConfig,
	ResolvedNetworkConfig,
	TransportAdapter,
} from "./types";
export { NetworkManager } from "./network-manager";
export type { NetworkEvents, NetworkManagerOptions, TransportRole } from "./network-manager";
export * from "./transport";
