/**
 * Core networking types for the host/join message layer
 */

/**
 * Which side(s) of the connection a process runs.
 * DUAL is host mode: a server and a client to it in the same process.
 */
export enum NetRole {
	CLIENT = 1,
	SERVER = 2,
	DUAL = 3,
}

/** True when `role` includes `part` (DUAL includes both) */
export function hasRole(role: NetRole, part: NetRole.CLIENT | NetRole.SERVER): boolean {
	return (role & part) === part;
}

/**
 * A complete frame received from a connection
 */
export interface InboundFrame {
	connectionId: number;
	data: Uint8Array;
}

/**
 * Poll-based transport: I/O callbacks only enqueue, and everything the
 * application observes changes inside the poll and drain calls.
 *
 * One transport instance is either a server (many connections) or a
 * client (one connection with id 0), decided by which start method ran.
 */
export interface TransportAdapter {
	/**
	 * Begin listening for connections.
	 * Rejects with TransportError if already started or the bind fails.
	 */
	startServer(port: number): Promise<void>;

	/**
	 * Open one outbound connection, which gets id 0.
	 * Rejects with TransportError if already started, refused or timed out.
	 */
	startClient(host: string, port: number): Promise<void>;

	/**
	 * Ids accepted since the last poll (server transports only)
	 */
	pollNewConnections(): number[];

	/**
	 * Ids closed since the last poll. Each id is reported once and its
	 * queued frames are discarded at the same time.
	 */
	pollDisconnects(): number[];

	/**
	 * All complete frames since the last drain, in arrival order
	 */
	drainMessages(): InboundFrame[];

	/**
	 * Unicast to `connectionId`, or broadcast when omitted.
	 * Sending to an unknown id is a no-op.
	 */
	send(data: Uint8Array, connectionId?: number): void;

	/**
	 * Close one connection; it is reported by the next pollDisconnects
	 */
	disconnect(connectionId: number): void;

	/**
	 * Ids of every live connection
	 */
	getConnectionIds(): number[];

	/**
	 * Port the server is bound to, or undefined for a client
	 */
	listeningPort(): number | undefined;

	/**
	 * Close every connection and the listener
	 */
	close(): Promise<void>;
}

/**
 * Configuration for network message handling
 */
export interface NetworkConfig {
	/**
	 * Enable debug logging
	 */
	debug?: boolean;

	/**
	 * Client connect timeout in milliseconds (default: 3000)
	 */
	connectTimeout?: number;

	/**
	 * Maximum message size in bytes (default: 64KB)
	 */
	maxMessageSize?: number;

	/**
	 * Exchange a registry checksum on connect and drop peers whose
	 * message registration differs (default: false)
	 */
	verifyRegistry?: boolean;
}

/** NetworkConfig with every default applied */
export type ResolvedNetworkConfig = Required<NetworkConfig>;

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 8080;

export function resolveNetworkConfig(config?: NetworkConfig): ResolvedNetworkConfig {
	return {
		debug: config?.debug ?? false,
		connectTimeout: config?.connectTimeout ?? 3000,
		maxMessageSize: config?.maxMessageSize ?? 65536,
		verifyRegistry: config?.verifyRegistry ?? false,
	};
}

/**
 * Payload of connection and disconnect events
 */
export interface ConnectionEvent {
	connectionId: number;
	/** Transport the event came from: CLIENT or SERVER */
	role: NetRole.CLIENT | NetRole.SERVER;
}
