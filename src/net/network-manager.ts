import { EventSystem } from "../core/events/event-system";
import type { Unsubscribe } from "../core/events/event-system";
import { AmbiguousRoleError, ConfigurationError, ProtocolError } from "../core/errors";
import type { AnyMessage } from "../protocol/message/define-message";
import { MessageRegistry } from "../protocol/message/message-registry";
import type { RegistrableType } from "../protocol/message/message-registry";
import { WebSocketTransport } from "./transport/websocket-transport";
import {
	DEFAULT_HOST,
	DEFAULT_PORT,
	NetRole,
	hasRole,
	resolveNetworkConfig,
	type ConnectionEvent,
	type InboundFrame,
	type NetworkConfig,
	type ResolvedNetworkConfig,
	type TransportAdapter,
} from "./types";

/** A single transport side */
export type TransportRole = NetRole.CLIENT | NetRole.SERVER;

/**
 * Events emitted by NetworkManager.
 * All of them fire synchronously inside `update()` or `getMessages()`.
 */
export type NetworkEvents = {
	connection: ConnectionEvent;
	disconnect: ConnectionEvent;
	"protocol-error": ConnectionEvent & { error: ProtocolError };
	"registry-mismatch": ConnectionEvent & { expected: string; received: string };
};

/**
 * Configuration for NetworkManager
 */
export interface NetworkManagerOptions<M extends AnyMessage> {
	/** Which transports to run; fixed for the manager's lifetime */
	role: NetRole;

	/** Host the client connects to (default: localhost) */
	host?: string;

	/** Port the server listens on and the client connects to (default: 8080) */
	port?: number;

	/** Message registry shared with the peers; created empty when omitted */
	registry?: MessageRegistry<M>;

	/** Transport factory (default: WebSocketTransport) */
	createTransport?: (role: TransportRole, config: NetworkConfig) => TransportAdapter;

	/** Network configuration */
	config?: NetworkConfig;
}

/**
 * Connection tracking and typed message exchange for one process.
 *
 * A CLIENT manager runs one client transport, a SERVER manager one server
 * transport, and a DUAL manager both, with its client connected to its own
 * server (host mode).
 *
 * Everything is poll-based: call `update()` once per tick to fire the
 * connection hooks, then `getMessages()` to drain decoded messages.
 *
 * @template M Union of every message type the registry carries
 *
 * @example
 * ```ts
 * type GameMessage = PlayerInputMsg | PlayerUpdateMsg;
 *
 * const network = await NetworkManager.create<GameMessage>({ role: NetRole.DUAL, port: 8080 });
 * network.registerMessageTypes(PlayerInputMsg, PlayerUpdateMsg);
 *
 * network.onConnection(({ connectionId, role }) => {
 *   console.log(`Connection ${connectionId} on ${NetRole[role]}`);
 * });
 *
 * // Each tick
 * network.update();
 * for (const msg of network.getMessages(NetRole.SERVER)) {
 *   if (msg.kind === "PlayerInputMsg") {
 *     network.send(PlayerUpdateMsg.create({ ... }), NetRole.SERVER); // broadcast
 *   }
 * }
 * network.send(PlayerInputMsg.create({ ... }), NetRole.CLIENT);
 * ```
 */
export class NetworkManager<M extends AnyMessage = AnyMessage> {
	readonly role: NetRole;
	readonly host: string;
	readonly port: number;
	readonly registry: MessageRegistry<M>;
	readonly events = new EventSystem<NetworkEvents>({
		events: ["connection", "disconnect", "protocol-error", "registry-mismatch"],
	});

	private config: ResolvedNetworkConfig;
	private createTransport: (role: TransportRole, config: NetworkConfig) => TransportAdapter;
	private server: TransportAdapter | null = null;
	private client: TransportAdapter | null = null;
	private started = false;

	constructor(options: NetworkManagerOptions<M>) {
		this.role = options.role;
		this.host = options.host ?? DEFAULT_HOST;
		this.port = options.port ?? DEFAULT_PORT;
		this.config = resolveNetworkConfig(options.config);
		this.createTransport = options.createTransport ?? ((_role, config) => new WebSocketTransport(config));

		this.registry = options.registry ?? new MessageRegistry<M>({ handshake: this.config.verifyRegistry });
		if (this.config.verifyRegistry && !this.registry.handshake) {
			throw new ConfigurationError("verifyRegistry needs a registry created with { handshake: true }");
		}
	}

	/**
	 * Creates a manager and starts its transports.
	 */
	static async create<M extends AnyMessage = AnyMessage>(options: NetworkManagerOptions<M>): Promise<NetworkManager<M>> {
		const manager = new NetworkManager<M>(options);
		await manager.start();
		return manager;
	}

	/**
	 * Starts the server transport (SERVER, DUAL), then the client transport
	 * (CLIENT, DUAL), then runs one `update()`.
	 *
	 * A DUAL client connects to the port the server actually bound, so port 0
	 * works in host mode. On failure every transport opened so far is closed.
	 */
	async start(): Promise<void> {
		if (this.started) {
			throw new ConfigurationError("Network manager is already started");
		}
		this.started = true;

		try {
			if (hasRole(this.role, NetRole.SERVER)) {
				this.server = this.createTransport(NetRole.SERVER, this.config);
				await this.server.startServer(this.port);
				this.log(`Server listening on port ${this.server.listeningPort() ?? this.port}`);
			}

			if (hasRole(this.role, NetRole.CLIENT)) {
				const port = this.server?.listeningPort() ?? this.port;
				this.client = this.createTransport(NetRole.CLIENT, this.config);
				await this.client.startClient(this.host, port);
				this.log(`Client connected to ${this.host}:${port}`);
			}
		} catch (error) {
			await this.close();
			throw error;
		}

		this.update();
	}

	/**
	 * Appends message types to the registry. Order defines the tags, so every
	 * peer must register the same types in the same order.
	 */
	registerMessageTypes(...types: RegistrableType<M>[]): void {
		this.registry.register(...types);
	}

	/**
	 * Encodes and sends a message.
	 *
	 * Unicasts to `message.connectionId` when set, otherwise broadcasts on the
	 * resolved transport.
	 *
	 * @param role Transport to send on. A DUAL manager must pass CLIENT or
	 * SERVER; a single-role manager may omit it.
	 * @throws UnregisteredMessageError if the message type is not registered
	 * @throws AmbiguousRoleError if the role does not resolve to one transport
	 */
	send(message: M, role: NetRole = NetRole.DUAL): void {
		const frame = this.registry.encode(message);
		const [transport] = this.resolve(role);
		transport.send(frame, message.connectionId);
	}

	/**
	 * Drains, decodes and returns every message received on the resolved
	 * transport, in arrival order, with `connectionId` set to the sender.
	 *
	 * Frames with an unknown tag or a corrupt payload are dropped and
	 * reported through the `protocol-error` event; the connection stays open.
	 */
	getMessages(role: NetRole = NetRole.DUAL): M[] {
		const [transport, side] = this.resolve(role);
		const messages: M[] = [];

		for (const frame of transport.drainMessages()) {
			const tag = frame.data[0];
			try {
				if (tag !== undefined && this.registry.isReservedTag(tag)) {
					this.handleChecksum(transport, side, frame);
					continue;
				}
				const message = this.registry.decode(frame.data);
				messages.push({ ...message, connectionId: frame.connectionId });
			} catch (error) {
				if (!(error instanceof ProtocolError)) throw error;
				console.warn(`[NetworkManager] Dropped frame from connection ${frame.connectionId}: ${error.message}`);
				this.events.emit("protocol-error", { connectionId: frame.connectionId, role: side, error });
			}
		}

		return messages;
	}

	/**
	 * Polls every transport (server first, then client) and fires the
	 * connection hooks, then the disconnect hooks, before returning.
	 */
	update(): void {
		for (const [side, transport] of this.transports()) {
			for (const connectionId of transport.pollNewConnections()) {
				this.log(`New connection ${connectionId} on ${NetRole[side]}`);
				if (side === NetRole.SERVER && this.config.verifyRegistry) {
					transport.send(this.registry.encodeChecksum(), connectionId);
				}
				this.events.emit("connection", { connectionId, role: side });
			}

			for (const connectionId of transport.pollDisconnects()) {
				this.log(`Connection ${connectionId} on ${NetRole[side]} closed`);
				this.events.emit("disconnect", { connectionId, role: side });
			}
		}
	}

	/**
	 * Registers a connection hook.
	 * @returns A function that removes the hook
	 */
	onConnection(handler: (event: ConnectionEvent) => void): Unsubscribe {
		return this.events.on("connection", handler);
	}

	/**
	 * Registers a disconnect hook.
	 * @returns A function that removes the hook
	 */
	onDisconnection(handler: (event: ConnectionEvent) => void): Unsubscribe {
		return this.events.on("disconnect", handler);
	}

	/**
	 * Live connection ids on the resolved transport
	 */
	getConnectionIds(role: NetRole = NetRole.DUAL): number[] {
		return this.resolve(role)[0].getConnectionIds();
	}

	/**
	 * Closes one connection on the resolved transport
	 */
	disconnect(connectionId: number, role: NetRole = NetRole.DUAL): void {
		this.resolve(role)[0].disconnect(connectionId);
	}

	/**
	 * Port the server transport is bound to
	 */
	listeningPort(): number | undefined {
		return this.server?.listeningPort();
	}

	/**
	 * Closes the client transport, then the server transport
	 */
	async close(): Promise<void> {
		const client = this.client;
		const server = this.server;
		this.client = null;
		this.server = null;

		if (client) await client.close();
		if (server) await server.close();
		this.log("Closed");
	}

	private *transports(): Generator<[TransportRole, TransportAdapter]> {
		if (this.server) yield [NetRole.SERVER, this.server];
		if (this.client) yield [NetRole.CLIENT, this.client];
	}

	private resolve(role: NetRole): [TransportAdapter, TransportRole] {
		let side: TransportRole;
		if (role === NetRole.DUAL) {
			if (this.role === NetRole.DUAL) {
				throw new AmbiguousRoleError("A DUAL network manager needs an explicit CLIENT or SERVER role");
			}
			side = this.role;
		} else {
			side = role;
		}

		if (!hasRole(this.role, side)) {
			throw new AmbiguousRoleError(`Network manager with role ${NetRole[this.role]} has no ${NetRole[side]} transport`);
		}

		const transport = side === NetRole.SERVER ? this.server : this.client;
		if (!transport) {
			throw new ConfigurationError("Network manager is not started");
		}
		return [transport, side];
	}

	private handleChecksum(transport: TransportAdapter, side: TransportRole, frame: InboundFrame): void {
		if (side === NetRole.SERVER) {
			this.log(`Ignored registry checksum from client ${frame.connectionId}`);
			return;
		}

		const received = this.registry.decodeChecksum(frame.data);
		const expected = this.registry.fingerprint();
		if (received === expected) {
			this.log(`Registry checksum verified (${expected})`);
			return;
		}

		console.error(
			`[NetworkManager] Registry mismatch on connection ${frame.connectionId}: expected ${expected}, received ${received}`
		);
		this.events.emit("registry-mismatch", { connectionId: frame.connectionId, role: side, expected, received });
		transport.disconnect(frame.connectionId);
	}

	private log(message: string): void {
		if (this.config.debug) {
			console.log(`[NetworkManager] ${message}`);
		}
	}
}
