import { TransportError } from "../../core/errors";
import type { NetworkConfig } from "../types";
import { QueuedTransport } from "./queued-transport";

/** First port handed out when a server listens on port 0 */
const EPHEMERAL_PORT_START = 49152;

/**
 * One end of an in-process connection.
 * Writing to it delivers into the peer end's transport queue.
 */
class LoopbackSocket {
	peer: LoopbackSocket | null = null;

	constructor(readonly owner: InProcessTransport) {}
}

/**
 * Registry of listening in-process servers, keyed by port.
 * Transports that should reach each other must share one network.
 */
export class InProcessNetwork {
	private servers = new Map<number, InProcessTransport>();
	private nextEphemeral = EPHEMERAL_PORT_START;

	/** @internal */
	listen(port: number, server: InProcessTransport): number {
		if (port === 0) {
			while (this.servers.has(this.nextEphemeral)) this.nextEphemeral++;
			port = this.nextEphemeral++;
		}
		if (this.servers.has(port)) {
			throw new TransportError(`Failed to listen on port ${port}: address already in use`);
		}
		this.servers.set(port, server);
		return port;
	}

	/** @internal */
	unlisten(port: number, server: InProcessTransport): void {
		if (this.servers.get(port) === server) this.servers.delete(port);
	}

	/** @internal */
	lookup(port: number): InProcessTransport | undefined {
		return this.servers.get(port);
	}

	/** Ports with a listening server */
	ports(): number[] {
		return Array.from(this.servers.keys());
	}
}

/**
 * Loopback transport for offline host play and tests.
 *
 * Frames are delivered synchronously into the peer's queue, so a `send`
 * followed by the peer's `drainMessages` sees the frame without waiting
 * for I/O. Connect, disconnect and ordering semantics match the socket
 * transport.
 *
 * @example
 * ```ts
 * const network = new InProcessNetwork();
 * const server = new InProcessTransport(network);
 * const client = new InProcessTransport(network);
 *
 * await server.startServer(8080);
 * await client.startClient("localhost", 8080);
 * server.pollNewConnections(); // [0]
 * ```
 */
export class InProcessTransport extends QueuedTransport<LoopbackSocket> {
	protected readonly label = "InProcessTransport";

	private port: number | undefined;

	constructor(private readonly network: InProcessNetwork, config?: NetworkConfig) {
		super(config);
	}

	async startServer(port: number): Promise<void> {
		this.claim("server");
		try {
			this.port = this.network.listen(port, this);
		} catch (error) {
			this.mode = "idle";
			throw error;
		}
		this.log(`Listening on port ${this.port}`);
	}

	async startClient(host: string, port: number): Promise<void> {
		this.claim("client");

		const server = this.network.lookup(port);
		if (!server) {
			this.mode = "idle";
			throw new TransportError(`Failed to connect to ${host}:${port}: connection refused`);
		}

		const local = new LoopbackSocket(this);
		const remote = new LoopbackSocket(server);
		local.peer = remote;
		remote.peer = local;

		this.addConnection(local, false);
		server.addConnection(remote, true);
		this.log(`Connected to ${host}:${port}`);
	}

	listeningPort(): number | undefined {
		return this.port;
	}

	async close(): Promise<void> {
		this.dropAll();
		this.mode = "closed";
		if (this.port !== undefined) {
			this.network.unlisten(this.port, this);
			this.port = undefined;
		}
	}

	protected write(socket: LoopbackSocket, data: Uint8Array): void {
		const peer = socket.peer;
		if (!peer) {
			throw new Error("socket is closed");
		}
		// Copy so the receiver never aliases a buffer the sender reuses
		peer.owner.receive(peer, data.slice());
	}

	protected hangUp(socket: LoopbackSocket): void {
		const peer = socket.peer;
		socket.peer = null;
		if (peer) {
			peer.peer = null;
			peer.owner.removeConnection(peer);
		}
	}
}
