import { TransportError } from "../../core/errors";
import type { InboundFrame, NetworkConfig, ResolvedNetworkConfig, TransportAdapter } from "../types";
import { resolveNetworkConfig } from "../types";

type TransportMode = "idle" | "server" | "client" | "closed";

/**
 * Base class for poll-based transports.
 *
 * Subclasses own the sockets and report what happens to them through
 * `addConnection`, `receive` and `removeConnection`; this class turns those
 * callbacks into the queues drained by `poll*` and `drainMessages`.
 *
 * Connection ids are issued in increasing order and never reused while the
 * transport lives. The id/handle map is bidirectional so socket callbacks
 * can find their id without a lookup scan.
 *
 * @template Handle The subclass' socket type
 */
export abstract class QueuedTransport<Handle> implements TransportAdapter {
	protected readonly config: ResolvedNetworkConfig;
	protected mode: TransportMode = "idle";

	private handles = new Map<number, Handle>();
	private ids = new Map<Handle, number>();
	private nextId = 0;

	private accepted: number[] = [];
	private closed: number[] = [];
	private inbound: InboundFrame[] = [];

	/** Prefix for debug log lines */
	protected abstract readonly label: string;

	constructor(config?: NetworkConfig) {
		this.config = resolveNetworkConfig(config);
	}

	abstract startServer(port: number): Promise<void>;
	abstract startClient(host: string, port: number): Promise<void>;
	abstract listeningPort(): number | undefined;
	abstract close(): Promise<void>;

	/** Writes a frame to a socket; throwing drops the connection */
	protected abstract write(handle: Handle, data: Uint8Array): void;

	/** Closes a socket that has already been removed from the maps */
	protected abstract hangUp(handle: Handle): void;

	pollNewConnections(): number[] {
		return this.accepted.splice(0);
	}

	pollDisconnects(): number[] {
		const ids = this.closed.splice(0);
		if (ids.length > 0) {
			const gone = new Set(ids);
			this.inbound = this.inbound.filter((frame) => !gone.has(frame.connectionId));
		}
		return ids;
	}

	drainMessages(): InboundFrame[] {
		return this.inbound.splice(0);
	}

	send(data: Uint8Array, connectionId?: number): void {
		if (connectionId === undefined) {
			for (const [id, handle] of [...this.handles]) {
				this.writeTo(id, handle, data);
			}
			return;
		}

		const handle = this.handles.get(connectionId);
		if (handle === undefined) {
			this.log(`Send to unknown connection ${connectionId} ignored`);
			return;
		}
		this.writeTo(connectionId, handle, data);
	}

	disconnect(connectionId: number): void {
		const handle = this.handles.get(connectionId);
		if (handle === undefined) {
			this.log(`Disconnect of unknown connection ${connectionId} ignored`);
			return;
		}
		this.removeConnection(handle);
		this.hangUp(handle);
	}

	getConnectionIds(): number[] {
		return Array.from(this.handles.keys());
	}

	/**
	 * Marks the transport as started.
	 * @throws TransportError if it was started (or closed) before
	 */
	protected claim(mode: "server" | "client"): void {
		if (this.mode !== "idle") {
			throw new TransportError(`Cannot start ${this.label} as ${mode}: transport is ${this.mode}`);
		}
		this.mode = mode;
	}

	/**
	 * Registers a new socket and returns its id.
	 * Only announced connections are reported by pollNewConnections.
	 */
	protected addConnection(handle: Handle, announce: boolean): number {
		const id = this.nextId++;
		this.handles.set(id, handle);
		this.ids.set(handle, id);
		if (announce) this.accepted.push(id);
		this.log(`Connection ${id} opened`);
		return id;
	}

	/**
	 * Forgets a socket and queues its disconnect. Safe to call twice.
	 */
	protected removeConnection(handle: Handle): void {
		const id = this.ids.get(handle);
		if (id === undefined) return;

		this.ids.delete(handle);
		this.handles.delete(id);
		this.closed.push(id);
		this.log(`Connection ${id} closed`);
	}

	/** Queues a frame received on a live socket */
	protected receive(handle: Handle, data: Uint8Array): void {
		const connectionId = this.ids.get(handle);
		if (connectionId === undefined) return;

		if (data.byteLength > this.config.maxMessageSize) {
			this.log(
				`Frame from connection ${connectionId} exceeds max size: ${data.byteLength} > ${this.config.maxMessageSize}`
			);
			return;
		}
		this.inbound.push({ connectionId, data });
	}

	/** Removes and hangs up every live connection */
	protected dropAll(): void {
		for (const handle of [...this.ids.keys()]) {
			this.removeConnection(handle);
			this.hangUp(handle);
		}
	}

	protected log(message: string): void {
		if (this.config.debug) {
			console.log(`[${this.label}] ${message}`);
		}
	}

	private writeTo(id: number, handle: Handle, data: Uint8Array): void {
		try {
			this.write(handle, data);
		} catch (error) {
			this.log(`Write to connection ${id} failed: ${error instanceof Error ? error.message : String(error)}`);
			this.removeConnection(handle);
			this.hangUp(handle);
		}
	}
}
