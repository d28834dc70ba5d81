import { WebSocket, WebSocketServer } from "ws";
import type { RawData } from "ws";
import { TransportError } from "../../core/errors";
import type { NetworkConfig } from "../types";
import { QueuedTransport } from "./queued-transport";

/** Frames past this size make `ws` close the socket (1009) */
const SOCKET_PAYLOAD_CEILING = 16 * 1024 * 1024;

/**
 * WebSocket transport on top of the `ws` package.
 *
 * Reliable, ordered, message-framed binary streams over TCP. Each binary
 * WebSocket message is one frame; text messages are dropped. Frames over
 * `maxMessageSize` are dropped and the connection stays open.
 *
 * @example
 * ```ts
 * const server = new WebSocketTransport({ debug: true });
 * await server.startServer(8080);
 *
 * const client = new WebSocketTransport();
 * await client.startClient("localhost", 8080);
 * client.send(frame); // to connection 0, the server
 * ```
 */
export class WebSocketTransport extends QueuedTransport<WebSocket> {
	protected readonly label = "WebSocketTransport";

	private server: WebSocketServer | null = null;

	constructor(config?: NetworkConfig) {
		super(config);
	}

	async startServer(port: number): Promise<void> {
		this.claim("server");

		const server = new WebSocketServer({ port, maxPayload: this.payloadCeiling() });
		try {
			await new Promise<void>((resolve, reject) => {
				server.once("listening", () => resolve());
				server.once("error", (error) =>
					reject(new TransportError(`Failed to listen on port ${port}: ${error.message}`))
				);
			});
		} catch (error) {
			this.mode = "idle";
			server.close();
			throw error;
		}

		server.on("connection", (socket) => this.bind(socket, true));
		server.on("error", (error) => console.error(`[${this.label}] Server error: ${error.message}`));
		this.server = server;
		this.log(`Listening on port ${this.listeningPort()}`);
	}

	async startClient(host: string, port: number): Promise<void> {
		this.claim("client");

		const url = `ws://${host}:${port}`;
		const socket = new WebSocket(url, {
			handshakeTimeout: this.config.connectTimeout,
			maxPayload: this.payloadCeiling(),
		});

		try {
			await new Promise<void>((resolve, reject) => {
				// Stays attached: ws may emit more than one error while aborting
				socket.on("error", (error) =>
					reject(new TransportError(`Failed to connect to ${url}: ${error.message}`))
				);
				socket.once("open", () => {
					this.bind(socket, false);
					resolve();
				});
			});
		} catch (error) {
			this.mode = "idle";
			throw error;
		}

		this.log(`Connected to ${url}`);
	}

	listeningPort(): number | undefined {
		const address = this.server?.address();
		return typeof address === "object" && address !== null ? address.port : undefined;
	}

	async close(): Promise<void> {
		this.dropAll();
		this.mode = "closed";

		const server = this.server;
		this.server = null;
		if (!server) return;

		await new Promise<void>((resolve, reject) => {
			server.close((error) => (error ? reject(error) : resolve()));
		});
		this.log("Closed");
	}

	protected write(socket: WebSocket, data: Uint8Array): void {
		if (socket.readyState !== WebSocket.OPEN) {
			throw new Error(`socket is not open (state ${socket.readyState})`);
		}
		socket.send(data, { binary: true });
	}

	protected hangUp(socket: WebSocket): void {
		socket.terminate();
	}

	private payloadCeiling(): number {
		return Math.max(this.config.maxMessageSize * 2, SOCKET_PAYLOAD_CEILING);
	}

	private bind(socket: WebSocket, announce: boolean): void {
		const id = this.addConnection(socket, announce);

		socket.on("message", (data, isBinary) => {
			if (!isBinary) {
				this.log(`Text frame from connection ${id} dropped`);
				return;
			}
			this.receive(socket, toBytes(data));
		});

		socket.on("close", () => this.removeConnection(socket));

		socket.on("error", (error) => {
			this.log(`Connection ${id} error: ${error.message}`);
			this.removeConnection(socket);
		});
	}
}

function toBytes(data: RawData): Uint8Array {
	if (Array.isArray(data)) {
		return new Uint8Array(Buffer.concat(data));
	}
	return new Uint8Array(data);
}
