import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { WebSocket } from "ws";
import { WebSocketTransport } from "./websocket-transport";
import { TransportError } from "../../core/errors";
import type { InboundFrame } from "../types";

const HOST = "127.0.0.1";

/** Polls until `read` returns a non-empty list, collecting everything it returned */
async function collect<T>(read: () => T[], count = 1, timeout = 2000): Promise<T[]> {
	const items: T[] = [];
	const deadline = Date.now() + timeout;
	while (items.length < count) {
		items.push(...read());
		if (items.length >= count) break;
		if (Date.now() > deadline) {
			throw new Error(`Timed out waiting for ${count} item(s), got ${items.length}`);
		}
		await new Promise((resolve) => setTimeout(resolve, 5));
	}
	return items;
}

describe("WebSocketTransport", () => {
	let server: WebSocketTransport;
	let client: WebSocketTransport;
	let port: number;

	beforeEach(async () => {
		server = new WebSocketTransport();
		client = new WebSocketTransport();
		await server.startServer(0);
		port = server.listeningPort() ?? 0;
	});

	afterEach(async () => {
		await client.close();
		await server.close();
	});

	it("should bind an ephemeral port", () => {
		expect(port).toBeGreaterThan(0);
		expect(client.listeningPort()).toBeUndefined();
	});

	it("should give the client connection id 0 without announcing it", async () => {
		await client.startClient(HOST, port);

		expect(client.getConnectionIds()).toEqual([0]);
		expect(client.pollNewConnections()).toEqual([]);
		expect(await collect(() => server.pollNewConnections())).toEqual([0]);
	});

	it("should exchange binary frames both ways", async () => {
		await client.startClient(HOST, port);
		const [id] = await collect(() => server.pollNewConnections());

		client.send(new Uint8Array([1, 2, 3]));
		const inbound = await collect<InboundFrame>(() => server.drainMessages());
		expect(inbound).toEqual([{ connectionId: id, data: new Uint8Array([1, 2, 3]) }]);

		server.send(new Uint8Array([4]), id);
		const reply = await collect<InboundFrame>(() => client.drainMessages());
		expect(reply).toEqual([{ connectionId: 0, data: new Uint8Array([4]) }]);
	});

	it("should keep frame order", async () => {
		await client.startClient(HOST, port);
		await collect(() => server.pollNewConnections());

		for (let i = 0; i < 5; i++) client.send(new Uint8Array([i]));
		const frames = await collect<InboundFrame>(() => server.drainMessages(), 5);

		expect(frames.map((frame) => frame.data[0])).toEqual([0, 1, 2, 3, 4]);
	});

	it("should report a client hang-up as a disconnect", async () => {
		await client.startClient(HOST, port);
		const [id] = await collect(() => server.pollNewConnections());

		await client.close();

		expect(await collect(() => server.pollDisconnects())).toEqual([id]);
		expect(server.getConnectionIds()).toEqual([]);
	});

	it("should report a server-side disconnect to the client", async () => {
		await client.startClient(HOST, port);
		const [id] = await collect(() => server.pollNewConnections());

		server.disconnect(id);

		expect(server.pollDisconnects()).toEqual([id]);
		expect(await collect(() => client.pollDisconnects())).toEqual([0]);
	});

	it("should drop text frames", async () => {
		const raw = new WebSocket(`ws://${HOST}:${port}`);
		await new Promise<void>((resolve, reject) => {
			raw.once("open", () => resolve());
			raw.once("error", reject);
		});
		const [id] = await collect(() => server.pollNewConnections());

		raw.send("hello");
		raw.send(new Uint8Array([7]));

		expect(await collect<InboundFrame>(() => server.drainMessages())).toEqual([
			{ connectionId: id, data: new Uint8Array([7]) },
		]);
		raw.terminate();
	});

	it("should drop an oversized frame and keep the connection", async () => {
		const small = new WebSocketTransport({ maxMessageSize: 16 });
		const sender = new WebSocketTransport({ maxMessageSize: 16 });
		await small.startServer(0);
		await sender.startClient(HOST, small.listeningPort() ?? 0);
		const [id] = await collect(() => small.pollNewConnections());

		sender.send(new Uint8Array(32));
		sender.send(new Uint8Array([9]));

		expect(await collect<InboundFrame>(() => small.drainMessages())).toEqual([
			{ connectionId: id, data: new Uint8Array([9]) },
		]);
		expect(small.pollDisconnects()).toEqual([]);
		expect(small.getConnectionIds()).toEqual([id]);

		await sender.close();
		await small.close();
	});

	it("should reject a port that is in use", async () => {
		const other = new WebSocketTransport();
		await expect(other.startServer(port)).rejects.toThrow(TransportError);
		await other.close();
	});

	it("should reject a refused connection", async () => {
		const lonely = new WebSocketTransport();
		await lonely.startServer(0);
		const closedPort = lonely.listeningPort() ?? 0;
		await lonely.close();

		await expect(client.startClient(HOST, closedPort)).rejects.toThrow(TransportError);
	});

	it("should refuse to start twice", async () => {
		await expect(server.startServer(0)).rejects.toThrow(
			"Cannot start WebSocketTransport as server: transport is server"
		);
	});
});
