import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { NetworkManager } from "./network-manager";
import type { NetworkManagerOptions } from "./network-manager";
import { NetRole } from "./types";
import type { ConnectionEvent } from "./types";
import { InProcessNetwork, InProcessTransport } from "./transport/in-process-transport";
import { BinaryCodec } from "../core/binary-codec";
import { defineMessage } from "../protocol/message/define-message";
import type { InferMessage } from "../protocol/message/define-message";
import { MessageRegistry } from "../protocol/message/message-registry";
import {
	AmbiguousRoleError,
	ConfigurationError,
	TransportError,
	UnknownTagError,
	UnregisteredMessageError,
} from "../core/errors";

const PlayerInputMsg = defineMessage({
	name: "PlayerInputMsg",
	schema: {
		moveDir: BinaryCodec.vec2h,
		aimPos: BinaryCodec.vec3h,
		actions: BinaryCodec.list(BinaryCodec.string(16), 8),
	},
});

const PlayerUpdateMsg = defineMessage({
	name: "PlayerUpdateMsg",
	schema: {
		playerId: BinaryCodec.u32,
		position: BinaryCodec.vec3h,
		alive: BinaryCodec.bool,
	},
});

type TestMessage = InferMessage<typeof PlayerInputMsg> | InferMessage<typeof PlayerUpdateMsg>;

const input = () => PlayerInputMsg.create({ moveDir: [1, 0], aimPos: [2, 0, 3.5], actions: ["fire"] });

describe("NetworkManager", () => {
	let network: InProcessNetwork;
	let managers: NetworkManager<TestMessage>[];

	const create = async (
		options: Omit<NetworkManagerOptions<TestMessage>, "createTransport">,
		register = true
	): Promise<NetworkManager<TestMessage>> => {
		const manager = await NetworkManager.create<TestMessage>({
			...options,
			createTransport: (_role, config) => new InProcessTransport(network, config),
		});
		if (register && manager.registry.size === 0) {
			manager.registerMessageTypes(PlayerInputMsg, PlayerUpdateMsg);
		}
		managers.push(manager);
		return manager;
	};

	beforeEach(() => {
		network = new InProcessNetwork();
		managers = [];
	});

	afterEach(async () => {
		for (const manager of managers) await manager.close();
		vi.restoreAllMocks();
	});

	describe("host mode (DUAL)", () => {
		it("should connect its client to its own server during start", async () => {
			const host = await create({ role: NetRole.DUAL, port: 8080 });

			expect(host.getConnectionIds(NetRole.SERVER)).toEqual([0]);
			expect(host.getConnectionIds(NetRole.CLIENT)).toEqual([0]);
			expect(host.listeningPort()).toBe(8080);
		});

		it("should exchange messages between its client and server", async () => {
			const host = await create({ role: NetRole.DUAL });

			host.send(input(), NetRole.CLIENT);
			expect(host.getMessages(NetRole.SERVER)).toEqual([{ ...input(), connectionId: 0 }]);

			host.send(PlayerUpdateMsg.create({ playerId: 0, position: [1, 2, 3], alive: true }, 0), NetRole.SERVER);
			expect(host.getMessages(NetRole.CLIENT)).toEqual([
				{ kind: "PlayerUpdateMsg", playerId: 0, position: [1, 2, 3], alive: true, connectionId: 0 },
			]);
		});

		it("should require an explicit role", async () => {
			const host = await create({ role: NetRole.DUAL });

			expect(() => host.send(input())).toThrow(AmbiguousRoleError);
			expect(() => host.getMessages()).toThrow(
				"A DUAL network manager needs an explicit CLIENT or SERVER role"
			);
		});

		it("should follow the bound port when listening on port 0", async () => {
			const host = await create({ role: NetRole.DUAL, port: 0 });

			expect(host.listeningPort()).toBe(49152);
			expect(host.getConnectionIds(NetRole.SERVER)).toEqual([0]);
		});
	});

	describe("role resolution", () => {
		it("should resolve DUAL to the manager's own role", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const client = await create({ role: NetRole.CLIENT, port: 9000 });

			client.send(input());
			client.send(input(), NetRole.CLIENT);

			expect(server.getMessages()).toHaveLength(2);
			expect(server.getMessages(NetRole.SERVER)).toEqual([]);
		});

		it("should reject a role the manager does not run", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const client = await create({ role: NetRole.CLIENT, port: 9000 });

			expect(() => client.send(input(), NetRole.SERVER)).toThrow(AmbiguousRoleError);
			expect(() => server.getMessages(NetRole.CLIENT)).toThrow(
				"Network manager with role SERVER has no CLIENT transport"
			);
		});
	});

	describe("messages", () => {
		it("should fail to send an unregistered type until it is registered", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 }, false);
			const client = await create({ role: NetRole.CLIENT, port: 9000 }, false);

			expect(() => client.send(input())).toThrow(UnregisteredMessageError);

			client.registerMessageTypes(PlayerInputMsg);
			server.registerMessageTypes(PlayerInputMsg);
			client.send(input());

			expect(server.getMessages()).toEqual([{ ...input(), connectionId: 0 }]);
		});

		it("should stamp the sender's connection id", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			await create({ role: NetRole.CLIENT, port: 9000 });
			const second = await create({ role: NetRole.CLIENT, port: 9000 });

			second.send(input());

			const [received] = server.getMessages();
			expect(received.kind).toBe("PlayerInputMsg");
			expect(received.connectionId).toBe(1);
			expect(received).toEqual({ ...input(), connectionId: 1 });
		});

		it("should unicast to connectionId and broadcast otherwise", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const first = await create({ role: NetRole.CLIENT, port: 9000 });
			const second = await create({ role: NetRole.CLIENT, port: 9000 });

			server.send(PlayerUpdateMsg.create({ playerId: 7, position: [0, 0, 0], alive: false }, 1));
			expect(first.getMessages()).toEqual([]);
			expect(second.getMessages()).toHaveLength(1);

			server.send(PlayerUpdateMsg.create({ playerId: 8, position: [0, 0, 0], alive: true }));
			expect(first.getMessages()).toHaveLength(1);
			expect(second.getMessages()).toHaveLength(1);
		});

		it("should drop frames with an unknown tag and keep the connection", async () => {
			const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
			const server = await create({ role: NetRole.SERVER, port: 9000 }, false);
			const client = await create({ role: NetRole.CLIENT, port: 9000 }, false);
			server.registerMessageTypes(PlayerInputMsg);
			client.registerMessageTypes(PlayerInputMsg, PlayerUpdateMsg);

			const errors: unknown[] = [];
			server.events.on("protocol-error", ({ error }) => errors.push(error));

			client.send(PlayerUpdateMsg.create({ playerId: 1, position: [0, 0, 0], alive: true }));
			client.send(input());

			expect(server.getMessages()).toEqual([{ ...input(), connectionId: 0 }]);
			expect(errors).toHaveLength(1);
			expect(errors[0]).toBeInstanceOf(UnknownTagError);
			expect(warn).toHaveBeenCalledWith(
				"[NetworkManager] Dropped frame from connection 0: No message type registered for tag 1"
			);
			expect(server.getConnectionIds()).toEqual([0]);
		});
	});

	describe("connection hooks", () => {
		it("should fire connection hooks during update", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const events: ConnectionEvent[] = [];
			server.onConnection((event) => events.push(event));

			await create({ role: NetRole.CLIENT, port: 9000 });
			expect(events).toEqual([]);

			server.update();
			expect(events).toEqual([{ connectionId: 0, role: NetRole.SERVER }]);
		});

		it("should fire disconnect hooks on both sides", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const client = await create({ role: NetRole.CLIENT, port: 9000 });
			const serverEvents: ConnectionEvent[] = [];
			const clientEvents: ConnectionEvent[] = [];
			server.onDisconnection((event) => serverEvents.push(event));
			client.onDisconnection((event) => clientEvents.push(event));
			server.update();

			server.disconnect(0);
			server.update();
			client.update();

			expect(serverEvents).toEqual([{ connectionId: 0, role: NetRole.SERVER }]);
			expect(clientEvents).toEqual([{ connectionId: 0, role: NetRole.CLIENT }]);
		});

		it("should stop calling a hook after unsubscribing", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const hook = vi.fn();
			const off = server.onConnection(hook);
			off();

			await create({ role: NetRole.CLIENT, port: 9000 });
			server.update();

			expect(hook).not.toHaveBeenCalled();
		});

		it("should not deliver frames from a connection reported as disconnected", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			const client = await create({ role: NetRole.CLIENT, port: 9000 });
			server.update();

			client.send(input());
			await client.close();

			const disconnects: number[] = [];
			server.onDisconnection(({ connectionId }) => disconnects.push(connectionId));
			server.update();

			expect(disconnects).toEqual([0]);
			expect(server.getMessages()).toEqual([]);
		});

		it("should let a throwing disconnect hook escape update", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			await create({ role: NetRole.CLIENT, port: 9000 });
			server.update();
			server.onDisconnection(() => {
				throw new Error("hook failed");
			});

			server.disconnect(0);

			expect(() => server.update()).toThrow("hook failed");
		});

		it("should report connection and disconnect for the host's own client", async () => {
			const host = await create({ role: NetRole.DUAL });
			const events: string[] = [];
			host.onDisconnection(({ role }) => events.push(NetRole[role]));

			host.disconnect(0, NetRole.SERVER);
			host.update();

			expect(events).toEqual(["SERVER", "CLIENT"]);
		});
	});

	describe("registry handshake", () => {
		const handshakeRegistry = (...types: (typeof PlayerInputMsg | typeof PlayerUpdateMsg)[]) => {
			const registry = new MessageRegistry<TestMessage>({ handshake: true });
			registry.register(...types);
			return registry;
		};

		it("should accept a peer with the same registration order", async () => {
			const server = await create({
				role: NetRole.SERVER,
				port: 9000,
				registry: handshakeRegistry(PlayerInputMsg, PlayerUpdateMsg),
				config: { verifyRegistry: true },
			});
			const client = await create({
				role: NetRole.CLIENT,
				port: 9000,
				registry: handshakeRegistry(PlayerInputMsg, PlayerUpdateMsg),
				config: { verifyRegistry: true },
			});
			const mismatch = vi.fn();
			client.events.on("registry-mismatch", mismatch);

			server.update();
			server.send(PlayerUpdateMsg.create({ playerId: 3, position: [0, 1, 0], alive: true }));

			expect(client.getMessages()).toEqual([
				{ kind: "PlayerUpdateMsg", playerId: 3, position: [0, 1, 0], alive: true, connectionId: 0 },
			]);
			expect(mismatch).not.toHaveBeenCalled();
			expect(client.registry.tagOf("PlayerInputMsg")).toBe(1);
		});

		it("should disconnect a peer with a different registration order", async () => {
			const error = vi.spyOn(console, "error").mockImplementation(() => {});
			const serverRegistry = handshakeRegistry(PlayerInputMsg, PlayerUpdateMsg);
			const clientRegistry = handshakeRegistry(PlayerUpdateMsg, PlayerInputMsg);
			const server = await create({
				role: NetRole.SERVER,
				port: 9000,
				registry: serverRegistry,
				config: { verifyRegistry: true },
			});
			const client = await create({
				role: NetRole.CLIENT,
				port: 9000,
				registry: clientRegistry,
				config: { verifyRegistry: true },
			});
			const mismatches: { expected: string; received: string }[] = [];
			client.events.on("registry-mismatch", ({ expected, received }) => mismatches.push({ expected, received }));

			server.update();

			expect(client.getMessages()).toEqual([]);
			expect(mismatches).toEqual([
				{ expected: clientRegistry.fingerprint(), received: serverRegistry.fingerprint() },
			]);
			expect(error).toHaveBeenCalledTimes(1);
			expect(client.getConnectionIds()).toEqual([]);
			expect(server.getConnectionIds()).toEqual([]);
		});

		it("should require a registry with the reserved tag", () => {
			expect(
				() =>
					new NetworkManager<TestMessage>({
						role: NetRole.SERVER,
						registry: new MessageRegistry<TestMessage>(),
						config: { verifyRegistry: true },
					})
			).toThrow(ConfigurationError);
		});

		it("should create a handshake registry when none is given", () => {
			const manager = new NetworkManager({ role: NetRole.SERVER, config: { verifyRegistry: true } });
			expect(manager.registry.handshake).toBe(true);
		});
	});

	describe("lifecycle", () => {
		it("should reject when the client cannot connect", async () => {
			await expect(create({ role: NetRole.CLIENT, port: 9000 })).rejects.toThrow(TransportError);
		});

		it("should close the server when the client fails to start", async () => {
			const elsewhere = new InProcessNetwork();
			const manager = new NetworkManager<TestMessage>({
				role: NetRole.DUAL,
				port: 9000,
				createTransport: (role) =>
					new InProcessTransport(role === NetRole.SERVER ? network : elsewhere),
			});

			await expect(manager.start()).rejects.toThrow("Failed to connect to localhost:9000: connection refused");
			expect(network.ports()).toEqual([]);
		});

		it("should refuse to start twice", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			await expect(server.start()).rejects.toThrow(ConfigurationError);
		});

		it("should free the port on close", async () => {
			const server = await create({ role: NetRole.SERVER, port: 9000 });
			await server.close();

			expect(network.ports()).toEqual([]);
			expect(() => server.getMessages()).toThrow("Network manager is not started");
		});
	});
});
