import { describe, expect, test, vi, beforeEach, afterEach } from "vitest";
import {
    ConfigurationError,
    InProcessNetwork,
    InProcessTransport,
    NetRole,
    NetworkManager,
    TransitionPhase,
} from "../../src";
import { MainClient } from "./client-state";
import { launchArena, parseLaunchArgs, type Arena } from "./launch";
import { JsonResourceLoader, parseLevel } from "./resources";
import { MainServer } from "./server-state";
import {
    BOT_ID_START,
    PlayerAction,
    PlayerActionMsg,
    PlayerInputMsg,
    PlayerUpdateMsg,
    createArenaRegistry,
    type ArenaMessage,
} from "./shared";

const levelData = {
    name: "Test Level",
    bounds: { min: [-1, -1], max: [1, 1] },
    playerStarts: [[0.5, 0.5, 3]],
};

describe("parseLaunchArgs", () => {
    test("should default to a dual process on the default port", () => {
        expect(parseLaunchArgs([])).toEqual({ role: NetRole.DUAL, host: "localhost", port: 8080 });
    });

    test("should host a dedicated server", () => {
        expect(parseLaunchArgs(["host", "9000"])).toEqual({ role: NetRole.SERVER, host: "localhost", port: 9000 });
    });

    test("should join a remote host", () => {
        expect(parseLaunchArgs(["join", "10.0.0.2", "9001"])).toEqual({
            role: NetRole.CLIENT,
            host: "10.0.0.2",
            port: 9001,
        });
        expect(parseLaunchArgs(["join"])).toEqual({ role: NetRole.CLIENT, host: "localhost", port: 8080 });
    });

    test("should reject unknown commands and bad ports", () => {
        expect(() => parseLaunchArgs(["spectate"])).toThrow(ConfigurationError);
        expect(() => parseLaunchArgs(["host", "http"])).toThrow('Invalid port "http"');
    });
});

describe("resources", () => {
    test("should ground every player start", () => {
        expect(parseLevel(levelData).playerStarts).toEqual([[0.5, 0.5, 0]]);
    });

    test("should reject a level without player starts", () => {
        expect(() => parseLevel({ ...levelData, playerStarts: [] })).toThrow("Level: needs at least one player start");
    });

    test("should load the bundled level", async () => {
        const level = parseLevel(await new JsonResourceLoader().load("levels/arena.json"));

        expect(level.name).toBe("Test Arena");
        expect(level.playerStarts).toHaveLength(5);
    });
});

describe("arena states", () => {
    let loopback: InProcessNetwork;
    let host: NetworkManager<ArenaMessage>;
    let remote: NetworkManager<ArenaMessage>;

    beforeEach(async () => {
        loopback = new InProcessNetwork();
        const createTransport = () => new InProcessTransport(loopback);
        host = await NetworkManager.create<ArenaMessage>({
            role: NetRole.SERVER,
            registry: createArenaRegistry(),
            createTransport,
        });
        remote = await NetworkManager.create<ArenaMessage>({
            role: NetRole.CLIENT,
            registry: createArenaRegistry(),
            createTransport,
        });
        host.update();
    });

    afterEach(async () => {
        await remote.close();
        await host.close();
        vi.restoreAllMocks();
    });

    describe("MainServer", () => {
        test("should register a player on its first input and broadcast its state", () => {
            const server = new MainServer(host, NetRole.SERVER);
            server.start({ level: levelData });
            expect([...server.players.keys()]).toEqual([BOT_ID_START]);

            remote.send(PlayerInputMsg.create({ moveDir: [1, 0], aimPos: [0, 0, 0], actions: [] }));
            server.handleMessages(host.getMessages());

            expect(remote.getMessages()).toEqual([
                { kind: "PlayerActionMsg", playerId: 0, action: PlayerAction.REGISTER, connectionId: 0 },
            ]);

            server.update(0.5);

            const updates = remote.getMessages();
            expect(updates.map((msg) => msg.kind)).toEqual(["PlayerUpdateMsg", "PlayerUpdateMsg"]);
            expect(updates[1]).toEqual({
                kind: "PlayerUpdateMsg",
                playerId: 0,
                position: [0.5, 0.5, 0],
                hpr: [-45, 0, 0],
                alive: true,
                connectionId: 0,
            });
        });

        test("should announce a removed player", () => {
            const server = new MainServer(host, NetRole.SERVER);
            server.start({ level: levelData });
            remote.send(PlayerInputMsg.create({ moveDir: [0, 0], aimPos: [0, 0, 0], actions: [] }));
            server.handleMessages(host.getMessages());
            remote.getMessages();

            server.handleDisconnect(0);

            expect(server.players.has(0)).toBe(false);
            expect(remote.getMessages()).toEqual([
                { kind: "PlayerActionMsg", playerId: 0, action: PlayerAction.REMOVE, connectionId: 0 },
            ]);
        });
    });

    describe("MainClient", () => {
        const startClient = () => {
            const client = new MainClient(remote, NetRole.CLIENT);
            client.autopilot = null;
            client.start({
                level: levelData,
                player: { name: "Skeleton", radius: 0.5 },
                animations: { idle: "Idle", move: "Run" },
            });
            return client;
        };

        test("should mirror registration, updates and shots", () => {
            const client = startClient();

            client.handleMessages([
                PlayerActionMsg.create({ playerId: 3, action: PlayerAction.REGISTER }),
                PlayerUpdateMsg.create({ playerId: 3, position: [1, 2, 0], hpr: [0, 0, 0], alive: true }),
                PlayerUpdateMsg.create({ playerId: 3, position: [3, 2, 0], hpr: [90, 0, 0], alive: true }),
                PlayerActionMsg.create({ playerId: 3, action: PlayerAction.FIRE }),
            ]);

            expect(client.playerId).toBe(3);
            expect(client.players.get(3)).toEqual({ position: [3, 2, 0], hpr: [90, 0, 0], alive: true, animation: "Run" });
            expect(client.projectiles).toEqual([{ playerId: 3, origin: [3, 2, 0], age: 0 }]);

            client.handleMessages([PlayerActionMsg.create({ playerId: 3, action: PlayerAction.REMOVE })]);
            expect(client.players.has(3)).toBe(false);
        });

        test("should send its input every update and clear the actions", () => {
            const client = startClient();
            client.input.moveDir = [0, 1];
            client.input.fire();

            client.update(0.1);
            client.update(0.1);

            const inputs = host.getMessages();
            expect(inputs).toEqual([
                { kind: "PlayerInputMsg", moveDir: [0, 1], aimPos: [0, 0, 0], actions: ["fire"], connectionId: 0 },
                { kind: "PlayerInputMsg", moveDir: [0, 1], aimPos: [0, 0, 0], actions: [], connectionId: 0 },
            ]);
        });

        test("should expire projectiles after their lifetime", () => {
            const client = startClient();
            client.handleMessages([PlayerActionMsg.create({ playerId: 3, action: PlayerAction.FIRE })]);

            client.update(0.5);
            expect(client.projectiles).toHaveLength(1);
            client.update(0.6);
            expect(client.projectiles).toEqual([]);
        });
    });
});

describe("launchArena", () => {
    let arena: Arena | null = null;

    afterEach(async () => {
        await arena?.stop();
        arena = null;
    });

    test("should register the local player in a dual process", async () => {
        const loopback = new InProcessNetwork();
        arena = await launchArena(
            { role: NetRole.DUAL, host: "localhost", port: 0 },
            { createTransport: (_role, config) => new InProcessTransport(loopback, config) }
        );
        const { states } = arena;

        await vi.waitFor(
            () => {
                const client = states.client?.currentState;
                expect(states.client?.phase).toBe(TransitionPhase.ACTIVE);
                expect(client).toBeInstanceOf(MainClient);
                if (!(client instanceof MainClient)) return;
                expect(client.playerId).toBe(0);
                expect(client.players.has(0)).toBe(true);
                expect(client.players.has(BOT_ID_START)).toBe(true);
            },
            { timeout: 4000, interval: 20 }
        );
    });
});
