import {
    ConfigurationError,
    DEFAULT_HOST,
    DEFAULT_PORT,
    NetRole,
    NetworkGameStateManager,
    NetworkManager,
    TimeoutDriver,
    TimedFadePresenter,
    type NetworkManagerOptions,
} from "../../src";
import { MainClient } from "./client-state";
import { JsonResourceLoader } from "./resources";
import { MainServer } from "./server-state";
import { TICK_RATE, createArenaRegistry, type ArenaMessage } from "./shared";

export const USAGE = "Usage: arena [dual [port] | host [port] | join [host] [port]]";

export interface LaunchOptions {
    role: NetRole;
    host: string;
    port: number;
}

export interface Arena {
    network: NetworkManager<ArenaMessage>;
    states: NetworkGameStateManager<ArenaMessage, unknown>;
    stop(): Promise<void>;
}

function parsePort(value: string | undefined): number {
    if (value === undefined) return DEFAULT_PORT;

    const port = Number(value);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigurationError(`Invalid port "${value}". ${USAGE}`);
    }
    return port;
}

/**
 * `join [host] [port]` runs a client, `host [port]` a dedicated server,
 * and `dual [port]` (or nothing) a client and server in one process.
 */
export function parseLaunchArgs(argv: string[]): LaunchOptions {
    const [command, ...rest] = argv;

    switch (command) {
        case "join":
            return { role: NetRole.CLIENT, host: rest[0] ?? DEFAULT_HOST, port: parsePort(rest[1]) };
        case "host":
            return { role: NetRole.SERVER, host: DEFAULT_HOST, port: parsePort(rest[0]) };
        case undefined:
        case "dual":
            return { role: NetRole.DUAL, host: DEFAULT_HOST, port: parsePort(rest[0]) };
        default:
            throw new ConfigurationError(`Unknown command "${command}". ${USAGE}`);
    }
}

/**
 * Starts the network, the state machines and the tick loop.
 */
export async function launchArena(
    options: LaunchOptions,
    {
        debug = false,
        createTransport,
    }: { debug?: boolean; createTransport?: NetworkManagerOptions<ArenaMessage>["createTransport"] } = {}
): Promise<Arena> {
    const network = await NetworkManager.create<ArenaMessage>({
        ...options,
        registry: createArenaRegistry(true),
        createTransport,
        config: { debug, verifyRegistry: true },
    });

    const states = new NetworkGameStateManager<ArenaMessage, unknown>(network, {
        clientStates: { Main: MainClient },
        serverStates: { Main: MainServer },
        loader: new JsonResourceLoader(),
        presenter: new TimedFadePresenter({
            duration: 0.25,
            onFade: (direction, duration) => {
                if (debug) console.log(`[Arena] Fade ${direction} (${duration}s)`);
            },
        }),
        debug,
    });
    states.change("Main");

    const driver = new TimeoutDriver((dt) => states.update(dt), { tickRate: TICK_RATE });
    driver.start();

    return {
        network,
        states,
        async stop() {
            driver.stop();
            states.dispose();
            await network.close();
        },
    };
}
