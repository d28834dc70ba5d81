import { NetRole } from "../../src";
import { launchArena, parseLaunchArgs } from "./launch";
import { DEBUG } from "./shared";

const options = parseLaunchArgs(process.argv.slice(2));

void launchArena(options, { debug: DEBUG }).then(
    (arena) => {
        const where = options.role === NetRole.CLIENT ? `${options.host}:${options.port}` : `port ${arena.network.listeningPort()}`;
        console.log(`Arena running as ${NetRole[options.role]} on ${where}. Press Ctrl+C to quit.`);

        process.once("SIGINT", () => {
            arena.stop().then(
                () => process.exit(0),
                (error: unknown) => {
                    console.error("Failed to shut down cleanly:", error);
                    process.exit(1);
                }
            );
        });
    },
    (error: unknown) => {
        console.error("Failed to start arena:", error);
        process.exitCode = 1;
    }
);
