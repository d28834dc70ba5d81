import { ImmediateDriver, TimeoutDriver } from "./drivers";

/**
 * Interface for loop drivers that tick the host.
 * Each tick the host calls `NetworkGameStateManager.update(dt)`, which polls
 * the network and advances the state machines.
 */
export interface LoopDriver {
    /** Starts the loop */
    start(): void;
    /** Stops the loop */
    stop(): void;
    /** Internal loop iteration method */
    loop(): void;
    /** Update callback invoked each tick with delta time in seconds */
    update(dt: number): void;
    /** True between start() and stop() */
    readonly isRunning: boolean;
}

/**
 * Type of driver to use for the loop.
 * - `'timeout'`: setTimeout at a fixed tick rate (default)
 * - `'immediate'`: setImmediate, runs as fast as possible
 */
export type DriverType = 'timeout' | 'immediate';

/**
 * Factory function to create a loop driver.
 *
 * @param type - Scheduling strategy
 * @param update - Callback function invoked each tick with delta time in seconds
 * @param tickRate - Target ticks per second for the timeout driver
 *
 * @example
 * ```typescript
 * const driver = createDriver('timeout', (dt) => states.update(dt), 30);
 * driver.start();
 * ```
 */
export function createDriver(type: DriverType, update: (dt: number) => void, tickRate?: number): LoopDriver {
    if (type === 'immediate') {
        return new ImmediateDriver(update);
    }
    return new TimeoutDriver(update, { tickRate });
}
