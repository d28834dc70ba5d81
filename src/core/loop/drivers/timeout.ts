import type { LoopDriver } from "../loop";

/** Default ticks per second for the host loop */
export const DEFAULT_TICK_RATE = 60;

export interface TimeoutDriverOptions {
    /** Target ticks per second (default 60) */
    tickRate?: number;
}

/**
 * Host loop driver using setTimeout at a target tick rate.
 *
 * Each tick is scheduled relative to when the previous one should have run,
 * so the average rate holds even when a tick overruns. The loop yields to the
 * event loop between ticks, which lets socket I/O fill the transport queues
 * that the next tick polls.
 *
 * Delta time is calculated between iterations and passed to the update callback in seconds.
 *
 * @example
 * ```typescript
 * const driver = new TimeoutDriver((dt) => states.update(dt), { tickRate: 30 });
 * driver.start();
 * ```
 */
export class TimeoutDriver implements LoopDriver {
    readonly interval: number;

    private last = performance.now();
    private next = 0;
    private running = false;
    private handle: NodeJS.Timeout | null = null;

    /**
     * @param update - Callback invoked each tick with delta time in seconds
     */
    constructor(public update: (dt: number) => void, options: TimeoutDriverOptions = {}) {
        const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
        if (!(tickRate > 0)) {
            throw new RangeError(`Tick rate must be positive, got ${tickRate}`);
        }
        this.interval = 1000 / tickRate;
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Starts the loop. The first tick runs synchronously.
     *
     * Resets timing to prevent large initial delta.
     */
    start() {
        if (this.running) return;
        this.running = true;
        this.last = performance.now();
        this.next = this.last;
        this.loop();
    }

    /**
     * Stops the loop and cancels the pending tick.
     */
    stop() {
        this.running = false;
        if (this.handle !== null) {
            clearTimeout(this.handle);
            this.handle = null;
        }
    }

    loop = () => {
        this.handle = null;
        if (!this.running) return;

        const now = performance.now();
        const dt = (now - this.last) / 1000;
        this.last = now;

        this.update(dt);
        if (!this.running) return;

        // Skip missed ticks instead of bursting to catch up
        this.next = Math.max(this.next + this.interval, performance.now());
        this.handle = setTimeout(this.loop, Math.max(0, this.next - performance.now()));
    };
}
