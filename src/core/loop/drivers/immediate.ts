import type { LoopDriver } from "../loop";

/**
 * Host loop driver using setImmediate: ticks as fast as the event loop allows.
 * Suited to headless servers and tests; prefer TimeoutDriver when CPU matters.
 */
export class ImmediateDriver implements LoopDriver {
    constructor(public update: (dt: number) => void) { }

    private last = performance.now();
    private running = false;
    private handle: NodeJS.Immediate | null = null;

    get isRunning(): boolean {
        return this.running;
    }

    start() {
        if (this.running) return;
        this.running = true;
        this.last = performance.now();
        this.loop();
    }

    stop() {
        this.running = false;
        if (this.handle !== null) {
            clearImmediate(this.handle);
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
        if (this.running) this.handle = setImmediate(this.loop);
    };
}
