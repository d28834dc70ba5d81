import type { FadePresenter } from "./game-state";

export interface TimedFadePresenterOptions {
    /** Fade length in seconds when none is given (default: 0.5) */
    duration?: number;

    /** Clock in milliseconds (default: performance.now) */
    now?: () => number;

    /** Called whenever a fade starts, e.g. to drive a shader or overlay */
    onFade?: (direction: "out" | "in", duration: number) => void;
}

/**
 * FadePresenter that only keeps time: a fade lasts `duration` seconds
 * and `isFading()` is true until it has elapsed.
 *
 * Useful for headless peers and as a base for presenters that draw.
 */
export class TimedFadePresenter implements FadePresenter {
    private readonly duration: number;
    private readonly now: () => number;
    private readonly onFade?: (direction: "out" | "in", duration: number) => void;
    private endsAt = 0;

    constructor(options: TimedFadePresenterOptions = {}) {
        this.duration = options.duration ?? 0.5;
        this.now = options.now ?? (() => performance.now());
        this.onFade = options.onFade;
    }

    fadeOut(duration = this.duration): void {
        this.begin("out", duration);
    }

    fadeIn(duration = this.duration): void {
        this.begin("in", duration);
    }

    isFading(): boolean {
        return this.now() < this.endsAt;
    }

    private begin(direction: "out" | "in", duration: number): void {
        this.endsAt = this.now() + Math.max(0, duration) * 1000;
        this.onFade?.(direction, duration);
    }
}
