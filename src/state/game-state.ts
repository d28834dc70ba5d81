import type { AnyMessage } from "../protocol/message/define-message";

/** Resource name → path, declared by a state and loaded before it starts */
export type ResourceManifest = Record<string, string>;

/** Resource name → loaded resource */
export type LoadedResources<R> = Record<string, R>;

/**
 * Contract every game state implements.
 *
 * The manager constructs the state, loads the `resources` manifest its
 * class declares, calls `start` once with the loaded resources, then
 * `update` every tick until the state is replaced and `cleanup` runs.
 *
 * @template M Message union the state receives through handleMessages
 * @template R Type of a loaded resource
 */
export interface GameState<M extends AnyMessage = AnyMessage, R = unknown> {
    /** Called once, after every resource has loaded */
    start(resources: LoadedResources<R>): void;

    /** Called every tick once the state is fully loaded */
    update(dt: number): void;

    /** Called when the state is replaced */
    cleanup(): void;

    /** Receives the messages drained for this state's role each tick */
    handleMessages?(messages: M[]): void;

    /** Called when a connection on this state's transport closes */
    handleDisconnect?(connectionId: number): void;
}

/**
 * A state class. Its static `resources` manifest is loaded before `start`.
 *
 * @example
 * ```ts
 * class MatchState implements GameState {
 *     static readonly resources = { level: "levels/arena.json" };
 *     // ...
 * }
 * ```
 */
export interface GameStateConstructor<TArgs extends unknown[], M extends AnyMessage, R> {
    new (...args: TArgs): GameState<M, R>;

    /** Resources to load before start */
    readonly resources?: ResourceManifest;
}

/** State name → constructor */
export type StateMap<TArgs extends unknown[], M extends AnyMessage, R> = Record<
    string,
    GameStateConstructor<TArgs, M, R>
>;

/**
 * Screen fade collaborator. Transitions fade out before loading and fade in
 * after start, waiting while `isFading()` is true.
 */
export interface FadePresenter {
    fadeOut(duration?: number): void;
    fadeIn(duration?: number): void;
    isFading(): boolean;
}

/**
 * Loads one resource by path
 */
export interface ResourceLoader<R> {
    load(path: string): Promise<R>;
}

/**
 * Phases of a state transition, in order.
 * FAILED is terminal until the next change().
 */
export enum TransitionPhase {
    IDLE = "idle",
    FADING_OUT = "fading-out",
    LOADING = "loading",
    STARTING = "starting",
    FADING_IN = "fading-in",
    ACTIVE = "active",
    FAILED = "failed",
}
