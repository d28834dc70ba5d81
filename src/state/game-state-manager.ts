import { EventSystem } from "../core/events/event-system";
import { ConfigurationError, UnknownStateError } from "../core/errors";
import type { AnyMessage } from "../protocol/message/define-message";
import {
    TransitionPhase,
    type FadePresenter,
    type GameState,
    type LoadedResources,
    type ResourceLoader,
    type ResourceManifest,
    type StateMap,
} from "./game-state";

export type GameStateEvents = {
    transition: { name: string; phase: TransitionPhase };
    error: { name: string; error: Error };
};

export interface GameStateManagerOptions<R> {
    /** Fade collaborator; fade phases pass straight through without one */
    presenter?: FadePresenter;

    /** Required as soon as a state declares resources */
    loader?: ResourceLoader<R>;

    /** Enable debug logging */
    debug?: boolean;

    /** Prefix for log lines (default: "GameStateManager") */
    label?: string;
}

interface PendingChange<TArgs> {
    name: string;
    args: TArgs;
}

const TRANSITIONING = new Set<TransitionPhase>([
    TransitionPhase.FADING_OUT,
    TransitionPhase.LOADING,
    TransitionPhase.STARTING,
    TransitionPhase.FADING_IN,
]);

/**
 * Runs one active game state at a time and walks every change through
 * fade out, resource loading, start and fade in.
 *
 * Each `update()` advances the transition as far as it can without waiting
 * on the presenter or on pending loads, then updates the current state
 * once it is ACTIVE.
 *
 * @template TArgs Constructor arguments every state takes
 * @template M Message union the states handle
 * @template R Loaded resource type
 *
 * @example
 * ```ts
 * const states = new GameStateManager({ Menu: MenuState, Match: MatchState }, { loader, presenter });
 * states.events.on("transition", ({ name, phase }) => console.log(name, phase));
 *
 * states.change("Menu");
 * loop.onTick((dt) => states.update(dt));
 * ```
 */
export class GameStateManager<TArgs extends unknown[] = [], M extends AnyMessage = AnyMessage, R = unknown> {
    readonly events = new EventSystem<GameStateEvents>({ events: ["transition", "error"] });

    private state: GameState<M, R> | null = null;
    private stateName = "";
    private previousName = "";
    private currentPhase = TransitionPhase.IDLE;
    private loaded: LoadedResources<R> | null = null;
    private generation = 0;
    private pending: PendingChange<TArgs>[] = [];
    private lastArgs = new Map<string, TArgs>();

    private presenter?: FadePresenter;
    private loader?: ResourceLoader<R>;
    private debug: boolean;
    private label: string;

    constructor(
        private readonly states: StateMap<TArgs, M, R>,
        options: GameStateManagerOptions<R> = {}
    ) {
        this.presenter = options.presenter;
        this.loader = options.loader;
        this.debug = options.debug ?? false;
        this.label = options.label ?? "GameStateManager";
    }

    get currentState(): GameState<M, R> | null {
        return this.state;
    }

    get currentStateName(): string {
        return this.stateName;
    }

    get previousStateName(): string {
        return this.previousName;
    }

    get phase(): TransitionPhase {
        return this.currentPhase;
    }

    /** True once the current state has started and faded in */
    get loadComplete(): boolean {
        return this.currentPhase === TransitionPhase.ACTIVE;
    }

    /** True while a transition is under way */
    get isTransitioning(): boolean {
        return TRANSITIONING.has(this.currentPhase);
    }

    has(name: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.states, name);
    }

    /**
     * Switches to the named state.
     *
     * A change requested while another transition is running is queued and
     * starts once that transition ends. The name and loader checks run first, so a
     * rejected change leaves the current state and the queue untouched.
     *
     * @throws UnknownStateError if no state is registered under `name`
     * @throws ConfigurationError if the state declares resources and no loader is configured
     */
    change(name: string, ...args: TArgs): void {
        if (!this.has(name)) {
            throw new UnknownStateError(name);
        }
        if (Object.keys(this.manifestOf(name)).length > 0 && !this.loader) {
            throw new ConfigurationError(`State "${name}" declares resources but no resource loader is configured`);
        }

        if (this.isTransitioning) {
            this.pending.push({ name, args });
            this.log(`Queued change to "${name}" (${this.pending.length} pending)`);
            return;
        }

        this.begin(name, args);
    }

    /**
     * Switches back to the previous state with the arguments it was last
     * constructed with.
     *
     * @throws UnknownStateError if there has been no transition yet
     */
    changeToPrevious(): void {
        const args = this.lastArgs.get(this.previousName);
        if (args === undefined) {
            throw new UnknownStateError(this.previousName, "No previous state to change to");
        }
        this.change(this.previousName, ...args);
    }

    /**
     * Advances the running transition, then updates the current state if it
     * is fully loaded.
     */
    update(dt: number): void {
        this.advance();

        if (this.state && this.loadComplete) {
            this.state.update(dt);
        }
    }

    private begin(name: string, args: TArgs): void {
        const firstTransition = this.state === null;

        if (firstTransition) {
            this.previousName = name;
        } else {
            this.previousName = this.stateName;
            this.state?.cleanup();
        }

        const StateClass = this.states[name];
        this.state = new StateClass(...args);
        this.stateName = name;
        this.lastArgs.set(name, args);
        this.loaded = null;
        this.generation++;

        this.log(`Changing to "${name}" (previous: "${this.previousName}")`);
        this.presenter?.fadeOut(firstTransition ? 0 : undefined);
        this.setPhase(TransitionPhase.FADING_OUT);
    }

    private advance(): void {
        let phase: TransitionPhase;
        do {
            phase = this.currentPhase;
            this.step();
        } while (phase !== this.currentPhase && this.isTransitioning);

        if (!this.isTransitioning) {
            const next = this.pending.shift();
            if (next) {
                this.begin(next.name, next.args);
            }
        }
    }

    private step(): void {
        switch (this.currentPhase) {
            case TransitionPhase.FADING_OUT:
                if (this.presenter?.isFading()) return;
                this.startLoading();
                return;

            case TransitionPhase.LOADING:
                if (this.loaded === null) return;
                this.setPhase(TransitionPhase.STARTING);
                return;

            case TransitionPhase.STARTING: {
                const resources = this.loaded ?? {};
                this.state?.start(resources);
                this.presenter?.fadeIn();
                this.setPhase(TransitionPhase.FADING_IN);
                return;
            }

            case TransitionPhase.FADING_IN:
                if (this.presenter?.isFading()) return;
                this.setPhase(TransitionPhase.ACTIVE);
                return;

            default:
                return;
        }
    }

    private startLoading(): void {
        const name = this.stateName;
        const generation = this.generation;
        const entries = Object.entries(this.manifestOf(name));

        this.setPhase(TransitionPhase.LOADING);

        const loader = this.loader;
        if (entries.length === 0 || !loader) {
            this.loaded = {};
            return;
        }

        this.log(`Loading ${entries.length} resource(s) for "${name}"`);
        void Promise.all(
            entries.map(async ([key, path]): Promise<[string, R]> => [key, await loader.load(path)])
        ).then(
            (pairs) => {
                if (generation !== this.generation) return;
                this.loaded = Object.fromEntries(pairs);
            },
            (error: unknown) => {
                if (generation !== this.generation) return;
                this.fail(name, error instanceof Error ? error : new Error(String(error)));
            }
        );
    }

    private manifestOf(name: string): ResourceManifest {
        return this.states[name]?.resources ?? {};
    }

    private fail(name: string, error: Error): void {
        console.error(`[${this.label}] Failed to load resources for "${name}": ${error.message}`);
        this.setPhase(TransitionPhase.FAILED);
        this.events.emit("error", { name, error });
    }

    private setPhase(phase: TransitionPhase): void {
        this.currentPhase = phase;
        this.log(`"${this.stateName}" -> ${phase}`);
        this.events.emit("transition", { name: this.stateName, phase });
    }

    private log(message: string): void {
        if (this.debug) {
            console.log(`[${this.label}] ${message}`);
        }
    }
}
