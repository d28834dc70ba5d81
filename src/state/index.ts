export { TransitionPhase } from "./game-state";
export type {
    FadePresenter,
    GameState,
    GameStateConstructor,
    LoadedResources,
    ResourceLoader,
    ResourceManifest,
    StateMap,
} from "./game-state";
export { GameStateManager } from "./game-state-manager";
export type { GameStateEvents, GameStateManagerOptions } from "./game-state-manager";
export { NetworkGameStateManager } from "./network-game-state-manager";
export type {
    NetworkGameStateManagerOptions,
    NetworkStateArgs,
    NetworkStateMap,
} from "./network-game-state-manager";
export { TimedFadePresenter } from "./timed-fade-presenter";
export type { TimedFadePresenterOptions } from "./timed-fade-presenter";
