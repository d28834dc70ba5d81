import { UnknownStateError } from "../core/errors";
import type { Unsubscribe } from "../core/events/event-system";
import type { AnyMessage } from "../protocol/message/define-message";
import type { NetworkManager, TransportRole } from "../net/network-manager";
import { NetRole, hasRole, type ConnectionEvent } from "../net/types";
import type { FadePresenter, ResourceLoader, StateMap } from "./game-state";
import { GameStateManager } from "./game-state-manager";

/** Arguments every networked state is constructed with */
export type NetworkStateArgs<M extends AnyMessage> = [network: NetworkManager<M>, role: TransportRole];

export type NetworkStateMap<M extends AnyMessage, R = unknown> = StateMap<NetworkStateArgs<M>, M, R>;

export interface NetworkGameStateManagerOptions<M extends AnyMessage, R> {
    /** States run by the client side (required when the network runs a client) */
    clientStates?: NetworkStateMap<M, R>;

    /** States run by the server side (required when the network runs a server) */
    serverStates?: NetworkStateMap<M, R>;

    /** Fade collaborator for the client side; the server never fades */
    presenter?: FadePresenter;

    /** Resource loader shared by both sides */
    loader?: ResourceLoader<R>;

    /** Enable debug logging */
    debug?: boolean;
}

/**
 * Pairs a client state machine and a server state machine over one
 * NetworkManager, driven by a single `update()`.
 *
 * Which machines exist follows the network's role: CLIENT runs the client
 * machine, SERVER the server machine, DUAL both. Every state is constructed
 * with the network and the role it plays.
 *
 * @example
 * ```ts
 * const network = await NetworkManager.create<GameMessage>({ role: NetRole.DUAL });
 * const states = new NetworkGameStateManager(network, {
 *     clientStates: { Main: MainClient },
 *     serverStates: { Main: MainServer },
 * });
 *
 * states.change("Main");
 * loop.onTick((dt) => states.update(dt));
 * ```
 */
export class NetworkGameStateManager<M extends AnyMessage = AnyMessage, R = unknown> {
    readonly client: GameStateManager<NetworkStateArgs<M>, M, R> | null = null;
    readonly server: GameStateManager<NetworkStateArgs<M>, M, R> | null = null;

    private debug: boolean;
    private unsubscribe: Unsubscribe;

    constructor(
        readonly network: NetworkManager<M>,
        options: NetworkGameStateManagerOptions<M, R> = {}
    ) {
        this.debug = options.debug ?? false;

        if (hasRole(network.role, NetRole.CLIENT)) {
            this.client = new GameStateManager<NetworkStateArgs<M>, M, R>(options.clientStates ?? {}, {
                presenter: options.presenter,
                loader: options.loader,
                debug: this.debug,
                label: "ClientStates",
            });
        }

        if (hasRole(network.role, NetRole.SERVER)) {
            this.server = new GameStateManager<NetworkStateArgs<M>, M, R>(options.serverStates ?? {}, {
                loader: options.loader,
                debug: this.debug,
                label: "ServerStates",
            });
        }

        this.unsubscribe = network.onDisconnection((event) => this.routeDisconnect(event));
    }

    /**
     * Switches every machine to the named state. Each machine must know the
     * name; nothing changes if one does not.
     *
     * @throws UnknownStateError if a machine has no state under `name`
     */
    change(name: string): void {
        for (const [, machine] of this.machines()) {
            if (!machine.has(name)) {
                throw new UnknownStateError(name);
            }
        }

        for (const [role, machine] of this.machines()) {
            machine.change(name, this.network, role);
        }
    }

    /**
     * Switches every machine back to its previous state.
     */
    changeToPrevious(): void {
        for (const [, machine] of this.machines()) {
            machine.changeToPrevious();
        }
    }

    /**
     * One tick: polls the network, then for the client and then the server
     * hands the state its messages and updates the machine.
     *
     * Messages for a side whose state is still loading stay queued on the
     * transport until it is ACTIVE.
     */
    update(dt: number): void {
        this.network.update();

        for (const [role, machine] of this.machines()) {
            this.handleMessages(role, machine);
            machine.update(dt);
        }
    }

    /** True once every machine is ACTIVE */
    get loadComplete(): boolean {
        for (const [, machine] of this.machines()) {
            if (!machine.loadComplete) return false;
        }
        return true;
    }

    /**
     * Stops routing disconnects. The network is left open.
     */
    dispose(): void {
        this.unsubscribe();
    }

    private *machines(): Generator<[TransportRole, GameStateManager<NetworkStateArgs<M>, M, R>]> {
        if (this.client) yield [NetRole.CLIENT, this.client];
        if (this.server) yield [NetRole.SERVER, this.server];
    }

    private handleMessages(role: TransportRole, machine: GameStateManager<NetworkStateArgs<M>, M, R>): void {
        const state = machine.currentState;
        if (!state || !machine.loadComplete) return;

        if (!state.handleMessages) {
            this.log(`"${machine.currentStateName}" on ${NetRole[role]} has no handleMessages`);
            return;
        }

        state.handleMessages(this.network.getMessages(role));
    }

    private routeDisconnect({ connectionId, role }: ConnectionEvent): void {
        const machine = role === NetRole.CLIENT ? this.client : this.server;
        if (!machine?.loadComplete) return;

        machine.currentState?.handleDisconnect?.(connectionId);
    }

    private log(message: string): void {
        if (this.debug) {
            console.log(`[NetworkGameStateManager] ${message}`);
        }
    }
}
