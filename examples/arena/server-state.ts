import {
    NetRole,
    createMessageDispatcher,
    type GameState,
    type LoadedResources,
    type NetworkManager,
    type TransportRole,
    type Vec3,
} from "../../src";
import { AiController, PlayerController } from "./controllers";
import { parseLevel, type Level } from "./resources";
import {
    BOT_ID_START,
    DEBUG,
    NUM_BOTS,
    PlayerAction,
    PlayerActionMsg,
    PlayerUpdateMsg,
    log,
    type ArenaMessage,
    type PlayerInputMsg,
} from "./shared";

/**
 * Authoritative arena: owns every player and bot, applies client input and
 * broadcasts one PlayerUpdateMsg per player each tick.
 *
 * Player ids are the server connection ids; bots start at BOT_ID_START.
 */
export class MainServer implements GameState<ArenaMessage> {
    static readonly resources = { level: "levels/arena.json" };

    readonly players = new Map<number, PlayerController>();
    readonly bots = new Map<number, AiController>();
    level: Level | null = null;

    private dispatch = createMessageDispatcher<ArenaMessage>(
        {
            PlayerInputMsg: (msg) => this.applyInput(msg),
            PlayerUpdateMsg: (msg) => log("MainServer", `Ignored ${msg.kind} from ${msg.connectionId}`),
            PlayerActionMsg: (msg) => log("MainServer", `Ignored ${msg.kind} from ${msg.connectionId}`),
        },
        { debug: DEBUG }
    );

    constructor(
        private readonly network: NetworkManager<ArenaMessage>,
        private readonly role: TransportRole
    ) {}

    start(resources: LoadedResources<unknown>): void {
        this.level = parseLevel(resources.level);
        log("MainServer", `Loaded level "${this.level.name}" on ${NetRole[this.role]}`);

        for (let i = 0; i < NUM_BOTS; i++) {
            const botId = BOT_ID_START + i;
            this.addPlayer(botId);
            this.bots.set(botId, new AiController(botId));
        }
    }

    handleMessages(messages: ArenaMessage[]): void {
        this.dispatch(messages);
    }

    handleDisconnect(connectionId: number): void {
        this.removePlayer(connectionId);
    }

    update(dt: number): void {
        for (const [botId, bot] of this.bots) {
            bot.update(dt);
            this.players.get(botId)?.updateMoveAim(bot.moveDir, bot.aimPos);
        }

        for (const [playerId, player] of this.players) {
            if (!player.alive) {
                player.spawn(this.pickStart());
            }
            player.update(dt);

            this.network.send(
                PlayerUpdateMsg.create({
                    playerId,
                    position: player.position,
                    hpr: player.hpr,
                    alive: player.alive,
                }),
                NetRole.SERVER
            );
        }
    }

    cleanup(): void {
        this.players.clear();
        this.bots.clear();
    }

    private addPlayer(playerId: number): PlayerController {
        const player = new PlayerController(playerId);
        this.players.set(playerId, player);

        if (playerId < BOT_ID_START) {
            this.network.send(PlayerActionMsg.create({ playerId, action: PlayerAction.REGISTER }, playerId), NetRole.SERVER);
            log("MainServer", `Registered player ${playerId}`);
        }
        return player;
    }

    private removePlayer(playerId: number): void {
        if (!this.players.delete(playerId)) return;

        this.network.send(PlayerActionMsg.create({ playerId, action: PlayerAction.REMOVE }), NetRole.SERVER);
        log("MainServer", `Removed player ${playerId}`);
    }

    private applyInput(msg: PlayerInputMsg): void {
        const playerId = msg.connectionId;
        if (playerId === undefined) return;

        const player = this.players.get(playerId) ?? this.addPlayer(playerId);
        player.updateMoveAim(msg.moveDir, msg.aimPos);

        if (player.alive && msg.actions.includes("fire")) {
            this.network.send(PlayerActionMsg.create({ playerId, action: PlayerAction.FIRE }), NetRole.SERVER);
        }
    }

    private pickStart(): Vec3 {
        const starts = this.level?.playerStarts ?? [];
        return starts[Math.floor(Math.random() * starts.length)] ?? [0, 0, 0];
    }
}
