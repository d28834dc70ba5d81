import {
    NetRole,
    createMessageDispatcher,
    type GameState,
    type LoadedResources,
    type NetworkManager,
    type TransportRole,
    type Vec2,
    type Vec3,
} from "../../src";
import { AiController } from "./controllers";
import {
    parseAnimations,
    parseCharacter,
    parseLevel,
    type AnimationSet,
    type CharacterModel,
    type Level,
} from "./resources";
import {
    DEBUG,
    PROJECTILE_LIFETIME,
    PlayerAction,
    PlayerInputMsg,
    log,
    type ArenaMessage,
    type PlayerActionMsg,
    type PlayerUpdateMsg,
} from "./shared";

export interface RemotePlayer {
    position: Vec3;
    hpr: Vec3;
    alive: boolean;
    animation: string;
}

export interface Projectile {
    playerId: number;
    origin: Vec3;
    age: number;
}

/**
 * Input gathered between two client ticks
 */
export class PlayerInput {
    moveDir: Vec2 = [0, 0];
    aimPos: Vec3 = [0, 0, 0];
    readonly actions = new Set<string>();

    fire(): void {
        this.actions.add("fire");
    }
}

/**
 * Headless arena client: mirrors the server's players and sends its input
 * every tick. Without a keyboard it steers with an AiController.
 */
export class MainClient implements GameState<ArenaMessage> {
    static readonly resources = {
        level: "levels/arena.json",
        player: "characters/skeleton.json",
        animations: "animations/animations.json",
    };

    playerId: number | null = null;
    readonly players = new Map<number, RemotePlayer>();
    readonly projectiles: Projectile[] = [];
    readonly input = new PlayerInput();
    autopilot: AiController | null = new AiController(-1);

    level: Level | null = null;
    character: CharacterModel | null = null;
    private animations: AnimationSet = { idle: "idle", move: "move" };

    private dispatch = createMessageDispatcher<ArenaMessage>(
        {
            PlayerActionMsg: (msg) => this.applyAction(msg),
            PlayerUpdateMsg: (msg) => this.applyUpdate(msg),
            PlayerInputMsg: (msg) => log("MainClient", `Ignored ${msg.kind} from ${msg.connectionId}`),
        },
        { debug: DEBUG }
    );

    constructor(
        private readonly network: NetworkManager<ArenaMessage>,
        private readonly role: TransportRole
    ) {}

    start(resources: LoadedResources<unknown>): void {
        this.level = parseLevel(resources.level);
        this.character = parseCharacter(resources.player);
        this.animations = parseAnimations(resources.animations);
        log("MainClient", `Loaded level "${this.level.name}" on ${NetRole[this.role]}`);
    }

    handleMessages(messages: ArenaMessage[]): void {
        this.dispatch(messages);
    }

    update(dt: number): void {
        if (this.autopilot?.update(dt)) {
            this.input.moveDir = this.autopilot.moveDir;
            this.input.aimPos = this.autopilot.aimPos;
        }

        for (const projectile of this.projectiles) {
            projectile.age += dt;
        }
        const live = this.projectiles.filter((projectile) => projectile.age < PROJECTILE_LIFETIME);
        this.projectiles.splice(0, this.projectiles.length, ...live);

        this.network.send(
            PlayerInputMsg.create({
                moveDir: this.input.moveDir,
                aimPos: this.input.aimPos,
                actions: [...this.input.actions],
            }),
            NetRole.CLIENT
        );
        this.input.actions.clear();
    }

    cleanup(): void {
        this.players.clear();
        this.projectiles.length = 0;
    }

    private applyAction(msg: PlayerActionMsg): void {
        switch (msg.action) {
            case PlayerAction.REGISTER:
                this.playerId = msg.playerId;
                log("MainClient", `Registered as player ${msg.playerId}`);
                break;
            case PlayerAction.REMOVE:
                this.players.delete(msg.playerId);
                break;
            case PlayerAction.FIRE: {
                const shooter = this.players.get(msg.playerId);
                this.projectiles.push({
                    playerId: msg.playerId,
                    origin: shooter ? shooter.position : [0, 0, 0],
                    age: 0,
                });
                break;
            }
        }
    }

    private applyUpdate(msg: PlayerUpdateMsg): void {
        const previous = this.players.get(msg.playerId);
        const moved = previous ? distanceSquared(previous.position, msg.position) > 0.01 : false;

        this.players.set(msg.playerId, {
            position: msg.position,
            hpr: msg.hpr,
            alive: msg.alive,
            animation: moved ? this.animations.move : this.animations.idle,
        });
    }
}

function distanceSquared(a: Vec3, b: Vec3): number {
    return (a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2 + (a[2] - b[2]) ** 2;
}
