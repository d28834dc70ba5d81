import { BinaryCodec, MessageRegistry, defineMessage, type InferMessage } from "../../src";

// Game constants
export const TICK_RATE = 30;
export const PLAYER_SPEED = 20;
export const MAX_HEALTH = 1;
export const NUM_BOTS = 1;
export const BOT_ID_START = 1000;
export const AI_THINK_INTERVAL = 0.25;
export const PROJECTILE_LIFETIME = 1;

export const DEBUG = process.env.HOSTLINK_DEBUG === "1";

export enum PlayerAction {
    REGISTER = 0,
    REMOVE = 1,
    FIRE = 2,
}

export const PlayerInputMsg = defineMessage({
    name: "PlayerInputMsg",
    schema: {
        moveDir: BinaryCodec.vec2h,
        aimPos: BinaryCodec.vec3h,
        actions: BinaryCodec.list(BinaryCodec.string(16), 8),
    },
});

export const PlayerUpdateMsg = defineMessage({
    name: "PlayerUpdateMsg",
    schema: {
        playerId: BinaryCodec.u32,
        position: BinaryCodec.vec3h,
        hpr: BinaryCodec.vec3h,
        alive: BinaryCodec.bool,
    },
});

export const PlayerActionMsg = defineMessage({
    name: "PlayerActionMsg",
    schema: {
        playerId: BinaryCodec.u32,
        action: BinaryCodec.enumOf(PlayerAction),
    },
});

export type PlayerInputMsg = InferMessage<typeof PlayerInputMsg>;
export type PlayerUpdateMsg = InferMessage<typeof PlayerUpdateMsg>;
export type PlayerActionMsg = InferMessage<typeof PlayerActionMsg>;

export type ArenaMessage = PlayerInputMsg | PlayerUpdateMsg | PlayerActionMsg;

// Shared by client and server; registration order defines the wire tags
export function createArenaRegistry(handshake = false): MessageRegistry<ArenaMessage> {
    const registry = new MessageRegistry<ArenaMessage>({ handshake });
    registry.register(PlayerInputMsg, PlayerUpdateMsg, PlayerActionMsg);

    return registry;
}

export function log(scope: string, message: string): void {
    if (DEBUG) {
        console.log(`[${scope}] ${message}`);
    }
}
