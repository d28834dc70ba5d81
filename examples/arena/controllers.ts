import type { Vec2, Vec3 } from "../../src";
import { AI_THINK_INTERVAL, MAX_HEALTH, PLAYER_SPEED } from "./shared";

export function normalize2([x, y]: Vec2): Vec2 {
    const length = Math.hypot(x, y);
    return length > 0 ? [x / length, y / length] : [0, 0];
}

export function normalize3([x, y, z]: Vec3): Vec3 {
    const length = Math.hypot(x, y, z);
    return length > 0 ? [x / length, y / length, z / length] : [0, 0, 0];
}

/**
 * Server-side avatar: position, heading and health of one player or bot.
 */
export class PlayerController {
    speed = PLAYER_SPEED;
    maxHealth = MAX_HEALTH;
    health = MAX_HEALTH;
    alive = false;
    position: Vec3 = [0, 0, 0];
    heading = 0;
    moveDir: Vec2 = [0, 0];
    aimPos: Vec3 = [0, 0, 0];

    constructor(readonly playerId: number) {}

    get hpr(): Vec3 {
        return [this.heading, 0, 0];
    }

    spawn(at: Vec3): void {
        this.position = [at[0], at[1], at[2]];
        this.health = this.maxHealth;
        this.alive = true;
    }

    kill(): void {
        this.alive = false;
    }

    updateMoveAim(moveDir: Vec2, aimPos: Vec3): void {
        if (!this.alive) return;

        this.moveDir = moveDir;
        this.aimPos = aimPos;
    }

    update(dt: number): void {
        if (this.health <= 0 && this.alive) {
            this.kill();
        }
        if (!this.alive) return;

        const [dx, dy] = normalize2(this.moveDir);
        const [x, y, z] = this.position;
        this.position = [x + dx * dt * this.speed, y + dy * dt * this.speed, z];

        // Heading in degrees, 0 facing +Y; models face -Y so turn them around
        const ax = this.aimPos[0] - this.position[0];
        const ay = this.aimPos[1] - this.position[1];
        this.heading = (Math.atan2(-ax, ay) * 180) / Math.PI - 180;
    }
}

/**
 * Random wandering for bots and the headless client.
 * Picks a new move direction and aim every AI_THINK_INTERVAL seconds.
 */
export class AiController {
    moveDir: Vec2 = [0, 0];
    aimPos: Vec3 = [0, 0, 0];

    private accum = 0;

    constructor(
        readonly playerId: number,
        private readonly random: () => number = Math.random
    ) {}

    /**
     * @returns true when a new direction was picked this update
     */
    update(dt: number): boolean {
        this.accum += dt;
        if (this.accum <= AI_THINK_INTERVAL) return false;

        const spread = () => this.random() * 2 - 1;
        if (this.random() > 0.5) {
            this.moveDir = normalize2([spread(), spread()]);
        } else {
            this.moveDir = [0, 0];
        }
        this.aimPos = normalize3([spread(), spread(), spread()]);
        this.accum = 0;
        return true;
    }
}
