import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { ResourceLoader, Vec2, Vec3 } from "../../src";

export interface Level {
    name: string;
    bounds: { min: Vec2; max: Vec2 };
    playerStarts: Vec3[];
}

export interface CharacterModel {
    name: string;
    radius: number;
}

export interface AnimationSet {
    idle: string;
    move: string;
}

/**
 * Reads JSON resources from a directory, by default the arena's assets/.
 */
export class JsonResourceLoader implements ResourceLoader<unknown> {
    constructor(readonly root: string = fileURLToPath(new URL("./assets/", import.meta.url))) {}

    async load(path: string): Promise<unknown> {
        const text = await readFile(join(this.root, path), "utf8");
        const data: unknown = JSON.parse(text);
        return data;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(data: Record<string, unknown>, key: string, what: string): string {
    const value = data[key];
    if (typeof value !== "string") {
        throw new TypeError(`${what}: "${key}" must be a string`);
    }
    return value;
}

function readNumbers(value: unknown, length: number, what: string): number[] {
    if (!Array.isArray(value) || value.length !== length || !value.every((n) => typeof n === "number")) {
        throw new TypeError(`${what}: expected ${length} numbers`);
    }
    return value.map(Number);
}

function readVec2(value: unknown, what: string): Vec2 {
    const [x, y] = readNumbers(value, 2, what);
    return [x, y];
}

function readVec3(value: unknown, what: string): Vec3 {
    const [x, y, z] = readNumbers(value, 3, what);
    return [x, y, z];
}

export function parseLevel(data: unknown): Level {
    if (!isRecord(data)) {
        throw new TypeError("Level: expected { name, bounds, playerStarts }");
    }
    const { bounds, playerStarts: starts } = data;
    if (!isRecord(bounds) || !Array.isArray(starts)) {
        throw new TypeError("Level: expected { name, bounds, playerStarts }");
    }

    const playerStarts = starts.map((start: unknown, i) => {
        const [x, y] = readVec3(start, `Level player start ${i}`);
        // Ground plane only
        const grounded: Vec3 = [x, y, 0];
        return grounded;
    });
    if (playerStarts.length === 0) {
        throw new TypeError("Level: needs at least one player start");
    }

    return {
        name: readString(data, "name", "Level"),
        bounds: {
            min: readVec2(bounds.min, "Level bounds min"),
            max: readVec2(bounds.max, "Level bounds max"),
        },
        playerStarts,
    };
}

export function parseCharacter(data: unknown): CharacterModel {
    if (!isRecord(data)) {
        throw new TypeError("Character: expected { name, radius }");
    }
    const { radius } = data;
    if (typeof radius !== "number") {
        throw new TypeError("Character: \"radius\" must be a number");
    }
    return { name: readString(data, "name", "Character"), radius };
}

export function parseAnimations(data: unknown): AnimationSet {
    if (!isRecord(data)) {
        throw new TypeError("Animations: expected { idle, move }");
    }
    return {
        idle: readString(data, "idle", "Animations"),
        move: readString(data, "move", "Animations"),
    };
}
