/**
 * MAP GENERATION SYSTEM
 * Deterministic rooms-and-corridors levels. Equal seeds give equal levels.
 * The generator never sees the player: it returns a spawn point and the new
 * entities, and the transition controller seeds the Store with both.
 */
import type { Entity, GameMap, GeneratedLevel, LevelGenerator, Point, Room, Tile } from './types';
import { createPoint, pointEquals, pointToKey } from './grid';
import { createRng, type Rng } from './systems/rng';
import {
    MAP_HEIGHT,
    MAP_WIDTH,
    MAX_ROOMS,
    MAX_ROOM_ITEMS,
    MAX_ROOM_MONSTERS,
    ROOM_MAX_SIZE,
    ROOM_MIN_SIZE
} from './constants';
import { DEFAULT_BESTIARY, type Bestiary } from './data/bestiary';
import { createItem, createMonster, createStairs } from './systems/entities/entity-factory';

export interface GeneratorOptions {
    width: number;
    height: number;
    maxRooms: number;
    roomMinSize: number;
    roomMaxSize: number;
    maxRoomMonsters: number;
    maxRoomItems: number;
    bestiary: Bestiary;
}

export const DEFAULT_GENERATOR_OPTIONS: GeneratorOptions = {
    width: MAP_WIDTH,
    height: MAP_HEIGHT,
    maxRooms: MAX_ROOMS,
    roomMinSize: ROOM_MIN_SIZE,
    roomMaxSize: ROOM_MAX_SIZE,
    maxRoomMonsters: MAX_ROOM_MONSTERS,
    maxRoomItems: MAX_ROOM_ITEMS,
    bestiary: DEFAULT_BESTIARY,
};

export interface DungeonResult extends GeneratedLevel {
    rooms: Room[];
}

const WALL: Tile = { blocksMovement: true, blocksSight: true };
const FLOOR: Tile = { blocksMovement: false, blocksSight: false };

export const createRoom = (x: number, y: number, w: number, h: number): Room => ({ x1: x, y1: y, x2: x + w, y2: y + h });

export const roomCenter = (room: Room): Point =>
    createPoint(Math.floor((room.x1 + room.x2) / 2), Math.floor((room.y1 + room.y2) / 2));

export const roomsIntersect = (a: Room, b: Room): boolean =>
    a.x1 <= b.x2 && a.x2 >= b.x1 && a.y1 <= b.y2 && a.y2 >= b.y1;

/** A map of solid rock with nothing explored. */
export const createFilledMap = (width: number, height: number): GameMap => ({
    width,
    height,
    tiles: Array.from({ length: width * height }, () => ({ ...WALL })),
    explored: new Set<string>(),
});

const carve = (map: GameMap, x: number, y: number) => {
    map.tiles[y * map.width + x] = { ...FLOOR };
};

// Room interiors exclude the outline so adjacent rooms keep a wall between them
const carveRoom = (map: GameMap, room: Room) => {
    for (let y = room.y1 + 1; y < room.y2; y++) {
        for (let x = room.x1 + 1; x < room.x2; x++) carve(map, x, y);
    }
};

const carveHorizontalTunnel = (map: GameMap, x1: number, x2: number, y: number) => {
    for (let x = Math.min(x1, x2); x <= Math.max(x1, x2); x++) carve(map, x, y);
};

const carveVerticalTunnel = (map: GameMap, y1: number, y2: number, x: number) => {
    for (let y = Math.min(y1, y2); y <= Math.max(y1, y2); y++) carve(map, x, y);
};

const pickByChance = <T extends { spawnChance: number }>(table: readonly T[], rng: Rng): T | undefined => {
    const roll = rng.int(1, 100);
    let cumulative = 0;
    for (const entry of table) {
        cumulative += entry.spawnChance;
        if (roll <= cumulative) return entry;
    }
    return undefined;
};

const randomInteriorPoint = (room: Room, rng: Rng): Point =>
    createPoint(rng.int(room.x1 + 1, room.x2 - 1), rng.int(room.y1 + 1, room.y2 - 1));

/**
 * Generate a single dungeon level
 */
export const generateDungeon = (
    depth: number,
    seed: string,
    options: GeneratorOptions = DEFAULT_GENERATOR_OPTIONS
): DungeonResult => {
    const rng = createRng(seed);
    const map = createFilledMap(options.width, options.height);
    const rooms: Room[] = [];

    // 1. Rooms and tunnels
    for (let attempt = 0; attempt < options.maxRooms; attempt++) {
        const w = rng.int(options.roomMinSize, options.roomMaxSize);
        const h = rng.int(options.roomMinSize, options.roomMaxSize);
        const x = rng.int(0, options.width - w - 1);
        const y = rng.int(0, options.height - h - 1);
        const room = createRoom(x, y, w, h);
        if (rooms.some(other => roomsIntersect(room, other))) continue;

        carveRoom(map, room);
        const previous = rooms[rooms.length - 1];
        if (previous) {
            const from = roomCenter(previous);
            const to = roomCenter(room);
            if (rng.next() < 0.5) {
                carveHorizontalTunnel(map, from.x, to.x, from.y);
                carveVerticalTunnel(map, from.y, to.y, to.x);
            } else {
                carveVerticalTunnel(map, from.y, to.y, from.x);
                carveHorizontalTunnel(map, from.x, to.x, to.y);
            }
        }
        rooms.push(room);
    }

    const firstRoom = rooms[0];
    const lastRoom = rooms[rooms.length - 1];
    if (!firstRoom || !lastRoom) {
        throw new Error(`Level generation placed no rooms (depth ${depth}, seed "${seed}")`);
    }
    const playerSpawn = roomCenter(firstRoom);

    // 2. Occupants
    const spawned: Entity[] = [];
    let counter = 0;
    const nextId = (kind: string) => `${kind}-${depth}-${counter++}`;
    const occupied = new Set<string>([pointToKey(playerSpawn)]);

    for (const room of rooms) {
        const monsterCount = rng.int(0, options.maxRoomMonsters);
        for (let i = 0; i < monsterCount; i++) {
            const pos = randomInteriorPoint(room, rng);
            const template = pickByChance(options.bestiary.monsters, rng);
            if (!template || occupied.has(pointToKey(pos))) continue;
            occupied.add(pointToKey(pos));
            spawned.push(createMonster(template, nextId('monster'), pos));
        }

        const itemCount = rng.int(0, options.maxRoomItems);
        for (let i = 0; i < itemCount; i++) {
            const pos = randomInteriorPoint(room, rng);
            const template = pickByChance(options.bestiary.items, rng);
            if (!template || pointEquals(pos, playerSpawn)) continue;
            spawned.push(createItem(template, nextId('item'), pos));
        }
    }

    // 3. Stairs at the centre of the last room
    spawned.push(createStairs(nextId('stairs'), roomCenter(lastRoom)));

    return { map, spawned, playerSpawn, rooms };
};

export const createRoomsAndCorridorsGenerator = (overrides: Partial<GeneratorOptions> = {}): LevelGenerator => {
    const options: GeneratorOptions = { ...DEFAULT_GENERATOR_OPTIONS, ...overrides };
    return {
        generate: ({ depth, seed }) => {
            const { map, spawned, playerSpawn } = generateDungeon(depth, seed, options);
            return { map, spawned, playerSpawn };
        }
    };
};

export const roomsAndCorridorsGenerator: LevelGenerator = createRoomsAndCorridorsGenerator();
