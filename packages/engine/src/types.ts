/**
 * ARCHITECTURE OVERVIEW
 * Logic: Immutable GameState threaded through pure systems; the reducer is the only entry point.
 * Entity Store: `GameState.entities` is ordered and slot 0 always holds the player.
 * External collaborators (level generation, field of view) are injected as EngineServices.
 */
export interface Point {
    x: number;
    y: number;
}

export type EntityKind = 'player' | 'monster' | 'item' | 'stairs' | 'corpse';

export type AiKind = 'basic';

/** Fighter stats. `xpYield` is fixed at creation and paid out once, on the killing blow. */
export interface CombatProfile {
    hp: number;
    maxHp: number;
    power: number;
    defense: number;
    alive: boolean;
    xp: number;
    xpYield: number;
}

export interface Entity {
    id: string;
    name: string;
    kind: EntityKind;
    position: Point;
    glyph: string;
    color: string;
    blocks: boolean;
    combat?: CombatProfile;
    ai?: AiKind;
    /** Character level. Only the player advances it today. */
    level: number;
    /** Drawable on explored tiles even when outside live field of view (stairs, items). */
    alwaysVisible: boolean;
}

export interface Tile {
    blocksMovement: boolean;
    blocksSight: boolean;
}

export interface GameMap {
    width: number;
    height: number;
    /** Row-major, `tiles[y * width + x]`. */
    tiles: Tile[];
    explored: ReadonlySet<string>;
}

export interface Room {
    x1: number;
    y1: number;
    x2: number;
    y2: number;
}

export type LevelUpStat = 'CONSTITUTION' | 'STRENGTH' | 'AGILITY';

export interface PendingLevelUp {
    /** Level reached by this level-up (already applied to the player). */
    level: number;
    /** Experience spent once a stat is picked; computed against the level before the increment. */
    threshold: number;
    options: LevelUpStat[];
}

export interface InventoryItem {
    id: string;
    name: string;
}

export type GameStatus = 'playing' | 'choosing_level_up' | 'lost';

export interface GameState {
    turnNumber: number;
    depth: number;
    playerId: string;
    entities: Entity[];
    map: GameMap;
    /** Live field of view, as tile keys. */
    fov: ReadonlySet<string>;
    inventory: InventoryItem[];
    message: string[];
    gameStatus: GameStatus;
    pendingLevelUp?: PendingLevelUp;

    /** Seed of the run; each level's seed is derived from it and the depth. */
    initialSeed: string;

    kills: number;
    actionLog: Action[];
}

export type Action =
    | { type: 'MOVE'; payload: { dx: number; dy: number } }
    | { type: 'WAIT' }
    | { type: 'DESCEND' }
    | { type: 'CAST_FIREBALL'; payload: { target: Point } }
    | { type: 'CHOOSE_LEVEL_UP'; payload?: unknown }
    | { type: 'RESET'; payload?: { seed: string } };

// External collaborator contracts

export interface LevelRequest {
    depth: number;
    seed: string;
}

export interface GeneratedLevel {
    map: GameMap;
    /** New non-player entities, in Store order after the player. */
    spawned: Entity[];
    playerSpawn: Point;
}

export interface LevelGenerator {
    generate(request: LevelRequest): GeneratedLevel;
}

export interface FovProvider {
    compute(map: GameMap, origin: Point, radius: number): ReadonlySet<string>;
}

export interface EngineServices {
    generator: LevelGenerator;
    fov: FovProvider;
}
