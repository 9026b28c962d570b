/**
 * ENTITY STORE
 * The ordered entity collection of the current level. Slot 0 is the player
 * for the whole session; everything here checks that by id, never by reference.
 */
import type { Entity, GameState, Point } from '../types';
import { pointEquals } from '../grid';

export const PLAYER_SLOT = 0;

export class EntityStoreInvariantError extends Error {
    slot: number;
    foundId?: string;
    constructor(message: string, slot: number, foundId?: string) {
        super(`Entity store invariant violated: ${message}`);
        this.name = 'EntityStoreInvariantError';
        this.slot = slot;
        this.foundId = foundId;
    }
}

/**
 * Throws unless slot 0 holds the player. Returns the player.
 */
export const assertPlayerSlot = (entities: readonly Entity[], playerId: string): Entity => {
    const occupant = entities[PLAYER_SLOT];
    if (!occupant) {
        throw new EntityStoreInvariantError('store is empty', PLAYER_SLOT);
    }
    if (occupant.id !== playerId) {
        throw new EntityStoreInvariantError(
            `expected player "${playerId}" at slot ${PLAYER_SLOT}, found "${occupant.id}"`,
            PLAYER_SLOT,
            occupant.id
        );
    }
    return occupant;
};

export const getPlayer = (state: GameState): Entity => assertPlayerSlot(state.entities, state.playerId);

export const isPlayer = (state: GameState, entity: Entity): boolean => entity.id === state.playerId;

export const getEntityById = (state: GameState, id: string): Entity | undefined =>
    state.entities.find(e => e.id === id);

/**
 * Returns a new Store with the entity carrying the same id replaced.
 */
export const replaceEntity = (entities: readonly Entity[], next: Entity): Entity[] =>
    entities.map(e => (e.id === next.id ? next : e));

export const replaceEntities = (entities: readonly Entity[], updates: readonly Entity[]): Entity[] => {
    if (updates.length === 0) return [...entities];
    const byId = new Map(updates.map(u => [u.id, u]));
    return entities.map(e => byId.get(e.id) ?? e);
};

export const withPlayer = (state: GameState, player: Entity): GameState => {
    assertPlayerSlot(state.entities, state.playerId);
    if (player.id !== state.playerId) {
        throw new EntityStoreInvariantError(`cannot place "${player.id}" in the player slot`, PLAYER_SLOT, player.id);
    }
    return { ...state, entities: [player, ...state.entities.slice(PLAYER_SLOT + 1)] };
};

export const getEntitiesAt = (state: GameState, position: Point): Entity[] =>
    state.entities.filter(e => pointEquals(e.position, position));

export const getBlockingEntityAt = (state: GameState, position: Point): Entity | undefined =>
    state.entities.find(e => e.blocks && pointEquals(e.position, position));

/**
 * Seeds a fresh Store from the player alone, followed by newly generated entities.
 * A generated entity reusing the player's id is rejected.
 */
export const buildStore = (player: Entity, spawned: readonly Entity[]): Entity[] => {
    const clash = spawned.findIndex(e => e.id === player.id);
    if (clash !== -1) {
        throw new EntityStoreInvariantError(
            `generated entity reuses the player id "${player.id}"`,
            clash + 1,
            player.id
        );
    }
    return [player, ...spawned];
};
