/**
 * STATELESS HELPERS
 * Pure utility functions for map and entity queries, plus the message log.
 */
import type { GameMap, GameState, Point, Tile } from './types';
import { isInBounds } from './grid';
import { MESSAGE_LOG_LIMIT } from './constants';
import { getBlockingEntityAt, getEntitiesAt, getPlayer } from './systems/entity-store';

/**
 * Appends narrative lines, keeping only the most recent entries.
 */
export const appendMessages = (log: readonly string[], lines: readonly string[]): string[] =>
    lines.length === 0 ? [...log] : [...log, ...lines].slice(-MESSAGE_LOG_LIMIT);

export const withMessages = (state: GameState, lines: readonly string[]): GameState =>
    lines.length === 0 ? state : { ...state, message: appendMessages(state.message, lines) };

export const getTile = (map: GameMap, position: Point): Tile | undefined =>
    isInBounds(position, map.width, map.height) ? map.tiles[position.y * map.width + position.x] : undefined;

/**
 * Checks if a position is walkable terrain (inside the map and not a wall).
 */
export const isWalkable = (map: GameMap, position: Point): boolean => {
    const tile = getTile(map, position);
    return !!tile && !tile.blocksMovement;
};

/**
 * Terrain or a blocking entity stands on the tile.
 */
export const isBlocked = (state: GameState, position: Point): boolean =>
    !isWalkable(state.map, position) || !!getBlockingEntityAt(state, position);

/**
 * Descend trigger: the player stands on a stairs entity.
 */
export const canDescend = (state: GameState): boolean => {
    const player = getPlayer(state);
    return getEntitiesAt(state, player.position).some(e => e.kind === 'stairs');
};
