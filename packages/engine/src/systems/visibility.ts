/**
 * VISIBILITY POLICY
 * Which entities are render candidates, given live field of view and the
 * tiles explored so far. Simulation never consults this.
 */
import type { Entity, FovProvider, GameMap, GameState, Point } from '../types';
import { createPoint, distance, getLine, isInBounds, pointToKey } from '../grid';
import { getTile } from '../helpers';
import { FOV_RADIUS } from '../constants';
import { getPlayer } from './entity-store';

export const isDrawable = (
    entity: Entity,
    liveFov: ReadonlySet<string>,
    exploredTiles: ReadonlySet<string>
): boolean => {
    const key = pointToKey(entity.position);
    return liveFov.has(key) || (entity.alwaysVisible && exploredTiles.has(key));
};

/**
 * Drawable entities in draw order: non-blocking ones (items, stairs, corpses)
 * first so fighters render on top of them.
 */
export const getDrawableEntities = (state: GameState): Entity[] => {
    const drawable = state.entities.filter(e => isDrawable(e, state.fov, state.map.explored));
    return [
        ...drawable.filter(e => !e.blocks),
        ...drawable.filter(e => e.blocks),
    ];
};

const isSightClear = (map: GameMap, origin: Point, target: Point): boolean => {
    const line = getLine(origin, target);
    // Ignore start and the target itself: a wall you look at is visible
    for (const p of line.slice(1, -1)) {
        if (getTile(map, p)?.blocksSight !== false) return false;
    }
    return true;
};

/**
 * Default field of view: every tile within the radius whose line from the
 * origin crosses no sight-blocking tile.
 */
export const lineOfSightFov: FovProvider = {
    compute(map, origin, radius) {
        const visible = new Set<string>();
        if (!isInBounds(origin, map.width, map.height)) return visible;
        visible.add(pointToKey(origin));

        for (let y = origin.y - radius; y <= origin.y + radius; y++) {
            for (let x = origin.x - radius; x <= origin.x + radius; x++) {
                const target = createPoint(x, y);
                if (!isInBounds(target, map.width, map.height)) continue;
                if (distance(origin, target) > radius) continue;
                if (isSightClear(map, origin, target)) visible.add(pointToKey(target));
            }
        }
        return visible;
    }
};

/**
 * Recomputes live FOV around the player and folds it into the map's explored set.
 */
export const refreshVisibility = (state: GameState, fov: FovProvider): GameState => {
    const player = getPlayer(state);
    const live = fov.compute(state.map, player.position, FOV_RADIUS);
    const explored = new Set(state.map.explored);
    live.forEach(key => explored.add(key));
    return {
        ...state,
        fov: live,
        map: { ...state.map, explored },
    };
};
