import { describe, expect, it } from 'vitest';
import { getDrawableEntities, isDrawable, lineOfSightFov, refreshVisibility } from '../systems/visibility';
import { createItem, createStairs } from '../systems/entities/entity-factory';
import { DEFAULT_BESTIARY } from '../data/bestiary';
import type { GameMap } from '../types';
import { createMockState, createOpenMap, createTestMonster, p, pointFov, withOthers } from './test_utils';

const withWallColumn = (map: GameMap, x: number): GameMap => ({
    ...map,
    tiles: map.tiles.map((tile, index) =>
        index % map.width === x ? { blocksMovement: true, blocksSight: true } : tile),
});

describe('drawable entities', () => {
    const seen = new Set(['2,2']);
    const none = new Set<string>();

    it('draws anything in live view', () => {
        expect(isDrawable(createTestMonster('orc-1', p(2, 2)), seen, none)).toBe(true);
        expect(isDrawable(createStairs('stairs-1', p(2, 2)), seen, none)).toBe(true);
    });

    it('draws remembered entities only when they are always visible', () => {
        expect(isDrawable(createTestMonster('orc-1', p(2, 2)), none, seen)).toBe(false);
        expect(isDrawable(createStairs('stairs-1', p(2, 2)), none, seen)).toBe(true);
    });

    it('hides everything on tiles never seen', () => {
        expect(isDrawable(createTestMonster('orc-1', p(2, 2)), none, none)).toBe(false);
        expect(isDrawable(createStairs('stairs-1', p(2, 2)), none, none)).toBe(false);
    });

    it('lists non-blocking entities before blocking ones', () => {
        const potion = DEFAULT_BESTIARY.items[0];
        if (!potion) throw new Error('default bestiary has no items');
        const state = withOthers(createMockState(), [
            createTestMonster('orc-1', p(3, 3)),
            createItem(potion, 'item-1', p(4, 4)),
            createStairs('stairs-1', p(5, 5)),
        ]);

        expect(getDrawableEntities(state).map(e => e.id)).toEqual(['item-1', 'stairs-1', 'player', 'orc-1']);
    });
});

describe('line of sight field of view', () => {
    it('stops at walls but shows the wall itself', () => {
        const map = withWallColumn(createOpenMap(), 4);
        const fov = lineOfSightFov.compute(map, p(2, 5), 10);

        expect(fov.has('2,5')).toBe(true);
        expect(fov.has('3,5')).toBe(true);
        expect(fov.has('4,5')).toBe(true);
        expect(fov.has('5,5')).toBe(false);
    });

    it('limits sight to the radius', () => {
        const fov = lineOfSightFov.compute(createOpenMap(), p(0, 0), 3);

        expect(fov.has('3,0')).toBe(true);
        expect(fov.has('3,1')).toBe(false);
    });

    it('sees nothing from outside the map', () => {
        expect(lineOfSightFov.compute(createOpenMap(), p(-1, 0), 3).size).toBe(0);
    });

    it('keeps explored tiles after they leave the view', () => {
        const base = createMockState();
        const state = { ...base, map: { ...base.map, explored: new Set(['9,9']) } };
        const next = refreshVisibility(state, pointFov);

        expect([...next.fov]).toEqual(['1,1']);
        expect(next.map.explored.has('9,9')).toBe(true);
        expect(next.map.explored.has('1,1')).toBe(true);
    });
});
