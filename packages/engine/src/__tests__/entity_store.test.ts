import { describe, expect, it } from 'vitest';
import {
    assertPlayerSlot,
    buildStore,
    EntityStoreInvariantError,
    getEntitiesAt,
    getPlayer,
    isPlayer,
    replaceEntity,
    withPlayer
} from '../systems/entity-store';
import { createPlayer } from '../systems/entities/entity-factory';
import { moveTo } from '../actor';
import { createMockState, createTestMonster, p, withOthers } from './test_utils';

describe('entity store', () => {
    it('returns the player from slot 0', () => {
        const state = createMockState();
        expect(getPlayer(state).id).toBe('player');
        expect(assertPlayerSlot(state.entities, 'player')).toBe(state.entities[0]);
    });

    it('throws when another entity occupies slot 0', () => {
        const state = createMockState();
        const orc = createTestMonster('orc-1', p(3, 3));
        const broken = { ...state, entities: [orc, ...state.entities] };

        expect(() => getPlayer(broken)).toThrow(EntityStoreInvariantError);
        try {
            getPlayer(broken);
        } catch (error) {
            expect(error).toBeInstanceOf(EntityStoreInvariantError);
            if (error instanceof EntityStoreInvariantError) {
                expect(error.slot).toBe(0);
                expect(error.foundId).toBe('orc-1');
                expect(error.message).toBe(
                    'Entity store invariant violated: expected player "player" at slot 0, found "orc-1"'
                );
            }
        }
    });

    it('throws on an empty store', () => {
        expect(() => assertPlayerSlot([], 'player')).toThrow('store is empty');
    });

    it('identifies the player by id, not by reference', () => {
        const state = createMockState();
        const copy = moveTo(getPlayer(state), p(2, 2));
        expect(isPlayer(state, copy)).toBe(true);
        expect(isPlayer(state, createTestMonster('orc-1', p(2, 2)))).toBe(false);
    });

    it('refuses to put a non-player into the player slot', () => {
        const state = createMockState();
        expect(() => withPlayer(state, createTestMonster('orc-1', p(2, 2)))).toThrow(EntityStoreInvariantError);
    });

    it('replaces entities without reordering the store', () => {
        const state = withOthers(createMockState(), [
            createTestMonster('orc-1', p(3, 3)),
            createTestMonster('orc-2', p(4, 4)),
        ]);
        const moved = moveTo(state.entities[1] ?? createTestMonster('missing', p(0, 0)), p(6, 6));
        const next = replaceEntity(state.entities, moved);

        expect(next.map(e => e.id)).toEqual(['player', 'orc-1', 'orc-2']);
        expect(next[1]?.position).toEqual({ x: 6, y: 6 });
        expect(state.entities[1]?.position).toEqual({ x: 3, y: 3 });
    });

    it('lists every entity on a tile', () => {
        const state = withOthers(createMockState(), [createTestMonster('orc-1', p(1, 1))]);
        expect(getEntitiesAt(state, p(1, 1)).map(e => e.id)).toEqual(['player', 'orc-1']);
        expect(getEntitiesAt(state, p(9, 9))).toEqual([]);
    });

    it('builds a store with the player first', () => {
        const player = createPlayer({ position: p(1, 1) });
        const store = buildStore(player, [createTestMonster('orc-1', p(2, 2))]);
        expect(store.map(e => e.id)).toEqual(['player', 'orc-1']);
    });

    it('rejects generated entities that reuse the player id', () => {
        const player = createPlayer({ position: p(1, 1) });
        const impostor = createTestMonster('player', p(2, 2));
        expect(() => buildStore(player, [impostor])).toThrow(EntityStoreInvariantError);
    });
});
