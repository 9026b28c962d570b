/**
 * MONSTER AI
 * Basic melee behaviour: a monster the player can see closes in and attacks
 * once adjacent. Monsters outside the player's field of view stay put.
 */
import type { Entity, GameState } from '../types';
import { chebyshevDistance, pointAdd, pointToKey, stepToward } from '../grid';
import { isBlocked } from '../helpers';
import { moveTo } from '../actor';
import { getEntityById, getPlayer, replaceEntity } from './entity-store';
import { resolveAttack } from './experience';

const takeBasicTurn = (state: GameState, monster: Entity): GameState => {
    const player = getPlayer(state);
    if (!player.combat?.alive) return state;

    if (chebyshevDistance(monster.position, player.position) > 1) {
        const destination = pointAdd(monster.position, stepToward(monster.position, player.position));
        if (isBlocked(state, destination)) return state;
        return { ...state, entities: replaceEntity(state.entities, moveTo(monster, destination)) };
    }

    return resolveAttack(state, monster.id, player.id);
};

/**
 * Resolves every monster's turn in Store order. Sets `lost` if the player dies.
 */
export const resolveMonsterTurns = (state: GameState): GameState => {
    let curState = state;

    for (const { id } of state.entities.slice(1)) {
        const monster = getEntityById(curState, id);
        if (!monster || monster.ai !== 'basic' || !monster.combat?.alive) continue;
        if (!curState.fov.has(pointToKey(monster.position))) continue;

        curState = takeBasicTurn(curState, monster);
        if (!getPlayer(curState).combat?.alive) {
            return { ...curState, gameStatus: 'lost' };
        }
    }

    return curState;
};
