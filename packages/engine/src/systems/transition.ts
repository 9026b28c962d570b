/**
 * LEVEL TRANSITION
 * Descent rebuilds the level around the one entity that survives it.
 * Runs to completion in a single call; no partial state is ever returned.
 */
import type { EngineServices, GameState } from '../types';
import { REST_HEAL_DIVISOR } from '../constants';
import { applyHeal, isAlive, moveTo } from '../actor';
import { appendMessages } from '../helpers';
import { seedForDepth } from './rng';
import { assertPlayerSlot, buildStore, EntityStoreInvariantError, PLAYER_SLOT } from './entity-store';
import { refreshVisibility } from './visibility';

export const restHealAmount = (maxHp: number): number => Math.floor(maxHp / REST_HEAL_DIVISOR);

/**
 * Moves the player one level deeper.
 *
 * Throws `EntityStoreInvariantError` when slot 0 is not the player or the
 * player is dead; both are programmer errors and must not be recovered from.
 */
export const descend = (state: GameState, services: EngineServices): GameState => {
    const player = assertPlayerSlot(state.entities, state.playerId);
    if (!isAlive(player)) {
        throw new EntityStoreInvariantError('cannot descend with a dead player', PLAYER_SLOT, player.id);
    }

    // 1. Rest
    const maxHp = player.combat?.maxHp ?? 0;
    const rested = applyHeal(player, restHealAmount(maxHp));

    // 2. Narrative
    const depth = state.depth + 1;
    const message = appendMessages(state.message, [
        'You take a moment to rest, and recover your strength.',
        `After a rare moment of peace, you descend deeper into the heart of the dungeon... (depth ${depth})`,
    ]);

    // 3-5. Keep the player, drop everything else, generate the next level
    const level = services.generator.generate({ depth, seed: seedForDepth(state.initialSeed, depth) });
    const entities = buildStore(moveTo(rested, level.playerSpawn), level.spawned);

    // 6. Fresh map, fresh memory, fresh field of view
    return refreshVisibility({
        ...state,
        depth,
        entities,
        map: { ...level.map, explored: new Set<string>() },
        fov: new Set<string>(),
        message,
    }, services.fov);
};
