/**
 * EXPERIENCE LEDGER
 * Turns kill results into experience. Two paths:
 * - single target: the attacker keeps the yield directly;
 * - area effect: yields are gathered first and credited to the player in one step,
 *   skipping every excluded id (the player's own death never pays out).
 */
import type { Entity, GameState, Point } from '../types';
import { distance } from '../grid';
import { withMessages } from '../helpers';
import { applyDamage, attack, capitalize, creditExperience, describeDeath } from './combat';
import { getEntityById, getPlayer, replaceEntities, withPlayer } from './entity-store';

export interface KillCredit {
    entityId: string;
    xpYield: number;
}

export interface AreaDamagePass {
    entities: Entity[];
    credits: KillCredit[];
    hitIds: string[];
    messages: string[];
}

export interface AreaDamageResult {
    state: GameState;
    credits: KillCredit[];
    totalXp: number;
    hitIds: string[];
}

export const sumCredits = (credits: readonly KillCredit[]): number =>
    credits.reduce((total, c) => total + c.xpYield, 0);

/**
 * Phase 1: damage every living fighter inside the radius and record who died.
 * Nothing is credited here.
 */
export const collectAreaDamage = (
    entities: readonly Entity[],
    center: Point,
    radius: number,
    amount: number,
    excludedIds: ReadonlySet<string>
): AreaDamagePass => {
    const credits: KillCredit[] = [];
    const hitIds: string[] = [];
    const messages: string[] = [];

    const next = entities.map(entity => {
        if (!entity.combat?.alive || distance(entity.position, center) > radius) return entity;

        hitIds.push(entity.id);
        messages.push(`${capitalize(entity.name)} gets burned for ${amount} hit points.`);
        const result = applyDamage(entity, amount);
        if (result.xpYield !== undefined) {
            const credited = !excludedIds.has(entity.id);
            if (credited) credits.push({ entityId: entity.id, xpYield: result.xpYield });
            messages.push(describeDeath(entity, result.xpYield, credited));
        }
        return result.target;
    });

    return { entities: next, credits, hitIds, messages };
};

/**
 * Area burst centred on a tile. The player may be caught in it; only
 * non-player kills are paid, once each, after the whole pass.
 */
export const resolveAreaDamage = (
    state: GameState,
    center: Point,
    radius: number,
    amount: number
): AreaDamageResult => {
    const pass = collectAreaDamage(state.entities, center, radius, amount, new Set([state.playerId]));

    // Phase 2: one credit for the whole pass
    const totalXp = sumCredits(pass.credits);
    let next: GameState = { ...state, entities: pass.entities };
    next = withPlayer(next, creditExperience(getPlayer(next), totalXp));
    next = withMessages({ ...next, kills: next.kills + pass.credits.length }, pass.messages);

    return { state: next, credits: pass.credits, totalXp, hitIds: pass.hitIds };
};

/**
 * Single-target attack between two Store entities, written back into the state.
 */
export const resolveAttack = (state: GameState, attackerId: string, targetId: string): GameState => {
    const attacker = getEntityById(state, attackerId);
    const target = getEntityById(state, targetId);
    if (!attacker || !target) return state;

    const result = attack(attacker, target);
    const playerKill = result.killed && attackerId === state.playerId;
    return withMessages({
        ...state,
        entities: replaceEntities(state.entities, [result.attacker, result.target]),
        kills: state.kills + (playerKill ? 1 : 0),
    }, result.messages);
};
