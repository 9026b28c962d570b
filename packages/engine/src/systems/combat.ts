/**
 * COMBAT SYSTEM
 * Damage resolution and the kill/experience result contract.
 * Damage math is deliberately flat: power minus defense.
 */
import type { Entity } from '../types';
import { toCorpse } from './entities/entity-factory';

export interface DamageResult {
    target: Entity;
    /** Present only when this very hit killed the target. */
    xpYield?: number;
}

export interface AttackResult {
    attacker: Entity;
    target: Entity;
    damage: number;
    killed: boolean;
    messages: string[];
}

export const capitalize = (text: string): string => text.charAt(0).toUpperCase() + text.slice(1);

/**
 * Applies damage to a target. The hit that takes a living target to zero hp
 * flips `alive` and returns the yield in the same call; a corpse yields nothing.
 */
export const applyDamage = (target: Entity, amount: number): DamageResult => {
    const combat = target.combat;
    if (!combat || !combat.alive || amount <= 0) return { target };

    const hp = Math.max(0, combat.hp - amount);
    if (hp > 0) {
        return { target: { ...target, combat: { ...combat, hp } } };
    }

    const dead: Entity = toCorpse({ ...target, combat: { ...combat, hp, alive: false } });
    return { target: dead, xpYield: combat.xpYield };
};

export const creditExperience = (entity: Entity, amount: number): Entity => {
    if (!entity.combat || amount <= 0) return entity;
    return { ...entity, combat: { ...entity.combat, xp: entity.combat.xp + amount } };
};

export const describeDeath = (victim: Entity, xpYield: number, creditedToPlayer: boolean): string => {
    if (victim.kind === 'player') return 'You died!';
    const name = capitalize(victim.name);
    return creditedToPlayer
        ? `${name} is dead! You gain ${xpYield} experience points.`
        : `${name} is dead!`;
};

/**
 * Single-target melee. Whoever lands the killing blow keeps the yield,
 * monsters included (they just never spend it).
 */
export const attack = (attacker: Entity, target: Entity): AttackResult => {
    const power = attacker.combat?.power ?? 0;
    const defense = target.combat?.defense ?? 0;
    const damage = power - defense;
    const attackerName = capitalize(attacker.name);

    if (damage <= 0) {
        return {
            attacker,
            target,
            damage: 0,
            killed: false,
            messages: [`${attackerName} attacks ${target.name} but it has no effect!`]
        };
    }

    const messages = [`${attackerName} attacks ${target.name} for ${damage} hit points.`];
    const result = applyDamage(target, damage);
    if (result.xpYield === undefined) {
        return { attacker, target: result.target, damage, killed: false, messages };
    }

    messages.push(describeDeath(target, result.xpYield, attacker.kind === 'player'));
    return {
        attacker: creditExperience(attacker, result.xpYield),
        target: result.target,
        damage,
        killed: true,
        messages
    };
};
