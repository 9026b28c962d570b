/**
 * ACTOR HELPERS
 * Pure functions for modifying Entity data. Inputs are never mutated.
 */
import type { Entity, Point } from './types';

/** Heal up to maxHp. Never lowers hp, never revives the dead. */
export const applyHeal = (actor: Entity, amount: number): Entity => {
    const combat = actor.combat;
    if (!combat || !combat.alive || amount <= 0) return actor;
    const hp = Math.max(combat.hp, Math.min(combat.maxHp, combat.hp + amount));
    return { ...actor, combat: { ...combat, hp } };
};

/** Increase max HP (and optionally heal by the same amount). */
export const increaseMaxHp = (actor: Entity, amount: number, heal: boolean = true): Entity => {
    const combat = actor.combat;
    if (!combat) return actor;
    const maxHp = combat.maxHp + amount;
    const hp = heal ? Math.min(maxHp, combat.hp + amount) : combat.hp;
    return { ...actor, combat: { ...combat, maxHp, hp } };
};

export const addPower = (actor: Entity, amount: number): Entity =>
    actor.combat ? { ...actor, combat: { ...actor.combat, power: actor.combat.power + amount } } : actor;

export const addDefense = (actor: Entity, amount: number): Entity =>
    actor.combat ? { ...actor, combat: { ...actor.combat, defense: actor.combat.defense + amount } } : actor;

export const moveTo = (actor: Entity, position: Point): Entity => ({ ...actor, position: { ...position } });

export const isAlive = (actor: Entity): boolean => !!actor.combat?.alive;
