import type { CombatProfile, Entity, Point } from '../../types';
import type { ItemTemplate, MonsterTemplate } from '../../data/bestiary';
import { COLORS, INITIAL_PLAYER_STATS, PLAYER_ID } from '../../constants';

/**
 * ENTITY FACTORY SYSTEM
 *
 * Every entity in the Store (player, monsters, items, stairs) is built here,
 * so defaults such as `level` and `alwaysVisible` stay consistent.
 */

export interface BaseEntityConfig {
    id: string;
    name: string;
    kind: Entity['kind'];
    position: Point;
    glyph: string;
    color: string;
    blocks: boolean;
    combat?: CombatProfile;
    ai?: Entity['ai'];
    level?: number;
    alwaysVisible?: boolean;
}

/**
 * Core entity factory - creates a fully-formed Entity
 */
export function createEntity(config: BaseEntityConfig): Entity {
    const entity: Entity = {
        id: config.id,
        name: config.name,
        kind: config.kind,
        position: { ...config.position },
        glyph: config.glyph,
        color: config.color,
        blocks: config.blocks,
        level: config.level ?? 1,
        alwaysVisible: config.alwaysVisible ?? false,
    };
    if (config.combat) entity.combat = { ...config.combat };
    if (config.ai) entity.ai = config.ai;
    return entity;
}

export const createCombatProfile = (stats: {
    hp: number;
    defense: number;
    power: number;
    xpYield: number;
    maxHp?: number;
    xp?: number;
}): CombatProfile => ({
    hp: stats.hp,
    maxHp: stats.maxHp ?? stats.hp,
    power: stats.power,
    defense: stats.defense,
    alive: stats.hp > 0,
    xp: stats.xp ?? 0,
    xpYield: stats.xpYield,
});

/**
 * Create the player entity
 */
export function createPlayer(config: { position: Point; id?: string }): Entity {
    return createEntity({
        id: config.id ?? PLAYER_ID,
        name: 'player',
        kind: 'player',
        position: config.position,
        glyph: '@',
        color: COLORS.white,
        blocks: true,
        combat: createCombatProfile(INITIAL_PLAYER_STATS),
    });
}

export function createMonster(template: MonsterTemplate, id: string, position: Point): Entity {
    return createEntity({
        id,
        name: template.name,
        kind: 'monster',
        position,
        glyph: template.glyph,
        color: template.color,
        blocks: true,
        combat: createCombatProfile(template.stats),
        ai: 'basic',
    });
}

export function createItem(template: ItemTemplate, id: string, position: Point): Entity {
    return createEntity({
        id,
        name: template.name,
        kind: 'item',
        position,
        glyph: template.glyph,
        color: template.color,
        blocks: false,
        alwaysVisible: true,
    });
}

export function createStairs(id: string, position: Point): Entity {
    return createEntity({
        id,
        name: 'stairs',
        kind: 'stairs',
        position,
        glyph: '<',
        color: COLORS.white,
        blocks: false,
        alwaysVisible: true,
    });
}

/**
 * Presentation of a dead fighter. The entity stays in the Store with its
 * combat profile (alive=false) so it can never be credited twice.
 */
export function toCorpse(entity: Entity): Entity {
    const corpse: Entity = {
        ...entity,
        glyph: '%',
        color: COLORS.corpse,
    };
    if (entity.kind === 'player') return corpse;

    const { ai: _ai, ...rest } = corpse;
    return {
        ...rest,
        kind: 'corpse',
        name: `remains of ${entity.name}`,
        blocks: false,
    };
}
