import { COLORS } from '../../constants';

/**
 * Raw spawn tables consumed by the level generator.
 * Kept as plain data and run through parseBestiary before use.
 */
export const DEFAULT_BESTIARY_SOURCE = {
    monsters: [
        {
            id: 'orc',
            name: 'orc',
            glyph: 'o',
            color: COLORS.orc,
            spawnChance: 80,
            stats: { hp: 20, defense: 0, power: 4, xpYield: 35 }
        },
        {
            id: 'troll',
            name: 'troll',
            glyph: 'T',
            color: COLORS.troll,
            spawnChance: 20,
            stats: { hp: 30, defense: 2, power: 8, xpYield: 100 }
        }
    ],
    items: [
        { id: 'healing_potion', name: 'healing potion', glyph: '!', color: COLORS.violet, spawnChance: 70 },
        { id: 'lightning_bolt', name: 'scroll of lightning bolt', glyph: '#', color: COLORS.lightYellow, spawnChance: 10 },
        { id: 'fireball', name: 'scroll of fireball', glyph: '#', color: COLORS.lightYellow, spawnChance: 10 },
        { id: 'confusion', name: 'scroll of confusion', glyph: '#', color: COLORS.lightYellow, spawnChance: 10 }
    ]
};
