import { describe, expect, it } from 'vitest';
import { BestiaryValidationError, DEFAULT_BESTIARY, parseBestiary, validateBestiary } from '../data/bestiary';

const orc = {
    id: 'orc',
    name: 'orc',
    glyph: 'o',
    color: '#3f7f3f',
    spawnChance: 100,
    stats: { hp: 20, defense: 0, power: 4, xpYield: 35 }
};

describe('bestiary parser', () => {
    it('parses the default tables', () => {
        expect(DEFAULT_BESTIARY.monsters.map(m => [m.id, m.spawnChance, m.stats])).toEqual([
            ['orc', 80, { hp: 20, defense: 0, power: 4, xpYield: 35 }],
            ['troll', 20, { hp: 30, defense: 2, power: 8, xpYield: 100 }],
        ]);
        expect(DEFAULT_BESTIARY.items.map(i => i.id)).toEqual([
            'healing_potion',
            'lightning_bolt',
            'fireball',
            'confusion',
        ]);
    });

    it('accepts a minimal valid bestiary', () => {
        expect(validateBestiary({ monsters: [orc], items: [] }).issues).toEqual([]);
    });

    it('rejects non-object input', () => {
        expect(validateBestiary('orc').issues).toEqual([{ path: '$', message: 'Expected bestiary object' }]);
    });

    it('reports unknown monster ids by path', () => {
        try {
            parseBestiary({ monsters: [{ id: 'dragon' }], items: [] });
            expect.unreachable('parseBestiary should throw');
        } catch (error) {
            expect(error).toBeInstanceOf(BestiaryValidationError);
            if (error instanceof BestiaryValidationError) {
                expect(error.issues).toEqual([
                    { path: '$.monsters[0].id', message: 'Expected one of orc, troll' },
                ]);
            }
        }
    });

    it('requires spawn chances to add up to 100', () => {
        const { issues } = validateBestiary({ monsters: [{ ...orc, spawnChance: 50 }], items: [] });
        expect(issues).toEqual([{ path: '$.monsters', message: 'Spawn chances add up to 50, expected 100' }]);
    });

    it('rejects multi-character glyphs and zero hp', () => {
        const { issues } = validateBestiary({
            monsters: [{ ...orc, glyph: 'oo', stats: { ...orc.stats, hp: 0 } }],
            items: [],
        });
        expect(issues).toEqual([
            { path: '$.monsters[0].stats.hp', message: 'Must be positive' },
            { path: '$.monsters[0].glyph', message: 'Expected a single character' },
        ]);
    });
});
