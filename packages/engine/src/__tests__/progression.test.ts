import { describe, expect, it } from 'vitest';
import {
    chooseLevelUp,
    describeCharacter,
    evaluateProgression,
    getLevelUpPrompt,
    getProgressionPhase,
    levelUpThreshold
} from '../systems/progression';
import { getPlayer } from '../systems/entity-store';
import { gameReducer } from '../logic';
import { createMockState, createTestMonster, createTestServices, p, patchPlayer, playerCombat, withOthers } from './test_utils';

const withXp = (xp: number) => patchPlayer(createMockState(), { combat: { xp } });

describe('level thresholds', () => {
    it('grows by 150 per level from a base of 200', () => {
        expect(levelUpThreshold(1)).toBe(350);
        expect(levelUpThreshold(2)).toBe(500);
        expect(levelUpThreshold(3)).toBe(650);
    });

    it('is strictly increasing', () => {
        for (let level = 1; level < 30; level++) {
            expect(levelUpThreshold(level + 1)).toBeGreaterThan(levelUpThreshold(level));
        }
    });
});

describe('level-up state machine', () => {
    it('stays idle below the threshold', () => {
        const state = withXp(349);
        expect(evaluateProgression(state)).toBe(state);
        expect(getProgressionPhase(state)).toBe('idle');
    });

    it('raises the level before the stat is chosen, then spends the threshold', () => {
        const reached = evaluateProgression(withXp(360));

        expect(getPlayer(reached).level).toBe(2);
        expect(playerCombat(reached).xp).toBe(360);
        expect(reached.gameStatus).toBe('choosing_level_up');
        expect(getProgressionPhase(reached)).toBe('awaiting_choice');
        expect(reached.pendingLevelUp).toEqual({
            level: 2,
            threshold: 350,
            options: ['CONSTITUTION', 'STRENGTH', 'AGILITY'],
        });
        expect(reached.message.at(-1)).toBe('Your battle skills grow stronger! You reached level 2!');

        const chosen = chooseLevelUp(reached, 'STRENGTH');
        expect(playerCombat(chosen).xp).toBe(10);
        expect(playerCombat(chosen).power).toBe(5);
        expect(getPlayer(chosen).level).toBe(2);
        expect(chosen.pendingLevelUp).toBeUndefined();
        expect(chosen.gameStatus).toBe('playing');
    });

    it('does not evaluate again while a choice is pending', () => {
        const reached = evaluateProgression(withXp(2000));
        expect(evaluateProgression(reached)).toBe(reached);
    });

    it('asks once per level when one gain crosses two thresholds', () => {
        const first = evaluateProgression(withXp(900));
        expect(first.pendingLevelUp?.threshold).toBe(350);

        const second = chooseLevelUp(first, 'AGILITY');
        expect(playerCombat(second).xp).toBe(550);
        expect(playerCombat(second).defense).toBe(2);
        expect(getPlayer(second).level).toBe(3);
        expect(second.pendingLevelUp).toEqual({
            level: 3,
            threshold: 500,
            options: ['CONSTITUTION', 'STRENGTH', 'AGILITY'],
        });

        const done = chooseLevelUp(second, 'STRENGTH');
        expect(playerCombat(done).xp).toBe(50);
        expect(getPlayer(done).level).toBe(3);
        expect(done.gameStatus).toBe('playing');
        expect(done.message.filter(line => line.startsWith('Your battle skills grow stronger!'))).toEqual([
            'Your battle skills grow stronger! You reached level 2!',
            'Your battle skills grow stronger! You reached level 3!',
        ]);
    });

    it('raises max hp and current hp by the same amount for constitution', () => {
        const reached = evaluateProgression(patchPlayer(createMockState(), { combat: { xp: 350, hp: 80 } }));
        const chosen = chooseLevelUp(reached, 'CONSTITUTION');

        expect(playerCombat(chosen).maxHp).toBe(120);
        expect(playerCombat(chosen).hp).toBe(100);
        expect(playerCombat(chosen).xp).toBe(0);
    });

    it('leaves the state untouched for anything but an offered stat', () => {
        const reached = evaluateProgression(withXp(400));
        expect(chooseLevelUp(reached, 'DEXTERITY')).toBe(reached);
        expect(chooseLevelUp(reached, undefined)).toBe(reached);
        expect(chooseLevelUp(reached, 42)).toBe(reached);
        expect(chooseLevelUp(withXp(10), 'STRENGTH').pendingLevelUp).toBeUndefined();
    });

    it('never levels a dead player', () => {
        const state = patchPlayer(createMockState(), { combat: { xp: 1000, hp: 0, alive: false } });
        expect(evaluateProgression(state)).toBe(state);
    });

    it('blocks every other action until a stat is picked', () => {
        const services = createTestServices();
        const base = withOthers(createMockState({}, services), [createTestMonster('orc-1', p(2, 1), { hp: 4 })]);
        const state = patchPlayer(base, { combat: { xp: 340 } });

        const leveled = gameReducer(state, { type: 'MOVE', payload: { dx: 1, dy: 0 } }, services);
        expect(playerCombat(leveled).xp).toBe(375);
        expect(leveled.gameStatus).toBe('choosing_level_up');

        expect(gameReducer(leveled, { type: 'WAIT' }, services)).toBe(leveled);
        expect(gameReducer(leveled, { type: 'MOVE', payload: { dx: 0, dy: 1 } }, services)).toBe(leveled);
        expect(gameReducer(leveled, { type: 'CHOOSE_LEVEL_UP', payload: 'nope' }, services)).toBe(leveled);

        const chosen = gameReducer(leveled, { type: 'CHOOSE_LEVEL_UP', payload: 'STRENGTH' }, services);
        expect(playerCombat(chosen).xp).toBe(25);
        expect(playerCombat(chosen).power).toBe(5);
        expect(chosen.gameStatus).toBe('playing');
        expect(chosen.actionLog.map(a => a.type)).toEqual(['MOVE', 'CHOOSE_LEVEL_UP']);
    });
});

describe('character sheet', () => {
    it('describes the player and the current depth', () => {
        expect(describeCharacter(createMockState())).toEqual([
            'Level: 1',
            'Experience: 0',
            'Experience to level up: 350',
            'Maximum HP: 100',
            'Attack: 4',
            'Defense: 1',
            'Dungeon depth: 1',
        ]);
    });

    it('labels each option with the current value', () => {
        expect(getLevelUpPrompt(createMockState())).toEqual([]);
        const reached = evaluateProgression(withXp(350));
        expect(getLevelUpPrompt(reached)).toEqual([
            { stat: 'CONSTITUTION', label: 'Constitution (+20 HP, from 100)' },
            { stat: 'STRENGTH', label: 'Strength (+1 attack, from 4)' },
            { stat: 'AGILITY', label: 'Agility (+1 defense, from 1)' },
        ]);
    });
});
