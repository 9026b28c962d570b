/**
 * PROGRESSION STATE MACHINE
 *
 *   idle ──(xp ≥ threshold)──▶ threshold_reached ──(level += 1)──▶ awaiting_choice
 *     ▲                                                                   │
 *     └──────────────(stat picked, threshold spent, re-evaluate)──────────┘
 *
 * The modal choice is not a blocking call: while a choice is pending the state
 * carries `pendingLevelUp` and `gameStatus = 'choosing_level_up'`, and the
 * caller resumes the machine with `chooseLevelUp`.
 */
import type { Entity, GameState, LevelUpStat, PendingLevelUp } from '../types';
import { LEVEL_UP_BASE, LEVEL_UP_FACTOR, LEVEL_UP_GAINS, LEVEL_UP_OPTIONS } from '../constants';
import { addDefense, addPower, increaseMaxHp } from '../actor';
import { withMessages } from '../helpers';
import { getPlayer, withPlayer } from './entity-store';

export type ProgressionPhase = 'idle' | 'awaiting_choice';

export type ThresholdCheck =
    | { phase: 'idle'; threshold: number }
    | { phase: 'threshold_reached'; threshold: number; nextLevel: number };

export interface LevelUpOption {
    stat: LevelUpStat;
    label: string;
}

/** Total experience needed to leave `level`. Recomputed every time, never cached. */
export const levelUpThreshold = (level: number): number => LEVEL_UP_BASE + level * LEVEL_UP_FACTOR;

export const checkThreshold = (player: Entity): ThresholdCheck => {
    const threshold = levelUpThreshold(player.level);
    const xp = player.combat?.xp ?? 0;
    return xp >= threshold
        ? { phase: 'threshold_reached', threshold, nextLevel: player.level + 1 }
        : { phase: 'idle', threshold };
};

export const getProgressionPhase = (state: GameState): ProgressionPhase =>
    state.pendingLevelUp ? 'awaiting_choice' : 'idle';

export const isLevelUpStat = (value: unknown): value is LevelUpStat =>
    LEVEL_UP_OPTIONS.some(option => option === value);

/**
 * Per-tick hook. Runs after every action of the tick has been resolved.
 * No-op while a choice is already pending or the player is dead.
 */
export const evaluateProgression = (state: GameState): GameState => {
    if (state.pendingLevelUp || state.gameStatus === 'lost') return state;

    const player = getPlayer(state);
    if (!player.combat?.alive) return state;

    const check = checkThreshold(player);
    if (check.phase === 'idle') return state;

    // threshold_reached -> awaiting_choice: the level goes up before the stat is picked
    const pendingLevelUp: PendingLevelUp = {
        level: check.nextLevel,
        threshold: check.threshold,
        options: [...LEVEL_UP_OPTIONS],
    };
    const next = withPlayer(state, { ...player, level: check.nextLevel });
    return withMessages(
        { ...next, pendingLevelUp, gameStatus: 'choosing_level_up' },
        [`Your battle skills grow stronger! You reached level ${check.nextLevel}!`]
    );
};

export const applyLevelUpStat = (player: Entity, stat: LevelUpStat): Entity => {
    const gains = LEVEL_UP_GAINS[stat];
    let next = player;
    if (gains.maxHp > 0) next = increaseMaxHp(next, gains.maxHp, true);
    if (gains.power > 0) next = addPower(next, gains.power);
    if (gains.defense > 0) next = addDefense(next, gains.defense);
    return next;
};

/**
 * awaiting_choice -> idle. Anything but one of the offered stats leaves the
 * state untouched, so the caller simply prompts again. A valid pick spends the
 * recorded threshold and immediately re-evaluates, which may open the next choice.
 */
export const chooseLevelUp = (state: GameState, choice: unknown): GameState => {
    const pending = state.pendingLevelUp;
    if (!pending || !isLevelUpStat(choice) || !pending.options.includes(choice)) return state;

    const player = getPlayer(state);
    const combat = player.combat;
    if (!combat) return state;

    const spent: Entity = { ...player, combat: { ...combat, xp: combat.xp - pending.threshold } };
    const { pendingLevelUp: _resolved, ...rest } = withPlayer(state, applyLevelUpStat(spent, choice));
    return evaluateProgression({ ...rest, gameStatus: 'playing' });
};

export const getLevelUpPrompt = (state: GameState): LevelUpOption[] => {
    const pending = state.pendingLevelUp;
    if (!pending) return [];
    const combat = getPlayer(state).combat;
    const maxHp = combat?.maxHp ?? 0;
    const power = combat?.power ?? 0;
    const defense = combat?.defense ?? 0;

    const labels: Record<LevelUpStat, string> = {
        CONSTITUTION: `Constitution (+${LEVEL_UP_GAINS.CONSTITUTION.maxHp} HP, from ${maxHp})`,
        STRENGTH: `Strength (+${LEVEL_UP_GAINS.STRENGTH.power} attack, from ${power})`,
        AGILITY: `Agility (+${LEVEL_UP_GAINS.AGILITY.defense} defense, from ${defense})`,
    };
    return pending.options.map(stat => ({ stat, label: labels[stat] }));
};

/**
 * Character sheet lines for the info screen.
 */
export const describeCharacter = (state: GameState): string[] => {
    const player = getPlayer(state);
    const combat = player.combat;
    return [
        `Level: ${player.level}`,
        `Experience: ${combat?.xp ?? 0}`,
        `Experience to level up: ${levelUpThreshold(player.level)}`,
        `Maximum HP: ${combat?.maxHp ?? 0}`,
        `Attack: ${combat?.power ?? 0}`,
        `Defense: ${combat?.defense ?? 0}`,
        `Dungeon depth: ${state.depth}`,
    ];
};
