/**
 * GAME CONSTANTS
 * Central repository for map size, progression tuning and player stats.
 */
import type { LevelUpStat } from './types';

// Map layout
export const MAP_WIDTH = 80;
export const MAP_HEIGHT = 43;

export const ROOM_MAX_SIZE = 10;
export const ROOM_MIN_SIZE = 6;
export const MAX_ROOMS = 30;

export const MAX_ROOM_MONSTERS = 3;
export const MAX_ROOM_ITEMS = 2;

export const FOV_RADIUS = 10;

export const MESSAGE_LOG_LIMIT = 50;

export const PLAYER_ID = 'player';

export const INITIAL_PLAYER_STATS = {
    hp: 100,
    maxHp: 100,
    defense: 1,
    power: 4,
    xp: 0,
    xpYield: 0,
};

// Level-up threshold for level L is LEVEL_UP_BASE + L * LEVEL_UP_FACTOR (350, 500, 650, ...)
export const LEVEL_UP_BASE = 200;
export const LEVEL_UP_FACTOR = 150;

export const LEVEL_UP_OPTIONS: readonly LevelUpStat[] = ['CONSTITUTION', 'STRENGTH', 'AGILITY'];

export const LEVEL_UP_GAINS: Record<LevelUpStat, { maxHp: number; power: number; defense: number }> = {
    CONSTITUTION: { maxHp: 20, power: 0, defense: 0 },
    STRENGTH: { maxHp: 0, power: 1, defense: 0 },
    AGILITY: { maxHp: 0, power: 0, defense: 1 },
};

// Descending rests the player for this share of max HP (rounded down)
export const REST_HEAL_DIVISOR = 2;

export const FIREBALL_RADIUS = 3;
export const FIREBALL_DAMAGE = 25;

export const COLORS = {
    white: '#ffffff',
    violet: '#7f00ff',
    lightYellow: '#ffff72',
    orc: '#3f7f3f',
    troll: '#007f00',
    corpse: '#7f0000',
};
