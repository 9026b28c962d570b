import type {
    Bestiary,
    ItemTemplate,
    ItemTemplateId,
    MonsterTemplate,
    MonsterTemplateId
} from './contracts';

export interface BestiaryValidationIssue {
    path: string;
    message: string;
}

export class BestiaryValidationError extends Error {
    issues: BestiaryValidationIssue[];
    constructor(issues: BestiaryValidationIssue[]) {
        super(`Bestiary validation failed:\n${issues.map(i => `${i.path}: ${i.message}`).join('\n')}`);
        this.name = 'BestiaryValidationError';
        this.issues = issues;
    }
}

const MONSTER_IDS: readonly MonsterTemplateId[] = ['orc', 'troll'];
const ITEM_IDS: readonly ItemTemplateId[] = ['healing_potion', 'lightning_bolt', 'fireball', 'confusion'];

const isRecord = (v: unknown): v is Record<string, unknown> =>
    typeof v === 'object' && v !== null && !Array.isArray(v);

const isStr = (v: unknown): v is string => typeof v === 'string';

const isMonsterId = (v: unknown): v is MonsterTemplateId => MONSTER_IDS.some(id => id === v);
const isItemId = (v: unknown): v is ItemTemplateId => ITEM_IDS.some(id => id === v);

const isNonNegativeInt = (v: unknown): v is number =>
    typeof v === 'number' && Number.isInteger(v) && v >= 0;

const push = (issues: BestiaryValidationIssue[], path: string, message: string) =>
    issues.push({ path, message });

const readGlyph = (input: Record<string, unknown>, issues: BestiaryValidationIssue[], path: string): string => {
    const glyph = input.glyph;
    if (!isStr(glyph) || glyph.length !== 1) {
        push(issues, `${path}.glyph`, 'Expected a single character');
        return '?';
    }
    return glyph;
};

const readString = (input: Record<string, unknown>, key: string, issues: BestiaryValidationIssue[], path: string): string => {
    const value = input[key];
    if (!isStr(value) || value.length === 0) {
        push(issues, `${path}.${key}`, 'Expected non-empty string');
        return '';
    }
    return value;
};

const readCount = (input: Record<string, unknown>, key: string, issues: BestiaryValidationIssue[], path: string): number => {
    const value = input[key];
    if (!isNonNegativeInt(value)) {
        push(issues, `${path}.${key}`, 'Expected non-negative integer');
        return 0;
    }
    return value;
};

const checkChanceTotal = (chances: number[], issues: BestiaryValidationIssue[], path: string) => {
    const total = chances.reduce((sum, c) => sum + c, 0);
    if (chances.length > 0 && total !== 100) push(issues, path, `Spawn chances add up to ${total}, expected 100`);
};

const parseMonster = (input: unknown, issues: BestiaryValidationIssue[], path: string): MonsterTemplate | undefined => {
    if (!isRecord(input)) {
        push(issues, path, 'Expected object');
        return undefined;
    }
    if (!isMonsterId(input.id)) {
        push(issues, `${path}.id`, `Expected one of ${MONSTER_IDS.join(', ')}`);
        return undefined;
    }
    if (!isRecord(input.stats)) {
        push(issues, `${path}.stats`, 'Expected object');
        return undefined;
    }
    const hp = readCount(input.stats, 'hp', issues, `${path}.stats`);
    if (hp === 0) push(issues, `${path}.stats.hp`, 'Must be positive');

    return {
        id: input.id,
        name: readString(input, 'name', issues, path),
        glyph: readGlyph(input, issues, path),
        color: readString(input, 'color', issues, path),
        spawnChance: readCount(input, 'spawnChance', issues, path),
        stats: {
            hp,
            defense: readCount(input.stats, 'defense', issues, `${path}.stats`),
            power: readCount(input.stats, 'power', issues, `${path}.stats`),
            xpYield: readCount(input.stats, 'xpYield', issues, `${path}.stats`),
        }
    };
};

const parseItem = (input: unknown, issues: BestiaryValidationIssue[], path: string): ItemTemplate | undefined => {
    if (!isRecord(input)) {
        push(issues, path, 'Expected object');
        return undefined;
    }
    if (!isItemId(input.id)) {
        push(issues, `${path}.id`, `Expected one of ${ITEM_IDS.join(', ')}`);
        return undefined;
    }
    return {
        id: input.id,
        name: readString(input, 'name', issues, path),
        glyph: readGlyph(input, issues, path),
        color: readString(input, 'color', issues, path),
        spawnChance: readCount(input, 'spawnChance', issues, path),
    };
};

export const validateBestiary = (input: unknown): { bestiary: Bestiary; issues: BestiaryValidationIssue[] } => {
    const issues: BestiaryValidationIssue[] = [];
    const bestiary: Bestiary = { monsters: [], items: [] };
    if (!isRecord(input)) {
        push(issues, '$', 'Expected bestiary object');
        return { bestiary, issues };
    }

    if (!Array.isArray(input.monsters)) {
        push(issues, '$.monsters', 'Expected array');
    } else {
        input.monsters.forEach((entry, idx) => {
            const monster = parseMonster(entry, issues, `$.monsters[${idx}]`);
            if (monster) bestiary.monsters.push(monster);
        });
        checkChanceTotal(bestiary.monsters.map(m => m.spawnChance), issues, '$.monsters');
    }

    if (!Array.isArray(input.items)) {
        push(issues, '$.items', 'Expected array');
    } else {
        input.items.forEach((entry, idx) => {
            const item = parseItem(entry, issues, `$.items[${idx}]`);
            if (item) bestiary.items.push(item);
        });
        checkChanceTotal(bestiary.items.map(i => i.spawnChance), issues, '$.items');
    }

    return { bestiary, issues };
};

export const parseBestiary = (input: unknown): Bestiary => {
    const { bestiary, issues } = validateBestiary(input);
    if (issues.length > 0) throw new BestiaryValidationError(issues);
    return bestiary;
};
