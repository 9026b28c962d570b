export type MonsterTemplateId = 'orc' | 'troll';
export type ItemTemplateId = 'healing_potion' | 'lightning_bolt' | 'fireball' | 'confusion';

export interface MonsterTemplate {
    id: MonsterTemplateId;
    name: string;
    glyph: string;
    color: string;
    /** Percent chance per spawn roll; a table's chances add up to 100. */
    spawnChance: number;
    stats: {
        hp: number;
        defense: number;
        power: number;
        xpYield: number;
    };
}

export interface ItemTemplate {
    id: ItemTemplateId;
    name: string;
    glyph: string;
    color: string;
    spawnChance: number;
}

export interface Bestiary {
    monsters: MonsterTemplate[];
    items: ItemTemplate[];
}
