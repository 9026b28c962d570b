import {
    canDescend,
    chebyshevDistance,
    createRng,
    gameReducer,
    generateInitialState,
    getDrawableEntities,
    getLevelUpPrompt,
    getPlayer,
    isBlocked,
    pointAdd,
    stepToward,
    type Action,
    type GameState,
    type Point,
    type Rng
} from '../src/index';

const count = Number(process.argv[2] || 5);
const maxTurns = Number(process.argv[3] || 500);
const seeds = Array.from({ length: count }, (_, i) => `autoplay-seed-${i + 1}`);

const DIRECTIONS: Point[] = [
    { x: -1, y: -1 }, { x: 0, y: -1 }, { x: 1, y: -1 },
    { x: -1, y: 0 }, { x: 1, y: 0 },
    { x: -1, y: 1 }, { x: 0, y: 1 }, { x: 1, y: 1 },
];

const chooseAction = (state: GameState, rng: Rng): Action => {
    if (state.gameStatus === 'choosing_level_up') {
        const options = getLevelUpPrompt(state);
        const pick = options[rng.int(0, options.length - 1)];
        return { type: 'CHOOSE_LEVEL_UP', payload: pick?.stat };
    }
    if (canDescend(state)) return { type: 'DESCEND' };

    const player = getPlayer(state);
    const drawable = getDrawableEntities(state);
    const monster = drawable
        .filter(e => e.kind === 'monster' && e.combat?.alive)
        .sort((a, b) => chebyshevDistance(player.position, a.position) - chebyshevDistance(player.position, b.position))[0];
    const stairs = drawable.find(e => e.kind === 'stairs');
    const goal = monster ?? stairs;

    if (goal) {
        const step = stepToward(player.position, goal.position);
        const destination = pointAdd(player.position, step);
        if (goal === monster && chebyshevDistance(player.position, goal.position) <= 1) {
            return { type: 'MOVE', payload: { dx: step.x, dy: step.y } };
        }
        if (!isBlocked(state, destination)) return { type: 'MOVE', payload: { dx: step.x, dy: step.y } };
    }

    const dir = DIRECTIONS[rng.int(0, DIRECTIONS.length - 1)] ?? { x: 0, y: 1 };
    return { type: 'MOVE', payload: { dx: dir.x, dy: dir.y } };
};

const runSeed = (seed: string) => {
    const rng = createRng(`policy:${seed}`);
    let state = generateInitialState(seed);
    let steps = 0;
    while (state.gameStatus !== 'lost' && state.turnNumber <= maxTurns && steps < maxTurns * 4) {
        state = gameReducer(state, chooseAction(state, rng));
        steps++;
    }
    const player = getPlayer(state);
    return {
        seed,
        status: state.gameStatus,
        depth: state.depth,
        level: player.level,
        xp: player.combat?.xp ?? 0,
        hp: player.combat?.hp ?? 0,
        kills: state.kills,
        turns: state.turnNumber,
        actions: state.actionLog.length,
    };
};

const results = seeds.map(runSeed);
const summary = {
    runs: results.length,
    maxDepth: Math.max(...results.map(r => r.depth)),
    avgLevel: results.reduce((sum, r) => sum + r.level, 0) / Math.max(1, results.length),
    deaths: results.filter(r => r.status === 'lost').length,
};

console.log(JSON.stringify({ maxTurns, summary, results }, null, 2));
