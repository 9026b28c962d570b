/**
 * CORE ENGINE LOGIC
 * Immutable state in, immutable state out. gameReducer is the primary entry point;
 * one call resolves one player action and everything that follows it in the same tick.
 */
import type { Action, EngineServices, Entity, GameState } from './types';
import { FIREBALL_DAMAGE, FIREBALL_RADIUS } from './constants';
import { pointAdd, pointEquals, pointToKey } from './grid';
import { canDescend, isBlocked, withMessages } from './helpers';
import { moveTo } from './actor';
import { roomsAndCorridorsGenerator } from './mapGeneration';
import { createPlayer } from './systems/entities/entity-factory';
import { buildStore, getPlayer, isPlayer, withPlayer } from './systems/entity-store';
import { resolveAreaDamage, resolveAttack } from './systems/experience';
import { chooseLevelUp, evaluateProgression } from './systems/progression';
import { lineOfSightFov, refreshVisibility } from './systems/visibility';
import { descend } from './systems/transition';
import { resolveMonsterTurns } from './systems/ai';
import { seedForDepth } from './systems/rng';
import { validateReplayActions } from './systems/replay-validation';

export const DEFAULT_SERVICES: EngineServices = {
    generator: roomsAndCorridorsGenerator,
    fov: lineOfSightFov,
};

/**
 * Generate the first level of a run. Callers should pass a seed; the clock
 * fallback exists only for interactive play.
 */
export const generateInitialState = (seed?: string, services: EngineServices = DEFAULT_SERVICES): GameState => {
    const actualSeed = seed || String(Date.now());
    const depth = 1;
    const level = services.generator.generate({ depth, seed: seedForDepth(actualSeed, depth) });
    const player = createPlayer({ position: level.playerSpawn });

    const initialState: GameState = {
        turnNumber: 1,
        depth,
        playerId: player.id,
        entities: buildStore(player, level.spawned),
        map: { ...level.map, explored: new Set<string>() },
        fov: new Set<string>(),
        inventory: [],
        message: ['Welcome stranger! Prepare to perish in the Tombs of the Ancient Kings.'],
        gameStatus: 'playing',
        initialSeed: actualSeed,
        kills: 0,
        actionLog: [],
    };

    return refreshVisibility(initialState, services.fov);
};

const findLivingFighterAt = (state: GameState, target: Entity['position']): Entity | undefined =>
    state.entities.find(e =>
        !isPlayer(state, e) && e.blocks && !!e.combat?.alive && pointEquals(e.position, target));

/**
 * Everything after the player's action: monsters act on the updated view,
 * then progression is checked once experience for the tick is settled.
 */
const endPlayerTurn = (state: GameState, services: EngineServices): GameState => {
    if (!getPlayer(state).combat?.alive) {
        return { ...state, gameStatus: 'lost', turnNumber: state.turnNumber + 1 };
    }

    let curState = refreshVisibility(state, services.fov);
    curState = resolveMonsterTurns(curState);
    curState = evaluateProgression(curState);

    return { ...curState, turnNumber: curState.turnNumber + 1 };
};

const resolveGameState = (s: GameState, a: Action, services: EngineServices): GameState => {
    switch (a.type) {
        case 'MOVE': {
            const { dx, dy } = a.payload;
            if (!Number.isInteger(dx) || !Number.isInteger(dy) || Math.abs(dx) > 1 || Math.abs(dy) > 1) return s;

            const player = getPlayer(s);
            const destination = pointAdd(player.position, { x: dx, y: dy });
            const target = findLivingFighterAt(s, destination);
            if (target) {
                return endPlayerTurn(resolveAttack(s, player.id, target.id), services);
            }
            if (isBlocked(s, destination)) {
                return endPlayerTurn(s, services);
            }
            return endPlayerTurn(withPlayer(s, moveTo(player, destination)), services);
        }

        case 'WAIT':
            return endPlayerTurn(s, services);

        case 'CAST_FIREBALL': {
            const { target } = a.payload;
            if (!s.fov.has(pointToKey(target))) {
                return withMessages(s, ['Target is out of sight.']);
            }
            const announced = withMessages(s, [
                `The fireball explodes, burning everything within ${FIREBALL_RADIUS} tiles!`
            ]);
            const { state: burned } = resolveAreaDamage(announced, target, FIREBALL_RADIUS, FIREBALL_DAMAGE);
            return endPlayerTurn(burned, services);
        }

        case 'DESCEND': {
            if (!canDescend(s)) {
                return withMessages(s, ['There are no stairs here.']);
            }
            return evaluateProgression(descend(s, services));
        }

        case 'CHOOSE_LEVEL_UP':
            return chooseLevelUp(s, a.payload);

        case 'RESET':
            return generateInitialState(a.payload?.seed, services);

        default:
            return s;
    }
};

export const gameReducer = (state: GameState, action: Action, services: EngineServices = DEFAULT_SERVICES): GameState => {
    if (action.type === 'RESET') return resolveGameState(state, action, services);
    if (state.gameStatus === 'lost') return state;

    // Modal level-up: nothing else proceeds until a stat is picked
    if (state.gameStatus === 'choosing_level_up' && action.type !== 'CHOOSE_LEVEL_UP') return state;
    if (state.gameStatus !== 'choosing_level_up' && action.type === 'CHOOSE_LEVEL_UP') return state;

    const next = resolveGameState(state, action, services);
    if (next === state) return state;

    return {
        ...next,
        actionLog: [...next.actionLog, action]
    };
};

/**
 * Replays a recorded action log from a seed. Invalid entries are reported and skipped.
 */
export const replayActions = (
    seed: string,
    actions: unknown,
    services: EngineServices = DEFAULT_SERVICES
): { state: GameState; errors: string[] } => {
    const { actions: valid, errors } = validateReplayActions(actions);
    const state = valid.reduce((cur, action) => gameReducer(cur, action, services), generateInitialState(seed, services));
    return { state, errors };
};

/**
 * Generates a deterministic fingerprint for state verification.
 */
export const fingerprintFromState = (state: GameState): string => {
    const player = getPlayer(state);
    const entities = state.entities.map(e => ({
        id: e.id,
        kind: e.kind,
        position: e.position,
        hp: e.combat?.hp,
        alive: e.combat?.alive,
    }));

    const obj = {
        player: {
            position: player.position,
            level: player.level,
            combat: player.combat,
        },
        entities,
        depth: state.depth,
        turnNumber: state.turnNumber,
        kills: state.kills,
        gameStatus: state.gameStatus,
        pendingLevelUp: state.pendingLevelUp,
    };

    return JSON.stringify(obj);
};
