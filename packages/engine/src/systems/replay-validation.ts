import type { Action, Point } from '../types';

export interface ReplayActionValidationResult {
    valid: boolean;
    actions: Action[];
    errors: string[];
}

const isObject = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null;

const isInt = (value: unknown): value is number => typeof value === 'number' && Number.isInteger(value);

const isPoint = (value: unknown): value is Point =>
    isObject(value) && isInt(value.x) && isInt(value.y);

/**
 * Rebuilds a typed action from untrusted input, or explains why it cannot.
 */
const toAction = (candidate: Record<string, unknown>): Action | string => {
    const payload = candidate.payload;
    switch (candidate.type) {
        case 'WAIT':
            return { type: 'WAIT' };
        case 'DESCEND':
            return { type: 'DESCEND' };
        case 'CHOOSE_LEVEL_UP':
            return { type: 'CHOOSE_LEVEL_UP', payload };
        case 'MOVE':
            if (!isObject(payload) || !isInt(payload.dx) || !isInt(payload.dy)) return 'MOVE needs integer payload.dx and payload.dy';
            return { type: 'MOVE', payload: { dx: payload.dx, dy: payload.dy } };
        case 'CAST_FIREBALL':
            if (!isObject(payload) || !isPoint(payload.target)) return 'CAST_FIREBALL needs payload.target { x, y }';
            return { type: 'CAST_FIREBALL', payload: { target: { x: payload.target.x, y: payload.target.y } } };
        default:
            return `type "${String(candidate.type)}" is not replayable`;
    }
};

export const validateReplayActions = (actions: unknown): ReplayActionValidationResult => {
    if (!Array.isArray(actions)) {
        return {
            valid: false,
            actions: [],
            errors: ['Replay actions must be an array.']
        };
    }

    const validActions: Action[] = [];
    const errors: string[] = [];

    actions.forEach((candidate, index) => {
        if (!isObject(candidate) || typeof candidate.type !== 'string') {
            errors.push(`Action[${index}] is not a valid action object with a "type" field.`);
            return;
        }
        const action = toAction(candidate);
        if (typeof action === 'string') {
            errors.push(`Action[${index}] ${action}.`);
            return;
        }
        validActions.push(action);
    });

    return {
        valid: errors.length === 0,
        actions: validActions,
        errors
    };
};
