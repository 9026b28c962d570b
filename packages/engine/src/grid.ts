/**
 * GRID GEOMETRY
 * Square-grid math on integer points. Pure functions only.
 */
import type { Point } from './types';

export const createPoint = (x: number, y: number): Point => ({ x, y });

/**
 * Single source of truth for coordinate keys.
 */
export const pointToKey = (pos: Point): string => `${pos.x},${pos.y}`;

export const pointEquals = (a: Point, b: Point): boolean => a.x === b.x && a.y === b.y;

export const pointAdd = (a: Point, b: Point): Point => createPoint(a.x + b.x, a.y + b.y);

export const distance = (a: Point, b: Point): number => Math.hypot(b.x - a.x, b.y - a.y);

/** King-move distance: the number of single steps between two tiles. */
export const chebyshevDistance = (a: Point, b: Point): number =>
    Math.max(Math.abs(b.x - a.x), Math.abs(b.y - a.y));

export const isInBounds = (pos: Point, width: number, height: number): boolean =>
    pos.x >= 0 && pos.y >= 0 && pos.x < width && pos.y < height;

const lerp = (a: number, b: number, t: number) => a + (b - a) * t;

/**
 * Line drawing by interpolation, start and end included.
 */
export const getLine = (start: Point, end: Point): Point[] => {
    const steps = chebyshevDistance(start, end);
    const results: Point[] = [];
    for (let i = 0; i <= steps; i++) {
        const t = steps === 0 ? 0 : i / steps;
        results.push(createPoint(
            Math.round(lerp(start.x, end.x, t)),
            Math.round(lerp(start.y, end.y, t))
        ));
    }
    return results;
};

/**
 * One step from `from` toward `to`, as in a monster closing in.
 * The direction is normalised and rounded, so diagonals are allowed.
 */
export const stepToward = (from: Point, to: Point): Point => {
    const dx = to.x - from.x;
    const dy = to.y - from.y;
    const dist = Math.hypot(dx, dy);
    if (dist === 0) return createPoint(0, 0);
    return createPoint(Math.round(dx / dist), Math.round(dy / dist));
};
