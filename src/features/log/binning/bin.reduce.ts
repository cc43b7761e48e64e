import orderBy from "lodash/orderBy";

/**
 * Two readings closer than this count as the same value when building the mode pair.
 */
export const APPROX_EPSILON = 1e-6;

export type ChannelExtent = { low: number; high: number };

export function approxEqual(a: number, b: number, epsilon: number = APPROX_EPSILON): boolean {
    return Math.abs(a - b) <= epsilon;
}

/**
 * Reflect directions past 180° onto 0..180 (200 → 160, 360 → 0).
 */
export function foldDirection(deg: number): number {
    return deg > 180 ? 360 - deg : deg;
}

type ValueGroup = { value: number; count: number };

/**
 * Reduce a bin's readings to the two most frequent values, returned as (low, high).
 *
 * Readings within `epsilon` of a group's first value join that group. Groups are ranked by
 * count, ties going to the smaller value. With a single group both ends are that value.
 */
export function modePair(values: readonly number[], epsilon: number = APPROX_EPSILON): ChannelExtent {
    if (values.length === 0) return { low: 0, high: 0 };
    if (values.length === 1) return { low: values[0], high: values[0] };

    const groups: ValueGroup[] = [];
    for (const v of values) {
        const g = groups.find((x) => approxEqual(x.value, v, epsilon));
        if (g) g.count++;
        else groups.push({ value: v, count: 1 });
    }

    const ranked = orderBy(groups, ["count", "value"], ["desc", "asc"]);
    const a = ranked[0].value;
    const b = ranked.length > 1 ? ranked[1].value : a;

    return { low: Math.min(a, b), high: Math.max(a, b) };
}
