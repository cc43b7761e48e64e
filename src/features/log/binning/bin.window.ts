// src/features/log/binning/bin.window.ts
// Time-windowed binning: one column per pixel, each reduced to a mode pair per channel.

import maxBy from "lodash/maxBy";
import minBy from "lodash/minBy";
import type { DataPoint, DataSet } from "../log.types";
import { foldDirection, modePair, type ChannelExtent } from "./bin.reduce";

/**
 * Smallest bin width. Keeps the sweep moving when the visible span is shorter than one ms per column.
 */
export const MIN_BIN_DURATION_MS = 1;

export type BinColumn = {
    /** Inclusive bin start (epoch ms) */
    start: number;
    /** Exclusive bin end (epoch ms) */
    end: number;
    memberCount: number;

    boatspeed: ChannelExtent;
    windspeed: ChannelExtent;
    /** Folded onto 0..180 */
    winddirection: ChannelExtent;
};

export type ValueRange = { min: number; max: number };

/**
 * Per-channel range over every point in the visible window.
 */
export type GlobalExtents = {
    boatspeed: ValueRange;
    windspeed: ValueRange;
    winddirection: ValueRange;
};

export type BinnedGraph = {
    columns: BinColumn[];
    /** null when fewer than two points are visible */
    extents: GlobalExtents | null;
    binDurationMs: number;
};

function emptyGraph(): BinnedGraph {
    return { columns: [], extents: null, binDurationMs: 0 };
}

function rangeOf(values: number[]): ValueRange {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
        if (v < min) min = v;
        if (v > max) max = v;
    }
    return { min, max };
}

function reduceBin(start: number, end: number, members: DataPoint[]): BinColumn {
    return {
        start,
        end,
        memberCount: members.length,
        boatspeed: modePair(members.map((p) => p.boatspeed)),
        windspeed: modePair(members.map((p) => p.windspeed)),
        winddirection: modePair(members.map((p) => foldDirection(p.winddirection))),
    };
}

/**
 * Split [visibleStart, visibleEnd] into at most `binCount` equal columns.
 */
export function binDataSet(
    dataset: DataSet,
    visibleStart: number,
    visibleEnd: number,
    binCount: number
): BinnedGraph {
    const columnsMax = Math.floor(binCount);
    if (!Number.isFinite(columnsMax) || columnsMax < 1) return emptyGraph();

    const visible = dataset.filter((p) => p.timestamp >= visibleStart && p.timestamp <= visibleEnd);
    if (visible.length < 2) return emptyGraph();

    // visible.length >= 2, so both exist
    const first = minBy(visible, (p) => p.timestamp)?.timestamp ?? visibleStart;
    const last = maxBy(visible, (p) => p.timestamp)?.timestamp ?? visibleEnd;

    const earliest = Math.max(first, visibleStart);
    const latest = Math.min(last, visibleEnd);

    const binDurationMs = Math.max(
        MIN_BIN_DURATION_MS,
        Math.floor((latest - earliest) / columnsMax)
    );

    const columns: BinColumn[] = [];
    for (
        let binStart = earliest;
        binStart <= latest && columns.length < columnsMax;
        binStart += binDurationMs
    ) {
        const binEnd = binStart + binDurationMs;
        const members = visible.filter((p) => p.timestamp >= binStart && p.timestamp < binEnd);
        columns.push(reduceBin(binStart, binEnd, members));
    }

    return {
        columns,
        binDurationMs,
        extents: {
            boatspeed: rangeOf(visible.map((p) => p.boatspeed)),
            windspeed: rangeOf(visible.map((p) => p.windspeed)),
            winddirection: rangeOf(visible.map((p) => foldDirection(p.winddirection))),
        },
    };
}
