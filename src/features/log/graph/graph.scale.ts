import type { ChannelExtent } from "../binning/bin.reduce";
import type { GlobalExtents } from "../binning/bin.window";

export type GraphScales = {
    /** px per knot, shared by boat speed and wind speed */
    speedScale: number;
    /** px per degree of folded wind direction */
    directionScale: number;
    height: number;
};

export type RowSpan = { yLow: number; yHigh: number };

/**
 * Boat and wind speed share one scale so they compare directly.
 * One knot of headroom keeps the largest value off the edge.
 */
export function computeScales(extents: GlobalExtents, height: number): GraphScales {
    const largestSpeed = Math.max(extents.boatspeed.max, extents.windspeed.max);
    return {
        speedScale: (height - 1) / (Math.floor(largestSpeed) + 1),
        directionScale: height / 180,
        height,
    };
}

// Truncate toward zero, never below row 0.
function toRow(v: number): number {
    return Math.max(0, Math.trunc(v));
}

export function speedRows(extent: ChannelExtent, scales: GraphScales): RowSpan {
    return {
        yLow: toRow(extent.low * scales.speedScale),
        yHigh: toRow(extent.high * scales.speedScale),
    };
}

/**
 * Direction is inverted (0° at the bottom), so low and high swap rows.
 */
export function directionRows(extent: ChannelExtent, scales: GraphScales): RowSpan {
    return {
        yLow: scales.height - toRow(extent.high * scales.directionScale),
        yHigh: scales.height - toRow(extent.low * scales.directionScale),
    };
}
