// src/features/log/graph/graph.compositor.ts
// Binned columns → draw commands → canvas

import clamp from "lodash/clamp";
import type { BinnedGraph } from "../binning/bin.window";
import {
    BOAT_SPEED_COLOR,
    TICK_HALF_LENGTH,
    WIND_DIRECTION_COLOR,
    WIND_SPEED_COLOR,
    type Rgb,
} from "./graph.config";
import { computeScales, directionRows, speedRows, type RowSpan } from "./graph.scale";
import type { GraphCanvas } from "./raster.canvas";

export type ChannelName = "boatspeed" | "windspeed" | "winddirection";

export type DrawCommand = {
    channel: ChannelName;
    x: number;
    y0: number;
    y1: number;
    color: Rgb;
};

function tick(y: number, height: number, halfLength: number): { y0: number; y1: number } {
    return {
        y0: clamp(y - halfLength, 0, height - 1),
        y1: clamp(y + halfLength, 0, height - 1),
    };
}

function channelCommands(
    channel: ChannelName,
    x: number,
    rows: RowSpan,
    color: Rgb,
    height: number,
    halfLength: number
): DrawCommand[] {
    return [
        { channel, x, color, ...tick(rows.yLow, height, halfLength) },
        { channel, x, color, ...tick(rows.yHigh, height, halfLength) },
        // drawn last so it sits on top of both ticks
        { channel, x, color, y0: rows.yLow, y1: rows.yHigh },
    ];
}

/**
 * Per column: boat speed, wind speed, then wind direction (topmost).
 */
export function composeColumns(
    graph: BinnedGraph,
    height: number,
    tickHalfLength: number = TICK_HALF_LENGTH
): DrawCommand[] {
    if (!graph.extents) return [];

    const scales = computeScales(graph.extents, height);
    const commands: DrawCommand[] = [];

    graph.columns.forEach((col, x) => {
        commands.push(
            ...channelCommands("boatspeed", x, speedRows(col.boatspeed, scales), BOAT_SPEED_COLOR, height, tickHalfLength),
            ...channelCommands("windspeed", x, speedRows(col.windspeed, scales), WIND_SPEED_COLOR, height, tickHalfLength),
            ...channelCommands("winddirection", x, directionRows(col.winddirection, scales), WIND_DIRECTION_COLOR, height, tickHalfLength)
        );
    });

    return commands;
}

export function paint(canvas: GraphCanvas, commands: readonly DrawCommand[]): void {
    for (const c of commands) {
        canvas.drawVerticalSegment(c.x, c.y0, c.y1, c.color);
    }
}
