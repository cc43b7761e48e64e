import { describe, it, expect } from "vitest";
import type { BinColumn, BinnedGraph, GlobalExtents } from "../binning/bin.window";
import { composeColumns, paint, type DrawCommand } from "./graph.compositor";
import { BOAT_SPEED_COLOR, WIND_DIRECTION_COLOR, WIND_SPEED_COLOR } from "./graph.config";
import { computeScales } from "./graph.scale";
import type { GraphCanvas } from "./raster.canvas";

const BASE = Date.UTC(2024, 0, 1);

function graphOf(
    column: Pick<BinColumn, "boatspeed" | "windspeed" | "winddirection">,
    boatMax: number,
    windMax: number
): BinnedGraph {
    return {
        binDurationMs: 2000,
        columns: [{ start: BASE, end: BASE + 2000, memberCount: 2, ...column }],
        extents: {
            boatspeed: { min: 0, max: boatMax },
            windspeed: { min: 0, max: windMax },
            winddirection: { min: 0, max: 180 },
        },
    };
}

const strip = (cmds: DrawCommand[]) => cmds.map(({ channel, y0, y1 }) => [channel, y0, y1]);

describe("computeScales", () => {
    const extents = (boatMax: number, windMax: number): GlobalExtents => ({
        boatspeed: { min: 0, max: boatMax },
        windspeed: { min: 0, max: windMax },
        winddirection: { min: 0, max: 180 },
    });

    it("shares one speed scale with one knot of headroom", () => {
        const scales = computeScales(extents(9, 5.5), 101);
        expect(scales.speedScale).toBe(10);
        expect(scales.directionScale).toBe(101 / 180);
    });

    it("uses the larger of boat and wind speed", () => {
        expect(computeScales(extents(4, 19.9), 201).speedScale).toBe(10);
    });
});

describe("composeColumns", () => {
    it("draws nothing without extents", () => {
        expect(composeColumns({ columns: [], extents: null, binDurationMs: 0 }, 100)).toEqual([]);
    });

    it("issues ticks then the segment per channel, direction last", () => {
        const graph = graphOf(
            {
                boatspeed: { low: 2, high: 2 },
                windspeed: { low: 5, high: 5 },
                winddirection: { low: 10, high: 10 },
            },
            9,
            5
        );

        // speedScale = 100 / 10 = 10; direction row = 101 - trunc(10 * 101 / 180) = 96
        const cmds = composeColumns(graph, 101);

        expect(strip(cmds)).toEqual([
            ["boatspeed", 14, 26],
            ["boatspeed", 14, 26],
            ["boatspeed", 20, 20],
            ["windspeed", 44, 56],
            ["windspeed", 44, 56],
            ["windspeed", 50, 50],
            ["winddirection", 90, 100],
            ["winddirection", 90, 100],
            ["winddirection", 96, 96],
        ]);
        expect(cmds.every((c) => c.x === 0)).toBe(true);
        expect(cmds[0].color).toEqual(BOAT_SPEED_COLOR);
        expect(cmds[3].color).toEqual(WIND_SPEED_COLOR);
        expect(cmds[8].color).toEqual(WIND_DIRECTION_COLOR);
    });

    it("clamps ticks to the canvas and inverts direction", () => {
        const graph = graphOf(
            {
                boatspeed: { low: 0, high: 9 },
                windspeed: { low: 0, high: 0 },
                winddirection: { low: 0, high: 180 },
            },
            9,
            0
        );

        // height 360: speedScale = 359 / 10, directionScale = 2
        const cmds = composeColumns(graph, 360);

        expect(strip(cmds.filter((c) => c.channel === "boatspeed"))).toEqual([
            ["boatspeed", 0, 6],
            ["boatspeed", 317, 329],
            ["boatspeed", 0, 323],
        ]);
        expect(strip(cmds.filter((c) => c.channel === "winddirection"))).toEqual([
            ["winddirection", 0, 6],
            ["winddirection", 354, 359],
            ["winddirection", 0, 360],
        ]);
    });

    it("honours a custom tick length", () => {
        const graph = graphOf(
            {
                boatspeed: { low: 2, high: 2 },
                windspeed: { low: 5, high: 5 },
                winddirection: { low: 10, high: 10 },
            },
            9,
            5
        );
        expect(strip(composeColumns(graph, 101, 0)).slice(0, 3)).toEqual([
            ["boatspeed", 20, 20],
            ["boatspeed", 20, 20],
            ["boatspeed", 20, 20],
        ]);
    });
});

describe("paint", () => {
    it("forwards every command to the canvas in order", () => {
        const calls: Array<[number, number, number]> = [];
        const canvas: GraphCanvas = {
            width: 1,
            height: 10,
            drawVerticalSegment: (x, y0, y1) => {
                calls.push([x, y0, y1]);
            },
        };

        paint(canvas, [
            { channel: "boatspeed", x: 0, y0: 1, y1: 2, color: BOAT_SPEED_COLOR },
            { channel: "windspeed", x: 0, y0: 3, y1: 4, color: WIND_SPEED_COLOR },
        ]);

        expect(calls).toEqual([[0, 1, 2], [0, 3, 4]]);
    });
});
