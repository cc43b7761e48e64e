import { describe, it, expect } from "vitest";
import type { DataPoint } from "../log.types";
import { BACKGROUND_COLOR, BOAT_SPEED_COLOR, WIND_DIRECTION_COLOR, WIND_SPEED_COLOR } from "./graph.config";
import { renderGraph } from "./graph.render";
import type { RasterCanvas } from "./raster.canvas";

const BASE = Date.UTC(2024, 0, 1, 12, 0, 0);

const THREE: DataPoint[] = [
    { timestamp: BASE, boatspeed: 2, windspeed: 5, winddirection: 10 },
    { timestamp: BASE + 1000, boatspeed: 2, windspeed: 5, winddirection: 10 },
    { timestamp: BASE + 2000, boatspeed: 9, windspeed: 5, winddirection: 10 },
];

function isBlank(canvas: RasterCanvas): boolean {
    for (let x = 0; x < canvas.width; x++) {
        for (let y = 0; y < canvas.height; y++) {
            const p = canvas.getPixel(x, y);
            if (p.r !== BACKGROUND_COLOR.r || p.g !== BACKGROUND_COLOR.g || p.b !== BACKGROUND_COLOR.b) return false;
        }
    }
    return true;
}

describe("renderGraph", () => {
    it("returns a blank image of the requested size for an empty data set", () => {
        const canvas = renderGraph([], { width: 20, height: 10, visibleStart: 0, visibleEnd: 0 });

        expect(canvas.width).toBe(20);
        expect(canvas.height).toBe(10);
        expect(isBlank(canvas)).toBe(true);
    });

    it("stays blank with fewer than two visible points", () => {
        const canvas = renderGraph(THREE, { width: 5, height: 50, visibleStart: BASE + 1500, visibleEnd: BASE + 9000 });
        expect(isBlank(canvas)).toBe(true);
    });

    it("scales by the visible maximum and draws the mode pair", () => {
        // speedScale = 100 / 10 = 10 → boat row 20, wind row 50; direction row 96
        const canvas = renderGraph(THREE, { width: 1, height: 101, visibleStart: BASE, visibleEnd: BASE + 2000 });

        expect(canvas.getPixel(0, 13)).toEqual(BACKGROUND_COLOR);
        expect(canvas.getPixel(0, 14)).toEqual(BOAT_SPEED_COLOR);
        expect(canvas.getPixel(0, 20)).toEqual(BOAT_SPEED_COLOR);
        expect(canvas.getPixel(0, 26)).toEqual(BOAT_SPEED_COLOR);
        expect(canvas.getPixel(0, 30)).toEqual(BACKGROUND_COLOR);

        expect(canvas.getPixel(0, 50)).toEqual(WIND_SPEED_COLOR);
        expect(canvas.getPixel(0, 90)).toEqual(WIND_DIRECTION_COLOR);
        expect(canvas.getPixel(0, 96)).toEqual(WIND_DIRECTION_COLOR);
        expect(canvas.getPixel(0, 100)).toEqual(WIND_DIRECTION_COLOR);

        // 9 knots would be row 90, which only the direction tick covers
        expect(canvas.getPixel(0, 89)).toEqual(BACKGROUND_COLOR);
    });

    it("falls back to the default size", () => {
        const canvas = renderGraph([], { visibleStart: 0, visibleEnd: 0 });
        expect(canvas.width).toBe(1000);
        expect(canvas.height).toBe(400);
    });

    it("is deterministic", () => {
        const opts = { width: 3, height: 60, visibleStart: BASE, visibleEnd: BASE + 2000 };
        expect(renderGraph(THREE, opts).toPng().equals(renderGraph(THREE, opts).toPng())).toBe(true);
    });
});
