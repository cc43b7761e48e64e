import type { DataSet } from "../log.types";
import { binDataSet } from "../binning/bin.window";
import { composeColumns, paint } from "./graph.compositor";
import { GraphOptionsSchema, type GraphOptions } from "./graph.config";
import { RasterCanvas } from "./raster.canvas";

export type RenderOptions = Partial<GraphOptions> & {
    /** Epoch ms, inclusive */
    visibleStart: number;
    /** Epoch ms, inclusive */
    visibleEnd: number;
};

/**
 * Full pipeline for one visible window. Re-run on every window change; nothing is cached.
 * Fewer than two visible points give a blank canvas.
 */
export function renderGraph(dataset: DataSet, options: RenderOptions): RasterCanvas {
    const { width, height, tickHalfLength } = GraphOptionsSchema.parse({
        width: options.width,
        height: options.height,
        tickHalfLength: options.tickHalfLength,
    });

    const canvas = new RasterCanvas(width, height);
    const binned = binDataSet(dataset, options.visibleStart, options.visibleEnd, width);
    paint(canvas, composeColumns(binned, height, tickHalfLength));

    return canvas;
}
