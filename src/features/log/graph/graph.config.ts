import { z } from "zod";

export type Rgb = { r: number; g: number; b: number };

export const BOAT_SPEED_COLOR: Rgb = { r: 0x00, g: 0xff, b: 0x00 };
export const WIND_SPEED_COLOR: Rgb = { r: 0xff, g: 0xff, b: 0xff };
export const WIND_DIRECTION_COLOR: Rgb = { r: 0xff, g: 0x00, b: 0x00 };
export const BACKGROUND_COLOR: Rgb = { r: 0x00, g: 0x00, b: 0x00 };

export const GRAPH_IMAGE_WIDTH = 1000;
export const GRAPH_IMAGE_HEIGHT = 400;

/** Half length (px) of the tick drawn at each end of a column mark */
export const TICK_HALF_LENGTH = 6;

export const GraphOptionsSchema = z.object({
    width: z.number().int().positive().default(GRAPH_IMAGE_WIDTH),
    height: z.number().int().min(2).default(GRAPH_IMAGE_HEIGHT),
    tickHalfLength: z.number().int().nonnegative().default(TICK_HALF_LENGTH),
});

export type GraphOptions = z.infer<typeof GraphOptionsSchema>;
