// src/features/log/graph/raster.canvas.ts
import { PNG } from "pngjs";
import { BACKGROUND_COLOR, type Rgb } from "./graph.config";

/**
 * Drawing surface the compositor talks to. Row 0 is the top row.
 */
export interface GraphCanvas {
    readonly width: number;
    readonly height: number;

    /** Inclusive of both rows. Rows outside the canvas are clipped. */
    drawVerticalSegment(x: number, y0: number, y1: number, color: Rgb): void;
}

/**
 * In-memory RGB raster with PNG export.
 */
export class RasterCanvas implements GraphCanvas {
    readonly width: number;
    readonly height: number;
    private readonly pixels: Uint8Array;

    constructor(width: number, height: number, background: Rgb = BACKGROUND_COLOR) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
            throw new Error(`Invalid canvas size ${width}x${height}`);
        }

        this.width = width;
        this.height = height;
        this.pixels = new Uint8Array(width * height * 3);

        for (let i = 0; i < width * height; i++) {
            this.pixels[i * 3] = background.r;
            this.pixels[i * 3 + 1] = background.g;
            this.pixels[i * 3 + 2] = background.b;
        }
    }

    drawVerticalSegment(x: number, y0: number, y1: number, color: Rgb): void {
        if (!Number.isInteger(x) || x < 0 || x >= this.width) return;

        const top = Math.max(0, Math.min(y0, y1));
        const bottom = Math.min(this.height - 1, Math.max(y0, y1));

        for (let y = top; y <= bottom; y++) {
            const i = (y * this.width + x) * 3;
            this.pixels[i] = color.r;
            this.pixels[i + 1] = color.g;
            this.pixels[i + 2] = color.b;
        }
    }

    getPixel(x: number, y: number): Rgb {
        if (x < 0 || x >= this.width || y < 0 || y >= this.height) {
            throw new RangeError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height}`);
        }
        const i = (y * this.width + x) * 3;
        return { r: this.pixels[i], g: this.pixels[i + 1], b: this.pixels[i + 2] };
    }

    /** Opaque RGBA PNG */
    toPng(): Buffer {
        const png = new PNG({ width: this.width, height: this.height });

        for (let i = 0; i < this.width * this.height; i++) {
            png.data[i * 4] = this.pixels[i * 3];
            png.data[i * 4 + 1] = this.pixels[i * 3 + 1];
            png.data[i * 4 + 2] = this.pixels[i * 3 + 2];
            png.data[i * 4 + 3] = 0xff;
        }

        return PNG.sync.write(png);
    }
}
