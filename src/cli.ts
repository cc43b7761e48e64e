// src/cli.ts
import { writeFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { CliOptionsSchema, type CliOptions } from "./cli.schemas";
import {
    createTimeWindowStore,
    dataRange,
    loadLogFile,
    renderGraph,
    type DataSet,
    type TimeRange,
} from "./features/log";

export const USAGE =
    "Usage: sailplot [file] [--out graph.png] [--width 1000] [--height 400] " +
    "[--start ISO] [--end ISO] [--from SEC] [--to SEC]";

export function parseCliOptions(argv: string[]): CliOptions {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            out: { type: "string", short: "o" },
            width: { type: "string" },
            height: { type: "string" },
            start: { type: "string" },
            end: { type: "string" },
            from: { type: "string" },
            to: { type: "string" },
        },
    });

    return CliOptionsSchema.parse({ ...values, filename: positionals[0] ?? null });
}

/**
 * Visible window from the options, clamped to the log's range.
 */
export function resolveVisibleWindow(dataset: DataSet, opts: CliOptions): TimeRange | null {
    const store = createTimeWindowStore();
    const { setDataRange } = store.getState();
    setDataRange(dataRange(dataset));

    const { dataRange: range, maxScrollerSec, setVisibleWindow, setScroller } = store.getState();
    if (!range) return null;

    if (opts.start !== undefined || opts.end !== undefined) {
        setVisibleWindow(opts.start ?? range.start, opts.end ?? range.end);
    } else if (opts.from !== undefined || opts.to !== undefined) {
        setScroller(opts.from ?? 0, opts.to ?? maxScrollerSec);
    }

    return store.getState().visible;
}

export async function runCli(argv: string[]): Promise<void> {
    const opts = parseCliOptions(argv);
    const data = await loadLogFile(opts.filename);

    const range = dataRange(data);
    if (range) {
        console.log(`Data from ${new Date(range.start).toISOString()} to ${new Date(range.end).toISOString()} (${data.length} points)`);
    } else {
        console.log("No complete data points in log; writing blank graph.");
    }

    const visible = resolveVisibleWindow(data, opts) ?? { start: 0, end: 0 };
    const canvas = renderGraph(data, {
        width: opts.width,
        height: opts.height,
        visibleStart: visible.start,
        visibleEnd: visible.end,
    });

    await writeFile(opts.out, canvas.toPng());
    console.log(`Wrote ${canvas.width}x${canvas.height} graph to ${opts.out}`);
}
