// src/features/log/service/log.loader.ts
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { assembleDataSet } from "../assembler/record.assembler";
import { LogLoadError } from "../log.errors";
import type { DataSet, TimeRange } from "../log.types";
import { decodeNmeaLine } from "../nmea/nmeaParser";
import type { DecodedSentence } from "../nmea/nmea.types";

/**
 * Decode every non-blank line; the first undecodable line aborts the load.
 */
function* decodeLines(lines: Iterable<string>): Generator<DecodedSentence> {
    let lineNumber = 0;
    for (const line of lines) {
        lineNumber++;
        if (line.trim() === "") continue;

        const res = decodeNmeaLine(line);
        if (!res.ok) throw new LogLoadError(lineNumber, res.error);
        yield res.sentence;
    }
}

export function loadLogFromLines(lines: Iterable<string>): DataSet {
    return assembleDataSet(decodeLines(lines));
}

export function loadLogFromText(content: string): DataSet {
    return loadLogFromLines(content.split(/\r?\n/));
}

export async function loadLogFromStream(input: Readable): Promise<DataSet> {
    const rl = createInterface({ input, crlfDelay: Infinity });
    const lines: string[] = [];
    for await (const line of rl) {
        lines.push(line);
    }
    return loadLogFromLines(lines);
}

/**
 * Read a log file, or stdin when no file is given.
 */
export async function loadLogFile(filename: string | null): Promise<DataSet> {
    if (filename === null) {
        console.log("Loading from stdin.");
        return loadLogFromStream(process.stdin);
    }

    console.log(`Loading from ${filename}`);
    return loadLogFromText(await readFile(filename, "utf8"));
}

/**
 * First and last fix time of the whole log (the data set is not sorted).
 */
export function dataRange(dataset: DataSet): TimeRange | null {
    if (dataset.length === 0) return null;

    let start = dataset[0].timestamp;
    let end = start;
    for (const p of dataset) {
        if (p.timestamp < start) start = p.timestamp;
        if (p.timestamp > end) end = p.timestamp;
    }
    return { start, end };
}
