// src/features/log/assembler/record.assembler.ts
// Merges partial sentences into complete fixes. Pure: the accumulator is passed in and returned.

import type { DecodedSentence } from "../nmea/nmea.types";
import type { Accumulator, DataPoint, DataSet } from "../log.types";

const MS_PER_DAY = 86_400_000;

/** Epoch is the "no timestamp yet" marker. */
export const UNSET_TIMESTAMP = 0;

export type AssemblyStep = {
    accumulator: Accumulator;
    /** Set exactly on the step that completed a fix */
    point: DataPoint | null;
};

export function emptyAccumulator(timestamp: number = UNSET_TIMESTAMP): Accumulator {
    return { timestamp, boatspeed: 0, windspeed: 0, winddirection: 0 };
}

export function isComplete(p: DataPoint): boolean {
    return (
        p.boatspeed > 0 &&
        p.windspeed > 0 &&
        p.winddirection !== 0 &&
        p.timestamp !== UNSET_TIMESTAMP
    );
}

/**
 * Replace the time of day of `timestamp`, keeping its UTC date.
 * Before any dated sentence the date is 1970-01-01.
 */
export function withTimeOfDay(timestamp: number, timeOfDayMs: number): number {
    const midnight = Math.floor(timestamp / MS_PER_DAY) * MS_PER_DAY;
    return midnight + timeOfDayMs;
}

/**
 * Apply one sentence's fields to the accumulator (no completeness check).
 */
export function applySentence(acc: Accumulator, sentence: DecodedSentence): Accumulator {
    switch (sentence.kind) {
        case "timeOfDay":
            if (sentence.timeOfDayMs === null) return acc;
            return { ...acc, timestamp: withTimeOfDay(acc.timestamp, sentence.timeOfDayMs) };

        case "dateTime":
            if (sentence.timestamp === null) return acc;
            return { ...acc, timestamp: sentence.timestamp };

        case "wind":
            return {
                ...acc,
                windspeed: sentence.windSpeedKnots ?? acc.windspeed,
                winddirection: sentence.windAngleTrue ?? acc.winddirection,
            };

        case "boatSpeed":
            if (sentence.waterSpeedKnots === null) return acc;
            return { ...acc, boatspeed: sentence.waterSpeedKnots };

        case "other":
            return acc;
    }
}

/**
 * One state-machine step. When the fix completes, the emitted point is detached
 * and the next accumulator starts over from the same timestamp.
 */
export function assembleStep(acc: Accumulator, sentence: DecodedSentence): AssemblyStep {
    const next = applySentence(acc, sentence);
    if (!isComplete(next)) {
        return { accumulator: next, point: null };
    }
    return { accumulator: emptyAccumulator(next.timestamp), point: { ...next } };
}

/**
 * Fold a whole sentence sequence into a data set (arrival order).
 */
export function assembleDataSet(sentences: Iterable<DecodedSentence>): DataSet {
    const points: DataPoint[] = [];
    let acc = emptyAccumulator();

    for (const sentence of sentences) {
        const step = assembleStep(acc, sentence);
        acc = step.accumulator;
        if (step.point) points.push(step.point);
    }

    return points;
}
