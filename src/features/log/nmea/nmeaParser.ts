import {
    BOAT_SPEED_SENTENCES,
    DATE_TIME_SENTENCES,
    NmeaDecodeError,
    TIME_OF_DAY_SENTENCES,
    type BoatSpeedSentenceId,
    type DateTimeSentenceId,
    type DecodedSentence,
    type NmeaDecodeErrorReason,
    type NmeaDecodeResult,
    type TimeOfDaySentenceId,
} from "./nmea.types";

const KMH_PER_KNOT = 1.852;
const MPH_PER_KNOT = 1.852 / 1.609344;

/**
 * XOR of every character between the start delimiter and "*", as two uppercase hex digits.
 */
export function nmeaChecksum(body: string): string {
    let sum = 0;
    for (let i = 0; i < body.length; i++) {
        sum ^= body.charCodeAt(i);
    }
    return sum.toString(16).toUpperCase().padStart(2, "0");
}

/**
 * One log line → decoded sentence.
 * Framing problems are errors; a broken field inside a well-framed sentence only yields null.
 */
export function decodeNmeaLine(line: string): NmeaDecodeResult {
    const raw = line.trim();
    if (raw === "") {
        return fail("empty", "Empty line");
    }

    const start = raw[0];
    if (start !== "$" && start !== "!") {
        return fail("start-delimiter", `Sentence must start with "$" or "!": ${raw}`);
    }

    let body = raw.slice(1);
    const star = body.indexOf("*");
    if (star >= 0) {
        const given = body.slice(star + 1);
        body = body.slice(0, star);

        if (!/^[0-9A-Fa-f]{2}$/.test(given)) {
            return fail("checksum-format", `Invalid checksum "${given}": ${raw}`);
        }

        const expected = nmeaChecksum(body);
        if (given.toUpperCase() !== expected) {
            return fail("checksum-mismatch", `Checksum ${given} does not match ${expected}: ${raw}`);
        }
    }

    const fields = body.split(",");
    const address = fields[0];

    let talker: string;
    let sentenceId: string;
    if (/^P[A-Z0-9]+$/.test(address)) {
        talker = "P";
        sentenceId = address.slice(1);
    } else if (/^[A-Z0-9]{5}$/.test(address)) {
        talker = address.slice(0, 2);
        sentenceId = address.slice(2);
    } else {
        return fail("address", `Invalid address field "${address}": ${raw}`);
    }

    return { ok: true, sentence: classify(talker, sentenceId, fields) };
}

function fail(reason: NmeaDecodeErrorReason, message: string): NmeaDecodeResult {
    return { ok: false, error: new NmeaDecodeError(reason, message) };
}

function classify(talker: string, sentenceId: string, fields: string[]): DecodedSentence {
    const field = (i: number) => fields[i] ?? "";

    if (isTimeOfDaySentence(sentenceId)) {
        // every time-of-day sentence we read puts the UTC time in field 1
        return { kind: "timeOfDay", talker, sentenceId, timeOfDayMs: parseTimeOfDay(field(1)) };
    }

    if (isDateTimeSentence(sentenceId)) {
        const timestamp =
            sentenceId === "RMC"
                ? combineDateTime(parseDdMmYy(field(9)), parseTimeOfDay(field(1)))
                : combineDateTime(
                    parseDayMonthYear(field(2), field(3), field(4)),
                    parseTimeOfDay(field(1))
                );
        return { kind: "dateTime", talker, sentenceId, timestamp };
    }

    if (sentenceId === "MWV") {
        const angle = parseNumber(field(1));
        const speed = parseNumber(field(3));
        return {
            kind: "wind",
            talker,
            sentenceId,
            windAngleTrue: field(2) === "T" ? angle : null,
            windSpeedKnots: speed === null ? null : toKnots(speed, field(4)),
        };
    }

    if (isBoatSpeedSentence(sentenceId)) {
        let waterSpeedKnots: number | null;
        if (sentenceId === "VHW") {
            const knots = parseNumber(field(5));
            const kmh = parseNumber(field(7));
            waterSpeedKnots = knots ?? (kmh === null ? null : kmh / KMH_PER_KNOT);
        } else {
            waterSpeedKnots = parseNumber(field(1));
        }
        return { kind: "boatSpeed", talker, sentenceId, waterSpeedKnots };
    }

    return { kind: "other", talker, sentenceId };
}

function isTimeOfDaySentence(id: string): id is TimeOfDaySentenceId {
    return TIME_OF_DAY_SENTENCES.some((s) => s === id);
}

function isDateTimeSentence(id: string): id is DateTimeSentenceId {
    return DATE_TIME_SENTENCES.some((s) => s === id);
}

function isBoatSpeedSentence(id: string): id is BoatSpeedSentenceId {
    return BOAT_SPEED_SENTENCES.some((s) => s === id);
}

// ---- Field parsers (empty or malformed → null) ----

export function parseNumber(raw: string): number | null {
    if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(raw)) return null;
    const n = Number(raw);
    return Number.isFinite(n) ? n : null;
}

/**
 * hhmmss[.sss] → milliseconds since midnight
 */
export function parseTimeOfDay(raw: string): number | null {
    const m = /^(\d{2})(\d{2})(\d{2})(\.\d+)?$/.exec(raw);
    if (!m) return null;

    const hh = Number(m[1]);
    const mm = Number(m[2]);
    const ss = Number(m[3]);
    if (hh > 23 || mm > 59 || ss > 59) return null;

    const frac = m[4] ? Math.round(Number(m[4]) * 1000) : 0;
    return ((hh * 60 + mm) * 60 + ss) * 1000 + frac;
}

/**
 * ddmmyy → epoch ms of that UTC midnight (yy < 80 → 20yy, else 19yy)
 */
export function parseDdMmYy(raw: string): number | null {
    const m = /^(\d{2})(\d{2})(\d{2})$/.exec(raw);
    if (!m) return null;

    const yy = Number(m[3]);
    return utcMidnight(yy < 80 ? 2000 + yy : 1900 + yy, Number(m[2]), Number(m[1]));
}

function parseDayMonthYear(day: string, month: string, year: string): number | null {
    if (!/^\d{1,2}$/.test(day) || !/^\d{1,2}$/.test(month) || !/^\d{4}$/.test(year)) return null;
    return utcMidnight(Number(year), Number(month), Number(day));
}

function utcMidnight(year: number, month: number, day: number): number | null {
    const t = Date.UTC(year, month - 1, day);
    const d = new Date(t);
    if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
        return null;
    }
    return t;
}

function combineDateTime(dateMs: number | null, timeMs: number | null): number | null {
    if (dateMs === null || timeMs === null) return null;
    return dateMs + timeMs;
}

/**
 * K = km/h, M = m/s, N = knots, S = statute mph
 */
export function toKnots(value: number, unit: string): number | null {
    switch (unit) {
        case "N":
            return value;
        case "K":
            return value / KMH_PER_KNOT;
        case "M":
            return (value * 3.6) / KMH_PER_KNOT;
        case "S":
            return value / MPH_PER_KNOT;
        default:
            return null;
    }
}

