// Decoded NMEA 0183 sentences, one per log line.

/**
 * Sentences that only carry a UTC time of day (no date).
 */
export const TIME_OF_DAY_SENTENCES = ["BWC", "BWR", "GGA", "GRS", "GST", "GXA", "TRF", "ZFO", "ZTG"] as const;

/**
 * Sentences that carry a full UTC date and time.
 */
export const DATE_TIME_SENTENCES = ["RMC", "ZDA"] as const;

export const BOAT_SPEED_SENTENCES = ["VBW", "VHW"] as const;

export type TimeOfDaySentenceId = (typeof TIME_OF_DAY_SENTENCES)[number];
export type DateTimeSentenceId = (typeof DATE_TIME_SENTENCES)[number];
export type BoatSpeedSentenceId = (typeof BOAT_SPEED_SENTENCES)[number];

type SentenceBase = {
    /** Two-letter talker id ("II", "GP", ...), "P" for proprietary sentences */
    talker: string;
};

export type TimeOfDaySentence = SentenceBase & {
    kind: "timeOfDay";
    sentenceId: TimeOfDaySentenceId;
    /** Milliseconds since UTC midnight, null if the field is empty or broken */
    timeOfDayMs: number | null;
};

export type DateTimeSentence = SentenceBase & {
    kind: "dateTime";
    sentenceId: DateTimeSentenceId;
    /** Epoch milliseconds (UTC), null if date or time could not be read */
    timestamp: number | null;
};

export type WindSentence = SentenceBase & {
    kind: "wind";
    sentenceId: "MWV";
    windSpeedKnots: number | null;
    /** Only set for true (not relative) wind angles */
    windAngleTrue: number | null;
};

export type BoatSpeedSentence = SentenceBase & {
    kind: "boatSpeed";
    sentenceId: BoatSpeedSentenceId;
    waterSpeedKnots: number | null;
};

export type OtherSentence = SentenceBase & {
    kind: "other";
    sentenceId: string;
};

export type DecodedSentence =
    | TimeOfDaySentence
    | DateTimeSentence
    | WindSentence
    | BoatSpeedSentence
    | OtherSentence;

export type NmeaDecodeResult =
    | { ok: true; sentence: DecodedSentence }
    | { ok: false; error: NmeaDecodeError };

export type NmeaDecodeErrorReason =
    | "empty"
    | "start-delimiter"
    | "address"
    | "checksum-format"
    | "checksum-mismatch";

export class NmeaDecodeError extends Error {
    readonly reason: NmeaDecodeErrorReason;

    constructor(reason: NmeaDecodeErrorReason, message: string) {
        super(message);
        this.name = "NmeaDecodeError";
        this.reason = reason;
    }
}
