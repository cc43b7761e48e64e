import type { NmeaDecodeError } from "./nmea/nmea.types";

/**
 * A log line that could not be decoded. Loading stops at the first one.
 */
export class LogLoadError extends Error {
    readonly lineNumber: number;
    readonly decodeError: NmeaDecodeError;

    constructor(lineNumber: number, decodeError: NmeaDecodeError) {
        super(`Line ${lineNumber}: ${decodeError.message}`);
        this.name = "LogLoadError";
        this.lineNumber = lineNumber;
        this.decodeError = decodeError;
    }
}
