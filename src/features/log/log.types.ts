// src/features/log/log.types.ts

/**
 * One complete fix: every channel observed at least once since the last fix.
 */
export type DataPoint = {
    /** Epoch milliseconds (UTC). 0 means "not set yet". */
    timestamp: number;

    /** Speed through water in knots */
    boatspeed: number;

    /** Wind speed in knots */
    windspeed: number;

    /** True wind direction in degrees (0..360) */
    winddirection: number;
};

/**
 * Scratch record the assembler fills in while sentences arrive.
 */
export type Accumulator = DataPoint;

/**
 * All fixes of one log, in arrival order (not re-sorted by time).
 */
export type DataSet = readonly DataPoint[];

export type TimeRange = { start: number; end: number };
