// src/features/log/store/timeWindow.store.ts
import { createStore } from "zustand/vanilla";
import type { TimeRange } from "../log.types";

type TimeWindowState = {
    /** Full extent of the loaded log */
    dataRange: TimeRange | null;
    /** What gets rendered; always inside dataRange */
    visible: TimeRange | null;

    /** Whole seconds between first and last fix (scroller maximum) */
    maxScrollerSec: number;

    setDataRange: (range: TimeRange | null) => void;
    setVisibleWindow: (start: number, end: number) => void;
    setScroller: (startOffsetSec: number, endOffsetSec: number) => void;
};

function clampToData(start: number, end: number, data: TimeRange): TimeRange {
    return {
        start: Math.max(start, data.start),
        end: Math.min(end, data.end),
    };
}

function sameRange(a: TimeRange | null, b: TimeRange | null) {
    if (a === null && b === null) return true;
    if (a === null || b === null) return false;
    return a.start === b.start && a.end === b.end;
}

export const createTimeWindowStore = () =>
    createStore<TimeWindowState>((set, get) => {
        const applyVisible = (start: number, end: number) => {
            const data = get().dataRange;
            if (!data) return;
            const next = clampToData(start, end, data);
            if (sameRange(get().visible, next)) return;
            set({ visible: next });
        };

        return {
            dataRange: null,
            visible: null,
            maxScrollerSec: 0,

            setDataRange: (range) =>
                set({
                    dataRange: range,
                    visible: range ? { ...range } : null,
                    maxScrollerSec: range ? Math.trunc((range.end - range.start) / 1000) : 0,
                }),

            setVisibleWindow: applyVisible,

            // offsets are truncated to whole seconds, like the scroller widgets
            setScroller: (startOffsetSec, endOffsetSec) => {
                const data = get().dataRange;
                if (!data) return;
                applyVisible(
                    data.start + Math.trunc(startOffsetSec) * 1000,
                    data.start + Math.trunc(endOffsetSec) * 1000
                );
            },
        };
    });

export type TimeWindowStore = ReturnType<typeof createTimeWindowStore>;
