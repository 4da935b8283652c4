import type { DurationMs, Timestamp } from './Ontology.js';

/**
 * Environment Port: System Clock
 * The single notion of "now" used for timestamps and timelock checks.
 */
export interface Clock {
    now(): Timestamp;
}

export class SystemClock implements Clock {
    public now(): Timestamp {
        return Date.now();
    }
}

/**
 * Logical clock driven by the caller. Time never moves backwards.
 */
export class ManualClock implements Clock {
    constructor(private current: Timestamp = 0) { }

    public now(): Timestamp {
        return this.current;
    }

    public set(ts: Timestamp): void {
        if (ts < this.current) {
            throw new Error(`ManualClock: Backwards timestamp (${ts} < ${this.current})`);
        }
        this.current = ts;
    }

    public advance(delta: DurationMs): Timestamp {
        this.set(this.current + delta);
        return this.current;
    }
}

export const SECOND: DurationMs = 1000;
export const HOUR: DurationMs = 60 * 60 * SECOND;
export const DAY: DurationMs = 24 * HOUR;
