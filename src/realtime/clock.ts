/**
 * Server time estimate fed by heartbeats.
 */

/**
 * Monotonic server clock.
 *
 * Heartbeats can arrive stale or out of order; the observed value only
 * moves forward. Until the first heartbeat, `read()` falls back to the
 * local wall clock.
 */
export class ServerClock {
    private _current = 0;
    private _now: () => number;

    constructor(options: { now?: () => number } = {}) {
        this._now = options.now ?? Date.now;
    }

    /**
     * Record a heartbeat timestamp (ms since epoch).
     *
     * @returns True if the value advanced the clock
     */
    observe(candidate: number): boolean {
        if (candidate > this._current) {
            this._current = candidate;
            return true;
        }
        return false;
    }

    /** Server time in ms since epoch. */
    read(): number {
        if (this._current < 1) {
            return this._now();
        }
        return this._current;
    }

    /** Whether a heartbeat has been observed. */
    get synchronized(): boolean {
        return this._current > 0;
    }
}
