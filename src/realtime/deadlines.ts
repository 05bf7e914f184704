/**
 * Deadline sweep for socket requests.
 *
 * Requests registered with a deadline are failed with a timeout error once
 * the deadline has passed. The sweep runs on an interval, so a request can
 * outlive its deadline by up to one sweep interval.
 */

import { ClientError } from '../errors';
import { createLogger, type Logger } from '../logging';
import type { CorrelationTable } from './correlation';

const defaultLogger = createLogger('rtclient.deadlines');

export class DeadlineSweeper {
    private _table: CorrelationTable;
    private _intervalMs: number;
    private _now: () => number;
    private _logger: Logger;

    private _intervalId?: NodeJS.Timeout;
    private _running = false;

    constructor(options: {
        table: CorrelationTable;
        intervalMs: number;
        now?: () => number;
        logger?: Logger;
    }) {
        this._table = options.table;
        this._intervalMs = options.intervalMs;
        this._now = options.now ?? Date.now;
        this._logger = options.logger ?? defaultLogger;
    }

    get running(): boolean {
        return this._running;
    }

    /**
     * Start the background sweep.
     */
    start(): void {
        if (this._running) {
            return;
        }

        this._running = true;
        this._intervalId = setInterval(() => {
            if (this._running) {
                this.sweep();
            }
        }, this._intervalMs);
        this._intervalId.unref();

        this._logger.debug(`Deadline sweep started (every ${this._intervalMs}ms)`);
    }

    /**
     * Stop the background sweep.
     */
    stop(): void {
        if (!this._running) {
            return;
        }
        this._running = false;
        if (this._intervalId) {
            clearInterval(this._intervalId);
            this._intervalId = undefined;
        }
        this._logger.debug('Deadline sweep stopped');
    }

    /**
     * Fail every request whose deadline has passed.
     *
     * @returns Number of requests failed
     */
    sweep(): number {
        const now = this._now();
        const expired = this._table.expire(now);
        for (const request of expired) {
            const waited = now - request.createdAt;
            request.reject(ClientError.timeout(`no reply for request ${request.id} after ${waited}ms`));
        }
        if (expired.length > 0) {
            this._logger.warn(`Expired ${expired.length} request(s) past their deadline`);
        }
        return expired.length;
    }
}
