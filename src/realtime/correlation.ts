/**
 * Correlation table for socket requests.
 *
 * Maps collation ids to the request awaiting a reply. Every method is
 * synchronous, so inserts from the send path and removals from the inbound
 * path never interleave within one event-loop turn.
 */

import { ClientError } from '../errors';
import type { ReplyValue } from './types';

// =============================================================================
// Pending Request
// =============================================================================

/**
 * An outstanding request.
 *
 * Settles at most once: the first call to `resolve` or `reject` wins and
 * later calls are ignored.
 */
export class PendingRequest {
    private _settled = false;

    private constructor(
        readonly id: string,
        readonly createdAt: number,
        readonly deadline: number | undefined,
        private readonly _resolve: (value: ReplyValue) => void,
        private readonly _reject: (error: Error) => void
    ) {}

    /**
     * Create a pending request and the promise its settlement drives.
     */
    static open(
        id: string,
        createdAt: number,
        deadline?: number
    ): { request: PendingRequest; reply: Promise<ReplyValue> } {
        let resolveReply: (value: ReplyValue) => void = () => undefined;
        let rejectReply: (error: Error) => void = () => undefined;
        const reply = new Promise<ReplyValue>((resolve, reject) => {
            resolveReply = resolve;
            rejectReply = reject;
        });
        const request = new PendingRequest(id, createdAt, deadline, resolveReply, rejectReply);
        return { request, reply };
    }

    get settled(): boolean {
        return this._settled;
    }

    /** @returns False if the request had already settled */
    resolve(value: ReplyValue): boolean {
        if (this._settled) {
            return false;
        }
        this._settled = true;
        this._resolve(value);
        return true;
    }

    /** @returns False if the request had already settled */
    reject(error: Error): boolean {
        if (this._settled) {
            return false;
        }
        this._settled = true;
        this._reject(error);
        return true;
    }
}

// =============================================================================
// Correlation Table
// =============================================================================

export class CorrelationTable {
    private _pending: Map<string, PendingRequest> = new Map();

    get size(): number {
        return this._pending.size;
    }

    has(id: string): boolean {
        return this._pending.has(id);
    }

    /**
     * Register a pending request.
     *
     * @throws ClientError if a request with the same id is already pending
     */
    insert(request: PendingRequest): void {
        if (this._pending.has(request.id)) {
            throw ClientError.protocol(`duplicate collation id ${request.id}`);
        }
        this._pending.set(request.id, request);
    }

    /**
     * Remove and return the request for `id`.
     *
     * @throws ClientError of kind `correlation` if nothing is pending under `id`
     */
    take(id: string): PendingRequest {
        const request = this._pending.get(id);
        if (!request) {
            throw ClientError.correlationMiss(id);
        }
        this._pending.delete(id);
        return request;
    }

    /**
     * Remove a request without settling it.
     *
     * @returns True if an entry was removed
     */
    remove(id: string): boolean {
        return this._pending.delete(id);
    }

    /**
     * Remove every pending request.
     *
     * @returns The removed requests, in insertion order
     */
    clearAll(): PendingRequest[] {
        const drained = [...this._pending.values()];
        this._pending.clear();
        return drained;
    }

    /**
     * Remove requests whose deadline is at or before `now`.
     *
     * @returns The removed requests
     */
    expire(now: number): PendingRequest[] {
        const expired: PendingRequest[] = [];
        for (const [id, request] of this._pending) {
            if (request.deadline !== undefined && request.deadline <= now) {
                this._pending.delete(id);
                expired.push(request);
            }
        }
        return expired;
    }
}
