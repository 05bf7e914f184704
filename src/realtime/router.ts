/**
 * Envelope router for inbound socket frames.
 *
 * Handles:
 * - Frame decoding (bad frames are logged and dropped, the socket stays up)
 * - Heartbeats, which only feed the server clock
 * - Pushes without a collation id, forwarded to the push sink
 * - Replies, matched to their pending request and settled
 *
 * Frames are routed synchronously, so frame N is fully dispatched before
 * frame N+1 is looked at.
 */

import { ClientError, errorMessage } from '../errors';
import { createLogger, type Logger } from '../logging';
import { truncate } from '../utils';
import type { ServerClock } from './clock';
import type { EnvelopeCodec } from './codec';
import type { CorrelationTable, PendingRequest } from './correlation';
import {
    HeartbeatPayloadSchema,
    PayloadKind,
    REPLY_KINDS,
    ReplyPayloadSchema,
    type Envelope
} from './types';

const defaultLogger = createLogger('rtclient.router');

// =============================================================================
// Types
// =============================================================================

/** Callbacks for the envelope router. */
export interface RouterCallbacks {
    onPush?: (envelope: Envelope) => void;
}

/** What the router did with a frame. */
export type RouteOutcome =
    | 'heartbeat'
    | 'push'
    | 'resolved'
    | 'rejected'
    | 'unmatched'
    | 'dropped';

// =============================================================================
// Envelope Router
// =============================================================================

export class EnvelopeRouter {
    private _table: CorrelationTable;
    private _clock: ServerClock;
    private _codec: EnvelopeCodec;
    private _logger: Logger;
    private _callbacks: RouterCallbacks;

    constructor(options: {
        table: CorrelationTable;
        clock: ServerClock;
        codec: EnvelopeCodec;
        logger?: Logger;
        callbacks?: RouterCallbacks;
    }) {
        this._table = options.table;
        this._clock = options.clock;
        this._codec = options.codec;
        this._logger = options.logger ?? defaultLogger;
        this._callbacks = options.callbacks ?? {};
    }

    /**
     * Decode and route one binary frame.
     */
    handleFrame(data: Uint8Array): RouteOutcome {
        let envelope: Envelope;
        try {
            envelope = this._codec.decode(data);
        } catch (error) {
            this._logger.warn(`Dropping undecodable frame (${data.byteLength} bytes): ${errorMessage(error)}`);
            return 'dropped';
        }
        this._logger.trace(`SocketDecoded: ${truncate(JSON.stringify(envelope), 500)}`);
        return this.route(envelope);
    }

    /**
     * Route a decoded envelope.
     */
    route(envelope: Envelope): RouteOutcome {
        const { collationId, payload } = envelope;

        // Heartbeats never carry a collation id and never settle a request
        if (payload.kind === PayloadKind.HEARTBEAT) {
            const heartbeat = HeartbeatPayloadSchema.safeParse(payload);
            if (!heartbeat.success) {
                this._logger.warn('Dropping heartbeat without a valid timestamp');
                return 'dropped';
            }
            if (!this._clock.observe(heartbeat.data.timestamp)) {
                this._logger.trace(`Ignoring stale heartbeat ${heartbeat.data.timestamp}`);
            }
            return 'heartbeat';
        }

        if (collationId === undefined) {
            this._forwardPush(envelope);
            return 'push';
        }

        let request: PendingRequest;
        try {
            request = this._table.take(collationId);
        } catch (error) {
            if (error instanceof ClientError && error.kind === 'correlation') {
                this._logger.warn(`Dropping '${payload.kind}' reply: ${error.message}`);
                return 'unmatched';
            }
            throw error;
        }

        return this._settle(request, envelope);
    }

    /**
     * Settle a request from its reply envelope.
     */
    private _settle(request: PendingRequest, envelope: Envelope): RouteOutcome {
        const kind = envelope.payload.kind;

        if (!REPLY_KINDS.has(kind)) {
            this._logger.trace(`Unrecognized message: ${truncate(JSON.stringify(envelope), 500)}`);
            request.reject(ClientError.protocol(`unrecognized reply kind '${kind}'`));
            return 'rejected';
        }

        const parsed = ReplyPayloadSchema.safeParse(envelope.payload);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid payload';
            request.reject(ClientError.decode(`malformed '${kind}' reply (${where})`));
            return 'rejected';
        }

        const payload = parsed.data;
        switch (payload.kind) {
            case PayloadKind.NONE:
                request.resolve({ kind: PayloadKind.NONE });
                return 'resolved';
            case PayloadKind.ERROR:
                request.reject(ClientError.protocol(payload.reason, payload.code));
                return 'rejected';
            case PayloadKind.SELF:
                request.resolve({ kind: PayloadKind.SELF, self: payload.self });
                return 'resolved';
            case PayloadKind.USERS:
                request.resolve({
                    kind: PayloadKind.USERS,
                    users: { results: payload.users, cursor: payload.cursor }
                });
                return 'resolved';
        }
    }

    private _forwardPush(envelope: Envelope): void {
        if (!this._callbacks.onPush) {
            this._logger.debug(`No push handler, dropping '${envelope.payload.kind}'`);
            return;
        }
        try {
            this._callbacks.onPush(envelope);
        } catch (error) {
            this._logger.error('Error in push handler', error instanceof Error ? error : undefined);
        }
    }
}
