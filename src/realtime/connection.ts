/**
 * Connection lifecycle for the realtime socket.
 *
 * A `Connection` owns exactly one duplex channel and walks it through
 * ABSENT → CONNECTING → OPEN → CLOSED. CLOSED is terminal: reconnecting
 * means constructing a new `Connection`.
 *
 * Integrates:
 * - Request/reply correlation by collation id
 * - Heartbeat-fed server clock
 * - Optional request deadlines
 * - Draining of every pending request when the channel closes
 */

import { randomUUID } from 'crypto';
import { nanoid } from 'nanoid';
import type { ClientConfig } from '../config';
import { ClientError, errorMessage } from '../errors';
import { componentLogger, type Logger } from '../logging';
import type { Session } from '../services/session';
import { truncate } from '../utils';
import { ServerClock } from './clock';
import { JsonEnvelopeCodec, type EnvelopeCodec } from './codec';
import { CorrelationTable, PendingRequest } from './correlation';
import { DeadlineSweeper } from './deadlines';
import type { RequestMessage } from './messages';
import { EnvelopeRouter } from './router';
import { createWsChannel, type ChannelFactory, type DuplexChannel } from './transport';
import {
    CloseCode,
    ConnectionState,
    PayloadKind,
    type Envelope,
    type OnDisconnect,
    type OnMessage,
    type OutboundEnvelope
} from './types';

// =============================================================================
// Types
// =============================================================================

export interface ConnectionOptions {
    config: ClientConfig;
    session: Session;
    codec?: EnvelopeCodec;
    channelFactory?: ChannelFactory;
    /** Clock for request timestamps and the server-time fallback. */
    now?: () => number;
    /** Collation id generator. */
    createId?: () => string;
}

/**
 * Socket URL for a session: `ws[s]://host:port/api?serverkey=…&token=…&lang=…`.
 */
export function buildSocketUrl(config: ClientConfig, token: string): string {
    const scheme = config.ssl ? 'wss' : 'ws';
    const url = new URL(`${scheme}://${config.host}:${config.port}/api`);
    url.searchParams.set('serverkey', config.serverKey);
    url.searchParams.set('token', token);
    url.searchParams.set('lang', config.lang);
    return url.toString();
}

// =============================================================================
// Connection
// =============================================================================

/**
 * One socket session.
 *
 * Usage:
 *     const connection = new Connection({ config, session });
 *     await connection.connect();
 *     const self = await connection.send(selfFetch());
 *     await connection.disconnect();
 */
export class Connection {
    readonly cid: string;

    private _config: ClientConfig;
    private _session: Session;
    private _codec: EnvelopeCodec;
    private _channelFactory: ChannelFactory;
    private _now: () => number;
    private _createId: () => string;
    private _logger: Logger;

    private _state: ConnectionState = ConnectionState.ABSENT;
    private _channel?: DuplexChannel;

    private _table = new CorrelationTable();
    private _clock: ServerClock;
    private _router: EnvelopeRouter;
    private _sweeper: DeadlineSweeper;

    // Open handshake
    private _opening?: Promise<void>;
    private _openSettlers?: { resolve: () => void; reject: (error: Error) => void };
    private _connectTimer?: NodeJS.Timeout;
    private _lastError?: Error;

    // Close completion
    private _disconnecting?: Promise<void>;
    private _closed: Promise<void>;
    private _resolveClosed: () => void = () => undefined;

    private _disconnectCallbacks: OnDisconnect[] = [];
    private _messageCallbacks: OnMessage[] = [];

    constructor(options: ConnectionOptions) {
        this._config = options.config;
        this._session = options.session;
        this._codec = options.codec ?? new JsonEnvelopeCodec();
        this._channelFactory = options.channelFactory ?? createWsChannel;
        this._now = options.now ?? Date.now;
        this._createId = options.createId ?? randomUUID;
        this.cid = nanoid(8);

        const { logger, trace } = this._config;
        this._logger = componentLogger('rtclient.socket', { logger, trace });

        this._clock = new ServerClock({ now: this._now });
        this._router = new EnvelopeRouter({
            table: this._table,
            clock: this._clock,
            codec: this._codec,
            logger: componentLogger('rtclient.router', { logger, trace }),
            callbacks: {
                onPush: (envelope) => this._notifyMessage(envelope)
            }
        });
        this._sweeper = new DeadlineSweeper({
            table: this._table,
            intervalMs: this._config.sweepInterval,
            now: this._now,
            logger: componentLogger('rtclient.deadlines', { logger, trace })
        });

        this._closed = new Promise<void>((resolve) => {
            this._resolveClosed = resolve;
        });
    }

    // =========================================================================
    // Public API
    // =========================================================================

    get state(): ConnectionState {
        return this._state;
    }

    get session(): Session {
        return this._session;
    }

    /** Number of requests awaiting a reply. */
    get pendingCount(): number {
        return this._table.size;
    }

    /** Latest heartbeat time, or local time before the first heartbeat. */
    get serverTime(): number {
        return this._clock.read();
    }

    /**
     * Open the channel.
     *
     * Resolves once the channel is open. Rejects with a timeout error after
     * `connectTimeout`, or a transport error if the channel closes first.
     */
    connect(): Promise<void> {
        if (this._state === ConnectionState.CLOSED) {
            return Promise.reject(ClientError.closed());
        }
        if (this._state === ConnectionState.OPEN) {
            return Promise.resolve();
        }
        if (this._opening) {
            return this._opening;
        }

        const { host, port, ssl, connectTimeout } = this._config;
        this._state = ConnectionState.CONNECTING;
        this._logger.debug(`Connecting [${this.cid}] to ${ssl ? 'wss' : 'ws'}://${host}:${port}/api`);

        this._opening = new Promise<void>((resolve, reject) => {
            this._openSettlers = { resolve, reject };
        });

        this._connectTimer = setTimeout(() => this._onConnectTimeout(), connectTimeout);
        this._connectTimer.unref();

        const channel = this._channelFactory(buildSocketUrl(this._config, this._session.token), {
            handshakeTimeout: connectTimeout,
            logger: this._logger
        });
        this._channel = channel;

        try {
            channel.open({
                onOpen: () => this._handleOpen(),
                onMessage: (data) => this._handleFrame(data),
                onClose: (code, reason) => this._handleClose(code, reason),
                onError: (error) => this._handleError(error)
            });
        } catch (error) {
            this._handleClose(CloseCode.ABNORMAL, errorMessage(error), ClientError.transport(errorMessage(error)));
        }

        return this._opening;
    }

    /**
     * Send a request and wait for its reply.
     *
     * @returns The reply narrowed by the message
     */
    send<T>(message: RequestMessage<T>): Promise<T> {
        const channel = this._channel;
        if (this._state !== ConnectionState.OPEN || !channel) {
            return Promise.reject(ClientError.closed());
        }

        const id = this._createId();
        const createdAt = this._now();
        const { requestTimeout } = this._config;
        const deadline = requestTimeout !== undefined ? createdAt + requestTimeout : undefined;
        const { request, reply } = PendingRequest.open(id, createdAt, deadline);

        const envelope: OutboundEnvelope = { collationId: id, payload: message.payload };
        try {
            this._table.insert(request);
        } catch (error) {
            return Promise.reject(error);
        }

        let frame: Uint8Array;
        try {
            frame = this._codec.encode(envelope);
        } catch (error) {
            this._table.remove(id);
            return Promise.reject(ClientError.protocol(`could not encode '${message.payload.kind}' request: ${errorMessage(error)}`));
        }

        this._logger.trace(`SocketWrite: ${truncate(JSON.stringify(envelope), 500)}`);

        void channel.send(frame).catch((error: unknown) => {
            // Entry is gone if a reply or the close drain got there first
            if (this._table.remove(id)) {
                request.reject(ClientError.transport(errorMessage(error)));
            }
        });

        return reply.then((value) => message.expect(value));
    }

    /**
     * Close the channel.
     *
     * When open, a logout envelope is written first and the channel is then
     * closed with a normal status. Resolves after the close has completed.
     * Later calls share the first call's promise.
     */
    disconnect(): Promise<void> {
        if (this._disconnecting) {
            return this._disconnecting;
        }
        const channel = this._channel;
        if (!channel || this._state === ConnectionState.ABSENT || this._state === ConnectionState.CLOSED) {
            return Promise.resolve();
        }
        this._disconnecting = this._shutdown(channel);
        return this._disconnecting;
    }

    /**
     * Register a callback raised once when the connection reaches CLOSED.
     */
    onDisconnect(callback: OnDisconnect): void {
        this._disconnectCallbacks.push(callback);
    }

    /**
     * Register a callback for frames that are not replies.
     */
    onMessage(callback: OnMessage): void {
        this._messageCallbacks.push(callback);
    }

    // =========================================================================
    // Channel Events
    // =========================================================================

    private _handleOpen(): void {
        if (this._state !== ConnectionState.CONNECTING) {
            return;
        }
        this._clearConnectTimer();
        this._state = ConnectionState.OPEN;

        if (this._config.requestTimeout !== undefined) {
            this._sweeper.start();
        }

        this._logger.info(`Socket connected [${this.cid}]`);
        this._openSettlers?.resolve();
        this._openSettlers = undefined;
    }

    private _handleFrame(data: Uint8Array): void {
        if (this._state !== ConnectionState.OPEN) {
            this._logger.trace(`Ignoring frame in state ${this._state} [${this.cid}]`);
            return;
        }
        try {
            this._router.handleFrame(data);
        } catch (error) {
            this._logger.error(`Error handling frame [${this.cid}]`, error instanceof Error ? error : undefined);
        }
    }

    private _handleError(error: Error): void {
        this._lastError = error;
        this._logger.debug(`Socket error [${this.cid}]: ${error.message}`);
    }

    private _onConnectTimeout(): void {
        if (this._state !== ConnectionState.CONNECTING) {
            return;
        }
        const timeout = ClientError.timeout(`socket connect timed out after ${this._config.connectTimeout}ms`);
        const channel = this._channel;
        this._handleClose(CloseCode.ABNORMAL, 'connect timeout', timeout);
        channel?.close(CloseCode.NORMAL, 'connect timeout');
    }

    /**
     * Move to CLOSED and release everything tied to the channel.
     *
     * @param openFailure - Error for a pending `connect()`, if any
     */
    private _handleClose(code: number, reason: string, openFailure?: Error): void {
        if (this._state === ConnectionState.CLOSED) {
            return;
        }
        this._state = ConnectionState.CLOSED;
        this._clearConnectTimer();
        this._sweeper.stop();

        const abandoned = this._table.clearAll();
        for (const request of abandoned) {
            request.reject(ClientError.disconnected());
        }
        if (abandoned.length > 0) {
            this._logger.warn(`Failed ${abandoned.length} pending request(s) on close [${this.cid}]`);
        }

        this._channel = undefined;

        if (this._openSettlers) {
            const detail = this._lastError ? `: ${this._lastError.message}` : '';
            this._openSettlers.reject(
                openFailure ?? ClientError.transport(`socket closed before opening (code ${code})${detail}`)
            );
            this._openSettlers = undefined;
        }

        const why = reason ? ` reason="${reason}"` : '';
        this._logger.info(`Socket disconnected [${this.cid}] code=${code}${why}`);

        this._resolveClosed();
        for (const callback of this._disconnectCallbacks) {
            this._invoke('disconnect', callback);
        }
    }

    // =========================================================================
    // Private Implementation
    // =========================================================================

    private _notifyMessage(envelope: Envelope): void {
        if (this._messageCallbacks.length === 0) {
            this._logger.debug(`No message handler, dropping '${envelope.payload.kind}'`);
            return;
        }
        for (const callback of this._messageCallbacks) {
            this._invoke('message', () => callback(envelope));
        }
    }

    /**
     * Run a user callback. Thrown errors and rejected promises are logged.
     */
    private _invoke(label: string, callback: () => void | Promise<void>): void {
        const report = (error: unknown): void => {
            this._logger.error(`Error in ${label} callback`, error instanceof Error ? error : undefined);
        };
        try {
            const result = callback();
            if (result instanceof Promise) {
                result.catch(report);
            }
        } catch (error) {
            report(error);
        }
    }

    private async _shutdown(channel: DuplexChannel): Promise<void> {
        if (this._state === ConnectionState.OPEN) {
            const logout: OutboundEnvelope = { payload: { kind: PayloadKind.LOGOUT } };
            try {
                await channel.send(this._codec.encode(logout));
            } catch (error) {
                this._logger.warn(`Could not send logout [${this.cid}]: ${errorMessage(error)}`);
            }
        }

        channel.close(CloseCode.NORMAL, 'client disconnect');
        await this._closed;
    }

    private _clearConnectTimer(): void {
        if (this._connectTimer) {
            clearTimeout(this._connectTimer);
            this._connectTimer = undefined;
        }
    }
}
