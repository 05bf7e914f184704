/**
 * Client facade: one config, one authenticator, and at most one live
 * socket connection at a time.
 */

import { ClientConfigBuilder, describeConfig, type ClientConfig } from './config';
import { ClientError } from './errors';
import { componentLogger, type Logger } from './logging';
import { Connection } from './realtime/connection';
import type { EnvelopeCodec } from './realtime/codec';
import type { RequestMessage } from './realtime/messages';
import type { ChannelFactory } from './realtime/transport';
import { ConnectionState, type Envelope, type OnDisconnect, type OnMessage } from './realtime/types';
import { AuthService } from './services/auth-service';
import type { AuthCodec, AuthenticateMessage } from './services/authenticate';
import type { HttpTransport } from './services/http-transport';
import type { Session } from './services/session';

/** Pluggable collaborators, mainly for tests. */
export interface ClientOptions {
    httpTransport?: HttpTransport;
    authCodec?: AuthCodec;
    envelopeCodec?: EnvelopeCodec;
    channelFactory?: ChannelFactory;
    now?: () => number;
}

/**
 * Realtime client.
 *
 * Usage:
 *     const client = Client.default('defaultkey');
 *     const session = await client.login(AuthenticateMessage.device('device-1'));
 *     await client.connect(session);
 *     const self = await client.send(selfFetch());
 *     await client.logout();
 */
export class Client {
    readonly config: ClientConfig;

    private _options: ClientOptions;
    private _auth: AuthService;
    private _connection?: Connection;
    private _logger: Logger;

    private _disconnectCallbacks: OnDisconnect[] = [];
    private _messageCallbacks: OnMessage[] = [];

    constructor(config: ClientConfig, options: ClientOptions = {}) {
        this.config = config;
        this._options = options;
        this._logger = componentLogger('rtclient', { logger: config.logger, trace: config.trace });
        this._auth = new AuthService({
            config,
            transport: options.httpTransport,
            codec: options.authCodec,
            now: options.now
        });
    }

    /** A client with default settings for everything but the server key. */
    static default(serverKey: string): Client {
        return new Client(ClientConfigBuilder.create(serverKey).build());
    }

    // =========================================================================
    // Authentication
    // =========================================================================

    login(message: AuthenticateMessage): Promise<Session> {
        return this._auth.login(message);
    }

    register(message: AuthenticateMessage): Promise<Session> {
        return this._auth.register(message);
    }

    // =========================================================================
    // Socket
    // =========================================================================

    /** Current connection, if one was created and has not closed. */
    get connection(): Connection | undefined {
        if (this._connection?.state === ConnectionState.CLOSED) {
            return undefined;
        }
        return this._connection;
    }

    /**
     * Open a socket for `session`.
     *
     * A live connection is reused; after a close a fresh one is created.
     */
    connect(session: Session): Promise<void> {
        const live = this.connection;
        if (live) {
            if (live.session !== session) {
                this._logger.warn('connect() called with a different session while connected; keeping the open socket');
            }
            return live.connect();
        }

        const connection = new Connection({
            config: this.config,
            session,
            codec: this._options.envelopeCodec,
            channelFactory: this._options.channelFactory,
            now: this._options.now
        });
        connection.onDisconnect(() => this._handleDisconnect(connection));
        connection.onMessage((envelope) => this._handleMessage(envelope));
        this._connection = connection;
        return connection.connect();
    }

    /**
     * Send a request over the current connection.
     */
    send<T>(message: RequestMessage<T>): Promise<T> {
        const live = this.connection;
        if (!live) {
            return Promise.reject(ClientError.closed());
        }
        return live.send(message);
    }

    /** Log out of the socket session and close it. */
    logout(): Promise<void> {
        return this.disconnect();
    }

    /**
     * Close the current connection, writing the logout envelope first when
     * it is open.
     */
    disconnect(): Promise<void> {
        const live = this.connection;
        if (!live) {
            return Promise.resolve();
        }
        return live.disconnect();
    }

    /** Server time in ms since epoch. */
    get serverTime(): number {
        const live = this.connection;
        if (live) {
            return live.serverTime;
        }
        return (this._options.now ?? Date.now)();
    }

    /** Register a callback raised each time a connection closes. */
    onDisconnect(callback: OnDisconnect): void {
        this._disconnectCallbacks.push(callback);
    }

    /** Register a callback for unsolicited messages. */
    onMessage(callback: OnMessage): void {
        this._messageCallbacks.push(callback);
    }

    toString(): string {
        return describeConfig(this.config);
    }

    // =========================================================================
    // Private Implementation
    // =========================================================================

    private async _handleMessage(envelope: Envelope): Promise<void> {
        for (const callback of this._messageCallbacks) {
            try {
                await callback(envelope);
            } catch (error) {
                this._logger.error('Error in message callback', error instanceof Error ? error : undefined);
            }
        }
    }

    private async _handleDisconnect(connection: Connection): Promise<void> {
        if (this._connection === connection) {
            this._connection = undefined;
        }
        for (const callback of this._disconnectCallbacks) {
            try {
                await callback();
            } catch (error) {
                this._logger.error('Error in disconnect callback', error instanceof Error ? error : undefined);
            }
        }
    }
}
