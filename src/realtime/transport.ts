/**
 * Duplex channel abstraction and its WebSocket implementation.
 *
 * The connection only needs open/send/close plus three event sources
 * (open, message, close). Anything that provides those can carry the
 * protocol; `WsChannel` does it over the `ws` package.
 */

import { WebSocket, type RawData } from 'ws';
import { createLogger, type Logger } from '../logging';

const defaultLogger = createLogger('rtclient.socket');

// =============================================================================
// Types
// =============================================================================

/** Event sinks bound by the connection when it opens a channel. */
export interface ChannelHandlers {
    onOpen(): void;
    onMessage(data: Uint8Array): void;
    onClose(code: number, reason: string): void;
    onError(error: Error): void;
}

/** A message-oriented, bidirectional channel. */
export interface DuplexChannel {
    /**
     * Start connecting. Handlers fire as the channel's events arrive; a
     * failed connect ends with `onError` and/or `onClose`.
     */
    open(handlers: ChannelHandlers): void;

    /**
     * Write one binary frame.
     *
     * @throws Error (as a rejection) if the channel is not open or the write fails
     */
    send(data: Uint8Array): Promise<void>;

    /** Request a close with the given status code. */
    close(code: number, reason?: string): void;
}

/** Options handed to a channel factory. */
export interface ChannelOptions {
    handshakeTimeout: number;
    logger?: Logger;
}

/** Builds a channel for a socket URL. */
export type ChannelFactory = (url: string, options: ChannelOptions) => DuplexChannel;

// =============================================================================
// WebSocket Channel
// =============================================================================

/**
 * Convert a `ws` message payload to a byte array.
 */
export function rawDataToBytes(data: RawData): Uint8Array {
    if (Array.isArray(data)) {
        return Buffer.concat(data);
    }
    if (data instanceof ArrayBuffer) {
        return new Uint8Array(data);
    }
    return data;
}

/**
 * Channel backed by a `ws` client socket.
 *
 * Text frames are not part of the protocol and are dropped; WebSocket
 * pings are answered by `ws` itself.
 */
export class WsChannel implements DuplexChannel {
    private _ws?: WebSocket;
    private _logger: Logger;

    constructor(
        readonly url: string,
        private readonly _options: ChannelOptions
    ) {
        this._logger = _options.logger ?? defaultLogger;
    }

    open(handlers: ChannelHandlers): void {
        if (this._ws) {
            throw new Error('WebSocket channel already opened');
        }

        const ws = new WebSocket(this.url, {
            handshakeTimeout: this._options.handshakeTimeout
        });
        ws.binaryType = 'nodebuffer';
        this._ws = ws;

        ws.on('open', () => handlers.onOpen());

        ws.on('message', (data: RawData, isBinary: boolean) => {
            if (!isBinary) {
                this._logger.trace('SocketReceive: Invalid content (text/plain).');
                return;
            }
            handlers.onMessage(rawDataToBytes(data));
        });

        ws.on('ping', () => {
            this._logger.trace('SocketReceive: WebSocket ping.');
        });

        ws.on('error', (error: Error) => handlers.onError(error));

        ws.on('close', (code: number, reason: Buffer) => {
            handlers.onClose(code, reason.toString('utf-8'));
        });
    }

    send(data: Uint8Array): Promise<void> {
        const ws = this._ws;
        if (!ws || ws.readyState !== WebSocket.OPEN) {
            return Promise.reject(new Error('WebSocket not open'));
        }

        return new Promise((resolve, reject) => {
            ws.send(data, { binary: true }, (error?: Error) => {
                if (error) {
                    reject(error);
                } else {
                    resolve();
                }
            });
        });
    }

    close(code: number, reason?: string): void {
        if (!this._ws || this._ws.readyState === WebSocket.CLOSED) {
            return;
        }
        this._ws.close(code, reason);
    }
}

/** Default factory: a `ws` client socket. */
export const createWsChannel: ChannelFactory = (url, options) => new WsChannel(url, options);
