/**
 * Auth Service: exchanges credentials for a session over HTTP.
 *
 * Flow:
 *   1. Tags the request body with a fresh collation id (log correlation only)
 *   2. POSTs it to /user/login or /user/register with the server key as
 *      basic auth
 *   3. On 200, wraps the returned token in a `Session` stamped with the
 *      local time taken before dispatch
 *   4. Otherwise surfaces the server's error reason, or the HTTP status
 *
 * Every failure arrives as a rejected promise; nothing throws synchronously.
 */

import { randomUUID } from 'crypto';
import type { ClientConfig } from '../config';
import { ClientError, errorMessage } from '../errors';
import { componentLogger, type Logger } from '../logging';
import { USER_AGENT } from '../version';
import { JsonAuthCodec, type AuthCodec, type AuthenticateMessage, type AuthenticateResponse } from './authenticate';
import { fetchTransport, type HttpResponse, type HttpTransport } from './http-transport';
import { Session } from './session';

// =============================================================================
// Configuration
// =============================================================================

export const LOGIN_PATH = '/user/login';
export const REGISTER_PATH = '/user/register';

const CONTENT_TYPE = 'application/octet-stream';

export interface AuthServiceOptions {
    config: ClientConfig;
    transport?: HttpTransport;
    codec?: AuthCodec;
    /** Clock used to stamp new sessions. */
    now?: () => number;
    createId?: () => string;
}

/**
 * `Authorization` header value for a server key.
 */
export function basicAuthHeader(serverKey: string): string {
    return `Basic ${Buffer.from(`${serverKey}:`, 'utf-8').toString('base64')}`;
}

/**
 * HTTP(S) URL for an endpoint path on the configured server.
 */
export function buildHttpUrl(config: ClientConfig, path: string): string {
    const scheme = config.ssl ? 'https' : 'http';
    return new URL(path, `${scheme}://${config.host}:${config.port}`).toString();
}

// =============================================================================
// Auth Service
// =============================================================================

export class AuthService {
    private _config: ClientConfig;
    private _transport: HttpTransport;
    private _codec: AuthCodec;
    private _now: () => number;
    private _createId: () => string;
    private _logger: Logger;

    constructor(options: AuthServiceOptions) {
        this._config = options.config;
        this._transport = options.transport ?? fetchTransport;
        this._codec = options.codec ?? new JsonAuthCodec();
        this._now = options.now ?? Date.now;
        this._createId = options.createId ?? randomUUID;
        this._logger = componentLogger('rtclient.auth', {
            logger: options.config.logger,
            trace: options.config.trace
        });
    }

    // =========================================================================
    // Public API
    // =========================================================================

    /** Sign in with existing credentials. */
    login(message: AuthenticateMessage): Promise<Session> {
        return this.authenticate(LOGIN_PATH, message);
    }

    /** Create an account for the credentials and sign in. */
    register(message: AuthenticateMessage): Promise<Session> {
        return this.authenticate(REGISTER_PATH, message);
    }

    /**
     * Run one credential exchange against `path`.
     *
     * @throws ClientError (as a rejection) of kind `transport` for network
     *         faults, `protocol` for a server refusal, `decode` for a 200
     *         body that cannot be read
     */
    async authenticate(path: string, message: AuthenticateMessage): Promise<Session> {
        const collationId = this._createId();
        const url = buildHttpUrl(this._config, path);
        const tag = collationId.slice(0, 8);

        this._logger.trace(`Url=${url}, Payload=${message.describe()}, CollationId=${collationId}`);

        const body = this._codec.encode({ collationId, credentials: message.credentials });
        const createdAt = this._now();

        let response: HttpResponse;
        try {
            response = await this._transport({
                url,
                method: 'POST',
                headers: {
                    'Content-Type': CONTENT_TYPE,
                    'Accept': CONTENT_TYPE,
                    'Authorization': basicAuthHeader(this._config.serverKey),
                    'Accept-Language': this._config.lang,
                    'User-Agent': USER_AGENT
                },
                body,
                connectTimeout: this._config.connectTimeout,
                timeout: this._config.timeout
            });
        } catch (error) {
            this._logger.warn(`[auth:${tag}] ${path} failed: ${errorMessage(error)}`);
            throw ClientError.transport(errorMessage(error));
        }

        this._logger.trace(`RawHttpResponse={ "uri": "${url}", "method": "POST", "status": ${response.status} }`);

        let decoded: AuthenticateResponse | undefined;
        let decodeFailure: string | undefined;
        try {
            decoded = this._codec.decode(response.body);
            this._logger.trace(`DecodedResponse=${JSON.stringify(redactToken(decoded))}`);
        } catch (error) {
            decodeFailure = errorMessage(error);
        }

        if (response.status === 200) {
            if (decodeFailure !== undefined) {
                throw ClientError.decode(decodeFailure);
            }
            const token = decoded?.session?.token;
            if (!token) {
                throw ClientError.protocol('authenticate response carried no session token');
            }
            this._logger.debug(`[auth:${tag}] ${path} ok`);
            return Session.fromToken(token, createdAt);
        }

        const serverError = decoded?.error;
        this._logger.debug(`[auth:${tag}] ${path} refused: HTTP ${response.status}`);
        if (serverError) {
            throw ClientError.protocol(serverError.reason, serverError.code);
        }
        throw ClientError.protocol(`HTTP ${response.status}`);
    }
}

function redactToken(response: AuthenticateResponse): AuthenticateResponse {
    if (!response.session) {
        return response;
    }
    return { ...response, session: { token: '<redacted>' } };
}
