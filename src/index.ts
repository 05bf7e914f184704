/**
 * Realtime session client.
 *
 * Exchanges credentials for a session over HTTP, then multiplexes typed
 * requests and server pushes over one WebSocket.
 */

export { Client, type ClientOptions } from './client';
export {
    ClientConfigBuilder,
    ClientConfigSchema,
    DEFAULT_CLIENT_CONFIG,
    describeConfig,
    loadClientConfig,
    type ClientConfig,
    type ClientConfigValues,
    type ClientEnv
} from './config';
export { ClientError, type ClientErrorKind } from './errors';
export { LogLevel, createLogger, parseLogLevel, setLogLevel, getLogLevel, type Logger } from './logging';
export { CLIENT_VERSION } from './version';

export * from './realtime';

export { AuthService, LOGIN_PATH, REGISTER_PATH, type AuthServiceOptions } from './services/auth-service';
export {
    AuthenticateMessage,
    JsonAuthCodec,
    type AuthCodec,
    type AuthenticateRequest,
    type AuthenticateResponse,
    type Credentials
} from './services/authenticate';
export { fetchTransport, type HttpRequest, type HttpResponse, type HttpTransport } from './services/http-transport';
export { Session } from './services/session';
