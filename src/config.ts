/**
 * Client configuration.
 *
 * A `ClientConfig` is frozen once built. The builder is immutable: every
 * setter returns a new builder, so a builder can be reused as a template
 * without ever aliasing a config it already produced.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { parseLogLevel, setLogLevel, type Logger } from './logging';

// =============================================================================
// Types
// =============================================================================

/** Validated shape of the configurable values. */
export const ClientConfigSchema = z.object({
    serverKey: z.string().min(1, 'server key is required'),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    ssl: z.boolean(),
    lang: z.string().min(1),
    connectTimeout: z.number().int().positive(),
    timeout: z.number().int().positive(),
    requestTimeout: z.number().int().positive().optional(),
    sweepInterval: z.number().int().positive(),
    trace: z.boolean()
});

/** Configuration values before the logger is attached. */
export type ClientConfigValues = z.infer<typeof ClientConfigSchema>;

/** Immutable client configuration. */
export interface ClientConfig extends Readonly<ClientConfigValues> {
    /** Replaces the built-in component loggers when set. */
    readonly logger?: Logger;
}

/** Defaults for everything but the server key. */
export const DEFAULT_CLIENT_CONFIG: Omit<ClientConfigValues, 'serverKey'> = {
    host: '127.0.0.1',
    port: 7350,
    ssl: false,
    lang: 'en',
    connectTimeout: 3000,
    timeout: 5000,
    requestTimeout: undefined,
    sweepInterval: 1000,
    trace: false
};

// =============================================================================
// Builder
// =============================================================================

/**
 * Immutable builder for `ClientConfig`.
 *
 * Usage:
 *     const config = ClientConfigBuilder.create('defaultkey')
 *         .host('game.example.com')
 *         .ssl(true)
 *         .build();
 */
export class ClientConfigBuilder {
    private constructor(
        private readonly values: ClientConfigValues,
        private readonly _logger?: Logger
    ) {}

    static create(serverKey: string): ClientConfigBuilder {
        return new ClientConfigBuilder({ ...DEFAULT_CLIENT_CONFIG, serverKey });
    }

    host(host: string): ClientConfigBuilder {
        return this.with({ host });
    }

    port(port: number): ClientConfigBuilder {
        return this.with({ port });
    }

    ssl(enable: boolean): ClientConfigBuilder {
        return this.with({ ssl: enable });
    }

    lang(lang: string): ClientConfigBuilder {
        return this.with({ lang });
    }

    /** Milliseconds allowed to establish the HTTP exchange or the socket. */
    connectTimeout(ms: number): ClientConfigBuilder {
        return this.with({ connectTimeout: ms });
    }

    /** Milliseconds allowed to read an HTTP response body. */
    timeout(ms: number): ClientConfigBuilder {
        return this.with({ timeout: ms });
    }

    /** Deadline for socket requests; without one, requests wait until a reply or disconnect. */
    requestTimeout(ms: number | undefined): ClientConfigBuilder {
        return this.with({ requestTimeout: ms });
    }

    sweepInterval(ms: number): ClientConfigBuilder {
        return this.with({ sweepInterval: ms });
    }

    trace(enable: boolean): ClientConfigBuilder {
        return this.with({ trace: enable });
    }

    logger(logger: Logger): ClientConfigBuilder {
        return new ClientConfigBuilder(this.values, logger);
    }

    /**
     * Validate and freeze the configuration.
     *
     * @throws Error if a value is out of range
     */
    build(): ClientConfig {
        const result = ClientConfigSchema.safeParse(this.values);
        if (!result.success) {
            const issues = result.error.issues
                .map(issue => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ');
            throw new Error(`Invalid client config: ${issues}`);
        }
        return Object.freeze({ ...result.data, logger: this._logger });
    }

    private with(patch: Partial<ClientConfigValues>): ClientConfigBuilder {
        return new ClientConfigBuilder({ ...this.values, ...patch }, this._logger);
    }
}

// =============================================================================
// Environment
// =============================================================================

/** Environment variables read by `loadClientConfig`. */
export type ClientEnv = Record<string, string | undefined>;

function parseBool(value: string | undefined, fallback: boolean): boolean {
    if (value === undefined) {
        return fallback;
    }
    return value.toLowerCase() === 'true' || value === '1';
}

function parseInteger(value: string | undefined, fallback: number): number {
    if (value === undefined || value === '') {
        return fallback;
    }
    return parseInt(value, 10);
}

/**
 * Create a client config from environment variables.
 *
 * Loads `.env` (or `envFile`) through dotenv unless an explicit `env` map
 * is given. LOG_LEVEL, when present, sets the global log level.
 *
 * @throws Error if RT_SERVER_KEY is missing or a value is invalid
 */
export function loadClientConfig(options: { env?: ClientEnv; envFile?: string } = {}): ClientConfig {
    let env: ClientEnv;
    if (options.env) {
        env = options.env;
    } else {
        dotenvConfig({ path: options.envFile });
        env = process.env;
    }

    if (env.LOG_LEVEL) {
        setLogLevel(parseLogLevel(env.LOG_LEVEL));
    }

    const requestTimeout = env.RT_REQUEST_TIMEOUT_MS;

    return ClientConfigBuilder.create(env.RT_SERVER_KEY ?? '')
        .host(env.RT_HOST ?? DEFAULT_CLIENT_CONFIG.host)
        .port(parseInteger(env.RT_PORT, DEFAULT_CLIENT_CONFIG.port))
        .ssl(parseBool(env.RT_SSL, DEFAULT_CLIENT_CONFIG.ssl))
        .lang(env.RT_LANG ?? DEFAULT_CLIENT_CONFIG.lang)
        .connectTimeout(parseInteger(env.RT_CONNECT_TIMEOUT_MS, DEFAULT_CLIENT_CONFIG.connectTimeout))
        .timeout(parseInteger(env.RT_TIMEOUT_MS, DEFAULT_CLIENT_CONFIG.timeout))
        .requestTimeout(requestTimeout ? parseInt(requestTimeout, 10) : undefined)
        .trace(parseBool(env.RT_TRACE, DEFAULT_CLIENT_CONFIG.trace))
        .build();
}

/**
 * Describe a config without leaking the logger object.
 */
export function describeConfig(config: ClientConfig): string {
    return (
        `Client(connectTimeout=${config.connectTimeout},host=${config.host},lang=${config.lang},` +
        `port=${config.port},serverKey=${config.serverKey},ssl=${config.ssl},` +
        `timeout=${config.timeout},trace=${config.trace})`
    );
}
