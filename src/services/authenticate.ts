/**
 * Authentication payloads and their HTTP body codec.
 */

import { z } from 'zod';

// =============================================================================
// Credentials
// =============================================================================

/** Identity proofs accepted by the login and register endpoints. */
export type Credentials =
    | { kind: 'email'; email: string; password: string }
    | { kind: 'device'; deviceId: string }
    | { kind: 'custom'; customId: string }
    | { kind: 'facebook'; oauthToken: string }
    | { kind: 'google'; oauthToken: string }
    | { kind: 'steam'; token: string };

/**
 * Credentials to exchange for a session.
 *
 * Usage:
 *     const session = await auth.login(AuthenticateMessage.device('device-1'));
 */
export class AuthenticateMessage {
    private constructor(readonly credentials: Credentials) {}

    static email(email: string, password: string): AuthenticateMessage {
        return new AuthenticateMessage({ kind: 'email', email, password });
    }

    static device(deviceId: string): AuthenticateMessage {
        return new AuthenticateMessage({ kind: 'device', deviceId });
    }

    static custom(customId: string): AuthenticateMessage {
        return new AuthenticateMessage({ kind: 'custom', customId });
    }

    static facebook(oauthToken: string): AuthenticateMessage {
        return new AuthenticateMessage({ kind: 'facebook', oauthToken });
    }

    static google(oauthToken: string): AuthenticateMessage {
        return new AuthenticateMessage({ kind: 'google', oauthToken });
    }

    static steam(token: string): AuthenticateMessage {
        return new AuthenticateMessage({ kind: 'steam', token });
    }

    /** Log-safe description: identifiers only, never secrets. */
    describe(): string {
        const credentials = this.credentials;
        switch (credentials.kind) {
            case 'email':
                return `email(${credentials.email})`;
            case 'device':
                return `device(${credentials.deviceId})`;
            case 'custom':
                return `custom(${credentials.customId})`;
            default:
                return credentials.kind;
        }
    }
}

// =============================================================================
// Wire Bodies
// =============================================================================

/** Body posted to an authentication endpoint. */
export interface AuthenticateRequest {
    /** Log correlation only; the server echoes it back. */
    collationId: string;
    credentials: Credentials;
}

export const AuthenticateResponseSchema = z.object({
    collationId: z.string().optional(),
    session: z.object({ token: z.string().min(1) }).optional(),
    error: z
        .object({
            code: z.number().int().optional(),
            reason: z.string()
        })
        .optional()
});

export type AuthenticateResponse = z.infer<typeof AuthenticateResponseSchema>;

/** Serializer for authentication bodies. */
export interface AuthCodec {
    encode(request: AuthenticateRequest): Uint8Array;

    /**
     * @throws Error if the body is not a valid response
     */
    decode(body: Uint8Array): AuthenticateResponse;
}

/** UTF-8 JSON bodies, validated with zod. */
export class JsonAuthCodec implements AuthCodec {
    encode(request: AuthenticateRequest): Uint8Array {
        return Buffer.from(JSON.stringify(request), 'utf-8');
    }

    decode(body: Uint8Array): AuthenticateResponse {
        const text = Buffer.from(body.buffer, body.byteOffset, body.byteLength).toString('utf-8');
        const result = AuthenticateResponseSchema.safeParse(JSON.parse(text));
        if (!result.success) {
            throw new Error(`malformed authenticate response: ${result.error.issues[0]?.message ?? 'invalid'}`);
        }
        return result.data;
    }
}
