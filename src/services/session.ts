/**
 * Authenticated session handed from the HTTP exchange to the socket.
 */

import { z } from 'zod';

/** Claims read from a JWT session token. `exp` is in seconds since epoch. */
const TokenClaimsSchema = z.object({
    exp: z.number().optional(),
    uid: z.string().optional(),
    han: z.string().optional()
});

type TokenClaims = z.infer<typeof TokenClaimsSchema>;

/**
 * Decode the claims segment of a JWT.
 *
 * @returns Undefined when the token is not a JWT or the claims are unreadable
 */
export function decodeTokenClaims(token: string): TokenClaims | undefined {
    const parts = token.split('.');
    if (parts.length !== 3) {
        return undefined;
    }

    let raw: unknown;
    try {
        raw = JSON.parse(Buffer.from(parts[1], 'base64url').toString('utf-8'));
    } catch {
        return undefined;
    }

    const result = TokenClaimsSchema.safeParse(raw);
    return result.success ? result.data : undefined;
}

/**
 * Immutable session.
 *
 * Only the authenticator creates sessions, from a server reply.
 */
export class Session {
    /** Expiry in ms since epoch, when the token carries one. */
    readonly expiresAt?: number;
    readonly userId?: string;
    readonly handle?: string;

    private constructor(
        readonly token: string,
        readonly createdAt: number
    ) {
        const claims = decodeTokenClaims(token);
        if (claims) {
            this.expiresAt = claims.exp !== undefined ? claims.exp * 1000 : undefined;
            this.userId = claims.uid;
            this.handle = claims.han;
        }
        Object.freeze(this);
    }

    /**
     * @param createdAt - Local time (ms) captured before the request that produced the token
     */
    static fromToken(token: string, createdAt: number): Session {
        return new Session(token, createdAt);
    }

    /**
     * Whether the token has expired at `at` (ms since epoch). Tokens
     * without an expiry claim never expire on the client side.
     */
    hasExpired(at: number = Date.now()): boolean {
        if (this.expiresAt === undefined) {
            return false;
        }
        return at >= this.expiresAt;
    }
}
