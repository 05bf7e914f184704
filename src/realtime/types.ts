/**
 * Type definitions for the realtime socket protocol.
 *
 * Envelopes are validated with zod on the way in; outbound payloads are
 * plain typed objects.
 */

import { z } from 'zod';

// =============================================================================
// Enums
// =============================================================================

/** State of the connection's channel. CLOSED is terminal. */
export enum ConnectionState {
    ABSENT = 'absent',
    CONNECTING = 'connecting',
    OPEN = 'open',
    CLOSED = 'closed'
}

/** WebSocket close codes used by the client. */
export const CloseCode = {
    NORMAL: 1000,
    ABNORMAL: 1006
} as const;

/** Payload kind discriminants. */
export const PayloadKind = {
    // Replies
    NONE: 'none',
    ERROR: 'error',
    SELF: 'self',
    USERS: 'users',

    // Server pushes
    HEARTBEAT: 'heartbeat',

    // Requests
    LOGOUT: 'logout',
    SELF_FETCH: 'selfFetch',
    SELF_UPDATE: 'selfUpdate',
    USERS_FETCH: 'usersFetch'
} as const;

// =============================================================================
// Domain Values
// =============================================================================

/** Public profile of a user. */
export const UserSchema = z.object({
    id: z.string(),
    handle: z.string(),
    fullname: z.string().optional(),
    avatarUrl: z.string().optional(),
    lang: z.string().optional(),
    location: z.string().optional(),
    timezone: z.string().optional(),
    metadata: z.string().optional(),
    createdAt: z.number().int(),
    updatedAt: z.number().int(),
    lastOnlineAt: z.number().int()
});

export type User = z.infer<typeof UserSchema>;

/** The authenticated user's own account, including linked identities. */
export const SelfSchema = UserSchema.extend({
    verified: z.boolean().default(false),
    email: z.string().optional(),
    deviceIds: z.array(z.string()).default([]),
    customId: z.string().optional(),
    facebookId: z.string().optional(),
    googleId: z.string().optional(),
    gamecenterId: z.string().optional(),
    steamId: z.string().optional()
});

export type Self = z.infer<typeof SelfSchema>;

/** A page of results with an optional cursor for the next page. */
export interface ResultSet<T> {
    results: T[];
    cursor?: string;
}

// =============================================================================
// Envelope
// =============================================================================

/**
 * Outer structure of every frame. The payload is only checked for its
 * discriminant here; the router validates kind-specific fields.
 */
export const EnvelopeSchema = z.object({
    collationId: z.string().optional(),
    payload: z.object({ kind: z.string() }).passthrough()
});

export type Envelope = z.infer<typeof EnvelopeSchema>;

export const NonePayloadSchema = z.object({ kind: z.literal(PayloadKind.NONE) });

export const ErrorPayloadSchema = z.object({
    kind: z.literal(PayloadKind.ERROR),
    reason: z.string(),
    code: z.number().int().optional()
});

export const HeartbeatPayloadSchema = z.object({
    kind: z.literal(PayloadKind.HEARTBEAT),
    timestamp: z.number().int()
});

export const SelfPayloadSchema = z.object({
    kind: z.literal(PayloadKind.SELF),
    self: SelfSchema
});

export const UsersPayloadSchema = z.object({
    kind: z.literal(PayloadKind.USERS),
    users: z.array(UserSchema),
    cursor: z.string().optional()
});

/** Payloads the server sends in reply to a request. */
export const ReplyPayloadSchema = z.discriminatedUnion('kind', [
    NonePayloadSchema,
    ErrorPayloadSchema,
    SelfPayloadSchema,
    UsersPayloadSchema
]);

export type ReplyPayload = z.infer<typeof ReplyPayloadSchema>;

/** Reply kinds the router knows how to decode. */
export const REPLY_KINDS: ReadonlySet<string> = new Set([
    PayloadKind.NONE,
    PayloadKind.ERROR,
    PayloadKind.SELF,
    PayloadKind.USERS
]);

/** Fields accepted by a self update. */
export interface SelfUpdateFields {
    handle?: string;
    fullname?: string;
    avatarUrl?: string;
    lang?: string;
    location?: string;
    timezone?: string;
    metadata?: string;
}

/** Payloads the client sends. */
export type OutboundPayload =
    | { kind: typeof PayloadKind.LOGOUT }
    | { kind: typeof PayloadKind.SELF_FETCH }
    | ({ kind: typeof PayloadKind.SELF_UPDATE } & SelfUpdateFields)
    | { kind: typeof PayloadKind.USERS_FETCH; userIds: string[]; handles: string[] };

/** Envelope written to the socket. */
export interface OutboundEnvelope {
    collationId?: string;
    payload: OutboundPayload;
}

/** Value a pending request is resolved with. */
export type ReplyValue =
    | { kind: typeof PayloadKind.NONE }
    | { kind: typeof PayloadKind.SELF; self: Self }
    | { kind: typeof PayloadKind.USERS; users: ResultSet<User> };

// =============================================================================
// Callback Types
// =============================================================================

/** Raised once when a connection reaches CLOSED. */
export type OnDisconnect = () => void | Promise<void>;

/** Raised for inbound frames that are not replies. */
export type OnMessage = (envelope: Envelope) => void | Promise<void>;
