/**
 * Realtime socket layer.
 *
 * Features:
 * - One owned duplex channel per connection, terminal once closed
 * - Request/reply correlation by collation id
 * - Heartbeat-fed monotonic server clock
 * - Optional request deadlines
 *
 * Usage:
 *     import { Connection, selfFetch } from './realtime';
 *
 *     const connection = new Connection({ config, session });
 *     await connection.connect();
 *     const self = await connection.send(selfFetch());
 */

// =============================================================================
// Type Definitions
// =============================================================================

export {
    // Enums and constants
    ConnectionState,
    CloseCode,
    PayloadKind,

    // Domain values
    UserSchema,
    type User,
    SelfSchema,
    type Self,
    type ResultSet,
    type SelfUpdateFields,

    // Envelopes
    EnvelopeSchema,
    type Envelope,
    ReplyPayloadSchema,
    type ReplyPayload,
    type OutboundPayload,
    type OutboundEnvelope,
    type ReplyValue,

    // Callbacks
    type OnDisconnect,
    type OnMessage
} from './types';

// =============================================================================
// Components
// =============================================================================

export { ServerClock } from './clock';
export { JsonEnvelopeCodec, type EnvelopeCodec } from './codec';
export { CorrelationTable, PendingRequest } from './correlation';
export { DeadlineSweeper } from './deadlines';
export { EnvelopeRouter, type RouteOutcome, type RouterCallbacks } from './router';
export {
    WsChannel,
    createWsChannel,
    type ChannelFactory,
    type ChannelHandlers,
    type ChannelOptions,
    type DuplexChannel
} from './transport';
export { selfFetch, selfUpdate, usersFetch, type RequestMessage } from './messages';
export { Connection, buildSocketUrl, type ConnectionOptions } from './connection';
