/**
 * Envelope serialization.
 *
 * The connection treats the codec as opaque: it hands over an outbound
 * envelope and gets bytes back, and the reverse for inbound frames. The
 * default codec writes UTF-8 JSON into binary frames.
 */

import { EnvelopeSchema, type Envelope, type OutboundEnvelope } from './types';

/** Converts envelopes to and from frame bytes. */
export interface EnvelopeCodec {
    encode(envelope: OutboundEnvelope): Uint8Array;

    /**
     * Decode a frame.
     *
     * @throws Error if the bytes are not a well-formed envelope
     */
    decode(data: Uint8Array): Envelope;
}

/**
 * JSON envelope codec validated with zod.
 */
export class JsonEnvelopeCodec implements EnvelopeCodec {
    encode(envelope: OutboundEnvelope): Uint8Array {
        return Buffer.from(JSON.stringify(envelope), 'utf-8');
    }

    decode(data: Uint8Array): Envelope {
        const text = Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf-8');
        const parsed: unknown = JSON.parse(text);
        const result = EnvelopeSchema.safeParse(parsed);
        if (!result.success) {
            throw new Error(`malformed envelope: ${result.error.issues[0]?.message ?? 'invalid'}`);
        }
        return result.data;
    }
}
