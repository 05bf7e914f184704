// In-process stand-ins shared by the test suites.

import { vi } from 'vitest';
import { ClientConfigBuilder, type ClientConfig } from '../config';
import type { Logger } from '../logging';
import type { ChannelFactory, ChannelHandlers, ChannelOptions, DuplexChannel } from '../realtime/transport';
import { EnvelopeSchema, type Envelope } from '../realtime/types';
import type { HttpRequest, HttpResponse, HttpTransport } from '../services/http-transport';

/** Logger whose methods are spies. */
export function createTestLogger() {
    return {
        trace: vi.fn<(message: string) => void>(),
        debug: vi.fn<(message: string) => void>(),
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
        error: vi.fn<(message: string, error?: Error) => void>()
    } satisfies Logger;
}

/** Default config for tests, with a silent logger. */
export function testConfig(
    customize: (builder: ClientConfigBuilder) => ClientConfigBuilder = (builder) => builder
): ClientConfig {
    return customize(ClientConfigBuilder.create('test-server-key').logger(createTestLogger())).build();
}

/** Encode a value the way the JSON envelope codec frames it. */
export function frame(value: unknown): Uint8Array {
    return Buffer.from(JSON.stringify(value), 'utf-8');
}

// =============================================================================
// Duplex Channel
// =============================================================================

export class FakeChannel implements DuplexChannel {
    handlers?: ChannelHandlers;
    sent: Uint8Array[] = [];
    closeCalls: Array<{ code: number; reason?: string }> = [];

    /** Reject every write. */
    failWrites = false;

    /** Emit the close event as soon as close() is called. */
    closeOnRequest = true;

    constructor(
        readonly url: string,
        readonly options: ChannelOptions
    ) {}

    open(handlers: ChannelHandlers): void {
        this.handlers = handlers;
    }

    send(data: Uint8Array): Promise<void> {
        if (this.failWrites) {
            return Promise.reject(new Error('write failed'));
        }
        this.sent.push(data);
        return Promise.resolve();
    }

    close(code: number, reason?: string): void {
        this.closeCalls.push({ code, reason });
        if (this.closeOnRequest) {
            this.simulateClose(code, reason ?? '');
        }
    }

    // Test helpers

    simulateOpen(): void {
        this.handlers?.onOpen();
    }

    simulateFrame(value: unknown): void {
        this.handlers?.onMessage(frame(value));
    }

    simulateRaw(data: Uint8Array): void {
        this.handlers?.onMessage(data);
    }

    simulateError(error: Error): void {
        this.handlers?.onError(error);
    }

    simulateClose(code: number = 1006, reason: string = ''): void {
        this.handlers?.onClose(code, reason);
    }

    /** Written frames, decoded. */
    sentEnvelopes(): Envelope[] {
        return this.sent.map((data) => EnvelopeSchema.parse(JSON.parse(Buffer.from(data).toString('utf-8'))));
    }
}

/** Factory that records every channel it builds. */
export function createFakeChannelFactory(): { factory: ChannelFactory; channels: FakeChannel[] } {
    const channels: FakeChannel[] = [];
    const factory: ChannelFactory = (url, options) => {
        const channel = new FakeChannel(url, options);
        channels.push(channel);
        return channel;
    };
    return { factory, channels };
}

// =============================================================================
// HTTP Transport
// =============================================================================

/** Transport that records requests and answers from a handler. */
export function createFakeTransport(
    handler: (request: HttpRequest) => HttpResponse | Promise<HttpResponse>
): { transport: HttpTransport; requests: HttpRequest[] } {
    const requests: HttpRequest[] = [];
    const transport: HttpTransport = async (request) => {
        requests.push(request);
        return handler(request);
    };
    return { transport, requests };
}

/** A JSON response body. */
export function jsonResponse(status: number, body: unknown): HttpResponse {
    return { status, body: frame(body) };
}
