import { describe, expect, it, vi } from 'vitest';
import { createTestLogger, frame } from '../__test__/fakes';
import { ServerClock } from './clock';
import { JsonEnvelopeCodec } from './codec';
import { CorrelationTable, PendingRequest } from './correlation';
import { EnvelopeRouter } from './router';
import type { Envelope } from './types';

function setup() {
    const table = new CorrelationTable();
    const clock = new ServerClock({ now: () => 0 });
    const logger = createTestLogger();
    const onPush = vi.fn<(envelope: Envelope) => void>();
    const router = new EnvelopeRouter({
        table,
        clock,
        codec: new JsonEnvelopeCodec(),
        logger,
        callbacks: { onPush }
    });
    const register = (id: string) => {
        const opened = PendingRequest.open(id, 0);
        table.insert(opened.request);
        return opened.reply;
    };
    return { table, clock, logger, onPush, router, register };
}

describe('EnvelopeRouter', () => {
    it('feeds heartbeats to the clock without touching the table', () => {
        const { router, clock, table, register } = setup();
        void register('req-1');

        expect(router.route({ payload: { kind: 'heartbeat', timestamp: 500 } })).toBe('heartbeat');
        expect(clock.read()).toBe(500);
        expect(table.size).toBe(1);
    });

    it('drops heartbeats without a valid timestamp', () => {
        const { router, clock } = setup();
        expect(router.route({ payload: { kind: 'heartbeat', timestamp: 'soon' } })).toBe('dropped');
        expect(clock.synchronized).toBe(false);
    });

    it('forwards envelopes without a collation id to the push sink', () => {
        const { router, onPush } = setup();
        const push = { payload: { kind: 'notification', subject: 'hello' } };

        expect(router.route(push)).toBe('push');
        expect(onPush).toHaveBeenCalledWith(push);
    });

    it('resolves none replies with the acknowledgement', async () => {
        const { router, register } = setup();
        const reply = register('req-1');

        expect(router.route({ collationId: 'req-1', payload: { kind: 'none' } })).toBe('resolved');
        await expect(reply).resolves.toEqual({ kind: 'none' });
    });

    it('rejects error replies with reason and code', async () => {
        const { router, register } = setup();
        const reply = register('req-1');

        expect(
            router.route({ collationId: 'req-1', payload: { kind: 'error', reason: 'handle in use', code: 7 } })
        ).toBe('rejected');
        await expect(reply).rejects.toMatchObject({ kind: 'protocol', message: 'handle in use', code: 7 });
    });

    it('logs and drops replies with no pending request', () => {
        const { router, logger } = setup();

        expect(router.route({ collationId: 'ghost', payload: { kind: 'none' } })).toBe('unmatched');
        expect(logger.warn).toHaveBeenCalledWith("Dropping 'none' reply: no pending request for collation id ghost");
    });

    it('rejects the taken request when the reply kind is unrecognized', async () => {
        const { router, register, table } = setup();
        const reply = register('req-1');

        expect(router.route({ collationId: 'req-1', payload: { kind: 'mystery' } })).toBe('rejected');
        await expect(reply).rejects.toMatchObject({
            kind: 'protocol',
            message: "unrecognized reply kind 'mystery'"
        });
        expect(table.size).toBe(0);
    });

    it('rejects replies whose payload fails validation', async () => {
        const { router, register } = setup();
        const reply = register('req-1');

        router.route({ collationId: 'req-1', payload: { kind: 'self', self: { id: 'user-1' } } });
        await expect(reply).rejects.toMatchObject({
            kind: 'decode',
            message: "malformed 'self' reply (self.handle: Required)"
        });
    });

    it('carries the users cursor through', async () => {
        const { router, register } = setup();
        const reply = register('req-1');
        const user = { id: 'u-1', handle: 'alpha', createdAt: 1, updatedAt: 1, lastOnlineAt: 1 };

        router.route({ collationId: 'req-1', payload: { kind: 'users', users: [user], cursor: 'page-2' } });
        await expect(reply).resolves.toEqual({ kind: 'users', users: { results: [user], cursor: 'page-2' } });
    });

    it('drops frames that fail to decode', () => {
        const { router, logger } = setup();
        expect(router.handleFrame(frame({ payload: 'not an object' }))).toBe('dropped');
        expect(router.handleFrame(Buffer.from('{{', 'utf-8'))).toBe('dropped');
        expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('logs push handler failures and keeps going', () => {
        const { router, onPush, logger } = setup();
        onPush.mockImplementation(() => {
            throw new Error('boom');
        });

        expect(router.route({ payload: { kind: 'notification' } })).toBe('push');
        expect(logger.error).toHaveBeenCalledTimes(1);
    });
});
