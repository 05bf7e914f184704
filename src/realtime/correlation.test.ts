import { describe, expect, it } from 'vitest';
import { ClientError } from '../errors';
import { CorrelationTable, PendingRequest } from './correlation';

function pending(id: string, deadline?: number) {
    return PendingRequest.open(id, 100, deadline);
}

describe('PendingRequest', () => {
    it('settles once, first call wins', async () => {
        const { request, reply } = pending('a');
        expect(request.resolve({ kind: 'none' })).toBe(true);
        expect(request.reject(new Error('late'))).toBe(false);
        expect(request.resolve({ kind: 'none' })).toBe(false);
        expect(request.settled).toBe(true);
        await expect(reply).resolves.toEqual({ kind: 'none' });
    });

    it('ignores a resolve after a reject', async () => {
        const { request, reply } = pending('a');
        request.reject(ClientError.disconnected());
        expect(request.resolve({ kind: 'none' })).toBe(false);
        await expect(reply).rejects.toMatchObject({ kind: 'disconnected' });
    });
});

describe('CorrelationTable', () => {
    it('takes an inserted entry exactly once', () => {
        const table = new CorrelationTable();
        const { request } = pending('a');
        table.insert(request);

        expect(table.has('a')).toBe(true);
        expect(table.take('a')).toBe(request);
        expect(table.size).toBe(0);
        expect(() => table.take('a')).toThrow('no pending request for collation id a');
    });

    it('raises a correlation error on a miss', () => {
        const table = new CorrelationTable();
        try {
            table.take('missing');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ClientError);
            expect(error).toMatchObject({ kind: 'correlation' });
        }
    });

    it('rejects a duplicate id and keeps the original entry', () => {
        const table = new CorrelationTable();
        const first = pending('a').request;
        table.insert(first);

        expect(() => table.insert(pending('a').request)).toThrow('duplicate collation id a');
        expect(table.take('a')).toBe(first);
    });

    it('clears everything and returns entries in insertion order', () => {
        const table = new CorrelationTable();
        const ids = ['c', 'a', 'b'];
        for (const id of ids) {
            table.insert(pending(id).request);
        }

        expect(table.clearAll().map((request) => request.id)).toEqual(['c', 'a', 'b']);
        expect(table.size).toBe(0);
    });

    it('removes without settling', () => {
        const table = new CorrelationTable();
        const { request } = pending('a');
        table.insert(request);

        expect(table.remove('a')).toBe(true);
        expect(table.remove('a')).toBe(false);
        expect(request.settled).toBe(false);
    });

    it('expires only entries with a deadline at or before now', () => {
        const table = new CorrelationTable();
        table.insert(pending('early', 150).request);
        table.insert(pending('exact', 200).request);
        table.insert(pending('late', 250).request);
        table.insert(pending('none').request);

        expect(table.expire(200).map((request) => request.id)).toEqual(['early', 'exact']);
        expect(table.size).toBe(2);
        expect(table.has('late')).toBe(true);
        expect(table.has('none')).toBe(true);
    });
});
