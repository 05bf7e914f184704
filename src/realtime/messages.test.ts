import { describe, expect, it } from 'vitest';
import { selfFetch, selfUpdate, usersFetch } from './messages';

const self = {
    id: 'user-1',
    handle: 'player-one',
    createdAt: 1,
    updatedAt: 1,
    lastOnlineAt: 1,
    verified: true,
    deviceIds: ['device-1']
};

describe('messages', () => {
    it('selfFetch narrows a self reply', () => {
        const message = selfFetch();
        expect(message.payload).toEqual({ kind: 'selfFetch' });
        expect(message.expect({ kind: 'self', self })).toBe(self);
    });

    it('selfUpdate carries its fields and resolves to true', () => {
        const message = selfUpdate({ handle: 'player-two', timezone: 'UTC' });
        expect(message.payload).toEqual({ kind: 'selfUpdate', handle: 'player-two', timezone: 'UTC' });
        expect(message.expect({ kind: 'none' })).toBe(true);
    });

    it('usersFetch fills missing lists', () => {
        expect(usersFetch({ handles: ['alpha'] }).payload).toEqual({
            kind: 'usersFetch',
            userIds: [],
            handles: ['alpha']
        });
    });

    it('usersFetch needs at least one id or handle', () => {
        expect(() => usersFetch({})).toThrow('usersFetch needs at least one id or handle');
    });

    it('raises a protocol error for a reply of the wrong kind', () => {
        expect(() => selfFetch().expect({ kind: 'none' })).toThrow("expected a 'self' reply, got 'none'");
        expect(() => selfUpdate({}).expect({ kind: 'self', self })).toThrow(
            "expected a 'none' reply, got 'self'"
        );
    });
});
