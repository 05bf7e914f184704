/**
 * Typed socket requests.
 *
 * Each builder pairs the outbound payload with the narrowing that turns
 * the generic reply into the caller's result type. A reply of the wrong
 * kind fails the request with a protocol error.
 */

import { ClientError } from '../errors';
import {
    PayloadKind,
    type OutboundPayload,
    type ReplyValue,
    type ResultSet,
    type Self,
    type SelfUpdateFields,
    type User
} from './types';

/** A request that resolves to `T`. */
export interface RequestMessage<T> {
    readonly payload: OutboundPayload;
    expect(reply: ReplyValue): T;
}

function unexpected(wanted: string, reply: ReplyValue): ClientError {
    return ClientError.protocol(`expected a '${wanted}' reply, got '${reply.kind}'`);
}

/**
 * Acknowledgement replies carry no data and resolve to `true`.
 */
function expectAck(reply: ReplyValue): true {
    if (reply.kind !== PayloadKind.NONE) {
        throw unexpected(PayloadKind.NONE, reply);
    }
    return true;
}

/** Fetch the authenticated user's own account. */
export function selfFetch(): RequestMessage<Self> {
    return {
        payload: { kind: PayloadKind.SELF_FETCH },
        expect(reply) {
            if (reply.kind !== PayloadKind.SELF) {
                throw unexpected(PayloadKind.SELF, reply);
            }
            return reply.self;
        }
    };
}

/** Update fields of the authenticated user's account. */
export function selfUpdate(fields: SelfUpdateFields): RequestMessage<true> {
    return {
        payload: { kind: PayloadKind.SELF_UPDATE, ...fields },
        expect: expectAck
    };
}

/**
 * Fetch users by id and/or handle.
 *
 * @throws Error if neither ids nor handles are given
 */
export function usersFetch(query: { ids?: string[]; handles?: string[] }): RequestMessage<ResultSet<User>> {
    const userIds = query.ids ?? [];
    const handles = query.handles ?? [];
    if (userIds.length === 0 && handles.length === 0) {
        throw new Error('usersFetch needs at least one id or handle');
    }
    return {
        payload: { kind: PayloadKind.USERS_FETCH, userIds, handles },
        expect(reply) {
            if (reply.kind !== PayloadKind.USERS) {
                throw unexpected(PayloadKind.USERS, reply);
            }
            return reply.users;
        }
    };
}
