/**
 * Error type surfaced through every failed promise of the client.
 */

/** Category of a client failure. */
export type ClientErrorKind =
    | 'transport'      // connect/write/read fault at the socket or HTTP layer
    | 'protocol'       // the server answered with an error, or with the wrong shape
    | 'correlation'    // a reply carried an id with no pending request
    | 'disconnected'   // the socket closed while the request was pending
    | 'timeout'        // connect timeout or request deadline
    | 'closed'         // operation attempted on a closed connection
    | 'decode';        // payload failed validation

/**
 * Error raised by the client.
 *
 * `code` is only set for protocol errors that carry a numeric server code.
 */
export class ClientError extends Error {
    constructor(
        public readonly kind: ClientErrorKind,
        message: string,
        public readonly code?: number
    ) {
        super(message);
        this.name = 'ClientError';
    }

    static transport(message: string): ClientError {
        return new ClientError('transport', message);
    }

    static protocol(reason: string, code?: number): ClientError {
        return new ClientError('protocol', reason, code);
    }

    static correlationMiss(collationId: string): ClientError {
        return new ClientError('correlation', `no pending request for collation id ${collationId}`);
    }

    static disconnected(): ClientError {
        return new ClientError('disconnected', 'connection closed before a reply arrived');
    }

    static timeout(message: string): ClientError {
        return new ClientError('timeout', message);
    }

    static closed(): ClientError {
        return new ClientError('closed', 'connection is closed');
    }

    static decode(message: string): ClientError {
        return new ClientError('decode', message);
    }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
