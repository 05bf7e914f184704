/**
 * Unary HTTP exchange used by the authenticator.
 *
 * The connect timeout covers everything up to the response headers; the
 * I/O timeout then covers reading the body. Either one aborts the request.
 */

/** An outbound request. */
export interface HttpRequest {
    url: string;
    method: 'POST';
    headers: Record<string, string>;
    body: Uint8Array;
    /** Ms until response headers. */
    connectTimeout: number;
    /** Ms to read the body once headers arrived. */
    timeout: number;
}

/** A response with its full body. Any status counts as a response. */
export interface HttpResponse {
    status: number;
    body: Uint8Array;
}

/**
 * Performs one request.
 *
 * Rejects only for transport faults (connect, write, read, timeout); an
 * error status still resolves.
 */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

/**
 * Describe a fetch failure, including the socket-level cause when present.
 */
function describeFetchError(error: unknown): string {
    if (!(error instanceof Error)) {
        return String(error);
    }
    const cause: unknown = error.cause;
    if (cause instanceof Error && cause.message) {
        return `${error.message}: ${cause.message}`;
    }
    return error.message;
}

/**
 * Transport backed by the global `fetch`.
 */
export const fetchTransport: HttpTransport = async (request) => {
    const controller = new AbortController();
    let phase: 'connect' | 'read' = 'connect';

    const arm = (ms: number): NodeJS.Timeout =>
        setTimeout(() => controller.abort(new Error(`${phase} timeout after ${ms}ms`)), ms);

    let timer = arm(request.connectTimeout);
    try {
        const response = await fetch(request.url, {
            method: request.method,
            headers: request.headers,
            body: request.body,
            signal: controller.signal
        });

        clearTimeout(timer);
        phase = 'read';
        timer = arm(request.timeout);

        const body = new Uint8Array(await response.arrayBuffer());
        return { status: response.status, body };
    } catch (error) {
        if (controller.signal.aborted) {
            const reason: unknown = controller.signal.reason;
            throw reason instanceof Error ? reason : new Error(`${phase} timeout`);
        }
        throw new Error(describeFetchError(error));
    } finally {
        clearTimeout(timer);
    }
};
