import { afterEach, describe, expect, it } from 'vitest';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { testConfig } from '../__test__/fakes';
import { Session } from '../services/session';
import { Connection } from './connection';
import { selfUpdate } from './messages';
import { rawDataToBytes } from './transport';
import { ConnectionState, EnvelopeSchema, type Envelope } from './types';

describe('rawDataToBytes', () => {
    it('joins fragmented buffers', () => {
        const bytes = rawDataToBytes([Buffer.from('ab'), Buffer.from('cd')]);
        expect(Buffer.from(bytes).toString('utf-8')).toBe('abcd');
    });

    it('wraps array buffers', () => {
        const buffer = new ArrayBuffer(3);
        new Uint8Array(buffer).set([1, 2, 3]);
        expect(Array.from(rawDataToBytes(buffer))).toEqual([1, 2, 3]);
    });
});

describe('WsChannel over loopback', () => {
    let wss: WebSocketServer | undefined;

    async function stopServer(): Promise<void> {
        const running = wss;
        wss = undefined;
        if (running) {
            for (const client of running.clients) {
                client.terminate();
            }
            await new Promise<void>((resolve) => running.close(() => resolve()));
        }
    }

    afterEach(stopServer);

    async function startServer(onConnection: (socket: WebSocket, url: string) => void): Promise<number> {
        const server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
        wss = server;
        server.on('connection', (socket, req) => onConnection(socket, req.url ?? ''));
        await new Promise<void>((resolve) => server.once('listening', () => resolve()));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('server has no port');
        }
        return address.port;
    }

    it('authenticates, answers a request and receives the logout', async () => {
        const received: Envelope[] = [];
        let requestUrl = '';

        const port = await startServer((socket, url) => {
            requestUrl = url;
            socket.send(Buffer.from(JSON.stringify({ payload: { kind: 'heartbeat', timestamp: 1_000_000 } })));
            socket.send('plain text is ignored');
            socket.on('message', (data: RawData) => {
                const envelope = EnvelopeSchema.parse(JSON.parse(Buffer.from(rawDataToBytes(data)).toString('utf-8')));
                received.push(envelope);
                if (envelope.collationId !== undefined) {
                    socket.send(Buffer.from(JSON.stringify({ collationId: envelope.collationId, payload: { kind: 'none' } })));
                }
            });
        });

        const connection = new Connection({
            config: testConfig((b) => b.port(port)),
            session: Session.fromToken('abc123', 0),
            createId: () => 'req-1'
        });

        await connection.connect();
        expect(requestUrl).toBe('/api?serverkey=test-server-key&token=abc123&lang=en');

        await expect(connection.send(selfUpdate({ handle: 'player-two' }))).resolves.toBe(true);
        expect(connection.serverTime).toBe(1_000_000);

        await connection.disconnect();

        expect(connection.state).toBe(ConnectionState.CLOSED);
        expect(received).toEqual([
            { collationId: 'req-1', payload: { kind: 'selfUpdate', handle: 'player-two' } },
            { payload: { kind: 'logout' } }
        ]);
    });

    it('fails pending requests when the server drops the socket', async () => {
        const port = await startServer((socket) => {
            socket.on('message', () => socket.terminate());
        });

        const connection = new Connection({
            config: testConfig((b) => b.port(port)),
            session: Session.fromToken('abc123', 0)
        });
        await connection.connect();

        await expect(connection.send(selfUpdate({ lang: 'en' }))).rejects.toMatchObject({ kind: 'disconnected' });
        expect(connection.state).toBe(ConnectionState.CLOSED);
    });

    it('rejects connect when nothing is listening', async () => {
        const port = await startServer(() => undefined);
        await stopServer();

        const connection = new Connection({
            config: testConfig((b) => b.port(port)),
            session: Session.fromToken('abc123', 0)
        });

        await expect(connection.connect()).rejects.toMatchObject({ kind: 'transport' });
        expect(connection.state).toBe(ConnectionState.CLOSED);
    });
});
