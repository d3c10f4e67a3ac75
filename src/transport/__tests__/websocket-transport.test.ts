import assert from 'node:assert/strict';
import { once } from 'node:events';
import { after, before, test } from 'node:test';
import WebSocket, { WebSocketServer } from 'ws';
import type { TransportMessage } from '../../types/index.js';
import { TransportError } from '../../utils/errors.js';
import { WebSocketTransport, toBuffer } from '../websocket-transport.js';

let server: WebSocketServer;
let url: string;

before(async () => {
    server = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not bound to a port');
    url = `ws://127.0.0.1:${address.port}`;
});

after(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
});

/** Dial the test server; returns our transport and the server's raw socket */
async function connect(): Promise<{ transport: WebSocketTransport; remote: WebSocket }> {
    const accepted = new Promise<WebSocket>((resolve) => server.once('connection', resolve));
    const ws = new WebSocket(url);
    await once(ws, 'open');
    const remote = await accepted;
    const transport = new WebSocketTransport(ws, 'client', {
        id: 'conn-1',
        remoteAddress: '127.0.0.1',
        subprotocol: null,
        principal: null,
    });
    return { transport, remote };
}

test('separates text and binary frames and keeps their order', async () => {
    const { transport, remote } = await connect();
    remote.send('hello');
    remote.send(Buffer.from([1, 2, 3]));
    remote.send('bye');
    remote.close(1000, 'done');

    const messages: TransportMessage[] = [];
    for await (const message of transport.messages()) messages.push(message);

    assert.deepEqual(messages, [
        { kind: 'text', data: 'hello' },
        { kind: 'binary', data: Buffer.from([1, 2, 3]) },
        { kind: 'text', data: 'bye' },
    ]);
    const info = await transport.closed;
    assert.equal(info.code, 1000);
    assert.equal(info.reason, 'done');
    assert.equal(transport.state, 'closed');
});

test('messages may be taken only once', async () => {
    const { transport } = await connect();
    transport.messages();

    assert.throws(
        () => transport.messages(),
        (error: unknown) => error instanceof TransportError && error.code === 'TRANSPORT_ALREADY_CONSUMED',
    );
    await transport.close();
});

test('sends reach the peer with their frame type', async () => {
    const { transport, remote } = await connect();
    const received: Array<{ data: Buffer; isBinary: boolean }> = [];
    const gotTwo = new Promise<void>((resolve) => {
        remote.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            received.push({ data: toBuffer(data), isBinary });
            if (received.length === 2) resolve();
        });
    });

    assert.equal(transport.state, 'open');
    transport.sendText('{"type":"ping"}');
    transport.sendBinary(Buffer.from([0xff, 0x7f]));
    await gotTwo;

    assert.deepEqual(received, [
        { data: Buffer.from('{"type":"ping"}'), isBinary: false },
        { data: Buffer.from([0xff, 0x7f]), isBinary: true },
    ]);
    await transport.close();
});

test('sending after close throws TRANSPORT_NOT_OPEN', async () => {
    const { transport } = await connect();
    await transport.close(1000, 'bye');

    assert.throws(
        () => transport.sendText('late'),
        (error: unknown) => error instanceof TransportError && error.code === 'TRANSPORT_NOT_OPEN',
    );
    assert.equal(transport.bufferedBytes, 0);
});

test('toBuffer flattens fragmented data', () => {
    assert.deepEqual(toBuffer([Buffer.from([1]), Buffer.from([2, 3])]), Buffer.from([1, 2, 3]));
    const arrayBuffer = new ArrayBuffer(2);
    new Uint8Array(arrayBuffer).set([4, 5]);
    assert.deepEqual(toBuffer(arrayBuffer), Buffer.from([4, 5]));
});
