import assert from 'node:assert/strict';
import { type TestContext, describe, test } from 'node:test';
import { ConnectionManager, buildAriEventsUrl, buildMediaUrl, toDialError } from '../connection-manager.js';
import type { SessionServer } from '../session-server.js';
import type { ControlSession } from '../../control/control-session.js';
import type { AriEvent } from '../../control/events.js';
import type { MediaSession } from '../../media/media-session.js';
import type { ReceivedFrame } from '../../types/index.js';
import { ControlError, ProtocolError, TransportError } from '../../utils/errors.js';
import { flush } from '../../__tests__/_test_utils.js';

const HOST = '127.0.0.1';
const credentials = { username: 'asterisk', password: 'test-secret' };

/** A manager for each role, stopped when the test ends */
function managers(t: TestContext): { serving: ConnectionManager; dialing: ConnectionManager } {
    const serving = new ConnectionManager();
    const dialing = new ConnectionManager();
    t.after(async () => {
        await dialing.stop();
        await serving.stop();
    });
    return { serving, dialing };
}

function nextSession<S>(server: SessionServer<S>): Promise<S> {
    return new Promise((resolve) => server.once('session', resolve));
}

/** Answer every RESTRequest arriving on `session` with the given status */
function answerRequests(session: ControlSession, statusCode: number): void {
    session.onEventMatching((event) => event.type === 'RESTRequest', (event: AriEvent) => {
        session.transport.sendText(JSON.stringify({
            type: 'RESTResponse',
            request_id: event['request_id'],
            status_code: statusCode,
            reason_phrase: 'OK',
            uri: event['uri'],
        }));
    });
}

/** One dialed and one accepted control session; `requester` is the side named */
async function controlPair(
    t: TestContext,
    requesterRole: 'client' | 'server',
): Promise<{ requester: ControlSession; answerer: ControlSession }> {
    const { serving, dialing } = managers(t);
    const server = await serving.serveControl({ host: HOST, port: 0, protocol: 'ari', metricsEnabled: false });
    const accepted = nextSession(server);
    const client = await dialing.dialControl({ host: HOST, port: server.address.port, app: 'demo', protocol: 'ari' });
    const remote = await accepted;
    return requesterRole === 'client'
        ? { requester: client, answerer: remote }
        : { requester: remote, answerer: client };
}

function isControlError(code: ControlError['code']) {
    return (error: unknown): boolean => error instanceof ControlError && error.code === code;
}

async function firstFrames(session: MediaSession, count: number): Promise<ReceivedFrame[]> {
    const frames: ReceivedFrame[] = [];
    for await (const received of session.frames()) {
        frames.push(received);
        if (frames.length === count) break;
    }
    return frames;
}

describe('control connections', () => {
    test('either side can request and either side can answer', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveControl({ host: HOST, port: 0, protocol: 'ari', credentials, metricsEnabled: false });
        const accepted = nextSession(server);

        const client = await dialing.dialControl({
            host: HOST,
            port: server.address.port,
            app: 'demo',
            credentials,
            protocol: 'ari',
            session: { requestTimeoutMs: 2000 },
        });
        const remote = await accepted;

        assert.equal(client.transport.role, 'client');
        assert.equal(remote.transport.role, 'server');
        assert.equal(remote.transport.identity.subprotocol, 'ari');
        assert.equal(remote.transport.identity.principal, 'asterisk');

        answerRequests(remote, 200);
        answerRequests(client, 204);

        assert.equal((await client.request('GET', 'asterisk/info')).statusCode, 200);
        assert.equal((await remote.request('POST', 'channels/1/answer')).statusCode, 204);
    });

    test('events sent by the server reach the dialer', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveControl({ host: HOST, port: 0, protocol: 'ari', metricsEnabled: false });
        const accepted = nextSession(server);
        const client = await dialing.dialControl({ host: HOST, port: server.address.port, app: 'demo', protocol: 'ari' });
        const remote = await accepted;

        const started = new Promise<string>((resolve) => {
            client.onEvent('StasisStart', (event) => resolve(event.channel.name));
        });
        remote.transport.sendText('{"type":"StasisStart","application":"demo","channel":{"id":"1","name":"PJSIP/alice-00000001"},"args":[]}');

        assert.equal(await started, 'PJSIP/alice-00000001');
    });

    test('wrong credentials are rejected with 401 before the upgrade', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveControl({ host: HOST, port: 0, protocol: 'ari', credentials, metricsEnabled: false });
        const rejections: ProtocolError[] = [];
        server.on('rejected', (error) => rejections.push(error));

        await assert.rejects(
            dialing.dialControl({
                host: HOST,
                port: server.address.port,
                app: 'demo',
                credentials: { username: 'asterisk', password: 'wrong' },
                protocol: 'ari',
            }),
            (error: unknown) => error instanceof ProtocolError
                && error.code === 'PROTOCOL_HANDSHAKE_REJECTED'
                && error.statusCode === 401,
        );
        assert.deepEqual(rejections.map((error) => [error.code, error.statusCode]), [['PROTOCOL_HANDSHAKE_REJECTED', 401]]);
        assert.equal(serving.activeConnections, 0);
        assert.equal(dialing.activeConnections, 0);
    });

    test('a missing subprotocol is rejected with 400', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveControl({ host: HOST, port: 0, protocol: 'ari', metricsEnabled: false });
        const rejections: ProtocolError[] = [];
        server.on('rejected', (error) => rejections.push(error));

        await assert.rejects(
            dialing.dialControl({ host: HOST, port: server.address.port, app: 'demo' }),
            (error: unknown) => error instanceof ProtocolError && error.statusCode === 400,
        );
        assert.deepEqual(rejections.map((error) => error.code), ['PROTOCOL_SUBPROTOCOL_MISMATCH']);
    });
});

for (const role of ['client', 'server'] as const) {
    describe(`control requests from the ${role} side`, () => {
        test('closing the socket fails every pending request', async (t) => {
            const { requester, answerer } = await controlPair(t, role);

            const pending = [
                requester.request('GET', 'channels'),
                requester.request('GET', 'bridges'),
                requester.request('GET', 'endpoints'),
            ];
            const failed = Promise.all(pending.map((request) => assert.rejects(request, isControlError('CONTROL_CONNECTION_CLOSED'))));
            await answerer.transport.close(1001, 'going away');

            await failed;
            assert.equal(requester.pendingCount, 0);
        });

        test('an answer after the deadline is reported as an anomaly', async (t) => {
            const { requester, answerer } = await controlPair(t, role);
            const requestIds: unknown[] = [];
            answerer.onEventMatching((event) => event.type === 'RESTRequest', (event: AriEvent) => {
                requestIds.push(event['request_id']);
            });
            const late = new Promise<string>((resolve) => {
                requester.once('anomaly', (_error, message) => resolve(message.request_id));
            });

            await assert.rejects(requester.request('GET', 'asterisk/info', { timeoutMs: 100 }), isControlError('CONTROL_TIMEOUT'));
            await answerer.whenIdle();
            assert.deepEqual(requestIds, ['1']);

            answerer.transport.sendText(JSON.stringify({ type: 'RESTResponse', request_id: '1', status_code: 200, reason_phrase: 'OK' }));
            assert.equal(await late, '1');
            assert.equal(requester.pendingCount, 0);
        });

        test('a failing handler leaves later events flowing', async (t) => {
            const { requester: listener, answerer: sender } = await controlPair(t, role);
            const failures: string[] = [];
            const seen: string[] = [];
            listener.on('handlerError', (error) => failures.push(error.message));
            listener.onEvent('StasisStart', () => {
                throw new Error('handler bug');
            });
            listener.onAnyEvent((event) => {
                seen.push(event.type);
            });
            const ended = new Promise<void>((resolve) => {
                listener.onEvent('StasisEnd', () => resolve());
            });

            sender.transport.sendText('{"type":"StasisStart","channel":{"id":"1","name":"PJSIP/a"},"args":[]}');
            sender.transport.sendText('{"type":"StasisEnd","channel":{"id":"1","name":"PJSIP/a"}}');
            await ended;
            await listener.whenIdle();

            assert.deepEqual(failures, ['handler bug']);
            assert.deepEqual(seen, ['StasisStart', 'StasisEnd']);
        });
    });
}

describe('media connections', () => {
    test('frames flow both ways once connected', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveMedia({ host: HOST, port: 0, protocol: 'media', metricsEnabled: false });

        const sessions = server.sessions();
        const client = await dialing.dialMedia({ host: HOST, port: server.address.port, connectionId: 'abc' });
        let remote: MediaSession | null = null;
        for await (const session of sessions) {
            remote = session;
            break;
        }
        if (!remote) throw new Error('no session accepted');

        assert.equal(client.transport.identity.subprotocol, 'media');
        assert.equal(serving.activeConnections, 1);
        assert.equal(dialing.activeConnections, 1);

        const atServer = firstFrames(remote, 2);
        client.sendFrame(Buffer.alloc(160, 1));
        client.sendFrame(Buffer.alloc(160, 2));
        assert.deepEqual((await atServer).map((received) => [received.frame.sequence, received.frame.payload[0]]), [[0, 1], [1, 2]]);

        const atClient = firstFrames(client, 1);
        remote.sendFrame(Buffer.alloc(160, 3));
        assert.deepEqual((await atClient).map((received) => [received.frame.sequence, received.frame.timestamp]), [[0, 0]]);
    });

    test('stop closes servers and connections on both sides', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveMedia({ host: HOST, port: 0, protocol: 'media', metricsEnabled: false });
        const accepted = nextSession(server);
        const client = await dialing.dialMedia({ host: HOST, port: server.address.port, connectionId: 'abc' });
        const remote = await accepted;

        await serving.stop();
        await client.closed;
        await remote.closed;
        await flush();

        assert.equal(serving.activeConnections, 0);
        assert.equal(dialing.activeConnections, 0);
        assert.equal(client.state, 'closed');
    });

    test('dialing a port nobody listens on fails with TRANSPORT_CONNECT_FAILED', async (t) => {
        const { serving, dialing } = managers(t);
        const server = await serving.serveMedia({ host: HOST, port: 0, protocol: 'media', metricsEnabled: false });
        const { port } = server.address;
        await server.close();

        await assert.rejects(
            dialing.dialMedia({ host: HOST, port, connectionId: 'abc' }),
            (error: unknown) => error instanceof TransportError && error.code === 'TRANSPORT_CONNECT_FAILED',
        );
    });
});

describe('http routes', () => {
    test('health reports active connections', async (t) => {
        const { serving } = managers(t);
        const server = await serving.serveMedia({ host: HOST, port: 0, protocol: 'media', metricsEnabled: true });

        const response = await fetch(`http://${HOST}:${server.address.port}/health`);
        const body: unknown = await response.json();

        assert.equal(response.status, 200);
        assert.ok(typeof body === 'object' && body !== null);
        assert.equal(Reflect.get(body, 'status'), 'ok');
        assert.equal(Reflect.get(body, 'kind'), 'media');
        assert.equal(Reflect.get(body, 'activeConnections'), 0);

        const metricsResponse = await fetch(`http://${HOST}:${server.address.port}/metrics`);
        assert.equal(metricsResponse.status, 200);
        assert.match(await metricsResponse.text(), /^# HELP asterisk_ws_active_connections /m);
    });
});

describe('urls and errors', () => {
    test('ARI events URL carries the app and an unescaped api_key', () => {
        assert.equal(
            buildAriEventsUrl({ host: 'pbx', port: 8088, app: 'demo', credentials }),
            'ws://pbx:8088/ari/events?subscribeAll=false&app=demo&api_key=asterisk:test-secret',
        );
        assert.equal(
            buildAriEventsUrl({ host: 'pbx', port: 8089, app: 'demo', subscribeAll: true, secure: true }),
            'wss://pbx:8089/ari/events?subscribeAll=true&app=demo',
        );
    });

    test('media URL names the connection', () => {
        assert.equal(buildMediaUrl({ host: 'pbx', port: 8088, connectionId: 'abc-1' }), 'ws://pbx:8088/media/abc-1');
    });

    test('handshake failures map onto the error taxonomy', () => {
        const rejected = toDialError(new Error('Unexpected server response: 403'), 'ws://pbx');
        assert.ok(rejected instanceof ProtocolError);
        assert.equal(rejected.code, 'PROTOCOL_HANDSHAKE_REJECTED');
        assert.equal(rejected.statusCode, 403);

        assert.equal(toDialError(new Error('Server sent no subprotocol'), 'ws://pbx').code, 'PROTOCOL_SUBPROTOCOL_MISMATCH');
        assert.equal(toDialError(new Error('connect ECONNREFUSED 127.0.0.1:1'), 'ws://pbx').code, 'TRANSPORT_CONNECT_FAILED');
    });
});
