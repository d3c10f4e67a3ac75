/**
 * ARI client.
 *
 * Dials Asterisk's ARI events websocket as the Stasis app ARI_APP and
 * bridges each incoming call to a WebSocket channel:
 *   - StasisStart with app data "incoming": create a WebSocket/INCOMING
 *     channel into this app and dial it
 *   - Dial on that channel with an empty status: open its media
 *     websocket (MEDIA_WEBSOCKET_CONNECTION_ID) and echo the audio
 *   - Dial ANSWER: bridge both channels and answer the caller
 *   - StasisEnd on either side: hang up the other and destroy the bridge
 *
 * Usage: npm run ari-client
 */

import { randomUUID } from 'crypto';
import { config } from '../src/config/index.js';
import { ConnectionManager } from '../src/connection/connection-manager.js';
import type { ControlSession } from '../src/control/control-session.js';
import type { AriChannel } from '../src/control/events.js';
import type { MediaSession } from '../src/media/media-session.js';
import { MediaError } from '../src/utils/errors.js';
import { logger } from '../src/utils/logger.js';

const log = logger.child({ component: 'ari-client' });

interface CallLeg {
    incomingId: string | null;
    incomingName: string;
    websocketId: string | null;
    bridgeId: string | null;
}

const legsByIncoming = new Map<string, CallLeg>();
const legsByWebsocket = new Map<string, CallLeg>();

function appData(channel: AriChannel): string {
    return channel.dialplan?.app_data ?? '';
}

async function createJson(session: ControlSession, uri: string, query: Record<string, string>): Promise<AriChannel> {
    const body = await session.requestJson('POST', uri, { query });
    if (typeof body !== 'object' || body === null || typeof Reflect.get(body, 'id') !== 'string') {
        throw new Error(`Unexpected response body from POST ${uri}`);
    }
    return { id: String(Reflect.get(body, 'id')), name: String(Reflect.get(body, 'name') ?? '') };
}

async function bridgeCall(session: ControlSession, leg: CallLeg): Promise<void> {
    if (!leg.incomingId || !leg.websocketId) return;
    const bridgeId = randomUUID();
    leg.bridgeId = bridgeId;
    log.info({ event: 'bridge_creating', bridgeId });

    await session.requestJson('POST', `bridges/${bridgeId}`, { query: { type: 'mixing' } });
    await session.requestJson('POST', `bridges/${bridgeId}/addChannel`, { query: { channel: leg.incomingId } });
    await session.requestJson('POST', `bridges/${bridgeId}/addChannel`, { query: { channel: leg.websocketId } });

    log.info({ event: 'call_answering', channel: leg.incomingName });
    await session.requestJson('POST', `channels/${leg.incomingId}/answer`);
}

/** Echo inbound audio until the media websocket closes */
async function echoMedia(media: MediaSession): Promise<void> {
    for await (const { frame, synthesized } of media.frames()) {
        if (synthesized || media.state !== 'streaming') continue;
        try {
            media.sendFrame(frame.payload);
        } catch (error) {
            if (!(error instanceof MediaError)) throw error;
        }
    }
}

function onControlSession(session: ControlSession, manager: ConnectionManager): void {
    session.onEvent('StasisStart', async (event) => {
        if (!appData(event.channel).includes('incoming')) return;

        const leg: CallLeg = { incomingId: event.channel.id, incomingName: event.channel.name, websocketId: null, bridgeId: null };
        legsByIncoming.set(event.channel.id, leg);

        log.info({ event: 'websocket_channel_creating', originator: event.channel.name });
        const websocket = await createJson(session, 'channels/create', {
            endpoint: 'WebSocket/INCOMING/c(ulaw)',
            app: config.ari.app,
            appArgs: 'websocket',
            originator: event.channel.id,
        });
        leg.websocketId = websocket.id;
        legsByWebsocket.set(websocket.id, leg);

        log.info({ event: 'websocket_channel_dialing', channel: websocket.name });
        await session.requestJson('POST', `channels/${websocket.id}/dial`, {
            query: { caller: event.channel.id, timeout: '5' },
        });
    });

    session.onEvent('Dial', async (event) => {
        if (!event.peer.name.includes('WebSocket/')) return;
        log.info({ event: 'websocket_dial', channel: event.peer.name, status: event.dialstatus });

        if (event.dialstatus === '') {
            const connectionId = event.peer.channelvars?.['MEDIA_WEBSOCKET_CONNECTION_ID'];
            if (!connectionId) {
                log.warn({ event: 'media_connection_id_missing', channel: event.peer.name });
                return;
            }
            const media = await manager.dialMedia({
                host: config.ari.host,
                port: config.ari.port,
                connectionId,
                session: { framing: config.media.framing, frameSize: config.media.frameSize, tag: event.peer.name },
            });
            void echoMedia(media).catch((error: unknown) => {
                log.error({ err: error, channel: event.peer.name }, 'Media echo failed');
            });
            return;
        }

        if (event.dialstatus === 'ANSWER') {
            const leg = legsByWebsocket.get(event.peer.id);
            if (leg) await bridgeCall(session, leg);
        }
    });

    session.onEvent('StasisEnd', async (event) => {
        const { id } = event.channel;
        const leg = legsByIncoming.get(id) ?? legsByWebsocket.get(id);
        if (!leg) return;

        if (leg.incomingId === id) {
            legsByIncoming.delete(id);
            leg.incomingId = null;
            if (leg.websocketId) await session.request('DELETE', `channels/${leg.websocketId}`);
        } else {
            legsByWebsocket.delete(id);
            leg.websocketId = null;
            if (leg.incomingId) await session.request('DELETE', `channels/${leg.incomingId}`);
        }

        if (leg.bridgeId) {
            await session.request('DELETE', `bridges/${leg.bridgeId}`);
            leg.bridgeId = null;
        }
    });
}

async function main(): Promise<void> {
    const manager = new ConnectionManager();

    const shutdown = async (signal: string) => {
        log.info({ event: 'shutdown_initiated', signal });
        await manager.stop();
        process.exit(0);
    };
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    const session = await manager.dialControl({
        host: config.ari.host,
        port: config.ari.port,
        app: config.ari.app,
        credentials: config.ari.credentials,
        session: { requestTimeoutMs: config.ari.requestTimeoutMs, tag: config.ari.app },
    });
    onControlSession(session, manager);
    log.info({ event: 'ari_connected', host: config.ari.host, port: config.ari.port, app: config.ari.app });

    await session.closed;
    log.info({ event: 'ari_disconnected' });
    await manager.stop();
}

main().catch((error: unknown) => {
    log.error({ err: error }, 'ARI client failed');
    process.exit(1);
});
