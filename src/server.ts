/**
 * Asterisk WS Kit — Inbound Listeners
 *
 * Entry point for running as the websocket server Asterisk dials into.
 *
 * Listeners:
 *   ARI:   ARI_BIND_ADDRESS:ARI_BIND_PORT, subprotocol ARI_WEBSOCKET_PROTOCOL
 *   Media: MEDIA_BIND_ADDRESS:MEDIA_BIND_PORT, subprotocol MEDIA_WEBSOCKET_PROTOCOL
 *
 * Every ARI event is logged; inbound media is echoed back to its sender.
 * SIGINT / SIGTERM close both listeners and every open connection.
 */

import { config } from './config/index.js';
import { ConnectionManager } from './connection/connection-manager.js';
import type { ControlSession } from './control/control-session.js';
import type { MediaSession } from './media/media-session.js';
import { MediaError } from './utils/errors.js';
import { logger } from './utils/logger.js';

// ── Session Handlers ────────────────────────────────────────────

function onControlSession(session: ControlSession): void {
    session.onEvent('StasisStart', (event) => {
        logger.info({
            event: 'stasis_start',
            channel: event.channel.name,
            args: event.args,
        });
    });

    session.onEvent('StasisEnd', (event) => {
        logger.info({ event: 'stasis_end', channel: event.channel.name });
    });
}

/** Send every received frame straight back until the stream ends */
async function echoMedia(session: MediaSession): Promise<void> {
    let echoed = 0;
    let skipped = 0;

    for await (const { frame, synthesized } of session.frames()) {
        if (synthesized || session.state !== 'streaming') continue;
        try {
            session.sendFrame(frame.payload);
            echoed += 1;
        } catch (error) {
            if (!(error instanceof MediaError)) throw error;
            skipped += 1;
        }
    }

    logger.info({ event: 'media_echo_finished', connectionId: session.transport.identity.id, echoed, skipped });
}

// ── Startup ─────────────────────────────────────────────────────

async function main(): Promise<void> {
    logger.info({
        event: 'server_starting',
        nodeEnv: config.nodeEnv,
        ari: config.ari.listener,
        media: config.media.listener,
        framing: config.media.framing,
        metricsEnabled: config.metricsEnabled,
    });

    const manager = new ConnectionManager();

    // Graceful shutdown
    const shutdown = async (signal: string) => {
        logger.info({ event: 'shutdown_initiated', signal, activeConnections: manager.activeConnections });

        try {
            await manager.stop();
            logger.info({ event: 'server_closed' });
            process.exit(0);
        } catch (error) {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
        }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    try {
        const ariServer = await manager.serveControl({
            host: config.ari.listener.bindAddress,
            port: config.ari.listener.bindPort,
            protocol: config.ari.listener.protocol,
            credentials: config.ari.listener.credentials,
            metricsEnabled: config.metricsEnabled,
            session: { requestTimeoutMs: config.ari.requestTimeoutMs, tag: config.ari.app },
        });
        ariServer.on('session', onControlSession);

        const mediaServer = await manager.serveMedia({
            host: config.media.listener.bindAddress,
            port: config.media.listener.bindPort,
            protocol: config.media.listener.protocol,
            credentials: config.media.listener.credentials,
            metricsEnabled: config.metricsEnabled,
            session: {
                framing: config.media.framing,
                frameSize: config.media.frameSize,
                drainGraceMs: config.media.drainGraceMs,
            },
        });
        mediaServer.on('session', (session) => {
            void echoMedia(session).catch((error: unknown) => {
                logger.error({ err: error, connectionId: session.transport.identity.id }, 'Media echo failed');
            });
        });

        logger.info({
            event: 'server_started',
            ariEndpoint: ariServer.url,
            mediaEndpoint: mediaServer.url,
            environment: config.nodeEnv,
        });
    } catch (error) {
        logger.error({ err: error }, 'Failed to start server');
        process.exit(1);
    }
}

// ── Run ─────────────────────────────────────────────────────────

void main();
