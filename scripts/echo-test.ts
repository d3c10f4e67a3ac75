/**
 * Media echo test.
 *
 * Listens for Asterisk's media websocket, plays a ulaw file into the
 * channel as one buffered run, and checks that the channel echoed it
 * back byte for byte. Point a dialplan at Echo() with chan_websocket
 * configured to dial MEDIA_BIND_ADDRESS:MEDIA_BIND_PORT.
 *
 * Usage: npm run echo-test -- [file.ulaw]
 * Exit status: 0 when the echo matched, 1 otherwise.
 */

import { readFile } from 'fs/promises';
import { config } from '../src/config/index.js';
import { ConnectionManager } from '../src/connection/connection-manager.js';
import { EchoVerifier } from '../src/media/echo-verifier.js';
import type { MediaSession } from '../src/media/media-session.js';
import type { MediaStartInfo } from '../src/types/index.js';
import { logger } from '../src/utils/logger.js';

const filename = process.argv[2] ?? 'test.ulaw';
const log = logger.child({ component: 'echo-test' });

async function runEcho(session: MediaSession, audio: Buffer): Promise<boolean> {
    const mediaStart = new Promise<MediaStartInfo>((resolve) => {
        session.once('mediaStart', resolve);
    });
    const bufferingCompleted = new Promise<void>((resolve) => {
        session.once('bufferingCompleted', () => resolve());
    });

    const start = await mediaStart;
    const verifier = new EchoVerifier({ frameSize: session.frameSize });
    const detach = verifier.attach(session);
    log.info({ event: 'echo_playing', filename, channel: start.channel, frameSize: session.frameSize });

    await session.play(audio, { buffered: true });
    await bufferingCompleted;

    // Trailing echoed frames arrive during the drain
    await session.hangup();
    await session.closed;
    detach();

    const report = verifier.verify();
    log.info({ event: 'echo_report', ...report });
    return report.passed;
}

async function main(): Promise<void> {
    const audio = await readFile(filename);
    const manager = new ConnectionManager();

    const server = await manager.serveMedia({
        host: config.media.listener.bindAddress,
        port: config.media.listener.bindPort,
        protocol: config.media.listener.protocol,
        credentials: config.media.listener.credentials,
        metricsEnabled: false,
        session: {
            framing: config.media.framing,
            frameSize: config.media.frameSize,
            drainGraceMs: config.media.drainGraceMs,
            // The verifier records frames from session events
            maxBufferedFrames: 0,
        },
    });
    log.info({ event: 'echo_waiting', address: server.url, filename, bytes: audio.length });

    let passed = false;
    for await (const session of server.sessions()) {
        passed = await runEcho(session, audio);
        break;
    }

    await manager.stop();
    log.info({ event: 'echo_result', result: passed ? 'passed' : 'failed' });
    process.exit(passed ? 0 : 1);
}

main().catch((error: unknown) => {
    log.error({ err: error }, 'Echo test failed');
    process.exit(1);
});
