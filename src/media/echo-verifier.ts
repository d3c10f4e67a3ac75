/**
 * Asterisk WS Kit — Echo Verifier
 *
 * Compares what was sent on a media session with what came back from an
 * echo peer. The peer pads a short final frame before echoing it, so at
 * least the sent length rounded up to whole frames must come back, and
 * it must start with exactly the sent bytes.
 */

import type { MediaFrame, ReceivedFrame } from '../types/index.js';
import { MediaError } from '../utils/errors.js';
import type { MediaSession } from './media-session.js';

export interface EchoVerifierOptions {
    frameSize: number;
    /** Leading frames the echo may be shifted by (jitter buffers, early silence) */
    maxOffsetFrames?: number;
}

export interface EchoReport {
    sentBytes: number;
    /** sentBytes rounded up to whole frames */
    expectedBytes: number;
    receivedBytes: number;
    /** Where the sent audio starts inside the echo; null if it was not found */
    offsetBytes: number | null;
    lengthOk: boolean;
    matched: boolean;
    /** First byte where the echo differs from the sent audio, when nothing matched */
    mismatchAt: number | null;
    passed: boolean;
}

export class EchoVerifier {
    private readonly sent: Buffer[] = [];
    private readonly received: Buffer[] = [];
    private readonly frameSize: number;
    private readonly maxOffsetFrames: number;

    constructor(options: EchoVerifierOptions) {
        this.frameSize = options.frameSize;
        this.maxOffsetFrames = options.maxOffsetFrames ?? 0;
    }

    recordSent(payload: Buffer): void {
        this.sent.push(Buffer.from(payload));
    }

    recordReceived(payload: Buffer): void {
        this.received.push(Buffer.from(payload));
    }

    /** Record every frame sent and every real (not synthesized) frame received. */
    attach(session: MediaSession): () => void {
        const onSent = (frame: MediaFrame): void => this.recordSent(frame.payload);
        const onFrame = (received: ReceivedFrame): void => {
            if (!received.synthesized) this.recordReceived(received.frame.payload);
        };

        session.on('frameSent', onSent);
        session.on('frame', onFrame);
        return () => {
            session.off('frameSent', onSent);
            session.off('frame', onFrame);
        };
    }

    verify(): EchoReport {
        const sent = Buffer.concat(this.sent);
        const received = Buffer.concat(this.received);
        const expectedBytes = Math.ceil(sent.length / this.frameSize) * this.frameSize;

        // Padding is the peer's choice of silence, so only the sent bytes are compared
        let offsetBytes: number | null = null;
        for (let shift = 0; shift <= this.maxOffsetFrames; shift += 1) {
            const start = shift * this.frameSize;
            if (start + sent.length > received.length) break;
            if (received.subarray(start, start + sent.length).equals(sent)) {
                offsetBytes = start;
                break;
            }
        }

        const lengthOk = received.length >= expectedBytes;
        const matched = offsetBytes !== null;

        return {
            sentBytes: sent.length,
            expectedBytes,
            receivedBytes: received.length,
            offsetBytes,
            lengthOk,
            matched,
            mismatchAt: matched ? null : firstDifference(sent, received),
            passed: matched && lengthOk,
        };
    }

    assertMatch(): EchoReport {
        const report = this.verify();
        if (!report.passed) {
            throw new MediaError(
                `Echo mismatch: sent ${report.sentBytes} bytes (${report.expectedBytes} framed), `
                    + `received ${report.receivedBytes}, first difference at ${report.mismatchAt ?? 'n/a'}`,
                'MEDIA_VERIFICATION_MISMATCH',
            );
        }
        return report;
    }
}

function firstDifference(a: Buffer, b: Buffer): number {
    const length = Math.min(a.length, b.length);
    for (let index = 0; index < length; index += 1) {
        if (a[index] !== b[index]) return index;
    }
    return length;
}
