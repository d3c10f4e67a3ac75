/**
 * Asterisk WS Kit — Media Session
 *
 * Streams ulaw audio frames over a websocket of its own. Binary frames
 * are audio; text frames are media commands (see media-commands.ts).
 *
 * Lifecycle:  idle → streaming → draining → closed
 *   - streaming: first frame sent or received
 *   - draining:  `drain()` / `hangup()` locally, or HANGUP from the peer;
 *                local sends stop and trailing inbound frames are
 *                collected until the grace deadline
 *   - closed:    terminal; reached after draining, on `cancel()`, or
 *                when the socket goes away
 *
 * Inbound sequence numbers are checked against the next expected one.
 * Real-time audio cannot be reordered after the fact, so gaps,
 * duplicates and regressions are reported and then handled according
 * to the session's `sequencePolicy`.
 */

import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import type pino from 'pino';
import type {
    MediaFrame,
    MediaFraming,
    MediaSessionState,
    MediaStartInfo,
    ReceivedFrame,
    SequenceAnomaly,
    SequenceAnomalyPolicy,
    TransportCloseInfo,
} from '../types/index.js';
import type { Transport } from '../transport/transport.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { MediaError, ProtocolError, TransportError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { metrics } from '../metrics/collector.js';
import {
    DEFAULT_FRAME_SIZE,
    chunkAudio,
    decodeSequencedFrame,
    encodeFrame,
    silence,
    wrapUint32,
} from './frame-codec.js';
import { type MediaCommand, formatMediaCommand, parseMediaCommand, toMediaStartInfo } from './media-commands.js';

// ─── Event Types ───────────────────────────────────────────────

export interface MediaSessionEvents {
    mediaStart: (info: MediaStartInfo) => void;
    /** Every inbound command, after the session has acted on it */
    command: (command: MediaCommand) => void;
    /** true on MEDIA_XOFF, false on MEDIA_XON */
    flowControl: (paused: boolean) => void;
    bufferingCompleted: (id: string | null) => void;
    /** The peer sent HANGUP */
    endOfStream: () => void;
    frame: (received: ReceivedFrame) => void;
    frameSent: (frame: MediaFrame) => void;
    anomaly: (error: MediaError, anomaly: SequenceAnomaly) => void;
    protocolError: (error: ProtocolError) => void;
    stateChange: (state: MediaSessionState, previous: MediaSessionState) => void;
    close: (info: TransportCloseInfo) => void;
}

export declare interface MediaSession {
    on<E extends keyof MediaSessionEvents>(event: E, listener: MediaSessionEvents[E]): this;
    once<E extends keyof MediaSessionEvents>(event: E, listener: MediaSessionEvents[E]): this;
    off<E extends keyof MediaSessionEvents>(event: E, listener: MediaSessionEvents[E]): this;
    emit<E extends keyof MediaSessionEvents>(event: E, ...args: Parameters<MediaSessionEvents[E]>): boolean;
}

// ─── Options ───────────────────────────────────────────────────

export interface MediaSessionOptions {
    framing?: MediaFraming;
    /** Frame size until MEDIA_START negotiates one */
    frameSize?: number;
    sequencePolicy?: SequenceAnomalyPolicy;
    /** Socket buffer level at which sendFrame refuses with MEDIA_BACKPRESSURE */
    backpressureThresholdBytes?: number;
    /** How long draining waits for trailing inbound frames */
    drainGraceMs?: number;
    /**
     * Frames kept for `frames()` until it is taken; the oldest are dropped
     * past this. 0 keeps none, for sessions read only through `frame` events.
     */
    maxBufferedFrames?: number;
    tag?: string;
}

export interface PlayOptions {
    /** Wrap the run in START_MEDIA_BUFFERING / STOP_MEDIA_BUFFERING */
    buffered?: boolean;
    /** Sent with STOP_MEDIA_BUFFERING and echoed back in MEDIA_BUFFERING_COMPLETED */
    bufferingId?: string;
    /** Pace frames at the audio rate instead of sending as fast as allowed */
    realtime?: boolean;
}

// ─── Constants ─────────────────────────────────────────────────

const DEFAULT_BACKPRESSURE_THRESHOLD_BYTES = 64 * 1024;
const DEFAULT_DRAIN_GRACE_MS = 2000;
/** Ten seconds of 20 ms frames */
const DEFAULT_MAX_BUFFERED_FRAMES = 500;
const BACKPRESSURE_POLL_MS = 10;
/** Gaps wider than this (one second of audio) are reported but not filled */
const MAX_FILL_FRAMES = 50;
const ULAW_SAMPLES_PER_MS = 8;
/** Forward distances below this are gaps, anything else is behind us */
const SEQUENCE_HALF_RANGE = 0x80000000;

// ─── Session ───────────────────────────────────────────────────

export class MediaSession extends EventEmitter {
    private readonly inbox = new AsyncQueue<ReceivedFrame>();
    private readonly framingValue: MediaFraming;
    private readonly sequencePolicy: SequenceAnomalyPolicy;
    private readonly backpressureThresholdBytes: number;
    private readonly drainGraceMs: number;
    private readonly maxBufferedFrames: number;
    private log: pino.Logger;

    private stateValue: MediaSessionState = 'idle';
    private frameSizeValue: number;
    private frameSizeNegotiated = false;
    private paused = false;
    private framesTaken = false;

    private outboundSequence = 0;
    private outboundTimestamp = 0;
    private expectedSequence = 0;
    private inboundCount = 0;
    private inboundTimestamp = 0;
    private sentBytesValue = 0;
    private receivedBytesValue = 0;
    private unreadDroppedValue = 0;

    private drainTask: Promise<void> | null = null;
    private abortError: MediaError | null = null;

    /** Resolves when the socket has closed and the frame sequence has ended */
    public readonly closed: Promise<void>;

    constructor(
        public readonly transport: Transport,
        options: MediaSessionOptions = {},
    ) {
        super();
        this.framingValue = options.framing ?? 'sequenced';
        this.frameSizeValue = options.frameSize ?? DEFAULT_FRAME_SIZE;
        this.sequencePolicy = options.sequencePolicy ?? 'deliver';
        this.backpressureThresholdBytes = options.backpressureThresholdBytes ?? DEFAULT_BACKPRESSURE_THRESHOLD_BYTES;
        this.drainGraceMs = options.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS;
        this.maxBufferedFrames = options.maxBufferedFrames ?? DEFAULT_MAX_BUFFERED_FRAMES;
        this.log = createComponentLogger('media', options.tag ?? transport.identity.id);

        this.log.info({
            event: 'media_session_started',
            role: transport.role,
            remoteAddress: transport.identity.remoteAddress,
            framing: this.framingValue,
            frameSize: this.frameSizeValue,
        });

        this.closed = this.run();
    }

    get state(): MediaSessionState {
        return this.stateValue;
    }

    get framing(): MediaFraming {
        return this.framingValue;
    }

    get frameSize(): number {
        return this.frameSizeValue;
    }

    get sentBytes(): number {
        return this.sentBytesValue;
    }

    get receivedBytes(): number {
        return this.receivedBytesValue;
    }

    /** Frames discarded because `frames()` had not been taken */
    get unreadDropped(): number {
        return this.unreadDroppedValue;
    }

    /** True while the peer has us on XOFF or the socket buffer is over the threshold */
    get isBackpressured(): boolean {
        return this.paused || this.transport.bufferedBytes >= this.backpressureThresholdBytes;
    }

    /**
     * Inbound frames in arrival order. Ends when the socket closes; throws
     * MEDIA_SEQUENCE_ANOMALY at the end when the `abort` policy tripped.
     * May be taken once per session. Until then only the newest
     * `maxBufferedFrames` are held for it.
     */
    frames(): AsyncIterable<ReceivedFrame> {
        if (this.framesTaken) {
            throw new TransportError('Media frames are already being consumed', 'TRANSPORT_ALREADY_CONSUMED');
        }
        this.framesTaken = true;
        return this.inbox;
    }

    /**
     * Send one frame. Never waits: refuses with MEDIA_BACKPRESSURE when
     * the peer or the socket cannot take more.
     */
    sendFrame(payload: Buffer): MediaFrame {
        if (this.stateValue === 'draining' || this.stateValue === 'closed') {
            throw new MediaError(`Cannot send media while ${this.stateValue}`, 'MEDIA_SESSION_CLOSED');
        }
        if (payload.length === 0 || payload.length > this.frameSizeValue) {
            throw new ProtocolError(
                `Media payload of ${payload.length} bytes does not fit a ${this.frameSizeValue}-byte frame`,
                'PROTOCOL_FRAME_SIZE',
            );
        }
        if (this.isBackpressured) {
            metrics.recordBackpressure();
            throw new MediaError(
                this.paused ? 'Peer paused media (MEDIA_XOFF)' : `Socket buffer above ${this.backpressureThresholdBytes} bytes`,
                'MEDIA_BACKPRESSURE',
            );
        }

        const frame: MediaFrame = {
            sequence: this.outboundSequence,
            timestamp: this.outboundTimestamp,
            payload,
        };
        this.transport.sendBinary(encodeFrame(frame, this.framingValue));

        this.outboundSequence = wrapUint32(this.outboundSequence + 1);
        this.outboundTimestamp = wrapUint32(this.outboundTimestamp + payload.length);
        this.sentBytesValue += payload.length;
        metrics.recordFrame('out');

        this.markStreaming();
        this.emit('frameSent', frame);
        return frame;
    }

    /**
     * Send a whole buffer of audio frame by frame, waiting out flow
     * control between frames. Resolves with the number of frames sent.
     */
    async play(audio: Buffer, options: PlayOptions = {}): Promise<number> {
        const chunks = chunkAudio(audio, this.frameSizeValue);
        this.log.info({ event: 'media_play_started', bytes: audio.length, frames: chunks.length, buffered: options.buffered ?? false });

        if (options.buffered) {
            this.sendCommand(formatMediaCommand('START_MEDIA_BUFFERING'));
        }

        for (const chunk of chunks) {
            await this.waitUntilWritable();
            this.sendFrame(chunk);
            if (options.realtime) {
                await delay(chunk.length / ULAW_SAMPLES_PER_MS);
            }
        }

        if (options.buffered) {
            this.sendCommand(formatMediaCommand('STOP_MEDIA_BUFFERING', options.bufferingId ? [options.bufferingId] : []));
        }

        this.log.info({ event: 'media_play_finished', frames: chunks.length });
        return chunks.length;
    }

    sendCommand(command: string): void {
        if (this.stateValue === 'closed') {
            throw new MediaError(`Cannot send "${command}" on a closed media session`, 'MEDIA_SESSION_CLOSED');
        }
        this.transport.sendText(command);
        this.log.debug({ event: 'media_command_sent', command });
    }

    /** Tell the peer we are done, then drain. */
    async hangup(): Promise<void> {
        this.sendCommand(formatMediaCommand('HANGUP'));
        await this.drain();
    }

    /**
     * Stop sending, collect trailing frames until the grace deadline (or
     * until the peer closes), then close. Repeated calls share one drain.
     */
    drain(graceMs = this.drainGraceMs): Promise<void> {
        this.drainTask ??= this.runDrain(graceMs);
        return this.drainTask;
    }

    /**
     * Jump straight to `closed`. Frames already in flight are still
     * delivered until the socket itself closes.
     */
    cancel(): void {
        this.setState('closed');
    }

    async close(code = 1000, reason = ''): Promise<void> {
        this.cancel();
        await this.transport.close(code, reason);
        await this.closed;
    }

    // ── Reader Task ───────────────────────────────────────────────

    private async run(): Promise<void> {
        try {
            for await (const message of this.transport.messages()) {
                if (message.kind === 'text') {
                    this.handleCommand(message.data);
                } else {
                    this.handleBinary(message.data);
                }
            }
        } catch (error) {
            this.log.error({ err: error }, 'Media reader task failed');
        }

        const info = await this.transport.closed;
        this.setState('closed');
        this.inbox.end(this.abortError ?? undefined);

        this.log.info({
            event: 'media_disconnected',
            code: info.code,
            sentBytes: this.sentBytesValue,
            receivedBytes: this.receivedBytesValue,
            frames: this.inboundCount,
            unreadDropped: this.unreadDroppedValue,
        });
        this.emit('close', info);
    }

    private handleCommand(text: string): void {
        const command = parseMediaCommand(text);
        this.log.info({ event: 'media_command', command: command.raw });

        switch (command.name) {
            case 'MEDIA_START': {
                const info = toMediaStartInfo(command);
                this.negotiateFrameSize(info.optimalFrameSize);
                if (info.channel) {
                    this.log = this.log.child({ channel: info.channel });
                }
                this.emit('mediaStart', info);
                break;
            }

            case 'MEDIA_XOFF':
                this.setPaused(true);
                break;

            case 'MEDIA_XON':
                this.setPaused(false);
                break;

            case 'MEDIA_BUFFERING_COMPLETED':
                this.emit('bufferingCompleted', command.args[0] ?? null);
                break;

            case 'HANGUP':
                this.emit('endOfStream');
                this.drainTask ??= this.runDrain(this.drainGraceMs);
                break;

            default:
                this.log.debug({ event: 'media_command_unhandled', name: command.name });
                break;
        }

        this.emit('command', command);
    }

    private handleBinary(data: Buffer): void {
        if (this.abortError) return;

        let frame: MediaFrame;
        if (this.framingValue === 'raw') {
            frame = { sequence: wrapUint32(this.inboundCount), timestamp: this.inboundTimestamp, payload: data };
            this.inboundTimestamp = wrapUint32(this.inboundTimestamp + data.length);
        } else {
            try {
                frame = decodeSequencedFrame(data);
            } catch (error) {
                if (!(error instanceof ProtocolError)) throw error;
                metrics.recordProtocolError(error.code);
                this.log.warn({ err: error }, 'Dropping undecodable media frame');
                this.emit('protocolError', error);
                return;
            }
        }

        this.inboundCount += 1;
        this.receivedBytesValue += frame.payload.length;
        metrics.recordFrame('in');
        this.markStreaming();

        const anomaly = this.checkSequence(frame.sequence);
        if (!anomaly) {
            this.deliver({ frame, anomaly: null, synthesized: false });
            return;
        }

        const error = new MediaError(
            `Media sequence ${anomaly.kind}: expected ${anomaly.expected}, received ${anomaly.received}`,
            'MEDIA_SEQUENCE_ANOMALY',
        );
        metrics.recordSequenceAnomaly(anomaly.kind);
        this.log.warn({ event: 'media_sequence_anomaly', ...anomaly, policy: this.sequencePolicy });
        this.emit('anomaly', error, anomaly);

        switch (this.sequencePolicy) {
            case 'deliver':
                this.deliver({ frame, anomaly, synthesized: false });
                break;

            case 'drop':
                if (anomaly.kind === 'gap') {
                    this.deliver({ frame, anomaly, synthesized: false });
                }
                break;

            case 'fill-silence':
                if (anomaly.kind === 'gap') {
                    this.fillGap(anomaly, frame);
                    this.deliver({ frame, anomaly, synthesized: false });
                }
                break;

            case 'abort':
                this.abort(error);
                break;
        }
    }

    // ── Sequencing ────────────────────────────────────────────────

    private checkSequence(sequence: number): SequenceAnomaly | null {
        const expected = this.expectedSequence;
        // Sequence numbers wrap at 2^32, so compare by distance
        const ahead = wrapUint32(sequence - expected);
        if (ahead === 0) {
            this.expectedSequence = wrapUint32(sequence + 1);
            return null;
        }
        if (ahead < SEQUENCE_HALF_RANGE) {
            this.expectedSequence = wrapUint32(sequence + 1);
            return { kind: 'gap', expected, received: sequence };
        }
        if (sequence === wrapUint32(expected - 1)) {
            return { kind: 'duplicate', expected, received: sequence };
        }
        return { kind: 'regression', expected, received: sequence };
    }

    private fillGap(anomaly: SequenceAnomaly, frame: MediaFrame): void {
        const missing = wrapUint32(anomaly.received - anomaly.expected);
        if (missing > MAX_FILL_FRAMES) {
            this.log.warn({ event: 'media_gap_too_wide', missing });
            return;
        }

        for (let offset = 0; offset < missing; offset += 1) {
            const behind = missing - offset;
            this.deliver({
                frame: {
                    sequence: wrapUint32(anomaly.expected + offset),
                    timestamp: wrapUint32(frame.timestamp - behind * this.frameSizeValue),
                    payload: silence(this.frameSizeValue),
                },
                anomaly: null,
                synthesized: true,
            });
        }
    }

    private deliver(received: ReceivedFrame): void {
        if (this.framesTaken) {
            this.inbox.push(received);
        } else {
            this.bufferUnread(received);
        }
        this.emit('frame', received);
    }

    private bufferUnread(received: ReceivedFrame): void {
        if (this.inbox.size >= this.maxBufferedFrames) {
            this.inbox.shift();
            this.unreadDroppedValue += 1;
            if (this.unreadDroppedValue === 1) {
                this.log.warn({ event: 'media_frames_unread', limit: this.maxBufferedFrames });
            }
        }
        if (this.maxBufferedFrames > 0) {
            this.inbox.push(received);
        }
    }

    private abort(error: MediaError): void {
        this.abortError = error;
        this.setState('closed');
        this.log.error({ err: error }, 'Aborting media session on sequence anomaly');
        void this.transport.close(1011, 'media sequence anomaly').catch((closeError: unknown) => {
            this.log.error({ err: closeError }, 'Failed to close media transport');
        });
    }

    // ── State ─────────────────────────────────────────────────────

    private async runDrain(graceMs: number): Promise<void> {
        if (this.stateValue === 'closed') return;
        this.setState('draining');

        let timer: ReturnType<typeof setTimeout> | undefined;
        const graceElapsed = new Promise<void>((resolve) => {
            timer = setTimeout(resolve, graceMs);
        });
        await Promise.race([graceElapsed, this.transport.closed]);
        clearTimeout(timer);

        this.setState('closed');
        await this.transport.close(1000, 'media drained');
    }

    private negotiateFrameSize(frameSize: number | null): void {
        if (frameSize === null) return;
        if (this.frameSizeNegotiated || this.outboundSequence > 0) {
            this.log.warn({ event: 'media_frame_size_ignored', current: this.frameSizeValue, offered: frameSize });
            return;
        }
        this.frameSizeValue = frameSize;
        this.frameSizeNegotiated = true;
        this.log.info({ event: 'media_frame_size_negotiated', frameSize });
    }

    private setPaused(paused: boolean): void {
        if (this.paused === paused) return;
        this.paused = paused;
        this.emit('flowControl', paused);
    }

    private async waitUntilWritable(): Promise<void> {
        while (this.isBackpressured) {
            if (this.stateValue === 'draining' || this.stateValue === 'closed' || this.transport.state !== 'open') {
                // sendFrame reports why
                return;
            }
            await delay(BACKPRESSURE_POLL_MS);
        }
    }

    private markStreaming(): void {
        if (this.stateValue === 'idle') this.setState('streaming');
    }

    private setState(next: MediaSessionState): void {
        const previous = this.stateValue;
        if (previous === next || previous === 'closed') return;

        this.stateValue = next;
        this.log.info({ event: 'media_state_changed', from: previous, to: next });
        this.emit('stateChange', next, previous);
    }
}
