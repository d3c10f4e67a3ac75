/**
 * Asterisk WS Kit — Media Frame Codec
 *
 * `sequenced` frames:
 *
 *   0        4        8
 *   +--------+--------+------------------+
 *   |  seq   |   ts   |  ulaw payload    |
 *   +--------+--------+------------------+
 *    uint32 BE uint32 BE
 *
 * `raw` frames are the payload alone, as Asterisk's chan_websocket
 * sends them; the receiver numbers them itself.
 */

import type { MediaFrame, MediaFraming } from '../types/index.js';
import { ProtocolError } from '../utils/errors.js';

export const FRAME_HEADER_BYTES = 8;

/** ulaw encoding of a zero sample */
export const ULAW_SILENCE = 0xff;

/** 20 ms of 8 kHz ulaw */
export const DEFAULT_FRAME_SIZE = 160;

const UINT32_RANGE = 0x1_0000_0000;

export function wrapUint32(value: number): number {
    return ((value % UINT32_RANGE) + UINT32_RANGE) % UINT32_RANGE;
}

export function encodeFrame(frame: MediaFrame, framing: MediaFraming): Buffer {
    if (framing === 'raw') return frame.payload;

    const header = Buffer.allocUnsafe(FRAME_HEADER_BYTES);
    header.writeUInt32BE(wrapUint32(frame.sequence), 0);
    header.writeUInt32BE(wrapUint32(frame.timestamp), 4);
    return Buffer.concat([header, frame.payload]);
}

/**
 * Decode a sequenced frame. Raw frames carry no header, so the caller
 * numbers them (see MediaSession).
 */
export function decodeSequencedFrame(data: Buffer): MediaFrame {
    if (data.length < FRAME_HEADER_BYTES) {
        throw new ProtocolError(
            `Media frame of ${data.length} bytes is shorter than its ${FRAME_HEADER_BYTES}-byte header`,
            'PROTOCOL_SHORT_FRAME',
        );
    }

    return {
        sequence: data.readUInt32BE(0),
        timestamp: data.readUInt32BE(4),
        payload: data.subarray(FRAME_HEADER_BYTES),
    };
}

/** A frame of ulaw silence */
export function silence(length: number): Buffer {
    return Buffer.alloc(length, ULAW_SILENCE);
}

/** Split audio into frame-size chunks; the last chunk may be short */
export function chunkAudio(audio: Buffer, frameSize: number): Buffer[] {
    const chunks: Buffer[] = [];
    for (let offset = 0; offset < audio.length; offset += frameSize) {
        chunks.push(audio.subarray(offset, offset + frameSize));
    }
    return chunks;
}
