/**
 * Asterisk WS Kit — Media Commands
 *
 * Text frames on a media connection are one-line commands:
 *
 * Asterisk sends:
 *   - `MEDIA_START channel:<name> optimal_frame_size:<n> format:<fmt> ...`
 *   - `MEDIA_XOFF` / `MEDIA_XON`: stop / resume sending audio
 *   - `MEDIA_BUFFERING_COMPLETED [id]`: a buffered run finished playing
 *   - `HANGUP` (from a peer built on this library): end of stream
 *
 * We send:
 *   - `START_MEDIA_BUFFERING` / `STOP_MEDIA_BUFFERING [id]`
 *   - `HANGUP`
 */

import type { MediaStartInfo } from '../types/index.js';

export type MediaCommandName =
    | 'MEDIA_START'
    | 'MEDIA_XOFF'
    | 'MEDIA_XON'
    | 'MEDIA_BUFFERING_COMPLETED'
    | 'START_MEDIA_BUFFERING'
    | 'STOP_MEDIA_BUFFERING'
    | 'HANGUP';

export interface MediaCommand {
    /** Upper-cased first word */
    name: string;
    /** Words without a colon, in order */
    args: string[];
    /** `key:value` words; the value keeps any later colons */
    params: Record<string, string>;
    raw: string;
}

export function parseMediaCommand(text: string): MediaCommand {
    const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
    const [first, ...rest] = words;

    const args: string[] = [];
    const params: Record<string, string> = {};
    for (const word of rest) {
        const colon = word.indexOf(':');
        if (colon > 0) {
            params[word.slice(0, colon)] = word.slice(colon + 1);
        } else {
            args.push(word);
        }
    }

    return { name: (first ?? '').toUpperCase(), args, params, raw: text };
}

export function formatMediaCommand(
    name: MediaCommandName | string,
    args: readonly string[] = [],
    params: Readonly<Record<string, string | number>> = {},
): string {
    const words = [name, ...args];
    for (const [key, value] of Object.entries(params)) {
        words.push(`${key}:${value}`);
    }
    return words.join(' ');
}

export function toMediaStartInfo(command: MediaCommand): MediaStartInfo {
    const frameSize = Number(command.params['optimal_frame_size']);
    return {
        channel: command.params['channel'] ?? null,
        optimalFrameSize: Number.isInteger(frameSize) && frameSize > 0 ? frameSize : null,
        format: command.params['format'] ?? null,
        params: { ...command.params },
    };
}
