/**
 * Asterisk WS Kit — Handshake Credentials & Subprotocols
 *
 * Basic credentials travel in the `Authorization` header of the upgrade
 * request. Asterisk answers a missing or wrong header with a 401 and the
 * `asterisk` realm, and so do we.
 */

import { createHash, timingSafeEqual } from 'crypto';
import type { Credentials } from '../types/index.js';

export const AUTH_REALM = 'asterisk';

export const WWW_AUTHENTICATE = `Basic realm="${AUTH_REALM}"`;

export function basicAuthorization(credentials: Credentials): string {
    const token = Buffer.from(`${credentials.username}:${credentials.password}`, 'utf8').toString('base64');
    return `Basic ${token}`;
}

/** Parse a `Basic` Authorization header; null when absent or malformed */
export function parseBasicAuthorization(header: string | undefined): Credentials | null {
    if (!header) return null;

    const match = /^Basic\s+([A-Za-z0-9+/=]+)\s*$/i.exec(header);
    const token = match?.[1];
    if (!token) return null;

    const decoded = Buffer.from(token, 'base64').toString('utf8');
    const colon = decoded.indexOf(':');
    if (colon < 0) return null;

    return { username: decoded.slice(0, colon), password: decoded.slice(colon + 1) };
}

function digest(value: string): Buffer {
    return createHash('sha256').update(value, 'utf8').digest();
}

/** Constant-time comparison of both halves */
export function credentialsMatch(expected: Credentials, presented: Credentials | null): boolean {
    if (!presented) return false;
    const usernameOk = timingSafeEqual(digest(expected.username), digest(presented.username));
    const passwordOk = timingSafeEqual(digest(expected.password), digest(presented.password));
    return usernameOk && passwordOk;
}

/** Subprotocols offered in a `Sec-WebSocket-Protocol` header, in order */
export function parseSubprotocols(header: string | string[] | undefined): string[] {
    if (header === undefined) return [];
    const values = Array.isArray(header) ? header : [header];
    return values
        .flatMap((value) => value.split(','))
        .map((value) => value.trim())
        .filter((value) => value.length > 0);
}
