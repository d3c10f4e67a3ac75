/**
 * Asterisk WS Kit — WebSocket Transport Adapter
 *
 * Wraps one `ws` socket, dialed by us or accepted by a SessionServer,
 * behind the Transport interface. Both roles look the same from here
 * on: text and binary frames are separated, inbound messages are
 * buffered into a queue from the moment the adapter is built, and the
 * queue ends when the socket closes.
 */

import WebSocket from 'ws';
import type pino from 'pino';
import type {
    ConnectionIdentity,
    ConnectionRole,
    ConnectionState,
    TransportCloseInfo,
    TransportMessage,
} from '../types/index.js';
import type { Transport } from './transport.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { TransportError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';

/** How long `close()` waits for the peer's close frame before terminating */
const CLOSE_GRACE_MS = 2000;

export function toBuffer(data: WebSocket.RawData): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (Array.isArray(data)) return Buffer.concat(data);
    return Buffer.from(data);
}

export class WebSocketTransport implements Transport {
    private readonly inbox = new AsyncQueue<TransportMessage>();
    private readonly log: pino.Logger;
    private consumed = false;
    private lastError: Error | null = null;
    private resolveClosed: (info: TransportCloseInfo) => void = () => { /* replaced below */ };

    public readonly closed: Promise<TransportCloseInfo>;

    constructor(
        private readonly ws: WebSocket,
        public readonly role: ConnectionRole,
        public readonly identity: ConnectionIdentity,
    ) {
        this.log = createComponentLogger('transport', identity.id);
        this.closed = new Promise((resolve) => {
            this.resolveClosed = resolve;
        });

        this.ws.on('message', (data: WebSocket.RawData, isBinary: boolean) => {
            const buffer = toBuffer(data);
            this.inbox.push(isBinary
                ? { kind: 'binary', data: buffer }
                : { kind: 'text', data: buffer.toString('utf8') });
        });

        this.ws.on('error', (error: Error) => {
            this.lastError = error;
            this.log.error({ err: error, role: this.role }, 'WebSocket error');
        });

        this.ws.on('close', (code: number, reason: Buffer) => {
            this.log.info({
                event: 'transport_closed',
                role: this.role,
                code,
                reason: reason.toString(),
                undelivered: this.inbox.size,
            });
            this.inbox.end();
            this.resolveClosed({ code, reason: reason.toString(), error: this.lastError });
        });

        if (this.ws.readyState === WebSocket.CLOSED) {
            this.inbox.end();
            this.resolveClosed({ code: 1006, reason: '', error: null });
        }
    }

    get state(): ConnectionState {
        switch (this.ws.readyState) {
            case WebSocket.CONNECTING:
                return 'connecting';
            case WebSocket.OPEN:
                return 'open';
            case WebSocket.CLOSING:
                return 'closing';
            default:
                return 'closed';
        }
    }

    get bufferedBytes(): number {
        return this.ws.bufferedAmount;
    }

    sendText(text: string): void {
        this.send(text, false);
    }

    sendBinary(data: Buffer): void {
        this.send(data, true);
    }

    messages(): AsyncIterable<TransportMessage> {
        if (this.consumed) {
            throw new TransportError(
                `Messages of connection ${this.identity.id} are already being consumed`,
                'TRANSPORT_ALREADY_CONSUMED',
            );
        }
        this.consumed = true;
        return this.inbox;
    }

    async close(code = 1000, reason = ''): Promise<void> {
        if (this.state === 'closed') return;

        if (this.state === 'open' || this.state === 'connecting') {
            this.ws.close(code, reason);
        }

        const timer = setTimeout(() => {
            this.log.warn({ event: 'transport_close_timeout' }, 'Peer did not complete close handshake');
            this.ws.terminate();
        }, CLOSE_GRACE_MS);

        await this.closed;
        clearTimeout(timer);
    }

    // ── Private ───────────────────────────────────────────────────

    private send(data: string | Buffer, binary: boolean): void {
        if (this.state !== 'open') {
            throw new TransportError(
                `Cannot send on connection ${this.identity.id}: state is ${this.state}`,
                'TRANSPORT_NOT_OPEN',
            );
        }

        this.ws.send(data, { binary }, (error?: Error) => {
            if (error) {
                // The socket reports the failure and closes; readers see the close
                this.log.error({ err: new TransportError('Send failed', 'TRANSPORT_SEND_FAILED', { cause: error }) }, 'WebSocket send failed');
            }
        });
    }
}
