/**
 * Asterisk WS Kit — Connection Manager
 *
 * Establishes connections in either role and hands each one to a
 * session:
 *   - client role: we dial Asterisk (`dialControl`, `dialMedia`)
 *   - server role: Asterisk dials us (`serveControl`, `serveMedia`)
 *
 * Once a connection is open the two roles are indistinguishable to the
 * session on top. The manager keeps its own table of live connections;
 * there is no process-wide registry.
 */

import { randomUUID } from 'crypto';
import WebSocket from 'ws';
import type pino from 'pino';
import type { ConnectionIdentity, Credentials, SessionKind } from '../types/index.js';
import type { Transport } from '../transport/transport.js';
import { WebSocketTransport } from '../transport/websocket-transport.js';
import { ControlSession, type ControlSessionOptions } from '../control/control-session.js';
import { MediaSession, type MediaSessionOptions } from '../media/media-session.js';
import { ProtocolError, TransportError, toError } from '../utils/errors.js';
import { createComponentLogger, redactUrl } from '../utils/logger.js';
import { metrics } from '../metrics/collector.js';
import { basicAuthorization } from './auth.js';
import { type ListenOptions, SessionServer } from './session-server.js';

// ─── Options ───────────────────────────────────────────────────

export interface DialOptions {
    url: string;
    /** Offered subprotocol; the server must select it */
    protocol?: string;
    /** Sent as a Basic Authorization header */
    credentials?: Credentials | null;
    handshakeTimeoutMs?: number;
    /** Session kind the connection is counted under */
    kind?: SessionKind;
}

export interface DialControlOptions {
    host: string;
    port: number;
    /** Stasis application to subscribe to */
    app: string;
    credentials?: Credentials | null;
    subscribeAll?: boolean;
    secure?: boolean;
    protocol?: string;
    handshakeTimeoutMs?: number;
    session?: ControlSessionOptions;
}

export interface DialMediaOptions {
    host: string;
    port: number;
    connectionId: string;
    protocol?: string;
    secure?: boolean;
    handshakeTimeoutMs?: number;
    session?: MediaSessionOptions;
}

export interface ServeControlOptions extends ListenOptions {
    session?: ControlSessionOptions;
}

export interface ServeMediaOptions extends ListenOptions {
    session?: MediaSessionOptions;
}

interface ManagedConnection {
    readonly transport: Transport;
    readonly kind: SessionKind;
    readonly openedAt: number;
}

interface Closable {
    close(): Promise<void>;
}

// ─── Constants ─────────────────────────────────────────────────

const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const MEDIA_PROTOCOL = 'media';

// ─── URL Builders ──────────────────────────────────────────────

/**
 * ARI events URL. `api_key` keeps its colon unescaped, as Asterisk
 * expects `user:password`.
 */
export function buildAriEventsUrl(options: Pick<DialControlOptions, 'host' | 'port' | 'app' | 'credentials' | 'subscribeAll' | 'secure'>): string {
    const scheme = options.secure ? 'wss' : 'ws';
    const query = new URLSearchParams({
        subscribeAll: String(options.subscribeAll ?? false),
        app: options.app,
    });

    let url = `${scheme}://${options.host}:${options.port}/ari/events?${query.toString()}`;
    if (options.credentials) {
        const { username, password } = options.credentials;
        url += `&api_key=${encodeURIComponent(username)}:${encodeURIComponent(password)}`;
    }
    return url;
}

export function buildMediaUrl(options: Pick<DialMediaOptions, 'host' | 'port' | 'connectionId' | 'secure'>): string {
    const scheme = options.secure ? 'wss' : 'ws';
    return `${scheme}://${options.host}:${options.port}/media/${encodeURIComponent(options.connectionId)}`;
}

/** Map a `ws` handshake failure onto the error taxonomy */
export function toDialError(error: Error, url: string): ProtocolError | TransportError {
    const rejected = /Unexpected server response: (\d+)/.exec(error.message);
    if (rejected?.[1]) {
        const statusCode = Number(rejected[1]);
        return new ProtocolError(`Handshake with ${url} rejected with HTTP ${statusCode}`, 'PROTOCOL_HANDSHAKE_REJECTED', {
            statusCode,
            cause: error,
        });
    }
    if (/subprotocol/i.test(error.message)) {
        return new ProtocolError(`Subprotocol negotiation with ${url} failed: ${error.message}`, 'PROTOCOL_SUBPROTOCOL_MISMATCH', {
            cause: error,
        });
    }
    return new TransportError(`Could not connect to ${url}: ${error.message}`, 'TRANSPORT_CONNECT_FAILED', { cause: error });
}

// ─── Manager ───────────────────────────────────────────────────

export class ConnectionManager {
    private readonly connections = new Map<string, ManagedConnection>();
    private readonly servers = new Set<Closable>();
    private readonly log: pino.Logger = createComponentLogger('connections');

    get activeConnections(): number {
        return this.connections.size;
    }

    connection(id: string): Transport | undefined {
        return this.connections.get(id)?.transport;
    }

    // ── Client Role ───────────────────────────────────────────────

    /**
     * Open a websocket and wait for the upgrade to finish. Rejects with
     * ProtocolError when the server refuses the handshake or the
     * subprotocol, TransportError for anything else.
     */
    async dial(options: DialOptions): Promise<WebSocketTransport> {
        const safeUrl = redactUrl(options.url);
        const headers: Record<string, string> = {};
        if (options.credentials) {
            headers['Authorization'] = basicAuthorization(options.credentials);
        }

        this.log.info({ event: 'ws_dialing', url: safeUrl, protocol: options.protocol ?? null });

        const ws = new WebSocket(options.url, options.protocol ? [options.protocol] : [], {
            headers,
            handshakeTimeout: options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS,
        });

        try {
            await new Promise<void>((resolve, reject) => {
                const onOpen = (): void => {
                    ws.off('error', onError);
                    resolve();
                };
                const onError = (error: Error): void => {
                    ws.off('open', onOpen);
                    reject(error);
                };
                ws.once('open', onOpen);
                ws.once('error', onError);
            });
        } catch (error) {
            const dialError = toDialError(toError(error), safeUrl);
            this.log.warn({ event: 'ws_dial_failed', url: safeUrl, err: dialError });
            throw dialError;
        }

        const identity: ConnectionIdentity = {
            id: randomUUID(),
            remoteAddress: new URL(options.url).host,
            subprotocol: ws.protocol || null,
            principal: options.credentials?.username ?? null,
        };
        const transport = new WebSocketTransport(ws, 'client', identity);
        this.track(transport, options.kind ?? 'control');

        this.log.info({ event: 'ws_connected', connectionId: identity.id, url: safeUrl, subprotocol: identity.subprotocol });
        return transport;
    }

    /** Dial ARI's event websocket and start a control session on it. */
    async dialControl(options: DialControlOptions): Promise<ControlSession> {
        const transport = await this.dial({
            url: buildAriEventsUrl(options),
            protocol: options.protocol,
            credentials: options.credentials,
            handshakeTimeoutMs: options.handshakeTimeoutMs,
            kind: 'control',
        });
        return new ControlSession(transport, { tag: options.app, ...options.session });
    }

    /** Dial a media websocket and start a media session on it. */
    async dialMedia(options: DialMediaOptions): Promise<MediaSession> {
        const transport = await this.dial({
            url: buildMediaUrl(options),
            protocol: options.protocol ?? MEDIA_PROTOCOL,
            handshakeTimeoutMs: options.handshakeTimeoutMs,
            kind: 'media',
        });
        return new MediaSession(transport, { tag: options.connectionId, ...options.session });
    }

    // ── Server Role ───────────────────────────────────────────────

    async serveControl(options: ServeControlOptions): Promise<SessionServer<ControlSession>> {
        return this.serve(options, 'control', (transport) => new ControlSession(transport, options.session));
    }

    async serveMedia(options: ServeMediaOptions): Promise<SessionServer<MediaSession>> {
        return this.serve(options, 'media', (transport) => new MediaSession(transport, options.session));
    }

    /** Close every server, then every connection. */
    async stop(): Promise<void> {
        this.log.info({ event: 'connections_stopping', servers: this.servers.size, connections: this.connections.size });

        const servers = [...this.servers];
        this.servers.clear();
        await Promise.all(servers.map((server) => server.close()));

        await Promise.all([...this.connections.values()].map(({ transport }) => transport.close(1001, 'going away')));
    }

    // ── Private ───────────────────────────────────────────────────

    private async serve<S>(
        options: ListenOptions,
        kind: SessionKind,
        createSession: (transport: WebSocketTransport) => S,
    ): Promise<SessionServer<S>> {
        const server = await SessionServer.start<S>({
            ...options,
            kind,
            activeConnections: () => this.connections.size,
            createSession: (transport) => {
                this.track(transport, kind);
                return createSession(transport);
            },
        });
        this.servers.add(server);
        return server;
    }

    private track(transport: Transport, kind: SessionKind): void {
        const id = transport.identity.id;
        this.connections.set(id, { transport, kind, openedAt: Date.now() });
        metrics.connectionOpened(kind);

        void transport.closed.then((info) => {
            const entry = this.connections.get(id);
            this.connections.delete(id);
            metrics.connectionClosed(kind);
            this.log.info({
                event: 'connection_removed',
                connectionId: id,
                kind,
                code: info.code,
                durationMs: entry ? Date.now() - entry.openedAt : null,
            });
        });
    }
}
