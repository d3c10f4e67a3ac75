/**
 * Asterisk WS Kit — Session Server
 *
 * One fastify listener that accepts websocket upgrades on any path and
 * hands every accepted socket to exactly one session.
 *
 * Routes:
 *   GET  /health   status, uptime and active connections
 *   GET  /metrics  Prometheus metrics (when enabled)
 *   WS   /*        Asterisk dials in here
 *
 * Upgrades are checked in a route-level preValidation hook, before the
 * handshake completes:
 *   - 401 with `WWW-Authenticate: Basic realm="asterisk"` when
 *     credentials are configured and the request's do not match
 *   - 400 when the configured subprotocol was not offered
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import type pino from 'pino';
import type { ConnectionIdentity, Credentials, SessionKind } from '../types/index.js';
import { WebSocketTransport } from '../transport/websocket-transport.js';
import { AsyncQueue } from '../utils/async-queue.js';
import { ProtocolError } from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { metrics } from '../metrics/collector.js';
import { WWW_AUTHENTICATE, credentialsMatch, parseBasicAuthorization, parseSubprotocols } from './auth.js';

// ─── Event Types ───────────────────────────────────────────────

export interface SessionServerEvents<S> {
    session: (session: S) => void;
    /** An upgrade refused before the handshake completed */
    rejected: (error: ProtocolError) => void;
}

export declare interface SessionServer<S> {
    on<E extends keyof SessionServerEvents<S>>(event: E, listener: SessionServerEvents<S>[E]): this;
    once<E extends keyof SessionServerEvents<S>>(event: E, listener: SessionServerEvents<S>[E]): this;
    off<E extends keyof SessionServerEvents<S>>(event: E, listener: SessionServerEvents<S>[E]): this;
    emit<E extends keyof SessionServerEvents<S>>(event: E, ...args: Parameters<SessionServerEvents<S>[E]>): boolean;
}

// ─── Options ───────────────────────────────────────────────────

export interface ListenOptions {
    host: string;
    /** 0 picks a free port; see `address` */
    port: number;
    protocol: string;
    credentials?: Credentials | null;
    metricsEnabled?: boolean;
}

export interface SessionServerOptions<S> extends ListenOptions {
    kind: SessionKind;
    createSession: (transport: WebSocketTransport) => S;
    /** Reported by /health */
    activeConnections: () => number;
}

export interface ServerAddress {
    host: string;
    port: number;
}

// ─── Server ────────────────────────────────────────────────────

export class SessionServer<S> extends EventEmitter {
    private readonly server: FastifyInstance;
    private readonly subscribers = new Set<AsyncQueue<S>>();
    private readonly log: pino.Logger;
    private boundAddress: ServerAddress;
    private isClosed = false;

    /** Build and bind a server; resolves once it is listening. */
    static async start<S>(options: SessionServerOptions<S>): Promise<SessionServer<S>> {
        const sessionServer = new SessionServer(options);
        await sessionServer.listen();
        return sessionServer;
    }

    private constructor(private readonly options: SessionServerOptions<S>) {
        super();
        this.log = createComponentLogger('server', options.kind);
        this.boundAddress = { host: options.host, port: options.port };
        this.server = Fastify({
            logger: false, // We use our own Pino logger
        });
    }

    get address(): ServerAddress {
        return this.boundAddress;
    }

    /** `ws://host:port`, for dialing this server */
    get url(): string {
        return `ws://${this.boundAddress.host}:${this.boundAddress.port}`;
    }

    /**
     * Sessions accepted from now on. Each call returns a new sequence, so
     * a consumer may stop and start again; sessions accepted while nobody
     * listens are only announced through the `session` event.
     */
    sessions(): AsyncIterable<S> {
        const queue: AsyncQueue<S> = new AsyncQueue<S>(() => {
            this.subscribers.delete(queue);
        });
        if (this.isClosed) {
            queue.end();
        } else {
            this.subscribers.add(queue);
        }
        return queue;
    }

    async close(): Promise<void> {
        if (this.isClosed) return;
        this.isClosed = true;

        for (const subscriber of this.subscribers) subscriber.end();
        this.subscribers.clear();

        await this.server.close();
        this.log.info({ event: 'server_closed', ...this.boundAddress });
    }

    // ── Setup ─────────────────────────────────────────────────────

    private async listen(): Promise<void> {
        const { protocol } = this.options;

        await this.server.register(fastifyWebsocket, {
            options: {
                handleProtocols: (offered: Set<string>) => (offered.has(protocol) ? protocol : false),
            },
        });

        // ── GET /health ─────────────────────────────────────────────
        this.server.get('/health', async (_request, reply) => {
            return reply.code(200).send({
                status: 'ok',
                kind: this.options.kind,
                uptime: process.uptime(),
                activeConnections: this.options.activeConnections(),
                timestamp: new Date().toISOString(),
            });
        });

        // ── GET /metrics ────────────────────────────────────────────
        if (this.options.metricsEnabled ?? true) {
            this.server.get('/metrics', async (_request, reply) => {
                const metricsOutput = await metrics.getMetrics();
                return reply
                    .type(metrics.getContentType())
                    .code(200)
                    .send(metricsOutput);
            });
        }

        // ── WS /* ───────────────────────────────────────────────────
        this.server.get('/*', {
            websocket: true,
            preValidation: (request, reply) => this.checkUpgrade(request, reply),
        }, (socket, request) => {
            const identity: ConnectionIdentity = {
                id: randomUUID(),
                remoteAddress: request.ip || null,
                subprotocol: socket.protocol || null,
                principal: this.options.credentials
                    ? parseBasicAuthorization(request.headers.authorization)?.username ?? null
                    : null,
            };

            this.log.info({
                event: 'ws_connection_accepted',
                connectionId: identity.id,
                path: request.url,
                remoteAddress: identity.remoteAddress,
                subprotocol: identity.subprotocol,
            });

            const transport = new WebSocketTransport(socket, 'server', identity);
            const session = this.options.createSession(transport);

            for (const subscriber of this.subscribers) subscriber.push(session);
            this.emit('session', session);
        });

        await this.server.listen({ host: this.options.host, port: this.options.port });

        const bound = this.server.server.address();
        if (bound !== null && typeof bound === 'object') {
            this.boundAddress = { host: this.options.host, port: bound.port };
        }

        this.log.info({
            event: 'server_started',
            address: this.url,
            protocol,
            authentication: this.options.credentials ? 'basic' : 'none',
            healthEndpoint: `GET http://${this.boundAddress.host}:${this.boundAddress.port}/health`,
        });
    }

    private async checkUpgrade(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { credentials, protocol } = this.options;

        if (credentials && !credentialsMatch(credentials, parseBasicAuthorization(request.headers.authorization))) {
            this.reject(
                new ProtocolError(`Rejected upgrade from ${request.ip}: bad or missing credentials`, 'PROTOCOL_HANDSHAKE_REJECTED', { statusCode: 401 }),
                'credentials',
            );
            await reply.code(401).header('WWW-Authenticate', WWW_AUTHENTICATE).send('Unauthorized');
            return;
        }

        const offered = parseSubprotocols(request.headers['sec-websocket-protocol']);
        if (!offered.includes(protocol)) {
            this.reject(
                new ProtocolError(
                    `Rejected upgrade from ${request.ip}: subprotocol "${protocol}" not offered (got ${offered.join(', ') || 'none'})`,
                    'PROTOCOL_SUBPROTOCOL_MISMATCH',
                    { statusCode: 400 },
                ),
                'subprotocol',
            );
            await reply.code(400).send(`Subprotocol "${protocol}" required`);
        }
    }

    private reject(error: ProtocolError, reason: 'credentials' | 'subprotocol'): void {
        metrics.recordHandshakeRejection(reason);
        this.log.warn({ event: 'ws_upgrade_rejected', reason, err: error });
        this.emit('rejected', error);
    }
}
