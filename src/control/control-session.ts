/**
 * Asterisk WS Kit — ARI Control Session
 *
 * Tunnels ARI REST requests and events over one websocket, whichever
 * side dialed it.
 *
 * We send:
 *   - `RESTRequest`:  { request_id, method, uri, query_strings?, content_type?, message_body? }
 *
 * Asterisk sends:
 *   - `RESTResponse`: { request_id, status_code, reason_phrase, message_body? }
 *   - anything else: an ARI event, discriminated by `type`
 *
 * A single reader task consumes the transport. Responses settle their
 * pending request right there; events are queued onto a handler chain
 * that runs handlers one event at a time in arrival order. Handlers run
 * off the reader task, so a handler can await `request()` without
 * blocking the response it is waiting for.
 */

import { EventEmitter } from 'events';
import type pino from 'pino';
import type {
    HttpMethod,
    QueryString,
    RestRequestMessage,
    RestResponse,
    RestResponseMessage,
    TransportCloseInfo,
} from '../types/index.js';
import type { Transport } from '../transport/transport.js';
import {
    type AriEvent,
    type AriEventMap,
    type AriEventType,
    type EventHandler,
    type EventPredicate,
    EventHandlerRegistry,
    describeEvent,
} from './events.js';
import { ControlError, ProtocolError, toError } from '../utils/errors.js';
import { createComponentLogger, hrtimeDiffMs } from '../utils/logger.js';
import { metrics, hrtimeNs, type RequestOutcome } from '../metrics/collector.js';

// ─── Event Types ───────────────────────────────────────────────

export interface ControlSessionEvents {
    /** A malformed or unexpected inbound message; the connection stays open */
    protocolError: (error: ProtocolError) => void;
    /** A response that matched no pending request (late or duplicate) */
    anomaly: (error: ProtocolError, message: RestResponseMessage) => void;
    /** An event handler threw or rejected */
    handlerError: (error: Error, event: AriEvent) => void;
    close: (info: TransportCloseInfo) => void;
}

export declare interface ControlSession {
    on<E extends keyof ControlSessionEvents>(event: E, listener: ControlSessionEvents[E]): this;
    once<E extends keyof ControlSessionEvents>(event: E, listener: ControlSessionEvents[E]): this;
    emit<E extends keyof ControlSessionEvents>(event: E, ...args: Parameters<ControlSessionEvents[E]>): boolean;
}

// ─── Options ───────────────────────────────────────────────────

export interface ControlSessionOptions {
    /** Default request deadline in ms; 0 or undefined waits indefinitely */
    requestTimeoutMs?: number;
    /** Prefix for generated correlation ids */
    requestIdPrefix?: string;
    /** Log tag (ARI app name, listener name) */
    tag?: string;
}

export interface RequestOptions {
    query?: Record<string, string | number | boolean> | QueryString[];
    /** Strings are sent as-is; anything else is JSON encoded */
    body?: unknown;
    contentType?: string;
    /** Overrides the session default; 0 disables the deadline */
    timeoutMs?: number;
    signal?: AbortSignal;
    /** Caller-chosen correlation id; must not collide with a pending one */
    requestId?: string;
}

interface PendingRequest {
    readonly requestId: string;
    readonly message: RestRequestMessage;
    readonly createdAt: number;
    readonly startedNs: bigint;
    readonly deadline: number | null;
    readonly resolve: (message: RestResponseMessage) => void;
    readonly reject: (error: Error) => void;
    timer: ReturnType<typeof setTimeout> | null;
    detachSignal: (() => void) | null;
}

// ─── Wire Helpers ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRestResponse(value: Record<string, unknown>): value is Record<string, unknown> & RestResponseMessage {
    return value['type'] === 'RESTResponse'
        && typeof value['request_id'] === 'string'
        && typeof value['status_code'] === 'number';
}

function isAriEvent(value: Record<string, unknown>): value is AriEvent {
    return typeof value['type'] === 'string' && value['type'].length > 0;
}

function toQueryStrings(query: RequestOptions['query']): QueryString[] | undefined {
    if (query === undefined) return undefined;
    if (Array.isArray(query)) return query;
    return Object.entries(query).map(([name, value]) => ({ name, value: String(value) }));
}

export function buildRestRequest(
    requestId: string,
    method: HttpMethod,
    uri: string,
    options: Pick<RequestOptions, 'query' | 'body' | 'contentType'> = {},
): RestRequestMessage {
    const message: RestRequestMessage = {
        type: 'RESTRequest',
        request_id: requestId,
        method,
        uri,
    };

    const queryStrings = toQueryStrings(options.query);
    if (queryStrings && queryStrings.length > 0) {
        message.query_strings = queryStrings;
    }

    if (options.body !== undefined) {
        const isText = typeof options.body === 'string';
        message.message_body = isText ? String(options.body) : JSON.stringify(options.body);
        message.content_type = options.contentType ?? (isText ? 'text/plain' : 'application/json');
    } else if (options.contentType) {
        message.content_type = options.contentType;
    }

    return message;
}

function toRestResponse(message: RestResponseMessage, request: RestRequestMessage): RestResponse {
    return {
        requestId: message.request_id,
        statusCode: message.status_code,
        reasonPhrase: typeof message.reason_phrase === 'string' ? message.reason_phrase : '',
        uri: typeof message.uri === 'string' ? message.uri : request.uri,
        contentType: typeof message.content_type === 'string' ? message.content_type : null,
        body: typeof message.message_body === 'string' && message.message_body.length > 0
            ? message.message_body
            : null,
    };
}

function outcomeOf(error: Error): RequestOutcome {
    if (error instanceof ControlError) {
        switch (error.code) {
            case 'CONTROL_TIMEOUT':
                return 'timeout';
            case 'CONTROL_CANCELLED':
                return 'cancelled';
            case 'CONTROL_CONNECTION_CLOSED':
                return 'closed';
            default:
                break;
        }
    }
    return 'send_failed';
}

// ─── Session ───────────────────────────────────────────────────

export class ControlSession extends EventEmitter {
    private readonly pending = new Map<string, PendingRequest>();
    private readonly handlers = new EventHandlerRegistry();
    private readonly log: pino.Logger;
    private readonly requestTimeoutMs: number;
    private readonly requestIdPrefix: string;

    private requestCounter = 0;
    private handlerChain: Promise<void> = Promise.resolve();
    private isClosed = false;

    /** Resolves when the reader task has finished and pending requests are settled */
    public readonly closed: Promise<void>;

    constructor(
        public readonly transport: Transport,
        options: ControlSessionOptions = {},
    ) {
        super();
        this.requestTimeoutMs = options.requestTimeoutMs ?? 0;
        this.requestIdPrefix = options.requestIdPrefix ?? '';
        this.log = createComponentLogger('ari', options.tag ?? transport.identity.id);

        this.log.info({
            event: 'ari_session_started',
            role: transport.role,
            remoteAddress: transport.identity.remoteAddress,
            subprotocol: transport.identity.subprotocol,
        });

        this.closed = this.run();
    }

    /** Number of requests awaiting a response */
    get pendingCount(): number {
        return this.pending.size;
    }

    get isOpen(): boolean {
        return !this.isClosed && this.transport.state === 'open';
    }

    /**
     * Send a REST request over the websocket and wait for its response.
     *
     * Resolves with the response whatever its status code; rejects with
     * ControlError on timeout, cancellation or connection close, and with
     * TransportError if the request could not be written.
     */
    async request(method: HttpMethod, uri: string, options: RequestOptions = {}): Promise<RestResponse> {
        const requestId = options.requestId ?? this.nextRequestId();
        if (this.pending.has(requestId)) {
            throw new ControlError(`Request id ${requestId} is already pending`, 'CONTROL_DUPLICATE_REQUEST_ID', { requestId });
        }
        if (options.signal?.aborted) {
            throw new ControlError(`Request ${requestId} was cancelled before it was sent`, 'CONTROL_CANCELLED', { requestId });
        }

        const message = buildRestRequest(requestId, method, uri, options);
        const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;

        const response = new Promise<RestResponseMessage>((resolve, reject) => {
            const entry: PendingRequest = {
                requestId,
                message,
                createdAt: Date.now(),
                startedNs: hrtimeNs(),
                deadline: timeoutMs > 0 ? Date.now() + timeoutMs : null,
                resolve,
                reject,
                timer: null,
                detachSignal: null,
            };

            if (timeoutMs > 0) {
                entry.timer = setTimeout(() => {
                    this.settle(requestId, new ControlError(
                        `${method} ${uri} timed out after ${timeoutMs}ms`,
                        'CONTROL_TIMEOUT',
                        { requestId },
                    ));
                }, timeoutMs);
            }

            const signal = options.signal;
            if (signal) {
                const onAbort = (): void => {
                    this.settle(requestId, new ControlError(`${method} ${uri} was cancelled`, 'CONTROL_CANCELLED', { requestId }));
                };
                signal.addEventListener('abort', onAbort, { once: true });
                entry.detachSignal = () => signal.removeEventListener('abort', onAbort);
            }

            this.pending.set(requestId, entry);
        });

        this.log.info({ event: 'rest_request', method, uri, requestId });

        try {
            if (this.isClosed) {
                throw new ControlError(`Session closed before ${method} ${uri} was sent`, 'CONTROL_CONNECTION_CLOSED', { requestId });
            }
            this.transport.sendText(JSON.stringify(message));
        } catch (error) {
            this.settle(requestId, toError(error));
        }

        const reply = await response;
        const result = toRestResponse(reply, message);

        this.log.info({
            event: 'rest_response',
            method,
            uri,
            requestId,
            statusCode: result.statusCode,
            reasonPhrase: result.reasonPhrase,
        });
        return result;
    }

    /**
     * `request` for JSON endpoints: rejects with CONTROL_REST_FAILURE on a
     * 4xx/5xx status and returns the parsed body (undefined when empty).
     */
    async requestJson(method: HttpMethod, uri: string, options: RequestOptions = {}): Promise<unknown> {
        const response = await this.request(method, uri, options);

        if (response.statusCode >= 400) {
            throw new ControlError(
                `${method} ${uri} failed: ${response.statusCode} ${response.reasonPhrase}`,
                'CONTROL_REST_FAILURE',
                { requestId: response.requestId, statusCode: response.statusCode },
            );
        }
        if (response.body === null) return undefined;

        try {
            return JSON.parse(response.body) as unknown;
        } catch (error) {
            throw new ProtocolError(`${method} ${uri} returned a body that is not JSON`, 'PROTOCOL_INVALID_JSON', { cause: error });
        }
    }

    /** Register a handler for one event kind. Returns an unsubscribe function. */
    onEvent<K extends AriEventType>(type: K, handler: EventHandler<AriEventMap[K]>): () => void {
        return this.handlers.on(type, handler);
    }

    /** Register a handler for every event the predicate accepts. */
    onEventMatching(predicate: EventPredicate, handler: EventHandler): () => void {
        return this.handlers.onMatch(predicate, handler);
    }

    /** Register a handler for every event. */
    onAnyEvent(handler: EventHandler): () => void {
        return this.handlers.onAny(handler);
    }

    /** Resolves once every event received so far has been handled */
    async whenIdle(): Promise<void> {
        let current: Promise<void>;
        do {
            current = this.handlerChain;
            await current;
        } while (current !== this.handlerChain);
    }

    async close(code = 1000, reason = ''): Promise<void> {
        await this.transport.close(code, reason);
        await this.closed;
    }

    // ── Reader Task ───────────────────────────────────────────────

    private async run(): Promise<void> {
        try {
            for await (const message of this.transport.messages()) {
                if (message.kind === 'binary') {
                    this.reportProtocolError(new ProtocolError(
                        `Unexpected ${message.data.length}-byte binary frame on control connection`,
                        'PROTOCOL_UNEXPECTED_BINARY',
                    ));
                    continue;
                }
                this.handleText(message.data);
            }
        } catch (error) {
            this.log.error({ err: error }, 'ARI reader task failed');
        }

        this.isClosed = true;
        const info = await this.transport.closed;
        this.failPending(info);

        this.log.info({ event: 'ari_disconnected', code: info.code, reason: info.reason });
        this.emit('close', info);
    }

    private handleText(text: string): void {
        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (error) {
            this.reportProtocolError(new ProtocolError('Control message is not valid JSON', 'PROTOCOL_INVALID_JSON', { cause: error }));
            return;
        }

        if (!isRecord(parsed)) {
            this.reportProtocolError(new ProtocolError('Control message is not a JSON object', 'PROTOCOL_MALFORMED_MESSAGE'));
            return;
        }

        if (isRestResponse(parsed)) {
            this.handleResponse(parsed);
            return;
        }

        if (parsed['type'] === 'RESTResponse') {
            this.reportProtocolError(new ProtocolError('RESTResponse without request_id or status_code', 'PROTOCOL_MALFORMED_MESSAGE'));
            return;
        }

        if (!isAriEvent(parsed)) {
            this.reportProtocolError(new ProtocolError('Control message has no type', 'PROTOCOL_MALFORMED_MESSAGE'));
            return;
        }

        this.dispatchEvent(parsed);
    }

    private handleResponse(message: RestResponseMessage): void {
        const entry = this.pending.get(message.request_id);
        if (!entry) {
            const anomaly = new ProtocolError(`Pending request ${message.request_id} not found`, 'PROTOCOL_MALFORMED_MESSAGE');
            this.log.warn({ event: 'rest_response_unmatched', requestId: message.request_id, statusCode: message.status_code });
            metrics.recordProtocolError('UNMATCHED_RESPONSE');
            this.emit('anomaly', anomaly, message);
            return;
        }

        this.settle(message.request_id, message);
    }

    private dispatchEvent(event: AriEvent): void {
        metrics.recordEvent(event.type);

        if (event.type === 'ChannelVarset') {
            this.log.trace({ event: 'ari_event', summary: describeEvent(event) });
        } else {
            this.log.info({ event: 'ari_event', summary: describeEvent(event) });
        }

        const handlers = this.handlers.match(event);
        if (handlers.length === 0) return;

        this.handlerChain = this.handlerChain
            .then(() => this.runHandlers(event, handlers))
            .catch((error: unknown) => {
                // Only reached when a handlerError listener itself throws
                this.log.error({ err: error, eventType: event.type }, 'ARI event dispatch failed');
            });
    }

    private async runHandlers(event: AriEvent, handlers: EventHandler[]): Promise<void> {
        for (const handler of handlers) {
            try {
                await handler(event);
            } catch (thrown) {
                const error = toError(thrown);
                this.log.error({ err: error, eventType: event.type }, 'ARI event handler failed');
                this.emit('handlerError', error, event);
            }
        }
    }

    // ── Pending Requests ──────────────────────────────────────────

    private nextRequestId(): string {
        this.requestCounter += 1;
        return `${this.requestIdPrefix}${this.requestCounter}`;
    }

    /** Remove a pending request and complete it. No-op if already settled. */
    private settle(requestId: string, outcome: RestResponseMessage | Error): void {
        const entry = this.pending.get(requestId);
        if (!entry) return;

        this.pending.delete(requestId);
        if (entry.timer) clearTimeout(entry.timer);
        entry.detachSignal?.();

        const latencyMs = hrtimeDiffMs(entry.startedNs, hrtimeNs());
        if (outcome instanceof Error) {
            metrics.recordRequest(outcomeOf(outcome));
            this.log.warn({ event: 'rest_request_failed', requestId, code: 'code' in outcome ? outcome.code : undefined, latencyMs });
            entry.reject(outcome);
        } else {
            metrics.recordRequest(outcome.status_code >= 400 ? 'rest_error' : 'ok', latencyMs);
            entry.resolve(outcome);
        }
    }

    private failPending(info: TransportCloseInfo): void {
        for (const requestId of [...this.pending.keys()]) {
            this.settle(requestId, new ControlError(
                `Connection closed (${info.code}) before response to request ${requestId}`,
                'CONTROL_CONNECTION_CLOSED',
                { requestId, cause: info.error ?? undefined },
            ));
        }
    }

    private reportProtocolError(error: ProtocolError): void {
        metrics.recordProtocolError(error.code);
        this.log.warn({ err: error }, 'ARI protocol error');
        this.emit('protocolError', error);
    }
}
