/**
 * Asterisk WS Kit — Shared Type Definitions
 *
 * Central type registry for the connection, control and media layers.
 * ARI event payloads live in `control/events.ts`; everything shared
 * across module boundaries is defined here.
 */

// ─── Connections ────────────────────────────────────────────────

/** Who performed the websocket handshake: we dialed, or we accepted */
export type ConnectionRole = 'client' | 'server';

export type ConnectionState = 'idle' | 'connecting' | 'open' | 'closing' | 'closed';

/** Which session a connection is handed to. Never both on one socket. */
export type SessionKind = 'control' | 'media';

export interface ConnectionIdentity {
    readonly id: string;
    readonly remoteAddress: string | null;
    /** Subprotocol agreed during the upgrade, if any */
    readonly subprotocol: string | null;
    /** Username that passed credential verification */
    readonly principal: string | null;
}

export interface Credentials {
    readonly username: string;
    readonly password: string;
}

// ─── Transport Messages ─────────────────────────────────────────

export type TransportMessage =
    | { readonly kind: 'text'; readonly data: string }
    | { readonly kind: 'binary'; readonly data: Buffer };

export interface TransportCloseInfo {
    code: number;
    reason: string;
    /** Last socket error seen before the close, if any */
    error: Error | null;
}

// ─── ARI REST Tunnel ────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface QueryString {
    name: string;
    value: string;
}

/** Outbound request as written on the wire */
export interface RestRequestMessage {
    type: 'RESTRequest';
    request_id: string;
    method: HttpMethod;
    uri: string;
    query_strings?: QueryString[];
    content_type?: string;
    message_body?: string;
}

/** Inbound response as read from the wire */
export interface RestResponseMessage {
    type: 'RESTResponse';
    request_id: string;
    transaction_id?: string;
    status_code: number;
    reason_phrase: string;
    uri?: string;
    content_type?: string;
    message_body?: string;
}

/** Response handed back to `ControlSession.request` callers */
export interface RestResponse {
    requestId: string;
    statusCode: number;
    reasonPhrase: string;
    uri: string;
    contentType: string | null;
    body: string | null;
}

// ─── Media ──────────────────────────────────────────────────────

/**
 * `sequenced` prefixes every binary frame with an 8-byte header.
 * `raw` carries bare ulaw bytes the way Asterisk's chan_websocket does.
 */
export type MediaFraming = 'sequenced' | 'raw';

export type MediaSessionState = 'idle' | 'streaming' | 'draining' | 'closed';

export interface MediaFrame {
    /** Monotonically increasing per direction, wraps at 2^32 */
    sequence: number;
    /** ulaw sample clock (8 kHz, one byte per sample) */
    timestamp: number;
    payload: Buffer;
}

export type SequenceAnomalyKind = 'gap' | 'duplicate' | 'regression';

export interface SequenceAnomaly {
    kind: SequenceAnomalyKind;
    expected: number;
    received: number;
}

export interface ReceivedFrame {
    frame: MediaFrame;
    anomaly: SequenceAnomaly | null;
    /** True for silence generated locally to fill a gap */
    synthesized: boolean;
}

/** What the media session does with an out-of-sequence frame */
export type SequenceAnomalyPolicy = 'deliver' | 'drop' | 'fill-silence' | 'abort';

/** Parameters announced by the peer in `MEDIA_START` */
export interface MediaStartInfo {
    channel: string | null;
    optimalFrameSize: number | null;
    format: string | null;
    params: Record<string, string>;
}

// ─── Application Config ─────────────────────────────────────────

export interface ListenerConfig {
    readonly bindAddress: string;
    readonly bindPort: number;
    readonly protocol: string;
    readonly credentials: Credentials | null;
}

export interface AppConfig {
    readonly nodeEnv: string;

    readonly ari: {
        readonly host: string;
        readonly port: number;
        readonly app: string;
        readonly credentials: Credentials | null;
        readonly requestTimeoutMs: number;
        readonly listener: ListenerConfig;
    };

    readonly media: {
        readonly framing: MediaFraming;
        readonly frameSize: number;
        readonly drainGraceMs: number;
        readonly listener: ListenerConfig;
    };

    readonly metricsEnabled: boolean;
}
