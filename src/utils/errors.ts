/**
 * Asterisk WS Kit — Structured Error Classes
 *
 * Each error class maps to one failure domain of the websocket layers:
 * the socket itself, the wire protocol, the ARI control tunnel and the
 * media stream. All errors carry a machine-readable `code` for metrics
 * and for callers that branch on the failure kind.
 */

// ─── Error Codes ───────────────────────────────────────────────

export type TransportErrorCode =
    | 'TRANSPORT_NOT_OPEN'
    | 'TRANSPORT_CONNECT_FAILED'
    | 'TRANSPORT_SEND_FAILED'
    | 'TRANSPORT_ALREADY_CONSUMED';

export type ProtocolErrorCode =
    | 'PROTOCOL_INVALID_JSON'
    | 'PROTOCOL_MALFORMED_MESSAGE'
    | 'PROTOCOL_UNEXPECTED_BINARY'
    | 'PROTOCOL_SHORT_FRAME'
    | 'PROTOCOL_FRAME_SIZE'
    | 'PROTOCOL_HANDSHAKE_REJECTED'
    | 'PROTOCOL_SUBPROTOCOL_MISMATCH';

export type ControlErrorCode =
    | 'CONTROL_TIMEOUT'
    | 'CONTROL_CONNECTION_CLOSED'
    | 'CONTROL_CANCELLED'
    | 'CONTROL_DUPLICATE_REQUEST_ID'
    | 'CONTROL_REST_FAILURE';

export type MediaErrorCode =
    | 'MEDIA_BACKPRESSURE'
    | 'MEDIA_SEQUENCE_ANOMALY'
    | 'MEDIA_VERIFICATION_MISMATCH'
    | 'MEDIA_SESSION_CLOSED';

/** Base error with a machine-readable code and optional cause chaining */
export class AsteriskWsError extends Error {
    public readonly code: string;
    public readonly timestamp: number;

    constructor(message: string, code: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
        this.code = code;
        this.timestamp = Date.now();

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /** Structured representation for Pino logging */
    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            timestamp: this.timestamp,
            stack: this.stack,
            cause: this.cause,
        };
    }
}

// ─── Domain-Specific Errors ────────────────────────────────────

/** Socket-level failures (refused, reset, write-after-close) */
export class TransportError extends AsteriskWsError {
    declare readonly code: TransportErrorCode;

    constructor(message: string, code: TransportErrorCode = 'TRANSPORT_SEND_FAILED', options?: ErrorOptions) {
        super(message, code, options);
    }
}

export interface ProtocolErrorOptions extends ErrorOptions {
    /** HTTP status of a rejected handshake */
    statusCode?: number;
}

/** Malformed messages, unknown frames, handshake and credential rejection */
export class ProtocolError extends AsteriskWsError {
    declare readonly code: ProtocolErrorCode;
    public readonly statusCode: number | null;

    constructor(message: string, code: ProtocolErrorCode = 'PROTOCOL_MALFORMED_MESSAGE', options?: ProtocolErrorOptions) {
        super(message, code, options);
        this.statusCode = options?.statusCode ?? null;
    }

    override toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), statusCode: this.statusCode };
    }
}

export interface ControlErrorOptions extends ErrorOptions {
    requestId?: string;
    statusCode?: number;
}

/** ARI control tunnel failures tied to one request */
export class ControlError extends AsteriskWsError {
    declare readonly code: ControlErrorCode;
    public readonly requestId: string | null;
    public readonly statusCode: number | null;

    constructor(message: string, code: ControlErrorCode, options?: ControlErrorOptions) {
        super(message, code, options);
        this.requestId = options?.requestId ?? null;
        this.statusCode = options?.statusCode ?? null;
    }

    override toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), requestId: this.requestId, statusCode: this.statusCode };
    }
}

/** Media stream failures (flow control, sequencing, echo verification) */
export class MediaError extends AsteriskWsError {
    declare readonly code: MediaErrorCode;

    constructor(message: string, code: MediaErrorCode, options?: ErrorOptions) {
        super(message, code, options);
    }
}

/** Configuration errors (invalid environment values) */
export class ConfigError extends AsteriskWsError {
    constructor(message: string, code: string = 'CONFIG_ERROR', options?: ErrorOptions) {
        super(message, code, options);
    }
}

/** Normalize anything thrown into an Error for logging and rejection */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
