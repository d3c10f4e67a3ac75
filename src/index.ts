/**
 * Asterisk WS Kit — Public API
 */

export * from './types/index.js';
export * from './utils/errors.js';
export { AsyncQueue } from './utils/async-queue.js';
export { logger, createComponentLogger, redactUrl } from './utils/logger.js';
export { MetricsCollector, metrics, type RequestOutcome } from './metrics/collector.js';

export type { Transport } from './transport/transport.js';
export { WebSocketTransport } from './transport/websocket-transport.js';

export * from './control/events.js';
export {
    ControlSession,
    buildRestRequest,
    type ControlSessionEvents,
    type ControlSessionOptions,
    type RequestOptions,
} from './control/control-session.js';

export * from './media/frame-codec.js';
export * from './media/media-commands.js';
export {
    MediaSession,
    type MediaSessionEvents,
    type MediaSessionOptions,
    type PlayOptions,
} from './media/media-session.js';
export { EchoVerifier, type EchoReport, type EchoVerifierOptions } from './media/echo-verifier.js';

export * from './connection/auth.js';
export {
    SessionServer,
    type ListenOptions,
    type ServerAddress,
    type SessionServerEvents,
} from './connection/session-server.js';
export {
    ConnectionManager,
    buildAriEventsUrl,
    buildMediaUrl,
    toDialError,
    type DialControlOptions,
    type DialMediaOptions,
    type DialOptions,
    type ServeControlOptions,
    type ServeMediaOptions,
} from './connection/connection-manager.js';
