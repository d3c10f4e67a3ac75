import type {
    ConnectionIdentity,
    ConnectionRole,
    ConnectionState,
    TransportCloseInfo,
    TransportMessage,
} from '../types/index.js';

export interface Transport {
    readonly role: ConnectionRole;
    readonly identity: ConnectionIdentity;
    readonly state: ConnectionState;

    /** Bytes queued by the socket but not yet written to the network. */
    readonly bufferedBytes: number;

    /** Resolves once the underlying socket has closed. */
    readonly closed: Promise<TransportCloseInfo>;

    /** Send a text frame. Throws TransportError unless the connection is open. */
    sendText(text: string): void;

    /** Send a binary frame. Throws TransportError unless the connection is open. */
    sendBinary(data: Buffer): void;

    /**
     * The connection's inbound messages, in arrival order. Finite: ends
     * when the socket closes. May be taken once per connection.
     */
    messages(): AsyncIterable<TransportMessage>;

    /** Close the socket and wait for the close handshake. */
    close(code?: number, reason?: string): Promise<void>;
}
