/**
 * Asterisk WS Kit — Prometheus Metrics Collector
 *
 * Histogram, counter and gauge metrics for the control and media
 * sessions. Served by every SessionServer on `GET /metrics`.
 *
 * Uses process.hrtime.bigint() for nanosecond-precision timing.
 */

import client from 'prom-client';
import type { SequenceAnomalyKind, SessionKind } from '../types/index.js';

export type RequestOutcome = 'ok' | 'rest_error' | 'timeout' | 'closed' | 'cancelled' | 'send_failed';

/** Process-wide metrics collector, instantiated once at startup */
export class MetricsCollector {
    // ── Histograms ────────────────────────────────────────────────

    /** Round-trip latency of tunnelled REST requests */
    public readonly requestLatency = new client.Histogram({
        name: 'asterisk_ws_request_latency_ms',
        help: 'Tunnelled ARI REST request round-trip latency in milliseconds',
        buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000],
    });

    // ── Counters ──────────────────────────────────────────────────

    public readonly requestsTotal = new client.Counter({
        name: 'asterisk_ws_requests_total',
        help: 'Tunnelled ARI REST requests by outcome',
        labelNames: ['outcome'] as const,
    });

    public readonly eventsTotal = new client.Counter({
        name: 'asterisk_ws_events_total',
        help: 'ARI events dispatched by type',
        labelNames: ['type'] as const,
    });

    public readonly protocolErrorsTotal = new client.Counter({
        name: 'asterisk_ws_protocol_errors_total',
        help: 'Protocol errors by code',
        labelNames: ['code'] as const,
    });

    public readonly mediaFramesTotal = new client.Counter({
        name: 'asterisk_ws_media_frames_total',
        help: 'Media frames by direction',
        labelNames: ['direction'] as const,
    });

    public readonly sequenceAnomaliesTotal = new client.Counter({
        name: 'asterisk_ws_sequence_anomalies_total',
        help: 'Inbound media sequence anomalies by kind',
        labelNames: ['kind'] as const,
    });

    public readonly backpressureTotal = new client.Counter({
        name: 'asterisk_ws_backpressure_total',
        help: 'Media frames refused because of backpressure',
    });

    public readonly handshakeRejectionsTotal = new client.Counter({
        name: 'asterisk_ws_handshake_rejections_total',
        help: 'Inbound websocket upgrades rejected by reason',
        labelNames: ['reason'] as const,
    });

    // ── Gauges ────────────────────────────────────────────────────

    public readonly activeConnections = new client.Gauge({
        name: 'asterisk_ws_active_connections',
        help: 'Currently open websocket connections by session kind',
        labelNames: ['kind'] as const,
    });

    // ── Recording Methods ─────────────────────────────────────────

    recordRequest(outcome: RequestOutcome, latencyMs?: number): void {
        this.requestsTotal.inc({ outcome });
        if (latencyMs !== undefined) {
            this.requestLatency.observe(latencyMs);
        }
    }

    recordEvent(type: string): void {
        this.eventsTotal.inc({ type });
    }

    recordProtocolError(code: string): void {
        this.protocolErrorsTotal.inc({ code });
    }

    recordFrame(direction: 'in' | 'out'): void {
        this.mediaFramesTotal.inc({ direction });
    }

    recordSequenceAnomaly(kind: SequenceAnomalyKind): void {
        this.sequenceAnomaliesTotal.inc({ kind });
    }

    recordBackpressure(): void {
        this.backpressureTotal.inc();
    }

    recordHandshakeRejection(reason: 'credentials' | 'subprotocol'): void {
        this.handshakeRejectionsTotal.inc({ reason });
    }

    connectionOpened(kind: SessionKind): void {
        this.activeConnections.inc({ kind });
    }

    connectionClosed(kind: SessionKind): void {
        this.activeConnections.dec({ kind });
    }

    // ── Metrics Endpoint ──────────────────────────────────────────

    /** Serialize all metrics in Prometheus exposition format */
    async getMetrics(): Promise<string> {
        return client.register.metrics();
    }

    /** Content-Type header for Prometheus */
    getContentType(): string {
        return client.register.contentType;
    }
}

/** Shared singleton instance */
export const metrics = new MetricsCollector();

/**
 * High-resolution nanosecond timestamp.
 */
export function hrtimeNs(): bigint {
    return process.hrtime.bigint();
}
