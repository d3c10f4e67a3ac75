/**
 * Asterisk WS Kit — Centralized Configuration
 *
 * Loads environment variables at startup, validates them, and exports a
 * frozen, typed config object. `buildConfig` takes the environment as a
 * parameter so tests can build configs without touching `process.env`.
 */

import dotenv from 'dotenv';
import type { AppConfig, Credentials, ListenerConfig, MediaFraming } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

dotenv.config();

type Env = Readonly<Record<string, string | undefined>>;

// ─── Helpers ───────────────────────────────────────────────────

function optionalEnv(env: Env, key: string, fallback: string): string {
    return env[key] || fallback;
}

function optionalInt(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigError(`Environment variable ${key} must be a non-negative integer, got: ${raw}`);
    }
    return parsed;
}

function optionalBool(env: Env, key: string, fallback: boolean): boolean {
    const raw = env[key];
    if (!raw) return fallback;
    return raw === 'true' || raw === '1';
}

/** Both halves or neither; a lone user or password is a mistake */
function optionalCredentials(env: Env, userKey: string, passwordKey: string): Credentials | null {
    const username = env[userKey];
    const password = env[passwordKey];
    if (!username && !password) return null;
    if (!username || !password) {
        throw new ConfigError(`${userKey} and ${passwordKey} must be set together`);
    }
    return Object.freeze({ username, password });
}

function mediaFraming(env: Env): MediaFraming {
    const raw = optionalEnv(env, 'MEDIA_FRAMING', 'raw');
    if (raw !== 'raw' && raw !== 'sequenced') {
        throw new ConfigError(`MEDIA_FRAMING must be "raw" or "sequenced", got: ${raw}`);
    }
    return raw;
}

// ─── Build Config ──────────────────────────────────────────────

function buildListener(env: Env, prefix: 'ARI' | 'MEDIA', defaultPort: number, defaultProtocol: string): ListenerConfig {
    return Object.freeze({
        bindAddress: optionalEnv(env, `${prefix}_BIND_ADDRESS`, 'localhost'),
        bindPort: optionalInt(env, `${prefix}_BIND_PORT`, defaultPort),
        protocol: optionalEnv(env, `${prefix}_WEBSOCKET_PROTOCOL`, defaultProtocol),
        credentials: optionalCredentials(env, `${prefix}_USER`, `${prefix}_PASSWORD`),
    });
}

export function buildConfig(env: Env = process.env): AppConfig {
    const frameSize = optionalInt(env, 'MEDIA_FRAME_SIZE', 160);
    if (frameSize === 0) {
        throw new ConfigError('MEDIA_FRAME_SIZE must be greater than zero');
    }

    return Object.freeze({
        nodeEnv: optionalEnv(env, 'NODE_ENV', 'development'),

        ari: Object.freeze({
            host: optionalEnv(env, 'ARI_HOST', 'localhost'),
            port: optionalInt(env, 'ARI_PORT', 8088),
            app: optionalEnv(env, 'ARI_APP', 'websocket-app'),
            credentials: optionalCredentials(env, 'ARI_USER', 'ARI_PASSWORD'),
            requestTimeoutMs: optionalInt(env, 'REQUEST_TIMEOUT_MS', 10_000),
            listener: buildListener(env, 'ARI', 8765, 'ari'),
        }),

        media: Object.freeze({
            framing: mediaFraming(env),
            frameSize,
            drainGraceMs: optionalInt(env, 'MEDIA_DRAIN_GRACE_MS', 2000),
            listener: buildListener(env, 'MEDIA', 8787, 'media'),
        }),

        metricsEnabled: optionalBool(env, 'METRICS_ENABLED', true),
    });
}

// ─── Exports ───────────────────────────────────────────────────

/** Immutable application configuration. Throws ConfigError on invalid values. */
export const config: AppConfig = buildConfig();
