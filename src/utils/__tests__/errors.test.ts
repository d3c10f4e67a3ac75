import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
    AsteriskWsError,
    ConfigError,
    ControlError,
    MediaError,
    ProtocolError,
    TransportError,
    toError,
} from '../errors.js';

test('domain errors keep their class, name and code', () => {
    const error = new ControlError('late', 'CONTROL_TIMEOUT', { requestId: '4' });

    assert.ok(error instanceof ControlError);
    assert.ok(error instanceof AsteriskWsError);
    assert.ok(error instanceof Error);
    assert.equal(error.name, 'ControlError');
    assert.equal(error.code, 'CONTROL_TIMEOUT');
    assert.equal(error.requestId, '4');
    assert.equal(error.statusCode, null);
});

test('default codes', () => {
    assert.equal(new TransportError('x').code, 'TRANSPORT_SEND_FAILED');
    assert.equal(new ProtocolError('x').code, 'PROTOCOL_MALFORMED_MESSAGE');
    assert.equal(new ConfigError('x').code, 'CONFIG_ERROR');
});

test('ProtocolError carries the HTTP status of a rejected handshake', () => {
    const cause = new Error('Unexpected server response: 401');
    const error = new ProtocolError('rejected', 'PROTOCOL_HANDSHAKE_REJECTED', { statusCode: 401, cause });

    assert.equal(error.statusCode, 401);
    assert.equal(error.cause, cause);
    assert.equal(error.toJSON()['statusCode'], 401);
});

test('toJSON exposes the fields pino logs', () => {
    const json = new MediaError('paused', 'MEDIA_BACKPRESSURE').toJSON();

    assert.equal(json['name'], 'MediaError');
    assert.equal(json['message'], 'paused');
    assert.equal(json['code'], 'MEDIA_BACKPRESSURE');
    assert.equal(typeof json['timestamp'], 'number');
});

test('toError wraps non-errors and passes errors through', () => {
    const original = new Error('same');

    assert.equal(toError(original), original);
    assert.equal(toError('text').message, 'text');
    assert.equal(toError(42).message, '42');
});
