import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
    WWW_AUTHENTICATE,
    basicAuthorization,
    credentialsMatch,
    parseBasicAuthorization,
    parseSubprotocols,
} from '../auth.js';

const credentials = { username: 'medianame', password: 'test-secret' };

test('builds and parses a Basic header', () => {
    const header = basicAuthorization(credentials);

    assert.equal(header, `Basic ${Buffer.from('medianame:test-secret').toString('base64')}`);
    assert.deepEqual(parseBasicAuthorization(header), credentials);
});

test('passwords may contain colons', () => {
    const header = basicAuthorization({ username: 'u', password: 'a:b' });
    assert.deepEqual(parseBasicAuthorization(header), { username: 'u', password: 'a:b' });
});

test('rejects missing or malformed headers', () => {
    assert.equal(parseBasicAuthorization(undefined), null);
    assert.equal(parseBasicAuthorization('Bearer abc'), null);
    assert.equal(parseBasicAuthorization(`Basic ${Buffer.from('nocolon').toString('base64')}`), null);
});

test('credentialsMatch compares both halves', () => {
    assert.equal(credentialsMatch(credentials, { username: 'medianame', password: 'test-secret' }), true);
    assert.equal(credentialsMatch(credentials, { username: 'medianame', password: 'wrong' }), false);
    assert.equal(credentialsMatch(credentials, { username: 'other', password: 'test-secret' }), false);
    assert.equal(credentialsMatch(credentials, null), false);
});

test('challenge uses the asterisk realm', () => {
    assert.equal(WWW_AUTHENTICATE, 'Basic realm="asterisk"');
});

test('parses offered subprotocols', () => {
    assert.deepEqual(parseSubprotocols('media, ari'), ['media', 'ari']);
    assert.deepEqual(parseSubprotocols(['a', 'b,c']), ['a', 'b', 'c']);
    assert.deepEqual(parseSubprotocols(undefined), []);
    assert.deepEqual(parseSubprotocols(''), []);
});
