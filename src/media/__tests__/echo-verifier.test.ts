import assert from 'node:assert/strict';
import { test } from 'node:test';
import { EchoVerifier } from '../echo-verifier.js';
import { MediaSession } from '../media-session.js';
import { MediaError } from '../../utils/errors.js';
import { createTransportPair, flush } from '../../__tests__/_test_utils.js';

function bytes(length: number, start = 0): Buffer {
    return Buffer.from(Array.from({ length }, (_, index) => (start + index) % 256));
}

test('an echo padded to whole frames passes', () => {
    const verifier = new EchoVerifier({ frameSize: 4 });
    const sent = bytes(10);
    verifier.recordSent(sent.subarray(0, 4));
    verifier.recordSent(sent.subarray(4, 8));
    verifier.recordSent(sent.subarray(8));
    verifier.recordReceived(sent.subarray(0, 8));
    verifier.recordReceived(Buffer.concat([sent.subarray(8), Buffer.from([0xff, 0xff])]));

    assert.deepEqual(verifier.verify(), {
        sentBytes: 10,
        expectedBytes: 12,
        receivedBytes: 12,
        offsetBytes: 0,
        lengthOk: true,
        matched: true,
        mismatchAt: null,
        passed: true,
    });
});

test('a short echo fails on length', () => {
    const verifier = new EchoVerifier({ frameSize: 4 });
    verifier.recordSent(bytes(6));
    verifier.recordReceived(bytes(6));

    const report = verifier.verify();
    assert.equal(report.matched, true);
    assert.equal(report.lengthOk, false);
    assert.equal(report.passed, false);
});

test('a corrupted echo reports the first difference', () => {
    const verifier = new EchoVerifier({ frameSize: 4 });
    verifier.recordSent(bytes(8));
    const echoed = bytes(8);
    echoed[5] = 0;
    verifier.recordReceived(echoed);

    const report = verifier.verify();
    assert.equal(report.matched, false);
    assert.equal(report.mismatchAt, 5);
    assert.throws(
        () => verifier.assertMatch(),
        (error: unknown) => error instanceof MediaError && error.code === 'MEDIA_VERIFICATION_MISMATCH',
    );
});

test('a leading offset is accepted within maxOffsetFrames', () => {
    const sent = bytes(8, 1);
    const echoed = Buffer.concat([Buffer.alloc(4, 0xff), sent]);

    const strict = new EchoVerifier({ frameSize: 4 });
    strict.recordSent(sent);
    strict.recordReceived(echoed);
    assert.equal(strict.verify().passed, false);

    const lenient = new EchoVerifier({ frameSize: 4, maxOffsetFrames: 1 });
    lenient.recordSent(sent);
    lenient.recordReceived(echoed);
    assert.equal(lenient.verify().offsetBytes, 4);
    assert.equal(lenient.assertMatch().passed, true);
});

test('attach records a session round trip', async () => {
    const [local, remote] = createTransportPair();
    const player = new MediaSession(local, { frameSize: 4 });
    const echo = new MediaSession(remote, { frameSize: 4 });
    const verifier = new EchoVerifier({ frameSize: 4 });
    const detach = verifier.attach(player);

    echo.on('frame', (received) => {
        const padded = Buffer.alloc(4, 0xff);
        received.frame.payload.copy(padded);
        echo.sendFrame(padded);
    });

    await player.play(bytes(10));
    await flush();
    detach();
    player.sendFrame(bytes(4));

    const report = verifier.verify();
    assert.equal(report.sentBytes, 10);
    assert.equal(report.receivedBytes, 12);
    assert.equal(report.passed, true);
});
