import assert from 'node:assert/strict';
import { test } from 'node:test';
import { type AriEvent, EventHandlerRegistry, describeEvent } from '../events.js';

const stasisStart: AriEvent = {
    type: 'StasisStart',
    application: 'demo',
    channel: { id: '1700.1', name: 'PJSIP/alice-00000001' },
    args: [],
};

test('match returns keyed, predicate and catch-all handlers in registration order', () => {
    const registry = new EventHandlerRegistry();
    const calls: string[] = [];

    registry.onAny(() => {
        calls.push('any');
    });
    registry.on('StasisStart', (event) => {
        calls.push(`start ${event.channel.name}`);
    });
    registry.on('StasisEnd', () => {
        calls.push('end');
    });
    registry.onMatch((event) => event.application === 'demo', () => {
        calls.push('demo');
    });

    for (const handler of registry.match(stasisStart)) void handler(stasisStart);

    assert.deepEqual(calls, ['any', 'start PJSIP/alice-00000001', 'demo']);
});

test('unsubscribe removes only that registration', () => {
    const registry = new EventHandlerRegistry();
    const off = registry.on('StasisStart', () => {});
    registry.on('StasisStart', () => {});

    assert.equal(registry.size, 2);
    off();
    off();
    assert.equal(registry.size, 1);
    assert.equal(registry.match(stasisStart).length, 1);
});

test('match is a snapshot', () => {
    const registry = new EventHandlerRegistry();
    registry.onAny(() => {});
    const handlers = registry.match(stasisStart);
    registry.onAny(() => {});

    assert.equal(handlers.length, 1);
    registry.clear();
    assert.equal(registry.size, 0);
});

test('describeEvent names the bridge and channel', () => {
    assert.equal(describeEvent(stasisStart), 'StasisStart PJSIP/alice-00000001');
    assert.equal(
        describeEvent({
            type: 'ChannelEnteredBridge',
            bridge: { id: 'b-1', name: 'conference' },
            channel: { id: '1', name: 'PJSIP/bob-00000002' },
        }),
        'ChannelEnteredBridge conference PJSIP/bob-00000002',
    );
    assert.equal(describeEvent({ type: 'BridgeDestroyed', bridge: { id: 'b-2', name: '' } }), 'BridgeDestroyed b-2');
    assert.equal(describeEvent({ type: 'Dial', peer: { id: '3', name: 'PJSIP/carol-00000003' } }), 'Dial PJSIP/carol-00000003');
    assert.equal(describeEvent({ type: 'ApplicationReplaced' }), 'ApplicationReplaced');
});
