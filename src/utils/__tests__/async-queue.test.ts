import assert from 'node:assert/strict';
import { test } from 'node:test';
import { AsyncQueue } from '../async-queue.js';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) items.push(item);
    return items;
}

test('buffers items pushed before anyone reads', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.end();

    assert.deepEqual(await collect(queue), [1, 2]);
});

test('a waiting reader receives the next push', async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next();
    queue.push('a');

    assert.deepEqual(await pending, { value: 'a', done: false });
    assert.equal(queue.size, 0);
});

test('push after end is refused', () => {
    const queue = new AsyncQueue<number>();
    queue.end();

    assert.equal(queue.push(1), false);
    assert.equal(queue.size, 0);
    assert.equal(queue.isEnded, true);
});

test('buffered items drain before the failure is raised', async () => {
    const queue = new AsyncQueue<number>();
    queue.push(7);
    queue.end(new Error('boom'));

    assert.deepEqual(await queue.next(), { value: 7, done: false });
    await assert.rejects(queue.next(), /boom/);
});

test('end rejects readers already waiting', async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    queue.end(new Error('gone'));

    await assert.rejects(pending, /gone/);
});

test('breaking out of the loop ends the queue and calls onReturn once', async () => {
    let returned = 0;
    const queue = new AsyncQueue<number>(() => {
        returned += 1;
    });
    queue.push(1);
    queue.push(2);

    for await (const item of queue) {
        assert.equal(item, 1);
        break;
    }

    assert.equal(returned, 1);
    assert.equal(queue.isEnded, true);
    assert.equal(queue.size, 0);
    await queue.return();
    assert.equal(returned, 1);
});

test('shift takes the oldest buffered item without waiting', () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    assert.equal(queue.shift(), 1);
    assert.equal(queue.size, 1);
    assert.equal(new AsyncQueue<number>().shift(), undefined);
});
