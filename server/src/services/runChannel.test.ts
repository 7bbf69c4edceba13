import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RunCancelled } from '../errors';
import { Channel, RequestChannel } from './runChannel';

describe('Channel', () => {
    it('delivers buffered and later values in order', async () => {
        const channel = new Channel<number>();
        channel.send(1);
        const pending = channel.receive();
        channel.send(2);

        assert.deepEqual(await pending, { value: 1, done: false });
        assert.deepEqual(await channel.receive(), { value: 2, done: false });
    });

    it('ends iteration once closed and drained', async () => {
        const channel = new Channel<string>();
        const seen: string[] = [];
        const consumer = (async () => {
            for await (const value of channel) seen.push(value);
        })();

        channel.send('a');
        channel.send('b');
        await new Promise(resolve => setImmediate(resolve));
        channel.close();
        await consumer;

        assert.deepEqual(seen, ['a', 'b']);
        assert.throws(() => channel.send('c'), RunCancelled);
    });
});

describe('RequestChannel', () => {
    it('replies to each request through one worker', async () => {
        const channel = new RequestChannel<number, number>();
        const handled: number[] = [];
        const worker = channel.serve(n => {
            handled.push(n);
            if (n < 0) throw new RangeError('negative');
            return n * 2;
        });

        const results = await Promise.allSettled([channel.request(1), channel.request(-1), channel.request(3)]);

        assert.deepEqual(handled, [1, -1, 3]);
        assert.deepEqual(results.map(r => (r.status === 'fulfilled' ? r.value : r.reason instanceof Error ? r.reason.message : 'unknown')), [2, 'negative', 6]);
        channel.close();
        await worker;
    });

    it('rejects requests nobody handled before close', async () => {
        const channel = new RequestChannel<string, string>();
        const pending = channel.request('late');
        channel.close();

        await assert.rejects(pending, RunCancelled);
    });
});
