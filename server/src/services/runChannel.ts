import { RunCancelled } from '../errors';

/**
 * Unbounded async FIFO. Consumers iterate with `for await`; iteration ends once the channel is closed
 * and drained.
 */
export class Channel<T> implements AsyncIterable<T> {
    private readonly buffer: T[] = [];
    private readonly takers: ((result: IteratorResult<T, undefined>) => void)[] = [];
    private closed = false;

    send(value: T): void {
        if (this.closed) throw new RunCancelled('Channel is closed');
        const taker = this.takers.shift();
        if (taker) taker({ value, done: false });
        else this.buffer.push(value);
    }

    receive(): Promise<IteratorResult<T, undefined>> {
        if (this.buffer.length > 0) {
            const [value] = this.buffer.splice(0, 1);
            return Promise.resolve({ value, done: false });
        }
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise(resolve => this.takers.push(resolve));
    }

    /** Stops accepting values; returns whatever was still buffered. */
    close(): T[] {
        this.closed = true;
        this.takers.splice(0).forEach(t => t({ value: undefined, done: true }));
        return this.buffer.splice(0);
    }

    [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
        return { next: () => this.receive() };
    }
}

interface Envelope<Req, Res> {
    payload: Req;
    resolve: (response: Res) => void;
    reject: (error: unknown) => void;
}

/**
 * Request/reply over a channel: senders await the reply, one worker handles requests in arrival order.
 */
export class RequestChannel<Req, Res> {
    private readonly channel = new Channel<Envelope<Req, Res>>();

    request(payload: Req): Promise<Res> {
        return new Promise<Res>((resolve, reject) => {
            this.channel.send({ payload, resolve, reject });
        });
    }

    async serve(handler: (payload: Req) => Res | Promise<Res>): Promise<void> {
        for await (const envelope of this.channel) {
            try {
                envelope.resolve(await handler(envelope.payload));
            } catch (e) {
                envelope.reject(e);
            }
        }
    }

    close(): void {
        for (const pending of this.channel.close()) pending.reject(new RunCancelled('Request channel closed before the request was handled'));
    }
}
