import { SubscriberOverload } from '../errors';
import { UpdateEvent } from '../types';

type CloseListener = (reason: Error | null) => void;

/**
 * One subscriber's view of the event stream. Events are buffered up to
 * `capacity`; a subscriber that falls further behind is closed with a
 * SubscriberOverload reason instead of slowing the publisher.
 */
export class Subscription implements AsyncIterableIterator<UpdateEvent> {
    private readonly queue: UpdateEvent[] = [];
    private waiting: ((result: IteratorResult<UpdateEvent>) => void) | null = null;
    private readonly listeners: CloseListener[] = [];
    private closedWith: Error | null | undefined = undefined;

    constructor(readonly id: number, readonly capacity: number) {}

    get closed(): boolean {
        return this.closedWith !== undefined;
    }

    get reason(): Error | null {
        return this.closedWith ?? null;
    }

    get pending(): number {
        return this.queue.length;
    }

    /** Returns false when the event could not be accepted. */
    offer(event: UpdateEvent): boolean {
        if (this.closed) return false;
        if (this.waiting) {
            const resolve = this.waiting;
            this.waiting = null;
            resolve({ value: event, done: false });
            return true;
        }
        if (this.queue.length >= this.capacity) return false;
        this.queue.push(event);
        return true;
    }

    close(reason: Error | null = null): void {
        if (this.closed) return;
        this.closedWith = reason;
        this.queue.length = 0;
        if (this.waiting) {
            const resolve = this.waiting;
            this.waiting = null;
            resolve({ value: undefined, done: true });
        }
        for (const listener of this.listeners.splice(0)) {
            listener(reason);
        }
    }

    onClose(listener: CloseListener): void {
        if (this.closed) {
            listener(this.reason);
            return;
        }
        this.listeners.push(listener);
    }

    next(): Promise<IteratorResult<UpdateEvent>> {
        const event = this.queue.shift();
        if (event) return Promise.resolve({ value: event, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
            this.waiting = resolve;
        });
    }

    return(): Promise<IteratorResult<UpdateEvent>> {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
    }

    [Symbol.asyncIterator](): AsyncIterableIterator<UpdateEvent> {
        return this;
    }
}

export class Broadcaster {
    private readonly subscribers = new Set<Subscription>();
    private nextId = 1;

    constructor(private readonly queueSize: number) {}

    subscribe(): Subscription {
        const subscription = new Subscription(this.nextId++, this.queueSize);
        this.subscribers.add(subscription);
        subscription.onClose(() => this.subscribers.delete(subscription));
        return subscription;
    }

    /** Delivers to every current subscriber without waiting on any of them; returns the delivery count. */
    publish(event: UpdateEvent): number {
        let delivered = 0;
        for (const subscription of Array.from(this.subscribers)) {
            if (subscription.offer(event)) {
                delivered++;
            } else if (!subscription.closed) {
                console.error(`[broadcaster] dropping subscriber ${subscription.id}: queue full`);
                subscription.close(new SubscriberOverload(subscription.capacity));
            }
        }
        return delivered;
    }

    get subscriberCount(): number {
        return this.subscribers.size;
    }

    close(): void {
        for (const subscription of Array.from(this.subscribers)) {
            subscription.close();
        }
    }
}
