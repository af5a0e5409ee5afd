import { ServiceUnavailableError, type RoomEvent, type WorkflowEvent } from '@blogflow/protocol';
import { BoundedChannel } from './channel';

/**
 * Topics carried by the pod's bus and the event type on each
 */
export interface PodTopics {
    workflow: WorkflowEvent;
    comments: RoomEvent;
}

export type SubscriptionEndReason = 'unsubscribed' | 'backpressure' | 'closed';

export interface SubscribeOptions {
    name?: string;
    capacity?: number;
}

export interface PublishReceipt {
    topic: string;
    delivered: number;
    dropped: string[]; // names of subscribers cut off by this publish
}

// Type-erased view the bus keeps per topic
interface Subscriber {
    readonly name: string;
    push(event: unknown): boolean;
    end(reason: SubscriptionEndReason): void;
}

/**
 * A subscriber's private channel, consumed as a lazy sequence of events
 */
export class Subscription<E> implements AsyncIterable<E> {
    private reason: SubscriptionEndReason | null = null;
    private readonly channel: BoundedChannel<E>;

    constructor(
        readonly topic: string,
        readonly name: string,
        capacity: number,
        private readonly detach: (subscription: Subscription<E>) => void
    ) {
        this.channel = new BoundedChannel<E>(capacity);
    }

    /**
     * Why the subscription ended, or null while it is live
     */
    get endReason(): SubscriptionEndReason | null {
        return this.reason;
    }

    get backlog(): number {
        return this.channel.size;
    }

    /** @internal called by the bus */
    push(event: E): boolean {
        return this.channel.offer(event);
    }

    /** @internal called by the bus; queued events stay readable */
    end(reason: SubscriptionEndReason): void {
        if (this.reason) return;
        this.reason = reason;
        this.detach(this);
        this.channel.close();
    }

    unsubscribe(): void {
        if (this.reason) return;
        this.reason = 'unsubscribed';
        this.detach(this);
        this.channel.abort();
    }

    [Symbol.asyncIterator](): AsyncIterator<E, undefined> {
        return this.channel[Symbol.asyncIterator]();
    }
}

/**
 * In-process pub/sub with one bounded channel per subscriber.
 *
 * Publish order is kept per topic for every subscriber. A subscriber whose channel is
 * full is dropped on the spot; the publisher never waits on a consumer. Nothing is
 * retained for subscribers that join later.
 */
export class EventBus<Topics extends object = PodTopics> {
    private readonly subscribers = new Map<keyof Topics, Set<Subscriber>>();
    private closed = false;
    private nextId = 1;

    constructor(private readonly defaultCapacity = 10_000) {}

    get isClosed(): boolean {
        return this.closed;
    }

    subscribe<K extends keyof Topics>(topic: K, options: SubscribeOptions = {}): Subscription<Topics[K]> {
        if (this.closed) {
            throw new ServiceUnavailableError('Event bus is closed');
        }

        const name = options.name ?? `${String(topic)}-${this.nextId++}`;
        const subscription = new Subscription<Topics[K]>(
            String(topic),
            name,
            options.capacity ?? this.defaultCapacity,
            sub => this.topicSet(topic).delete(sub)
        );
        this.topicSet(topic).add(subscription);
        return subscription;
    }

    /**
     * Hand an event to every current subscriber of the topic
     * @throws ServiceUnavailableError once the bus is closed
     */
    publish<K extends keyof Topics>(topic: K, event: Topics[K]): PublishReceipt {
        if (this.closed) {
            throw new ServiceUnavailableError('Event bus is closed', { topic: String(topic) });
        }

        const receipt: PublishReceipt = { topic: String(topic), delivered: 0, dropped: [] };
        const subscribers = this.subscribers.get(topic);
        if (!subscribers) return receipt;

        for (const subscription of [...subscribers]) {
            if (subscription.push(event)) {
                receipt.delivered++;
            } else {
                receipt.dropped.push(subscription.name);
                subscription.end('backpressure');
            }
        }
        return receipt;
    }

    subscriberCount(topic: keyof Topics): number {
        return this.subscribers.get(topic)?.size ?? 0;
    }

    /**
     * Refuse further publishes and end every subscription; queued events stay readable
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        for (const subscribers of this.subscribers.values()) {
            for (const subscription of [...subscribers]) subscription.end('closed');
        }
        this.subscribers.clear();
    }

    private topicSet(topic: keyof Topics): Set<Subscriber> {
        let subscribers = this.subscribers.get(topic);
        if (!subscribers) {
            subscribers = new Set();
            this.subscribers.set(topic, subscribers);
        }
        return subscribers;
    }
}
