import { DeliveryDegradedError, type RoomEvent } from '@blogflow/protocol';
import type { EventBus, Subscription } from '../bus/event-bus';
import type { PostStore } from '../store';
import { trackDegraded } from '../metrics';

/**
 * Hands every accepted comment to the store. Runs off the comments topic so a slow
 * store never delays delivery to viewers.
 */
export class CommentArchiver {
    private subscription: Subscription<RoomEvent> | null = null;
    private pump: Promise<void> = Promise.resolve();
    private running = false;
    private archived = 0;
    private failed = 0;

    constructor(
        private readonly bus: EventBus,
        private readonly store: PostStore
    ) {}

    get stats(): { archived: number; failed: number } {
        return { archived: this.archived, failed: this.failed };
    }

    start(): void {
        if (this.running) return;
        this.running = true;
        this.attach();
    }

    /**
     * Resolves once the archiver's subscription has ended and its backlog is written
     */
    done(): Promise<void> {
        return this.pump;
    }

    /**
     * Stop immediately, dropping anything not yet written
     */
    async stop(): Promise<void> {
        this.running = false;
        this.subscription?.unsubscribe();
        await this.pump;
    }

    private attach(): void {
        const subscription = this.bus.subscribe('comments', { name: 'comment-archiver' });
        this.subscription = subscription;
        this.pump = this.consume(subscription);
    }

    private async consume(subscription: Subscription<RoomEvent>): Promise<void> {
        for await (const event of subscription) {
            if (event.kind !== 'comment') continue;
            try {
                await this.store.appendComment(event.message);
                this.archived++;
            } catch (error) {
                this.failed++;
                console.error(`Failed to archive comment ${event.message.messageId}:`, error);
            }
        }

        if (subscription.endReason !== 'backpressure' || !this.running) return;

        console.warn(new DeliveryDegradedError('Comment archiver fell behind; some comments were not archived').message);
        trackDegraded('comments', 'archiver');
        this.attach();
        await this.pump;
    }
}
