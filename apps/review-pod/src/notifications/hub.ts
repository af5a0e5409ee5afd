import {
    CapacityExceededError,
    DeliveryDegradedError,
    ForbiddenError,
    InvalidInputError,
    NotificationType,
    PostStatus,
    ServiceUnavailableError,
    type NotificationFrame,
    type Role,
    type WorkflowEvent,
} from '@blogflow/protocol';
import { can } from '@blogflow/auth';
import { BoundedChannel } from '../bus/channel';
import type { EventBus, Subscription } from '../bus/event-bus';
import type { PostStore } from '../store';
import type { WorkflowJournal } from '../workflow/journal';
import { trackConnection, trackDegraded, trackEviction } from '../metrics';
import { settleWithin } from '../timing';

export type EvictionReason = 'backpressure' | 'idle' | 'admin' | 'shutdown';

export interface NotificationHubOptions {
    queueDepth: number;
    heartbeatIntervalMs: number;
    idleTimeoutMs: number;
    maxConnections: number;
}

export interface NotificationHubDeps {
    bus: EventBus;
    store: PostStore;
    journal: WorkflowJournal;
    now?: () => number;
}

export interface ConnectionInfo {
    connectionId: string;
    role: Role;
    connectedAt: string;
    lastActivity: string;
    queued: number;
}

interface NotificationConnection {
    connectionId: string;
    role: Role;
    channel: BoundedChannel<NotificationFrame>;
    connectedAt: number;
    lastActivity: number;
}

type HubState = 'idle' | 'running' | 'closing' | 'closed';

/**
 * Frame a workflow event for the reviewer stream
 */
export function toNotificationFrame(event: WorkflowEvent): NotificationFrame {
    if (event.kind === 'submitted') {
        return {
            type: NotificationType.SUBMITTED,
            postId: event.postId,
            actor: event.actorId,
            resubmission: event.resubmission,
            sequenceNumber: event.sequenceNumber,
            timestamp: event.timestamp,
        };
    }
    return {
        type: event.decision === PostStatus.APPROVED ? NotificationType.APPROVED : NotificationType.REJECTED,
        postId: event.postId,
        actor: event.actorId,
        ...(event.reason ? { reason: event.reason } : {}),
        sequenceNumber: event.sequenceNumber,
        timestamp: event.timestamp,
    };
}

/**
 * One connected reviewer session; frames are read in the order they were queued
 */
export class NotificationStream implements AsyncIterable<NotificationFrame> {
    constructor(
        readonly connectionId: string,
        private readonly channel: BoundedChannel<NotificationFrame>,
        private readonly release: () => void
    ) {}

    get queued(): number {
        return this.channel.size;
    }

    next(): Promise<IteratorResult<NotificationFrame, undefined>> {
        return this.channel.take();
    }

    close(): void {
        this.release();
    }

    [Symbol.asyncIterator](): AsyncIterator<NotificationFrame, undefined> {
        return {
            next: () => this.channel.take(),
            return: async () => {
                this.release();
                return { value: undefined, done: true };
            },
        };
    }
}

/**
 * Pushes pending-queue activity to every connected admin and approver.
 *
 * The hub keeps its own view of which posts are pending, seeded from the store and
 * moved forward by the workflow events it consumes, so a new connection gets its
 * snapshot without a store round trip. Each connection has a bounded queue; one that
 * fills up is evicted rather than slowing anyone else down.
 */
export class NotificationHub {
    private readonly connections = new Map<string, NotificationConnection>();
    private pending = new Set<string>();
    private subscription: Subscription<WorkflowEvent> | null = null;
    private pump: Promise<void> | null = null;
    private state: HubState = 'idle';
    private closing: Promise<void> | null = null;

    private readonly bus: EventBus;
    private readonly store: PostStore;
    private readonly journal: WorkflowJournal;
    private readonly now: () => number;

    constructor(private readonly options: NotificationHubOptions, deps: NotificationHubDeps) {
        this.bus = deps.bus;
        this.store = deps.store;
        this.journal = deps.journal;
        this.now = deps.now ?? Date.now;
    }

    get connectionCount(): number {
        return this.connections.size;
    }

    get heartbeatIntervalMs(): number {
        return this.options.heartbeatIntervalMs;
    }

    /**
     * Post ids currently pending review, in the order they entered the queue
     */
    pendingPosts(): string[] {
        return [...this.pending];
    }

    /**
     * Subscribe to workflow events, seed the pending set and start fan-out
     */
    async start(): Promise<void> {
        if (this.state !== 'idle') return;
        this.state = 'running';
        await this.attach();
        console.log(`Notification hub started with ${this.pending.size} pending posts`);
    }

    /**
     * Register a reviewer session. The first frame is always a snapshot of the
     * pending queue.
     */
    connect(connectionId: string, role: Role): NotificationStream {
        if (this.state === 'closing' || this.state === 'closed') {
            throw new ServiceUnavailableError('Notification hub is shutting down');
        }
        if (!can(role, 'notifications.subscribe')) {
            throw new ForbiddenError(`Role ${role} may not subscribe to notifications`, { role });
        }
        if (this.connections.has(connectionId)) {
            throw new InvalidInputError(`Connection ${connectionId} is already registered`);
        }
        if (this.connections.size >= this.options.maxConnections) {
            throw new CapacityExceededError('Notification connection limit reached', {
                limit: this.options.maxConnections,
            });
        }

        const now = this.now();
        const connection: NotificationConnection = {
            connectionId,
            role,
            connectedAt: now,
            lastActivity: now,
            channel: new BoundedChannel<NotificationFrame>(this.options.queueDepth, () => {
                connection.lastActivity = this.now();
            }),
        };
        connection.channel.offer(this.snapshotFrame(now));
        this.connections.set(connectionId, connection);
        trackConnection('notifications');
        console.log(`Reviewer connected: ${connectionId} (${role})`);

        return new NotificationStream(connectionId, connection.channel, () => this.disconnect(connectionId));
    }

    /**
     * Drop a connection; repeated calls are no-ops
     * @returns whether the connection was still registered
     */
    disconnect(connectionId: string): boolean {
        const connection = this.connections.get(connectionId);
        if (!connection) return false;
        this.connections.delete(connectionId);
        connection.channel.abort();
        trackConnection('notifications', 'none', false);
        console.log(`Reviewer disconnected: ${connectionId}`);
        return true;
    }

    /**
     * Close a connection on the server's initiative
     */
    evict(connectionId: string, reason: EvictionReason): boolean {
        const connection = this.connections.get(connectionId);
        if (!connection) return false;
        this.connections.delete(connectionId);
        connection.channel.abort();
        trackConnection('notifications', 'none', false);
        trackEviction('notifications', reason);

        if (reason === 'backpressure') {
            const warning = new DeliveryDegradedError(`Reviewer ${connectionId} evicted: queue full`, {
                queueDepth: this.options.queueDepth,
            });
            console.warn(warning.message);
            trackDegraded('notifications', reason);
        } else {
            console.log(`Reviewer ${connectionId} evicted (${reason})`);
        }
        return true;
    }

    /**
     * Queue a heartbeat on every connection
     */
    heartbeat(): void {
        this.broadcast({
            type: NotificationType.HEARTBEAT,
            sequenceNumber: 0,
            timestamp: new Date(this.now()).toISOString(),
        });
    }

    /**
     * Evict connections whose consumer has not taken a frame within the idle timeout
     * @returns ids of the evicted connections
     */
    sweep(now = this.now()): string[] {
        const evicted: string[] = [];
        for (const connection of [...this.connections.values()]) {
            if (now - connection.lastActivity > this.options.idleTimeoutMs) {
                this.evict(connection.connectionId, 'idle');
                evicted.push(connection.connectionId);
            }
        }
        return evicted;
    }

    /**
     * Journal events for a post after the given sequence number, as frames
     */
    history(postId: string, after = 0): NotificationFrame[] {
        return this.journal.replay(postId, after).map(toNotificationFrame);
    }

    listConnections(): ConnectionInfo[] {
        return [...this.connections.values()].map(connection => ({
            connectionId: connection.connectionId,
            role: connection.role,
            connectedAt: new Date(connection.connectedAt).toISOString(),
            lastActivity: new Date(connection.lastActivity).toISOString(),
            queued: connection.channel.size,
        }));
    }

    hasConnection(connectionId: string): boolean {
        return this.connections.has(connectionId);
    }

    /**
     * Send Closing, let consumers flush until the deadline, then force-close
     */
    shutdown(deadlineMs: number): Promise<void> {
        if (!this.closing) {
            this.closing = this.close(deadlineMs);
        }
        return this.closing;
    }

    private async close(deadlineMs: number): Promise<void> {
        this.state = 'closing';
        this.subscription?.unsubscribe();

        const closing: NotificationFrame = {
            type: NotificationType.CLOSING,
            sequenceNumber: 0,
            timestamp: new Date(this.now()).toISOString(),
        };
        const drained: Promise<void>[] = [];
        for (const connection of this.connections.values()) {
            connection.channel.offer(closing);
            connection.channel.close();
            drained.push(connection.channel.whenDrained());
        }

        const flushed = await settleWithin(Promise.all(drained), deadlineMs);
        if (!flushed) {
            console.warn(`Notification hub shutdown deadline hit with ${this.connections.size} connections unflushed`);
        }
        for (const connectionId of [...this.connections.keys()]) {
            this.evict(connectionId, 'shutdown');
        }

        await this.pump;
        this.state = 'closed';
        console.log('Notification hub closed');
    }

    private async attach(): Promise<void> {
        const subscription = this.bus.subscribe('workflow', { name: 'notification-hub' });
        this.subscription = subscription;
        this.pending = new Set(await this.store.listPending());
        this.pump = this.consume(subscription);
    }

    private async consume(subscription: Subscription<WorkflowEvent>): Promise<void> {
        for await (const event of subscription) {
            this.apply(event);
            this.broadcast(toNotificationFrame(event));
        }

        if (subscription.endReason !== 'backpressure' || this.state !== 'running') return;

        const warning = new DeliveryDegradedError('Notification hub fell behind the workflow topic; resubscribing');
        console.warn(warning.message);
        trackDegraded('notifications', 'subscription');
        try {
            await this.attach();
        } catch (error) {
            console.error('Notification hub could not resubscribe:', error);
        }
    }

    private apply(event: WorkflowEvent): void {
        if (event.kind === 'submitted') {
            this.pending.add(event.postId);
        } else {
            this.pending.delete(event.postId);
        }
    }

    private broadcast(frame: NotificationFrame): void {
        for (const connection of [...this.connections.values()]) {
            if (!connection.channel.offer(frame)) {
                this.evict(connection.connectionId, 'backpressure');
            }
        }
    }

    private snapshotFrame(now: number): NotificationFrame {
        const pending = [...this.pending];
        return {
            type: NotificationType.SNAPSHOT,
            pending,
            count: pending.length,
            sequenceNumber: 0,
            timestamp: new Date(now).toISOString(),
        };
    }
}
