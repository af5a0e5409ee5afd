import { EventBus } from './bus/event-bus';
import { CommentArchiver } from './comments/archiver';
import { CommentRoomRegistry } from './comments/registry';
import type { PodConfig } from './config';
import { NotificationHub } from './notifications/hub';
import type { PostStore } from './store';
import { settleWithin } from './timing';
import { WorkflowEngine } from './workflow/engine';
import { WorkflowJournal } from './workflow/journal';

export interface SupervisorOptions {
    sweepIntervalMs: number;
    shutdownDeadlineMs: number;
}

export interface SupervisedParts {
    bus: EventBus;
    engine: WorkflowEngine;
    notifications: NotificationHub;
    rooms: CommentRoomRegistry;
    archiver: CommentArchiver;
}

export interface SweepReport {
    at: string;
    notificationsEvicted: string[];
    viewersEvicted: string[];
    roomsClosed: string[];
}

export interface ReviewCore extends SupervisedParts {
    store: PostStore;
    journal: WorkflowJournal;
    supervisor: Supervisor;
}

/**
 * Owns the lifecycle of the pod's long-running parts: starting them, sweeping idle
 * connections and empty rooms on a timer, and shutting down in order.
 */
export class Supervisor {
    private timers: NodeJS.Timeout[] = [];
    private started = false;
    private stopping: Promise<void> | null = null;

    constructor(
        private readonly options: SupervisorOptions,
        private readonly parts: SupervisedParts,
        private readonly now: () => number = Date.now
    ) {}

    get isRunning(): boolean {
        return this.started && !this.stopping;
    }

    get timerCount(): number {
        return this.timers.length;
    }

    async start(): Promise<void> {
        if (this.started) return;
        this.started = true;

        await this.parts.notifications.start();
        this.parts.rooms.start();
        this.parts.archiver.start();

        const sweeper = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
        const heartbeat = setInterval(() => this.parts.notifications.heartbeat(), this.parts.notifications.heartbeatIntervalMs);
        for (const timer of [sweeper, heartbeat]) {
            timer.unref();
            this.timers.push(timer);
        }
        console.log(`Supervisor started (sweep every ${this.options.sweepIntervalMs}ms)`);
    }

    /**
     * Evict idle connections and viewers, close rooms past their grace period
     */
    sweep(now = this.now()): SweepReport {
        const notificationsEvicted = this.parts.notifications.sweep(now);
        const { evictedViewers, closedRooms } = this.parts.rooms.sweep(now);
        const report: SweepReport = {
            at: new Date(now).toISOString(),
            notificationsEvicted,
            viewersEvicted: evictedViewers,
            roomsClosed: closedRooms,
        };
        if (notificationsEvicted.length + evictedViewers.length + closedRooms.length > 0) {
            console.log(
                `Sweep: ${notificationsEvicted.length} reviewers, ${evictedViewers.length} viewers evicted; ${closedRooms.length} rooms closed`
            );
        }
        return report;
    }

    /**
     * Stop transitions, close both hubs, then the bus. Safe to call more than once.
     */
    shutdown(): Promise<void> {
        if (!this.stopping) {
            this.stopping = this.stop();
        }
        return this.stopping;
    }

    private async stop(): Promise<void> {
        const deadline = this.options.shutdownDeadlineMs;
        for (const timer of this.timers.splice(0)) clearInterval(timer);

        this.parts.engine.close();
        if (!(await settleWithin(this.parts.engine.drain(), deadline))) {
            console.warn(`Workflow transitions still running after ${deadline}ms`);
        }

        await Promise.all([
            this.parts.notifications.shutdown(deadline),
            this.parts.rooms.shutdown(deadline),
        ]);

        this.parts.bus.close();
        if (!(await settleWithin(this.parts.archiver.done(), deadline))) {
            console.warn('Comment archiver did not finish before the deadline');
        }
        console.log('Supervisor stopped');
    }
}

/**
 * Wire the pod's core from configuration; connection limits are set here
 */
export function buildCore(config: PodConfig, store: PostStore, now: () => number = Date.now): ReviewCore {
    const bus = new EventBus(config.bus.capacity);
    const journal = new WorkflowJournal({ depth: config.journal.depth, maxPosts: config.journal.maxPosts });
    const engine = new WorkflowEngine({ store, bus, journal, now: () => new Date(now()) });

    const notifications = new NotificationHub(
        {
            queueDepth: config.notifications.queueDepth,
            heartbeatIntervalMs: config.notifications.heartbeatIntervalMs,
            idleTimeoutMs: config.notifications.idleTimeoutMs,
            maxConnections: config.notifications.maxConnections,
        },
        { bus, store, journal, now }
    );
    const rooms = new CommentRoomRegistry(
        {
            queueDepth: config.rooms.queueDepth,
            replayWindow: config.rooms.replayWindow,
            emptyRoomGraceMs: config.rooms.emptyRoomGraceMs,
            idleTimeoutMs: config.rooms.idleTimeoutMs,
            maxViewers: config.rooms.maxViewers,
            maxTextLength: config.rooms.maxTextLength,
        },
        { bus, now }
    );
    const archiver = new CommentArchiver(bus, store);

    const parts: SupervisedParts = { bus, engine, notifications, rooms, archiver };
    const supervisor = new Supervisor(config.supervisor, parts, now);
    return { ...parts, store, journal, supervisor };
}
