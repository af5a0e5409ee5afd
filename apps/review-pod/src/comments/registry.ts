import { LRUCache } from 'lru-cache';
import { ulid } from 'ulid';
import {
    CapacityExceededError,
    DeliveryDegradedError,
    InvalidInputError,
    RoomFrameType,
    ServiceUnavailableError,
    type CommentMessage,
    type MembershipChange,
    type RoomEvent,
    type RoomFrame,
} from '@blogflow/protocol';
import { BoundedChannel } from '../bus/channel';
import type { EventBus, Subscription } from '../bus/event-bus';
import { trackComment, trackConnection, trackDegraded, trackEviction } from '../metrics';
import { settleWithin } from '../timing';

export type ViewerEvictionReason = 'backpressure' | 'idle' | 'admin' | 'shutdown';

export interface CommentRoomOptions {
    queueDepth: number;
    replayWindow: number;
    emptyRoomGraceMs: number;
    idleTimeoutMs: number;
    maxViewers: number; // per room
    maxTextLength: number;
    retiredRooms?: number; // sequence counters kept for torn-down rooms
}

export interface CommentRoomDeps {
    bus: EventBus;
    now?: () => number;
}

export interface ViewerInfo {
    connectionId: string;
    roomId: string;
    viewerId: string;
    joinedAt: string;
    lastActivity: string;
    queued: number;
}

export interface RoomSweepReport {
    evictedViewers: string[];
    closedRooms: string[];
}

interface Member {
    connectionId: string;
    viewerId: string;
    roomId: string;
    channel: BoundedChannel<RoomFrame>;
    cursor: number; // highest room position already queued for this member
    joinedAt: number;
    lastActivity: number;
}

interface Room {
    postId: string;
    members: Map<string, Member>;
    lastSequence: number;
    position: number;
    replay: RoomEvent[]; // comment events only, oldest first
    emptySince: number | null;
}

interface RoomCounters {
    lastSequence: number;
    position: number;
}

type RegistryState = 'idle' | 'running' | 'closing' | 'closed';

/**
 * Wire frame for a room event
 */
export function toRoomFrame(event: RoomEvent): RoomFrame {
    if (event.kind === 'comment') {
        return {
            type: RoomFrameType.COMMENT,
            author: event.message.authorId,
            text: event.message.text,
            messageId: event.message.messageId,
            sequenceNumber: event.message.sequenceNumber,
            timestamp: event.message.timestamp,
        };
    }
    return {
        type: event.change === 'joined' ? RoomFrameType.JOINED : RoomFrameType.LEFT,
        author: event.viewerId,
        ...(event.reason ? { reason: event.reason } : {}),
        sequenceNumber: event.sequenceNumber,
        timestamp: event.timestamp,
    };
}

function roomOf(event: RoomEvent): string {
    return event.kind === 'comment' ? event.message.roomId : event.roomId;
}

/**
 * A viewer's seat in a room
 */
export class CommentStream implements AsyncIterable<RoomFrame> {
    constructor(
        readonly connectionId: string,
        readonly postId: string,
        readonly viewerId: string,
        private readonly channel: BoundedChannel<RoomFrame>,
        private readonly registry: CommentRoomRegistry
    ) {}

    get queued(): number {
        return this.channel.size;
    }

    next(): Promise<IteratorResult<RoomFrame, undefined>> {
        return this.channel.take();
    }

    /**
     * Record inbound traffic from the viewer
     */
    touch(): void {
        this.registry.touch(this.connectionId);
    }

    /**
     * Queue an Error frame for this viewer only
     */
    reportError(code: string, message: string, sequenceNumber = 0): boolean {
        return this.channel.offer({
            type: RoomFrameType.ERROR,
            code,
            message,
            sequenceNumber,
            timestamp: new Date().toISOString(),
        });
    }

    close(): void {
        this.registry.leave(this.postId, this.connectionId);
    }

    [Symbol.asyncIterator](): AsyncIterator<RoomFrame, undefined> {
        return {
            next: () => this.channel.take(),
            return: async () => {
                this.close();
                return { value: undefined, done: true };
            },
        };
    }
}

/**
 * Live comment rooms, one per post.
 *
 * Every room event gets a position when it is created and goes out through the bus;
 * members receive events in position order and skip anything at or below their cursor,
 * which is how a joiner gets the replay window and then live traffic without overlap.
 * Rooms appear on first use and are torn down by `sweep` after staying empty for the
 * grace period.
 */
export class CommentRoomRegistry {
    private readonly rooms = new Map<string, Room>();
    private readonly connections = new Map<string, string>(); // connectionId -> postId
    private readonly retired: LRUCache<string, RoomCounters>;
    private subscription: Subscription<RoomEvent> | null = null;
    private pump: Promise<void> | null = null;
    private state: RegistryState = 'idle';
    private closing: Promise<void> | null = null;

    private readonly bus: EventBus;
    private readonly now: () => number;

    constructor(private readonly options: CommentRoomOptions, deps: CommentRoomDeps) {
        this.bus = deps.bus;
        this.now = deps.now ?? Date.now;
        this.retired = new LRUCache<string, RoomCounters>({ max: options.retiredRooms ?? 10_000 });
    }

    get roomCount(): number {
        return this.rooms.size;
    }

    get viewerCount(): number {
        return this.connections.size;
    }

    hasRoom(postId: string): boolean {
        return this.rooms.has(postId);
    }

    memberCount(postId: string): number {
        return this.rooms.get(postId)?.members.size ?? 0;
    }

    hasConnection(connectionId: string): boolean {
        return this.connections.has(connectionId);
    }

    start(): void {
        if (this.state !== 'idle') return;
        this.state = 'running';
        this.attach();
        console.log('Comment rooms started');
    }

    /**
     * Seat a viewer in a post's room. Buffered comments are queued first, then the
     * viewer's own Joined frame and live traffic.
     */
    join(postId: string, connectionId: string, viewerId: string): CommentStream {
        if (this.state === 'closing' || this.state === 'closed') {
            throw new ServiceUnavailableError('Comment rooms are shutting down');
        }
        if (this.connections.has(connectionId)) {
            throw new InvalidInputError(`Connection ${connectionId} is already in a room`);
        }

        const room = this.roomFor(postId);
        if (room.members.size >= this.options.maxViewers) {
            throw new CapacityExceededError(`Room ${postId} is full`, { limit: this.options.maxViewers });
        }

        const now = this.now();
        const member: Member = {
            connectionId,
            viewerId,
            roomId: postId,
            cursor: 0,
            joinedAt: now,
            lastActivity: now,
            // room for the full replay on top of the live queue
            channel: new BoundedChannel<RoomFrame>(this.options.queueDepth + this.options.replayWindow, () => {
                member.lastActivity = this.now();
            }),
        };

        for (const event of room.replay) {
            member.channel.offer(toRoomFrame(event));
        }

        const joined = this.membershipEvent(room, 'joined', member, now);
        member.cursor = joined.position - 1;
        room.members.set(connectionId, member);
        room.emptySince = null;
        this.connections.set(connectionId, postId);
        trackConnection('comments', postId);
        console.log(`Viewer ${viewerId} joined room ${postId} as ${connectionId}`);

        this.publish(joined);
        return new CommentStream(connectionId, postId, viewerId, member.channel, this);
    }

    /**
     * Accept a comment into a room and broadcast it to every member, the sender included
     * @returns the room-scoped sequence number
     */
    post(postId: string, authorId: string, text: string): number {
        if (this.state === 'closing' || this.state === 'closed') {
            throw new ServiceUnavailableError('Comment rooms are shutting down');
        }
        const trimmed = text.trim();
        if (!trimmed) {
            throw new InvalidInputError('Comment text must not be empty');
        }
        if (trimmed.length > this.options.maxTextLength) {
            throw new InvalidInputError(`Comment text must be at most ${this.options.maxTextLength} characters`, {
                length: trimmed.length,
            });
        }

        const room = this.roomFor(postId);
        const now = this.now();
        const message: CommentMessage = {
            messageId: ulid(now),
            roomId: postId,
            authorId,
            text: trimmed,
            sequenceNumber: ++room.lastSequence,
            timestamp: new Date(now).toISOString(),
        };
        const event: RoomEvent = { kind: 'comment', position: ++room.position, message };

        room.replay.push(event);
        if (room.replay.length > this.options.replayWindow) {
            room.replay.splice(0, room.replay.length - this.options.replayWindow);
        }
        if (room.members.size === 0 && room.emptySince === null) {
            room.emptySince = now;
        }

        trackComment();
        this.publish(event);
        return message.sequenceNumber;
    }

    /**
     * Remove a viewer; repeated calls are no-ops
     */
    leave(postId: string, connectionId: string): boolean {
        const room = this.rooms.get(postId);
        const member = room?.members.get(connectionId);
        if (!room || !member) return false;

        const now = this.now();
        this.remove(room, member, now);
        console.log(`Viewer ${member.viewerId} left room ${postId}`);
        this.publish(this.membershipEvent(room, 'left', member, now));
        return true;
    }

    /**
     * Remove a viewer on the server's initiative; the room sees a Left frame with the reason
     */
    evict(connectionId: string, reason: ViewerEvictionReason, now = this.now()): boolean {
        const postId = this.connections.get(connectionId);
        const room = postId === undefined ? undefined : this.rooms.get(postId);
        const member = room?.members.get(connectionId);
        if (!room || !member) return false;

        this.remove(room, member, now);
        trackEviction('comments', reason);
        if (reason === 'backpressure') {
            const warning = new DeliveryDegradedError(`Viewer ${connectionId} in room ${room.postId} evicted: queue full`);
            console.warn(warning.message);
            trackDegraded('comments', reason);
        } else {
            console.log(`Viewer ${connectionId} in room ${room.postId} evicted (${reason})`);
        }

        if (reason !== 'shutdown') {
            this.publish(this.membershipEvent(room, 'left', member, now, reason));
        }
        return true;
    }

    /**
     * Mark inbound traffic (a message or a pong) from a viewer
     */
    touch(connectionId: string): void {
        const postId = this.connections.get(connectionId);
        const member = postId === undefined ? undefined : this.rooms.get(postId)?.members.get(connectionId);
        if (member) member.lastActivity = this.now();
    }

    /**
     * Evict idle viewers and tear down rooms that stayed empty past the grace period
     */
    sweep(now = this.now()): RoomSweepReport {
        const report: RoomSweepReport = { evictedViewers: [], closedRooms: [] };

        for (const room of [...this.rooms.values()]) {
            for (const member of [...room.members.values()]) {
                if (now - member.lastActivity > this.options.idleTimeoutMs) {
                    this.evict(member.connectionId, 'idle', now);
                    report.evictedViewers.push(member.connectionId);
                }
            }
        }

        for (const room of [...this.rooms.values()]) {
            if (room.members.size === 0 && room.emptySince !== null && now - room.emptySince >= this.options.emptyRoomGraceMs) {
                this.rooms.delete(room.postId);
                this.retired.set(room.postId, { lastSequence: room.lastSequence, position: room.position });
                report.closedRooms.push(room.postId);
                console.log(`Room ${room.postId} closed after staying empty`);
            }
        }
        return report;
    }

    listConnections(): ViewerInfo[] {
        const viewers: ViewerInfo[] = [];
        for (const room of this.rooms.values()) {
            for (const member of room.members.values()) {
                viewers.push({
                    connectionId: member.connectionId,
                    roomId: room.postId,
                    viewerId: member.viewerId,
                    joinedAt: new Date(member.joinedAt).toISOString(),
                    lastActivity: new Date(member.lastActivity).toISOString(),
                    queued: member.channel.size,
                });
            }
        }
        return viewers;
    }

    /**
     * Send Closing to every viewer, let them flush until the deadline, then force-close
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

        const drained: Promise<void>[] = [];
        const timestamp = new Date(this.now()).toISOString();
        for (const room of this.rooms.values()) {
            for (const member of room.members.values()) {
                member.channel.offer({ type: RoomFrameType.CLOSING, sequenceNumber: room.lastSequence, timestamp });
                member.channel.close();
                drained.push(member.channel.whenDrained());
            }
        }

        const flushed = await settleWithin(Promise.all(drained), deadlineMs);
        if (!flushed) {
            console.warn(`Comment rooms shutdown deadline hit with ${this.connections.size} viewers unflushed`);
        }
        for (const connectionId of [...this.connections.keys()]) {
            this.evict(connectionId, 'shutdown');
        }
        this.rooms.clear();

        await this.pump;
        this.state = 'closed';
        console.log('Comment rooms closed');
    }

    private attach(): void {
        const subscription = this.bus.subscribe('comments', { name: 'comment-rooms' });
        this.subscription = subscription;
        this.pump = this.consume(subscription);
    }

    private async consume(subscription: Subscription<RoomEvent>): Promise<void> {
        for await (const event of subscription) {
            this.dispatch(event);
        }

        if (subscription.endReason !== 'backpressure' || this.state !== 'running') return;

        const warning = new DeliveryDegradedError('Comment rooms fell behind the comments topic; resubscribing');
        console.warn(warning.message);
        trackDegraded('comments', 'subscription');
        try {
            this.attach();
            this.resync();
        } catch (error) {
            console.error('Comment rooms could not resubscribe:', error);
        }
    }

    private dispatch(event: RoomEvent): void {
        const room = this.rooms.get(roomOf(event));
        if (!room) return;

        const frame = toRoomFrame(event);
        for (const member of [...room.members.values()]) {
            if (event.position <= member.cursor) continue;
            member.cursor = event.position;
            if (!member.channel.offer(frame)) {
                this.evict(member.connectionId, 'backpressure');
            }
        }
    }

    // Bring every member up to date from its room's replay buffer
    private resync(): void {
        for (const room of this.rooms.values()) {
            for (const member of [...room.members.values()]) {
                for (const event of room.replay) {
                    if (event.position <= member.cursor) continue;
                    member.cursor = event.position;
                    if (!member.channel.offer(toRoomFrame(event))) {
                        this.evict(member.connectionId, 'backpressure');
                        break;
                    }
                }
            }
        }
    }

    private publish(event: RoomEvent): void {
        try {
            const receipt = this.bus.publish('comments', event);
            if (receipt.dropped.length > 0) {
                console.warn(new DeliveryDegradedError(`Comments topic dropped ${receipt.dropped.join(', ')}`).message);
                trackDegraded('comments', 'backpressure');
            }
        } catch (error) {
            // bus gone: keep members of this pod consistent
            console.warn('Comments topic unavailable, delivering locally:', error instanceof Error ? error.message : error);
            trackDegraded('comments', 'bus');
            this.dispatch(event);
        }
    }

    private remove(room: Room, member: Member, now: number): void {
        room.members.delete(member.connectionId);
        this.connections.delete(member.connectionId);
        member.channel.abort();
        trackConnection('comments', room.postId, false);
        if (room.members.size === 0) {
            room.emptySince = now;
        }
    }

    private roomFor(postId: string): Room {
        let room = this.rooms.get(postId);
        if (!room) {
            const counters = this.retired.get(postId);
            this.retired.delete(postId);
            room = {
                postId,
                members: new Map(),
                lastSequence: counters?.lastSequence ?? 0,
                position: counters?.position ?? 0,
                replay: [],
                emptySince: null,
            };
            this.rooms.set(postId, room);
        }
        return room;
    }

    private membershipEvent(
        room: Room,
        change: MembershipChange,
        member: Member,
        now: number,
        reason?: string
    ): RoomEvent {
        return {
            kind: 'membership',
            position: ++room.position,
            change,
            roomId: room.postId,
            viewerId: member.viewerId,
            connectionId: member.connectionId,
            sequenceNumber: room.lastSequence,
            timestamp: new Date(now).toISOString(),
            ...(reason ? { reason } : {}),
        };
    }
}
