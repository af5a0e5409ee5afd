import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    CapacityExceededError,
    InvalidInputError,
    RoomFrameType,
    ServiceUnavailableError,
    type RoomFrame,
} from '@blogflow/protocol';
import { EventBus } from '../bus/event-bus';
import { CommentRoomRegistry, toRoomFrame, type CommentRoomOptions, type CommentStream } from './registry';

const flush = async () => {
    await new Promise(resolve => setImmediate(resolve));
    await new Promise(resolve => setImmediate(resolve));
};

async function queuedFrames(stream: CommentStream): Promise<RoomFrame[]> {
    const frames: RoomFrame[] = [];
    while (stream.queued > 0) {
        const result = await stream.next();
        if (result.done) break;
        frames.push(result.value);
    }
    return frames;
}

const summary = (frames: RoomFrame[]) =>
    frames.map(frame => (frame.type === RoomFrameType.COMMENT ? `${frame.author}:${frame.text}` : `${frame.type}:${frame.author}`));

describe('toRoomFrame', () => {
    it('carries the eviction reason on Left frames', () => {
        expect(
            toRoomFrame({
                kind: 'membership',
                position: 7,
                change: 'left',
                roomId: 'p1',
                viewerId: 'v1',
                connectionId: 'c1',
                sequenceNumber: 3,
                timestamp: '2024-01-01T00:00:00.000Z',
                reason: 'idle',
            })
        ).toEqual({
            type: RoomFrameType.LEFT,
            author: 'v1',
            reason: 'idle',
            sequenceNumber: 3,
            timestamp: '2024-01-01T00:00:00.000Z',
        });
    });
});

describe('CommentRoomRegistry', () => {
    let clock: number;
    let bus: EventBus;
    let registry: CommentRoomRegistry;

    const options: CommentRoomOptions = {
        queueDepth: 4,
        replayWindow: 3,
        emptyRoomGraceMs: 30_000,
        idleTimeoutMs: 90_000,
        maxViewers: 3,
        maxTextLength: 1000,
    };

    function createRegistry(overrides: Partial<CommentRoomOptions> = {}, registryBus = bus): CommentRoomRegistry {
        const created = new CommentRoomRegistry({ ...options, ...overrides }, { bus: registryBus, now: () => clock });
        created.start();
        return created;
    }

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        clock = Date.parse('2024-06-01T10:00:00.000Z');
        bus = new EventBus();
        registry = createRegistry();
    });

    it('echoes a comment to its sender exactly once', async () => {
        const viewer = registry.join('p1', 'c1', 'v1');
        await flush();

        expect(registry.post('p1', 'v1', '  hello  ')).toBe(1);
        await flush();

        const frames = await queuedFrames(viewer);
        expect(frames).toEqual([
            { type: RoomFrameType.JOINED, author: 'v1', sequenceNumber: 0, timestamp: '2024-06-01T10:00:00.000Z' },
            {
                type: RoomFrameType.COMMENT,
                author: 'v1',
                text: 'hello',
                messageId: expect.stringMatching(/^[0-9A-HJKMNP-TV-Z]{26}$/),
                sequenceNumber: 1,
                timestamp: '2024-06-01T10:00:00.000Z',
            },
        ]);
    });

    it('replays the buffered window to a late joiner, then goes live', async () => {
        const first = registry.join('p1', 'c1', 'v1');
        for (const text of ['a', 'b', 'c', 'd']) registry.post('p1', 'v1', text);
        await flush();

        const late = registry.join('p1', 'c2', 'v2');
        await flush();
        registry.post('p1', 'v1', 'e');
        await flush();

        expect(summary(await queuedFrames(late))).toEqual(['v1:b', 'v1:c', 'v1:d', 'Joined:v2', 'v1:e']);
        expect(summary(await queuedFrames(first))).toEqual([
            'Joined:v1', 'v1:a', 'v1:b', 'v1:c', 'v1:d', 'Joined:v2', 'v1:e',
        ]);
    });

    it('does not duplicate comments that were still in flight when a viewer joined', async () => {
        const first = registry.join('p1', 'c1', 'v1');
        registry.post('p1', 'v1', 'x');
        const late = registry.join('p1', 'c2', 'v2');
        await flush();

        expect(summary(await queuedFrames(late))).toEqual(['v1:x', 'Joined:v2']);
        expect(summary(await queuedFrames(first))).toEqual(['Joined:v1', 'v1:x', 'Joined:v2']);
    });

    it('shows every member the same order', async () => {
        const one = registry.join('p1', 'c1', 'v1');
        const two = registry.join('p1', 'c2', 'v2');
        await flush();
        await queuedFrames(one);
        await queuedFrames(two);

        registry.post('p1', 'v1', 'first');
        registry.post('p1', 'v2', 'second');
        await flush();
        registry.post('p1', 'v2', 'third');
        registry.post('p1', 'v1', 'fourth');
        await flush();

        const seen = (frames: RoomFrame[]) => frames.map(frame => `${frame.sequenceNumber}:${frame.text}`);
        const expected = ['1:first', '2:second', '3:third', '4:fourth'];
        expect(seen(await queuedFrames(one))).toEqual(expected);
        expect(seen(await queuedFrames(two))).toEqual(expected);
    });

    it('rejects empty and oversized comments', () => {
        expect(() => registry.post('p1', 'v1', '   ')).toThrow(InvalidInputError);
        expect(() => registry.post('p1', 'v1', 'x'.repeat(1001))).toThrow(InvalidInputError);
        expect(registry.post('p1', 'v1', 'x'.repeat(1000))).toBe(1);
    });

    it('enforces the viewer limit and unique connection ids', () => {
        registry.join('p1', 'c1', 'v1');
        registry.join('p1', 'c2', 'v2');
        expect(() => registry.join('p1', 'c2', 'v2')).toThrow(InvalidInputError);
        registry.join('p1', 'c3', 'v3');
        expect(() => registry.join('p1', 'c4', 'v4')).toThrow(CapacityExceededError);
        expect(() => registry.join('p2', 'c4', 'v4')).not.toThrow();
    });

    it('leaves idempotently and tells the others', async () => {
        const leaving = registry.join('p1', 'c1', 'v1');
        const staying = registry.join('p1', 'c2', 'v2');
        await flush();
        await queuedFrames(staying);

        expect(registry.leave('p1', 'c1')).toBe(true);
        expect(registry.leave('p1', 'c1')).toBe(false);
        await flush();

        expect(await leaving.next()).toEqual({ value: undefined, done: true });
        expect(await queuedFrames(staying)).toEqual([
            { type: RoomFrameType.LEFT, author: 'v1', sequenceNumber: 0, timestamp: '2024-06-01T10:00:00.000Z' },
        ]);
        expect(registry.memberCount('p1')).toBe(1);
    });

    it('tears an empty room down after the grace period and keeps numbering', () => {
        registry.join('p1', 'c1', 'v1');
        registry.post('p1', 'v1', 'a');
        const leftAt = clock;
        registry.leave('p1', 'c1');

        expect(registry.sweep(leftAt + 29_999).closedRooms).toEqual([]);
        expect(registry.sweep(leftAt + 30_000).closedRooms).toEqual(['p1']);
        expect(registry.hasRoom('p1')).toBe(false);

        registry.join('p1', 'c2', 'v1');
        expect(registry.post('p1', 'v1', 'b')).toBe(2);
    });

    it('cancels a pending teardown when someone joins', () => {
        registry.join('p1', 'c1', 'v1');
        const leftAt = clock;
        registry.leave('p1', 'c1');

        clock = leftAt + 10_000;
        registry.join('p1', 'c2', 'v2');

        expect(registry.sweep(leftAt + 40_000).closedRooms).toEqual([]);
        expect(registry.hasRoom('p1')).toBe(true);
    });

    it('evicts a stalled viewer without holding up a reading one', async () => {
        const stalled = registry.join('p1', 'slow', 'v1');
        const reader = registry.join('p1', 'fast', 'v2');

        const received: RoomFrame[] = [];
        const reading = (async () => {
            for await (const frame of reader) received.push(frame);
        })();

        for (let i = 1; i <= 6; i++) {
            registry.post('p1', 'v2', `m${i}`);
            await flush();
        }

        expect(registry.hasConnection('slow')).toBe(false);
        expect(await stalled.next()).toEqual({ value: undefined, done: true });

        registry.leave('p1', 'fast');
        await reading;
        expect(summary(received)).toEqual([
            'Joined:v2', 'v2:m1', 'v2:m2', 'v2:m3', 'v2:m4', 'v2:m5', 'v2:m6', 'Left:v1',
        ]);
        expect(received[received.length - 1].reason).toBe('backpressure');
    });

    it('sweeps viewers with no recent activity', () => {
        const joinedAt = clock;
        registry.join('p1', 'c1', 'v1');
        registry.join('p1', 'c2', 'v2');

        clock = joinedAt + 60_000;
        registry.touch('c1');

        expect(registry.sweep(joinedAt + 100_000)).toEqual({ evictedViewers: ['c2'], closedRooms: [] });
        expect(registry.hasConnection('c1')).toBe(true);
    });

    it('lists viewers for operators', () => {
        registry.join('p1', 'c1', 'v1');
        expect(registry.listConnections()).toEqual([
            {
                connectionId: 'c1',
                roomId: 'p1',
                viewerId: 'v1',
                joinedAt: '2024-06-01T10:00:00.000Z',
                lastActivity: '2024-06-01T10:00:00.000Z',
                queued: 0,
            },
        ]);
    });

    it('resyncs members from the replay buffer after losing its subscription', async () => {
        const tightBus = new EventBus(1);
        const rooms = createRegistry({}, tightBus);

        const viewer = rooms.join('p1', 'c1', 'v1');
        rooms.post('p1', 'v1', 'a');
        rooms.post('p1', 'v1', 'b');
        await flush();

        expect(tightBus.subscriberCount('comments')).toBe(1);
        rooms.post('p1', 'v1', 'c');
        await flush();

        expect(summary(await queuedFrames(viewer))).toEqual(['Joined:v1', 'v1:a', 'v1:b', 'v1:c']);
    });

    it('lets the remaining viewer post after another disconnects', async () => {
        const first = registry.join('p1', 'c1', 'v1');
        const second = registry.join('p1', 'c2', 'v2');
        await flush();

        first.close();
        expect(registry.post('p1', 'v2', 'hello')).toBe(1);
        await flush();

        expect(summary(await queuedFrames(second))).toEqual(['Joined:v2', 'Left:v1', 'v2:hello']);
    });

    it('sends Closing on shutdown and refuses new work', async () => {
        const reader = registry.join('p1', 'c1', 'v1');
        registry.join('p1', 'c2', 'v2');
        await flush();

        const received: RoomFrame[] = [];
        const reading = (async () => {
            for await (const frame of reader) received.push(frame);
        })();

        await registry.shutdown(50);
        await reading;

        expect(received.map(frame => frame.type)).toEqual([RoomFrameType.JOINED, RoomFrameType.JOINED, RoomFrameType.CLOSING]);
        expect(registry.viewerCount).toBe(0);
        expect(() => registry.join('p1', 'c3', 'v3')).toThrow(ServiceUnavailableError);
        expect(() => registry.post('p1', 'v1', 'late')).toThrow(ServiceUnavailableError);
    });
});
