import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
    InvalidInputError,
    InvalidTransitionError,
    NotFoundError,
    PostStatus,
    Role,
    ServiceUnavailableError,
    StaleStateError,
    UnauthorizedError,
    type Identity,
    type WorkflowEvent,
} from '@blogflow/protocol';
import { EventBus } from '../bus/event-bus';
import { MemoryPostStore } from '../store/memory';
import { WorkflowJournal } from './journal';
import { MAX_REASON_LENGTH, WorkflowEngine, canTransition, normalizeReason } from './engine';

const author: Identity = { userId: 'author-1', role: Role.USER };
const stranger: Identity = { userId: 'someone-else', role: Role.USER };
const admin: Identity = { userId: 'admin-1', role: Role.ADMIN };
const approver: Identity = { userId: 'approver-1', role: Role.L1_APPROVER };

const fixedNow = new Date('2024-03-01T12:00:00.000Z');

describe('canTransition', () => {
    it('allows only the workflow edges', () => {
        expect(canTransition(PostStatus.DRAFT, PostStatus.PENDING)).toBe(true);
        expect(canTransition(PostStatus.PENDING, PostStatus.APPROVED)).toBe(true);
        expect(canTransition(PostStatus.PENDING, PostStatus.REJECTED)).toBe(true);
        expect(canTransition(PostStatus.REJECTED, PostStatus.PENDING)).toBe(true);

        expect(canTransition(PostStatus.DRAFT, PostStatus.APPROVED)).toBe(false);
        expect(canTransition(PostStatus.DRAFT, PostStatus.REJECTED)).toBe(false);
        expect(canTransition(PostStatus.APPROVED, PostStatus.PENDING)).toBe(false);
        expect(canTransition(PostStatus.REJECTED, PostStatus.APPROVED)).toBe(false);
    });
});

describe('normalizeReason', () => {
    it('trims and drops blank reasons', () => {
        expect(normalizeReason('  needs sources  ')).toBe('needs sources');
        expect(normalizeReason('   ')).toBeUndefined();
        expect(normalizeReason(undefined)).toBeUndefined();
    });

    it('rejects reasons over the limit', () => {
        expect(normalizeReason('x'.repeat(MAX_REASON_LENGTH))).toHaveLength(MAX_REASON_LENGTH);
        expect(() => normalizeReason('x'.repeat(MAX_REASON_LENGTH + 1))).toThrow(InvalidInputError);
    });
});

describe('WorkflowEngine', () => {
    let store: MemoryPostStore;
    let bus: EventBus;
    let journal: WorkflowJournal;
    let engine: WorkflowEngine;

    beforeEach(async () => {
        vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.spyOn(console, 'warn').mockImplementation(() => {});
        store = new MemoryPostStore();
        bus = new EventBus();
        journal = new WorkflowJournal();
        engine = new WorkflowEngine({ store, bus, journal, now: () => fixedNow });
        await store.createDraft('p1', author.userId, 'first post');
    });

    it('submits a draft and publishes the event', async () => {
        const subscription = bus.subscribe('workflow');

        const result = await engine.submit('p1', author);

        expect(result.delivery).toBe('ok');
        expect(result.post.status).toBe(PostStatus.PENDING);
        expect(result.post.updatedAt).toBe('2024-03-01T12:00:00.000Z');
        expect(result.event).toMatchObject({
            kind: 'submitted',
            resubmission: false,
            postId: 'p1',
            actorId: 'author-1',
            sequenceNumber: 1,
            timestamp: '2024-03-01T12:00:00.000Z',
        });
        expect(result.event.eventId).toMatch(/^[0-9a-f-]{36}$/);

        const delivered = await subscription[Symbol.asyncIterator]().next();
        expect(delivered.value).toEqual(result.event);
        expect(journal.replay('p1')).toEqual([result.event]);
        expect(store.approvalEvents('p1')).toEqual([result.event]);
    });

    it('walks the full graph with increasing sequence numbers', async () => {
        await engine.submit('p1', author);
        const rejected = await engine.decide('p1', approver, PostStatus.REJECTED, '  needs sources  ');
        expect(rejected.event).toMatchObject({ kind: 'decided', decision: 'rejected', reason: 'needs sources', sequenceNumber: 2 });
        expect(rejected.post).toMatchObject({ rejectionReason: 'needs sources', reviewerId: 'approver-1' });

        const resubmitted = await engine.resubmit('p1', author);
        expect(resubmitted.event).toMatchObject({ kind: 'submitted', resubmission: true, sequenceNumber: 3 });
        expect(resubmitted.post).toMatchObject({ status: 'pending', rejectionReason: null, reviewerId: null });

        const approved = await engine.decide('p1', admin, PostStatus.APPROVED);
        expect(approved.event).toMatchObject({ kind: 'decided', decision: 'approved', sequenceNumber: 4 });
        expect(approved.event).not.toHaveProperty('reason');
        expect(approved.post.status).toBe(PostStatus.APPROVED);

        expect(journal.replay('p1').map(e => e.sequenceNumber)).toEqual([1, 2, 3, 4]);
    });

    it('rejects every illegal edge without side effects', async () => {
        await expect(engine.decide('p1', admin, PostStatus.APPROVED)).rejects.toBeInstanceOf(InvalidTransitionError);
        await expect(engine.resubmit('p1', author)).rejects.toBeInstanceOf(InvalidTransitionError);

        await engine.submit('p1', author);
        await expect(engine.submit('p1', author)).rejects.toBeInstanceOf(InvalidTransitionError);
        await expect(engine.resubmit('p1', author)).rejects.toBeInstanceOf(InvalidTransitionError);

        await engine.decide('p1', admin, PostStatus.APPROVED);
        await expect(engine.decide('p1', admin, PostStatus.REJECTED)).rejects.toBeInstanceOf(InvalidTransitionError);
        await expect(engine.resubmit('p1', author)).rejects.toBeInstanceOf(InvalidTransitionError);
        await expect(engine.submit('p1', author)).rejects.toBeInstanceOf(InvalidTransitionError);

        const post = await store.getPost('p1');
        expect(post?.revision).toBe(2);
        expect(store.approvalEvents('p1')).toHaveLength(2);
    });

    it('requires a reviewer role to decide', async () => {
        await engine.submit('p1', author);

        const caught = await engine.decide('p1', author, PostStatus.APPROVED).catch((error: unknown) => error);
        expect(caught).toBeInstanceOf(UnauthorizedError);
        expect((await store.getPost('p1'))?.status).toBe(PostStatus.PENDING);
    });

    it('only lets the author submit and resubmit', async () => {
        await expect(engine.submit('p1', stranger)).rejects.toBeInstanceOf(UnauthorizedError);
        await expect(engine.submit('p1', admin)).rejects.toBeInstanceOf(UnauthorizedError);

        await engine.submit('p1', author);
        await engine.decide('p1', admin, PostStatus.REJECTED);
        await expect(engine.resubmit('p1', stranger)).rejects.toBeInstanceOf(UnauthorizedError);
        expect((await store.getPost('p1'))?.status).toBe(PostStatus.REJECTED);
    });

    it('fails with NotFound for an unknown post', async () => {
        await expect(engine.submit('nope', author)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('rejects an oversized reason before touching the post', async () => {
        await engine.submit('p1', author);

        await expect(
            engine.decide('p1', admin, PostStatus.REJECTED, 'x'.repeat(MAX_REASON_LENGTH + 1))
        ).rejects.toBeInstanceOf(InvalidInputError);
        expect((await store.getPost('p1'))?.status).toBe(PostStatus.PENDING);
    });

    it('lets exactly one of two racing decisions win', async () => {
        await engine.submit('p1', author);

        const [first, second] = await Promise.allSettled([
            engine.decide('p1', admin, PostStatus.APPROVED),
            engine.decide('p1', approver, PostStatus.REJECTED, 'too late'),
        ]);

        expect(first.status).toBe('fulfilled');
        expect(second.status).toBe('rejected');
        if (second.status === 'rejected') {
            expect(second.reason).toBeInstanceOf(StaleStateError);
        }

        const decided = store.approvalEvents('p1').filter((e: WorkflowEvent) => e.kind === 'decided');
        expect(decided).toHaveLength(1);
        expect((await store.getPost('p1'))?.status).toBe(PostStatus.APPROVED);
    });

    it('refuses a decision read before the post was rejected and resubmitted', async () => {
        await engine.submit('p1', author);
        const earlier = await store.getPost('p1');

        await engine.decide('p1', approver, PostStatus.REJECTED, 'needs sources');
        await engine.resubmit('p1', author);
        vi.spyOn(store, 'getPost').mockResolvedValueOnce(earlier);

        await expect(engine.decide('p1', admin, PostStatus.APPROVED)).rejects.toBeInstanceOf(StaleStateError);
        expect(await store.getPost('p1')).toMatchObject({ status: PostStatus.PENDING, revision: 3 });
        const decided = store.approvalEvents('p1').filter((e: WorkflowEvent) => e.kind === 'decided');
        expect(decided).toHaveLength(1);
    });

    it('reports degraded delivery when the bus is closed but keeps the commit', async () => {
        bus.close();

        const result = await engine.submit('p1', author);

        expect(result.delivery).toBe('degraded');
        expect((await store.getPost('p1'))?.status).toBe(PostStatus.PENDING);
        expect(journal.replay('p1')).toHaveLength(1);
        expect(console.warn).toHaveBeenCalled();
    });

    it('reports degraded delivery when a subscriber is dropped', async () => {
        await store.createDraft('p2', author.userId, 'second post');
        const slow = bus.subscribe('workflow', { name: 'slow', capacity: 1 });

        const first = await engine.submit('p1', author);
        const second = await engine.submit('p2', author);

        expect(first.delivery).toBe('ok');
        expect(second.delivery).toBe('degraded');
        expect(slow.endReason).toBe('backpressure');
    });

    it('keeps the transition when the event log write fails', async () => {
        vi.spyOn(store, 'appendApprovalEvent').mockRejectedValue(new Error('disk full'));
        const subscription = bus.subscribe('workflow');

        const result = await engine.submit('p1', author);

        expect(result.delivery).toBe('degraded');
        expect(result.post.status).toBe(PostStatus.PENDING);
        expect(subscription.backlog).toBe(1);
    });

    it('publishes nothing when the commit itself fails', async () => {
        vi.spyOn(store, 'compareAndSetStatus').mockRejectedValue(new Error('connection reset'));
        const subscription = bus.subscribe('workflow');

        await expect(engine.submit('p1', author)).rejects.toThrow('connection reset');
        expect(subscription.backlog).toBe(0);
        expect(journal.replay('p1')).toEqual([]);
    });

    it('refuses new transitions after close and drains running ones', async () => {
        const running = engine.submit('p1', author);
        engine.close();

        await expect(engine.submit('p1', author)).rejects.toBeInstanceOf(ServiceUnavailableError);
        await engine.drain();

        expect(engine.inFlightCount).toBe(0);
        await expect(running).resolves.toMatchObject({ delivery: 'ok' });
        expect(engine.isClosed).toBe(true);
    });
});
