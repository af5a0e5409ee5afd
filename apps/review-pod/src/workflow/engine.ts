import pLimit, { type LimitFunction } from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import {
    DeliveryDegradedError,
    InvalidInputError,
    InvalidTransitionError,
    NotFoundError,
    PostStatus,
    ServiceUnavailableError,
    StaleStateError,
    UnauthorizedError,
    isAppError,
    type Action,
    type Decision,
    type Identity,
    type WorkflowEvent,
} from '@blogflow/protocol';
import { authorize } from '@blogflow/auth';
import type { EventBus } from '../bus/event-bus';
import type { PostRecord, PostStore, TransitionChanges } from '../store';
import { trackDegraded, trackTransition } from '../metrics';
import type { WorkflowJournal } from './journal';

export const MAX_REASON_LENGTH = 500;

export type TransitionAction = 'submit' | 'decide' | 'resubmit';

export type Delivery = 'ok' | 'degraded';

export interface TransitionResult {
    event: WorkflowEvent;
    post: PostRecord;
    delivery: Delivery;
}

export interface WorkflowEngineDeps {
    store: PostStore;
    bus: EventBus;
    journal: WorkflowJournal;
    now?: () => Date;
}

type EventFields = Pick<WorkflowEvent, 'eventId' | 'postId' | 'actorId' | 'sequenceNumber' | 'timestamp'>;

interface TransitionPlan {
    next: PostStatus;
    ownerOnly: boolean;
    changes: (now: string) => TransitionChanges;
    build: (fields: EventFields) => WorkflowEvent;
}

const actionPermissions: Record<TransitionAction, Action> = {
    submit: 'post.submit',
    decide: 'post.decide',
    resubmit: 'post.resubmit',
};

// Allowed status edges; approved is terminal
const edges: Record<PostStatus, readonly PostStatus[]> = {
    [PostStatus.DRAFT]: [PostStatus.PENDING],
    [PostStatus.PENDING]: [PostStatus.APPROVED, PostStatus.REJECTED],
    [PostStatus.APPROVED]: [],
    [PostStatus.REJECTED]: [PostStatus.PENDING],
};

// Which source status each action starts from
const sources: Record<TransitionAction, PostStatus> = {
    submit: PostStatus.DRAFT,
    decide: PostStatus.PENDING,
    resubmit: PostStatus.REJECTED,
};

export function canTransition(from: PostStatus, to: PostStatus): boolean {
    return edges[from].includes(to);
}

/**
 * Trim a reviewer reason; blank becomes undefined
 * @throws InvalidInputError when longer than MAX_REASON_LENGTH
 */
export function normalizeReason(reason: string | undefined): string | undefined {
    const trimmed = reason?.trim();
    if (!trimmed) return undefined;
    if (trimmed.length > MAX_REASON_LENGTH) {
        throw new InvalidInputError(`Reason must be at most ${MAX_REASON_LENGTH} characters`, {
            length: trimmed.length,
        });
    }
    return trimmed;
}

/**
 * Owns every post status change. Each attempt reads the post fresh, validates the edge,
 * commits through the store's compare-and-set and only then records and publishes the
 * event. Transitions on one post run one at a time so events leave in sequence order.
 */
export class WorkflowEngine {
    private readonly store: PostStore;
    private readonly bus: EventBus;
    private readonly journal: WorkflowJournal;
    private readonly now: () => Date;

    private readonly locks = new Map<string, { limit: LimitFunction; waiting: number }>();
    private readonly inFlight = new Set<Promise<TransitionResult>>();
    private closed = false;

    constructor(deps: WorkflowEngineDeps) {
        this.store = deps.store;
        this.bus = deps.bus;
        this.journal = deps.journal;
        this.now = deps.now ?? (() => new Date());
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get inFlightCount(): number {
        return this.inFlight.size;
    }

    /**
     * Move a draft into the pending queue
     */
    submit(postId: string, actor: Identity): Promise<TransitionResult> {
        return this.transition('submit', postId, actor, () => ({
            next: PostStatus.PENDING,
            ownerOnly: true,
            changes: now => ({ updatedAt: now }),
            build: fields => ({ ...fields, kind: 'submitted', resubmission: false }),
        }));
    }

    /**
     * Approve or reject a pending post
     */
    decide(postId: string, actor: Identity, decision: Decision, reason?: string): Promise<TransitionResult> {
        return this.transition('decide', postId, actor, () => {
            const note = normalizeReason(reason);
            return {
                next: decision,
                ownerOnly: false,
                changes: now => ({
                    updatedAt: now,
                    reviewerId: actor.userId,
                    rejectionReason: decision === PostStatus.REJECTED ? note ?? null : null,
                }),
                build: fields => ({ ...fields, kind: 'decided', decision, ...(note ? { reason: note } : {}) }),
            };
        });
    }

    /**
     * Send a rejected post back to the pending queue
     */
    resubmit(postId: string, actor: Identity): Promise<TransitionResult> {
        return this.transition('resubmit', postId, actor, () => ({
            next: PostStatus.PENDING,
            ownerOnly: true,
            changes: now => ({ updatedAt: now, reviewerId: null, rejectionReason: null }),
            build: fields => ({ ...fields, kind: 'submitted', resubmission: true }),
        }));
    }

    /**
     * Refuse new transitions; running ones continue
     */
    close(): void {
        this.closed = true;
    }

    /**
     * Resolve once every in-flight transition has settled
     */
    async drain(): Promise<void> {
        while (this.inFlight.size > 0) {
            await Promise.allSettled([...this.inFlight]);
        }
    }

    private async transition(
        action: TransitionAction,
        postId: string,
        actor: Identity,
        planFor: () => TransitionPlan
    ): Promise<TransitionResult> {
        if (this.closed) {
            throw new ServiceUnavailableError('Workflow engine is shutting down');
        }

        const started = Date.now();
        const attempt = this.attempt(action, postId, actor, planFor);
        this.inFlight.add(attempt);
        try {
            const result = await attempt;
            trackTransition(action, result.delivery === 'ok' ? 'committed' : 'degraded', Date.now() - started);
            return result;
        } catch (error) {
            trackTransition(action, isAppError(error) ? error.code.toLowerCase() : 'error');
            throw error;
        } finally {
            this.inFlight.delete(attempt);
        }
    }

    private async attempt(
        action: TransitionAction,
        postId: string,
        actor: Identity,
        planFor: () => TransitionPlan
    ): Promise<TransitionResult> {
        authorize(actor.role, actionPermissions[action]);
        const plan = planFor();

        const current = await this.store.getPost(postId);
        if (!current) {
            throw new NotFoundError(`Post ${postId} not found`, { postId });
        }
        if (plan.ownerOnly && current.authorId !== actor.userId) {
            throw new UnauthorizedError(`Only the author may ${action} post ${postId}`, {
                postId,
                action,
            });
        }

        const expected = sources[action];
        if (current.status !== expected || !canTransition(expected, plan.next)) {
            throw new InvalidTransitionError(
                `Cannot ${action} post ${postId} from status ${current.status}`,
                { postId, from: current.status, to: plan.next }
            );
        }

        return this.serialized(postId, () => this.commit(action, current, actor, plan));
    }

    private async commit(
        action: TransitionAction,
        current: PostRecord,
        actor: Identity,
        plan: TransitionPlan
    ): Promise<TransitionResult> {
        const timestamp = this.now().toISOString();
        const updated = await this.store.compareAndSetStatus(
            current.id,
            { status: current.status, revision: current.revision },
            plan.next,
            plan.changes(timestamp)
        );
        if (!updated) {
            throw new StaleStateError(`Post ${current.id} changed while the ${action} was in progress`, {
                postId: current.id,
                expected: current.status,
                revision: current.revision,
            });
        }

        const event = plan.build({
            eventId: uuidv4(),
            postId: current.id,
            actorId: actor.userId,
            sequenceNumber: updated.revision,
            timestamp,
        });
        console.log(`Post ${current.id} moved ${current.status} -> ${updated.status} by ${actor.userId} (seq ${event.sequenceNumber})`);

        let delivery: Delivery = 'ok';

        try {
            await this.store.appendApprovalEvent(event);
        } catch (error) {
            delivery = this.degrade('persistence', event, error);
        }

        this.journal.record(event);

        try {
            const receipt = this.bus.publish('workflow', event);
            if (receipt.dropped.length > 0) {
                delivery = this.degrade('backpressure', event, `dropped ${receipt.dropped.join(', ')}`);
            }
        } catch (error) {
            delivery = this.degrade('bus', event, error);
        }

        return { event, post: updated, delivery };
    }

    private degrade(reason: string, event: WorkflowEvent, cause: unknown): Delivery {
        const warning = new DeliveryDegradedError(`Event ${event.eventId} for post ${event.postId} was not fully delivered`, {
            reason,
            cause: cause instanceof Error ? cause.message : String(cause),
        });
        console.warn(warning.message, warning.details);
        trackDegraded('workflow', reason);
        return 'degraded';
    }

    // One limiter per post, dropped once nobody waits on it
    private async serialized<T>(postId: string, task: () => Promise<T>): Promise<T> {
        let entry = this.locks.get(postId);
        if (!entry) {
            entry = { limit: pLimit(1), waiting: 0 };
            this.locks.set(postId, entry);
        }
        const lock = entry;
        lock.waiting++;
        try {
            return await lock.limit(task);
        } finally {
            lock.waiting--;
            if (lock.waiting === 0 && this.locks.get(postId) === lock) {
                this.locks.delete(postId);
            }
        }
    }
}
