/**
 * Lifecycle status of a submitted post
 */
export enum PostStatus {
    DRAFT = 'draft',
    PENDING = 'pending',
    APPROVED = 'approved',
    REJECTED = 'rejected',
}

export type Decision = PostStatus.APPROVED | PostStatus.REJECTED;

/**
 * Fields shared by every workflow event
 */
interface WorkflowEventBase {
    eventId: string; // uuid v4
    postId: string;
    actorId: string;
    sequenceNumber: number; // post-scoped, equals the post revision after the transition
    timestamp: string; // ISO timestamp
}

/**
 * Produced when a post enters the pending queue
 */
export interface SubmittedEvent extends WorkflowEventBase {
    kind: 'submitted';
    resubmission: boolean;
}

/**
 * Produced when a reviewer approves or rejects a pending post
 */
export interface ApprovalEvent extends WorkflowEventBase {
    kind: 'decided';
    decision: Decision;
    reason?: string;
}

export type WorkflowEvent = SubmittedEvent | ApprovalEvent;
