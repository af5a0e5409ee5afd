import type { CommentMessage, PostStatus, WorkflowEvent } from '@blogflow/protocol';

/**
 * Post as held by the persistence collaborator.
 * `revision` counts accepted transitions and is bumped atomically with the status.
 */
export interface PostRecord {
    id: string;
    authorId: string;
    status: PostStatus;
    content: string;
    revision: number;
    rejectionReason: string | null;
    reviewerId: string | null;
    createdAt: string; // ISO timestamp
    updatedAt: string; // ISO timestamp
}

/**
 * The version of a post a transition was planned against
 */
export type PostVersion = Pick<PostRecord, 'status' | 'revision'>;

/**
 * Fields written together with a status change
 */
export interface TransitionChanges {
    reviewerId?: string | null;
    rejectionReason?: string | null;
    updatedAt: string;
}

/**
 * Narrow persistence interface the core calls; storage itself lives elsewhere
 */
export interface PostStore {
    createDraft(id: string, authorId: string, content: string): Promise<PostRecord>;
    getPost(id: string): Promise<PostRecord | null>;

    /**
     * Set `next` only if the stored status and revision still equal `expected`
     * @returns The updated record, or null when the post moved on
     */
    compareAndSetStatus(
        id: string,
        expected: PostVersion,
        next: PostStatus,
        changes: TransitionChanges
    ): Promise<PostRecord | null>;

    appendApprovalEvent(event: WorkflowEvent): Promise<void>;
    appendComment(message: CommentMessage): Promise<void>;
    listPending(): Promise<string[]>;
}
