import { PostStatus, type CommentMessage, type WorkflowEvent } from '@blogflow/protocol';
import type { PostRecord, PostStore, PostVersion, TransitionChanges } from './types';

/**
 * In-process store used in development and tests
 */
export class MemoryPostStore implements PostStore {
    private readonly posts = new Map<string, PostRecord>();
    private readonly events = new Map<string, WorkflowEvent[]>();
    private readonly comments = new Map<string, CommentMessage[]>();

    async createDraft(id: string, authorId: string, content: string): Promise<PostRecord> {
        if (this.posts.has(id)) {
            throw new Error(`Post ${id} already exists`);
        }
        const now = new Date().toISOString();
        const post: PostRecord = {
            id,
            authorId,
            status: PostStatus.DRAFT,
            content,
            revision: 0,
            rejectionReason: null,
            reviewerId: null,
            createdAt: now,
            updatedAt: now,
        };
        this.posts.set(id, post);
        return { ...post };
    }

    async getPost(id: string): Promise<PostRecord | null> {
        const post = this.posts.get(id);
        return post ? { ...post } : null;
    }

    async compareAndSetStatus(
        id: string,
        expected: PostVersion,
        next: PostStatus,
        changes: TransitionChanges
    ): Promise<PostRecord | null> {
        const post = this.posts.get(id);
        if (!post || post.status !== expected.status || post.revision !== expected.revision) return null;

        const updated: PostRecord = {
            ...post,
            status: next,
            revision: post.revision + 1,
            reviewerId: changes.reviewerId !== undefined ? changes.reviewerId : post.reviewerId,
            rejectionReason: changes.rejectionReason !== undefined ? changes.rejectionReason : post.rejectionReason,
            updatedAt: changes.updatedAt,
        };
        this.posts.set(id, updated);
        return { ...updated };
    }

    async appendApprovalEvent(event: WorkflowEvent): Promise<void> {
        const log = this.events.get(event.postId) ?? [];
        log.push(event);
        this.events.set(event.postId, log);
    }

    async appendComment(message: CommentMessage): Promise<void> {
        const log = this.comments.get(message.roomId) ?? [];
        log.push(message);
        this.comments.set(message.roomId, log);
    }

    async listPending(): Promise<string[]> {
        return [...this.posts.values()]
            .filter(post => post.status === PostStatus.PENDING)
            .map(post => post.id);
    }

    /**
     * Events recorded for a post, oldest first
     */
    approvalEvents(postId: string): WorkflowEvent[] {
        return [...(this.events.get(postId) ?? [])];
    }

    storedComments(roomId: string): CommentMessage[] {
        return [...(this.comments.get(roomId) ?? [])];
    }
}
