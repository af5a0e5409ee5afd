import Redis from 'ioredis';
import { PostStatus, type CommentMessage, type WorkflowEvent } from '@blogflow/protocol';
import type { PostRecord, PostStore, PostVersion, TransitionChanges } from './types';

const STREAM_MAXLEN = 1000;
const PENDING_SET = 'posts:pending';

// Status and revision compare-and-set with revision bump and pending-set upkeep in one round trip
const CAS_SCRIPT = `
local current = redis.call('HMGET', KEYS[1], 'status', 'revision')
if current[1] ~= ARGV[1] or current[2] ~= ARGV[9] then
    return nil
end
redis.call('HSET', KEYS[1], 'status', ARGV[2], 'updatedAt', ARGV[3])
redis.call('HINCRBY', KEYS[1], 'revision', 1)
if ARGV[5] == '1' then
    redis.call('HSET', KEYS[1], 'reviewerId', ARGV[4])
end
if ARGV[7] == '1' then
    redis.call('HSET', KEYS[1], 'rejectionReason', ARGV[6])
end
if ARGV[2] == 'pending' then
    redis.call('SADD', KEYS[2], ARGV[8])
else
    redis.call('SREM', KEYS[2], ARGV[8])
end
return redis.call('HGETALL', KEYS[1])
`;

// Whole-hash insert that fails if the post already exists
const CREATE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 1 then
    return 0
end
redis.call('HSET', KEYS[1], unpack(ARGV))
return 1
`;

const postKey = (id: string) => `post:${id}`;
const eventStreamKey = (postId: string) => `post-events-${postId}`;
const commentStreamKey = (roomId: string) => `comments-${roomId}`;

function isPostStatus(value: string | undefined): value is PostStatus {
    return Object.values(PostStatus).some(status => status === value);
}

/**
 * Parse a post hash; empty strings stand for null
 */
export function toPostRecord(fields: Record<string, string>): PostRecord | null {
    if (!fields.id) return null;
    if (!isPostStatus(fields.status)) {
        throw new Error(`Post ${fields.id} has unknown status ${fields.status}`);
    }
    return {
        id: fields.id,
        authorId: fields.authorId ?? '',
        status: fields.status,
        content: fields.content ?? '',
        revision: Number.parseInt(fields.revision ?? '0', 10),
        rejectionReason: fields.rejectionReason || null,
        reviewerId: fields.reviewerId || null,
        createdAt: fields.createdAt ?? '',
        updatedAt: fields.updatedAt ?? '',
    };
}

/**
 * HGETALL reply as returned by EVAL: a flat [field, value, ...] list
 */
export function pairsToFields(reply: unknown): Record<string, string> | null {
    if (!Array.isArray(reply)) return null;
    const fields: Record<string, string> = {};
    for (let i = 0; i + 1 < reply.length; i += 2) {
        const field: unknown = reply[i];
        const value: unknown = reply[i + 1];
        if (typeof field === 'string' && typeof value === 'string') {
            fields[field] = value;
        }
    }
    return fields;
}

/**
 * Field/value pairs of a new draft's hash
 */
export function draftFields(id: string, authorId: string, content: string, now: string): string[] {
    return [
        'id', id,
        'authorId', authorId,
        'status', PostStatus.DRAFT,
        'content', content,
        'revision', '0',
        'rejectionReason', '',
        'reviewerId', '',
        'createdAt', now,
        'updatedAt', now,
    ];
}

/**
 * ARGV for the CAS script, in script order
 */
export function casArguments(
    id: string,
    expected: PostVersion,
    next: PostStatus,
    changes: TransitionChanges
): string[] {
    return [
        expected.status,
        next,
        changes.updatedAt,
        changes.reviewerId ?? '',
        changes.reviewerId !== undefined ? '1' : '0',
        changes.rejectionReason ?? '',
        changes.rejectionReason !== undefined ? '1' : '0',
        id,
        String(expected.revision),
    ];
}

/**
 * Post store backed by Redis: one hash per post, a set of pending ids, and capped
 * streams for workflow events and comments
 */
export class RedisPostStore implements PostStore {
    constructor(private readonly redis: Redis) {}

    static fromUrl(url: string): RedisPostStore {
        return new RedisPostStore(new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 3 }));
    }

    async createDraft(id: string, authorId: string, content: string): Promise<PostRecord> {
        const now = new Date().toISOString();
        const created = await this.redis.eval(CREATE_SCRIPT, 1, postKey(id), ...draftFields(id, authorId, content, now));
        if (created !== 1) {
            throw new Error(`Post ${id} already exists`);
        }
        const post = await this.getPost(id);
        if (!post) {
            throw new Error(`Post ${id} vanished after creation`);
        }
        return post;
    }

    async getPost(id: string): Promise<PostRecord | null> {
        return toPostRecord(await this.redis.hgetall(postKey(id)));
    }

    async compareAndSetStatus(
        id: string,
        expected: PostVersion,
        next: PostStatus,
        changes: TransitionChanges
    ): Promise<PostRecord | null> {
        const reply = await this.redis.eval(
            CAS_SCRIPT,
            2,
            postKey(id),
            PENDING_SET,
            ...casArguments(id, expected, next, changes)
        );
        const fields = pairsToFields(reply);
        return fields ? toPostRecord(fields) : null;
    }

    async appendApprovalEvent(event: WorkflowEvent): Promise<void> {
        await this.redis.xadd(
            eventStreamKey(event.postId),
            'MAXLEN',
            '~',
            String(STREAM_MAXLEN),
            '*',
            'event',
            JSON.stringify(event)
        );
    }

    async appendComment(message: CommentMessage): Promise<void> {
        await this.redis.xadd(
            commentStreamKey(message.roomId),
            'MAXLEN',
            '~',
            String(STREAM_MAXLEN),
            '*',
            'comment',
            JSON.stringify(message)
        );
    }

    async listPending(): Promise<string[]> {
        return this.redis.smembers(PENDING_SET);
    }

    async quit(): Promise<void> {
        await this.redis.quit();
    }
}
