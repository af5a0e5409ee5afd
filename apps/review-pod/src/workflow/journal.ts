import { LRUCache } from 'lru-cache';
import type { WorkflowEvent } from '@blogflow/protocol';

export interface JournalOptions {
    depth?: number; // events kept per post
    maxPosts?: number;
}

/**
 * Bounded per-post record of produced workflow events, replayed on demand.
 * Posts nobody touches for a while fall out least-recently-used first.
 */
export class WorkflowJournal {
    private readonly depth: number;
    private readonly posts: LRUCache<string, WorkflowEvent[]>;

    constructor(options: JournalOptions = {}) {
        this.depth = options.depth ?? 100;
        this.posts = new LRUCache<string, WorkflowEvent[]>({
            max: options.maxPosts ?? 10_000,
        });
    }

    record(event: WorkflowEvent): void {
        const events = this.posts.get(event.postId) ?? [];
        events.push(event);
        if (events.length > this.depth) {
            events.splice(0, events.length - this.depth);
        }
        this.posts.set(event.postId, events);
    }

    /**
     * Events for a post with a sequence number above `after`, oldest first
     */
    replay(postId: string, after = 0): WorkflowEvent[] {
        const events = this.posts.get(postId) ?? [];
        return events.filter(event => event.sequenceNumber > after);
    }

    /**
     * Highest sequence number recorded for a post, 0 if none
     */
    latest(postId: string): number {
        const events = this.posts.peek(postId);
        return events && events.length > 0 ? events[events.length - 1].sequenceNumber : 0;
    }

    get trackedPosts(): number {
        return this.posts.size;
    }
}
