import { describe, it, expect } from 'vitest';
import { PostStatus } from '@blogflow/protocol';
import { MemoryPostStore } from './memory';

describe('MemoryPostStore', () => {
    it('creates drafts at revision 0', async () => {
        const store = new MemoryPostStore();
        const post = await store.createDraft('p1', 'author-1', 'Hello world');
        expect(post).toMatchObject({ id: 'p1', authorId: 'author-1', status: 'draft', revision: 0 });
        await expect(store.createDraft('p1', 'author-1', 'again')).rejects.toThrow('Post p1 already exists');
    });

    it('sets the status only when the expected status matches', async () => {
        const store = new MemoryPostStore();
        await store.createDraft('p1', 'author-1', 'Hello world');

        const stale = await store.compareAndSetStatus('p1', { status: PostStatus.PENDING, revision: 0 }, PostStatus.APPROVED, {
            updatedAt: '2026-01-01T00:00:00.000Z',
        });
        expect(stale).toBeNull();

        const updated = await store.compareAndSetStatus('p1', { status: PostStatus.DRAFT, revision: 0 }, PostStatus.PENDING, {
            updatedAt: '2026-01-01T00:00:00.000Z',
        });
        expect(updated).toMatchObject({ status: 'pending', revision: 1, updatedAt: '2026-01-01T00:00:00.000Z' });
        expect(await store.listPending()).toEqual(['p1']);
    });

    it('refuses a matching status at an older revision', async () => {
        const store = new MemoryPostStore();
        await store.createDraft('p1', 'author-1', 'Hello world');
        await store.compareAndSetStatus('p1', { status: PostStatus.DRAFT, revision: 0 }, PostStatus.PENDING, { updatedAt: 't1' });
        await store.compareAndSetStatus('p1', { status: PostStatus.PENDING, revision: 1 }, PostStatus.REJECTED, { updatedAt: 't2' });
        await store.compareAndSetStatus('p1', { status: PostStatus.REJECTED, revision: 2 }, PostStatus.PENDING, { updatedAt: 't3' });

        const late = await store.compareAndSetStatus('p1', { status: PostStatus.PENDING, revision: 1 }, PostStatus.APPROVED, {
            updatedAt: 't4',
        });
        expect(late).toBeNull();
        expect(await store.getPost('p1')).toMatchObject({ status: 'pending', revision: 3 });
    });

    it('keeps reviewer and reason unless the change names them', async () => {
        const store = new MemoryPostStore();
        await store.createDraft('p1', 'author-1', 'Hello world');
        await store.compareAndSetStatus('p1', { status: PostStatus.DRAFT, revision: 0 }, PostStatus.PENDING, { updatedAt: 't1' });
        await store.compareAndSetStatus('p1', { status: PostStatus.PENDING, revision: 1 }, PostStatus.REJECTED, {
            updatedAt: 't2',
            reviewerId: 'rev-1',
            rejectionReason: 'needs sources',
        });
        const resubmitted = await store.compareAndSetStatus('p1', { status: PostStatus.REJECTED, revision: 2 }, PostStatus.PENDING, {
            updatedAt: 't3',
        });
        expect(resubmitted).toMatchObject({ reviewerId: 'rev-1', rejectionReason: 'needs sources', revision: 3 });
    });

    it('returns copies so callers cannot mutate stored posts', async () => {
        const store = new MemoryPostStore();
        const post = await store.createDraft('p1', 'author-1', 'Hello world');
        post.status = PostStatus.APPROVED;
        expect((await store.getPost('p1'))?.status).toBe('draft');
        expect(await store.getPost('missing')).toBeNull();
    });
});
