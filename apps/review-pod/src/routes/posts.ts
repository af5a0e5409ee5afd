import { Router } from 'express';
import { ulid } from 'ulid';
import { z } from 'zod';
import {
    DecisionBodySchema,
    InvalidInputError,
    NotFoundError,
    PostStatus,
    isReviewer,
    type Identity,
} from '@blogflow/protocol';
import { authorize } from '@blogflow/auth';
import type { PostRecord, PostStore } from '../store';
import type { TransitionResult, WorkflowEngine } from '../workflow/engine';
import { asyncHandler, parseInput, requireIdentity } from './errors';

const CreatePostBodySchema = z.object({
    id: z.string().trim().min(1).max(128).refine(id => id !== 'pending', 'Post id is reserved').optional(),
    content: z.string().max(100_000),
});

export interface PostView {
    id: string;
    authorId: string;
    status: PostStatus;
    content: string;
    revision: number;
    createdAt: string;
    updatedAt: string;
    reviewerId?: string | null;
    rejectionReason?: string | null;
}

/**
 * Shape a post for a reader. Reviewer identity and the rejection reason are shown only
 * to the author and to reviewer roles.
 */
export function toPostView(post: PostRecord, reader: Identity): PostView {
    const view: PostView = {
        id: post.id,
        authorId: post.authorId,
        status: post.status,
        content: post.content,
        revision: post.revision,
        createdAt: post.createdAt,
        updatedAt: post.updatedAt,
    };
    if (reader.userId === post.authorId || isReviewer(reader.role)) {
        view.reviewerId = post.reviewerId;
        view.rejectionReason = post.rejectionReason;
    }
    return view;
}

/**
 * Approved posts are public; anything else only exists for its author and reviewers
 */
export function canView(post: PostRecord, reader: Identity): boolean {
    return post.status === PostStatus.APPROVED || reader.userId === post.authorId || isReviewer(reader.role);
}

function transitionBody(result: TransitionResult, reader: Identity) {
    return {
        post: toPostView(result.post, reader),
        event: result.event,
        delivery: result.delivery,
    };
}

export function postsRouter(store: PostStore, engine: WorkflowEngine): Router {
    const router = Router();

    // Draft shell; content editing lives outside this service
    router.post('/', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        authorize(identity.role, 'post.create');
        const body = parseInput(CreatePostBodySchema, req.body);

        const id = body.id ?? ulid();
        if (await store.getPost(id)) {
            throw new InvalidInputError(`Post ${id} already exists`);
        }
        const post = await store.createDraft(id, identity.userId, body.content);
        res.status(201).json(toPostView(post, identity));
    }));

    // Review queue, oldest first in store order
    router.get('/pending', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        authorize(identity.role, 'post.decide');
        const posts: PostView[] = [];
        for (const id of await store.listPending()) {
            const post = await store.getPost(id);
            if (post?.status === PostStatus.PENDING) posts.push(toPostView(post, identity));
        }
        res.json({ posts, count: posts.length });
    }));

    router.get('/:id', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        authorize(identity.role, 'post.read');
        const post = await store.getPost(req.params.id);
        if (!post || !canView(post, identity)) {
            throw new NotFoundError(`Post ${req.params.id} not found`);
        }
        res.json(toPostView(post, identity));
    }));

    router.post('/:id/submit', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        const result = await engine.submit(req.params.id, identity);
        res.json(transitionBody(result, identity));
    }));

    router.post('/:id/decision', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        const body = parseInput(DecisionBodySchema, req.body);
        const decision = body.decision === 'approved' ? PostStatus.APPROVED : PostStatus.REJECTED;
        const result = await engine.decide(req.params.id, identity, decision, body.reason);
        res.json(transitionBody(result, identity));
    }));

    router.post('/:id/resubmit', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        const result = await engine.resubmit(req.params.id, identity);
        res.json(transitionBody(result, identity));
    }));

    return router;
}
