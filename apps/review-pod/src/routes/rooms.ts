import { Router } from 'express';
import { ClientCommentFrameSchema, NotFoundError } from '@blogflow/protocol';
import { authorize } from '@blogflow/auth';
import type { CommentRoomRegistry } from '../comments/registry';
import type { PostStore } from '../store';
import { asyncHandler, parseInput, requireIdentity } from './errors';

export function roomsRouter(store: PostStore, rooms: CommentRoomRegistry): Router {
    const router = Router();

    router.post('/:postId/comments', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        authorize(identity.role, 'comments.post');
        const { text } = parseInput(ClientCommentFrameSchema, req.body);

        const { postId } = req.params;
        if (!(await store.getPost(postId))) {
            throw new NotFoundError(`Post ${postId} not found`);
        }
        const sequenceNumber = rooms.post(postId, identity.userId, text);
        res.status(201).json({ postId, sequenceNumber });
    }));

    return router;
}
