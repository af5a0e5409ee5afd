import { Router } from 'express';
import { NotFoundError } from '@blogflow/protocol';
import { authorize } from '@blogflow/auth';
import type { CommentRoomRegistry } from '../comments/registry';
import type { NotificationHub } from '../notifications/hub';
import { asyncHandler, requireIdentity } from './errors';

export function adminRouter(hub: NotificationHub, rooms: CommentRoomRegistry): Router {
    const router = Router();

    router.use((req, _res, next) => {
        try {
            authorize(requireIdentity(req).role, 'admin.operate');
            next();
        } catch (error) {
            next(error);
        }
    });

    router.get('/connections', (_req, res) => {
        res.json({
            notifications: hub.listConnections(),
            comments: rooms.listConnections(),
            rooms: rooms.roomCount,
        });
    });

    router.delete('/connections/:connectionId', asyncHandler(async (req, res) => {
        const { connectionId } = req.params;
        const closed = hub.evict(connectionId, 'admin') || rooms.evict(connectionId, 'admin');
        if (!closed) {
            throw new NotFoundError(`No live connection ${connectionId}`);
        }
        res.status(204).end();
    }));

    return router;
}
