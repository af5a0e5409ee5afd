import { Router, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ForbiddenError, type NotificationFrame } from '@blogflow/protocol';
import { can } from '@blogflow/auth';
import type { NotificationHub, NotificationStream } from '../notifications/hub';
import { asyncHandler, parseInput, requireIdentity } from './errors';

const HistoryQuerySchema = z.object({
    after: z.coerce.number().int().min(0).default(0),
});

/**
 * Server-sent event encoding: `event: <type>\ndata: <json>\n\n`
 */
export function encodeEvent(frame: NotificationFrame): string {
    return `event: ${frame.type}\ndata: ${JSON.stringify(frame)}\n\n`;
}

function waitForDrain(res: Response): Promise<void> {
    return new Promise(resolve => {
        const done = () => {
            res.off('drain', done);
            res.off('close', done);
            resolve();
        };
        res.on('drain', done);
        res.on('close', done);
    });
}

/**
 * Copy frames to the response until the stream ends or the client goes away
 */
async function pipeFrames(stream: NotificationStream, res: Response): Promise<void> {
    for (;;) {
        const result = await stream.next();
        if (result.done || res.destroyed) break;
        if (!res.write(encodeEvent(result.value))) {
            await waitForDrain(res);
        }
    }
    if (!res.writableEnded) res.end();
}

export function notificationsRouter(hub: NotificationHub): Router {
    const router = Router();

    router.get('/stream', (req, res, next) => {
        try {
            const identity = requireIdentity(req);
            const stream = hub.connect(uuidv4(), identity.role);

            res.writeHead(200, {
                'Content-Type': 'text/event-stream',
                'Cache-Control': 'no-cache',
                Connection: 'keep-alive',
                'X-Accel-Buffering': 'no',
            });
            res.flushHeaders();

            res.on('close', () => stream.close());
            pipeFrames(stream, res).catch(error => {
                console.error(`Notification stream ${stream.connectionId} failed:`, error);
                stream.close();
                res.destroy();
            });
        } catch (error) {
            next(error);
        }
    });

    router.get('/history/:postId', asyncHandler(async (req, res) => {
        const identity = requireIdentity(req);
        if (!can(identity.role, 'notifications.subscribe')) {
            throw new ForbiddenError(`Role ${identity.role} may not read notification history`);
        }
        const { after } = parseInput(HistoryQuerySchema, req.query);
        res.json({ postId: req.params.postId, frames: hub.history(req.params.postId, after) });
    }));

    return router;
}
