import express, { type Express, type Request, type Response } from 'express';
import http from 'http';
import type { WebSocketServer } from 'ws';
import { authMiddleware, type AuthConfig } from '@blogflow/auth';
import type { PodConfig } from './config';
import { httpMetricsMiddleware, register } from './metrics';
import { adminRouter } from './routes/admin';
import { errorHandler, notFoundHandler } from './routes/errors';
import { notificationsRouter } from './routes/notifications';
import { postsRouter } from './routes/posts';
import { roomsRouter } from './routes/rooms';
import { attachCommentSockets } from './sockets/comments';
import { RedisPostStore, createStore, type PostStore } from './store';
import { buildCore, type ReviewCore } from './supervisor';

export interface ReviewPodOptions {
    store?: PostStore;
    auth?: Partial<AuthConfig>;
    now?: () => number;
}

export interface ReviewPod {
    app: Express;
    server: http.Server;
    wss: WebSocketServer;
    core: ReviewCore;
    /** Start the core and listen; resolves with the bound port */
    start(port?: number): Promise<number>;
    stop(): Promise<void>;
}

/**
 * Assemble the review pod: HTTP routes, SSE notifications and comment sockets over one server
 */
export function createReviewPod(config: PodConfig, options: ReviewPodOptions = {}): ReviewPod {
    const store = options.store ?? createStore(config.store.driver, config.store.redisUrl);
    const core = buildCore(config, store, options.now);

    const app: Express = express();
    app.disable('x-powered-by');
    app.use(httpMetricsMiddleware);
    app.use(express.json({ limit: '256kb' }));

    app.get('/health', (_req: Request, res: Response) => {
        res.status(core.supervisor.isRunning ? 200 : 503).send(core.supervisor.isRunning ? 'OK' : 'STOPPED');
    });

    app.get('/metrics', (_req: Request, res: Response) => {
        res.set('Content-Type', register.contentType);
        register.metrics().then((metrics: string) => res.end(metrics)).catch((error: Error) => {
            console.error('Error generating metrics:', error);
            res.status(500).end('Error generating metrics');
        });
    });

    const authenticate = authMiddleware(options.auth);
    app.use('/posts', authenticate, postsRouter(store, core.engine));
    app.use('/notifications', authenticate, notificationsRouter(core.notifications));
    app.use('/rooms', authenticate, roomsRouter(store, core.rooms));
    app.use('/admin', authenticate, adminRouter(core.notifications, core.rooms));

    app.use(notFoundHandler);
    app.use(errorHandler);

    const server = http.createServer(app);
    const wss = attachCommentSockets(server, {
        rooms: core.rooms,
        store,
        pingIntervalMs: Math.max(1000, Math.floor(config.rooms.idleTimeoutMs / 3)),
        auth: options.auth,
    });

    let stopping: Promise<void> | null = null;

    return {
        app,
        server,
        wss,
        core,

        async start(port = config.port): Promise<number> {
            await core.supervisor.start();
            await new Promise<void>((resolve, reject) => {
                server.once('error', reject);
                server.listen(port, () => {
                    server.off('error', reject);
                    resolve();
                });
            });
            const address = server.address();
            const bound = typeof address === 'object' && address ? address.port : port;
            console.log(`Review pod listening on port ${bound}`);
            return bound;
        },

        stop(): Promise<void> {
            if (!stopping) {
                stopping = (async () => {
                    await core.supervisor.shutdown();
                    for (const client of wss.clients) client.terminate();
                    await new Promise<void>(resolve => wss.close(() => resolve()));
                    if (server.listening) {
                        server.closeAllConnections();
                        await new Promise<void>((resolve, reject) => {
                            server.close(error => (error ? reject(error) : resolve()));
                        });
                    }
                    if (store instanceof RedisPostStore) {
                        await store.quit();
                    }
                    console.log('Review pod stopped');
                })();
            }
            return stopping;
        },
    };
}
