import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

const intFrom = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    STORE_DRIVER: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),

    NOTIFY_QUEUE_DEPTH: intFrom(64),
    NOTIFY_HEARTBEAT_MS: intFrom(15_000),
    NOTIFY_IDLE_TIMEOUT_MS: intFrom(45_000),
    NOTIFY_MAX_CONNECTIONS: intFrom(1000),

    ROOM_QUEUE_DEPTH: intFrom(64),
    ROOM_REPLAY_WINDOW: intFrom(50),
    ROOM_EMPTY_GRACE_MS: intFrom(30_000),
    ROOM_IDLE_TIMEOUT_MS: intFrom(90_000),
    ROOM_MAX_VIEWERS: intFrom(5000),
    COMMENT_MAX_LENGTH: intFrom(1000),

    BUS_CAPACITY: intFrom(10_000),
    JOURNAL_DEPTH: intFrom(100),
    JOURNAL_MAX_POSTS: intFrom(10_000),
    SWEEP_INTERVAL_MS: intFrom(5000),
    SHUTDOWN_DEADLINE_MS: intFrom(2000),
});

export interface PodConfig {
    nodeEnv: 'development' | 'test' | 'production';
    port: number;
    store: { driver: 'memory' | 'redis'; redisUrl: string };
    notifications: {
        queueDepth: number;
        heartbeatIntervalMs: number;
        idleTimeoutMs: number;
        maxConnections: number;
    };
    rooms: {
        queueDepth: number;
        replayWindow: number;
        emptyRoomGraceMs: number;
        idleTimeoutMs: number;
        maxViewers: number;
        maxTextLength: number;
    };
    bus: { capacity: number };
    journal: { depth: number; maxPosts: number };
    supervisor: { sweepIntervalMs: number; shutdownDeadlineMs: number };
}

/**
 * Build the pod configuration from environment variables
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PodConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${problems.join('; ')}`);
    }
    const e = parsed.data;

    return Object.freeze({
        nodeEnv: e.NODE_ENV,
        port: e.PORT,
        store: { driver: e.STORE_DRIVER, redisUrl: e.REDIS_URL },
        notifications: {
            queueDepth: e.NOTIFY_QUEUE_DEPTH,
            heartbeatIntervalMs: e.NOTIFY_HEARTBEAT_MS,
            idleTimeoutMs: e.NOTIFY_IDLE_TIMEOUT_MS,
            maxConnections: e.NOTIFY_MAX_CONNECTIONS,
        },
        rooms: {
            queueDepth: e.ROOM_QUEUE_DEPTH,
            replayWindow: e.ROOM_REPLAY_WINDOW,
            emptyRoomGraceMs: e.ROOM_EMPTY_GRACE_MS,
            idleTimeoutMs: e.ROOM_IDLE_TIMEOUT_MS,
            maxViewers: e.ROOM_MAX_VIEWERS,
            maxTextLength: e.COMMENT_MAX_LENGTH,
        },
        bus: { capacity: e.BUS_CAPACITY },
        journal: { depth: e.JOURNAL_DEPTH, maxPosts: e.JOURNAL_MAX_POSTS },
        supervisor: { sweepIntervalMs: e.SWEEP_INTERVAL_MS, shutdownDeadlineMs: e.SHUTDOWN_DEADLINE_MS },
    });
}

/**
 * Load `.env` into process.env, then build the configuration
 */
export function loadConfigFromEnvironment(): PodConfig {
    loadDotenv();
    return loadConfig(process.env);
}
