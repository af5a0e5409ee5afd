import type { IncomingMessage, Server } from 'http';
import { STATUS_CODES } from 'http';
import type { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import {
    ClientCommentFrameSchema,
    RoomFrameType,
    isAppError,
    type Identity,
} from '@blogflow/protocol';
import { can, verifyWebSocketToken, type AuthConfig } from '@blogflow/auth';
import type { CommentRoomRegistry, CommentStream } from '../comments/registry';
import type { PostStore } from '../store';

const ROOM_PATH = /^\/rooms\/([^/]+)\/?$/;

/**
 * Post id named by a room path, or null when the path is not a room or is badly escaped
 */
export function roomIdFromPath(pathname: string): string | null {
    const match = ROOM_PATH.exec(pathname);
    if (!match) return null;
    try {
        return decodeURIComponent(match[1]);
    } catch {
        return null;
    }
}

export interface CommentSocketOptions {
    rooms: CommentRoomRegistry;
    store: PostStore;
    pingIntervalMs: number;
    auth?: Partial<AuthConfig>;
}

interface Admitted {
    postId: string;
    identity: Identity;
}

/**
 * Answer an upgrade request with a plain HTTP status and drop the socket
 */
function reject(socket: Duplex, status: number, message: string): void {
    const reason = STATUS_CODES[status] ?? 'Error';
    const body = JSON.stringify({ error: { code: reason.toUpperCase().replace(/ /g, '_'), message } });
    socket.write(
        `HTTP/1.1 ${status} ${reason}\r\n` +
        'Connection: close\r\n' +
        'Content-Type: application/json\r\n' +
        `Content-Length: ${Buffer.byteLength(body)}\r\n\r\n` +
        body
    );
    socket.destroy();
}

function send(ws: WebSocket, data: string): Promise<void> {
    return new Promise((resolve, reject) => {
        ws.send(data, error => (error ? reject(error) : resolve()));
    });
}

/**
 * Serve `/rooms/:postId?token=` comment sockets on an HTTP server.
 * Bad paths, missing or invalid tokens and unknown posts are refused before the handshake.
 */
export function attachCommentSockets(server: Server, options: CommentSocketOptions): WebSocketServer {
    const { rooms, store } = options;
    const wss = new WebSocketServer({ noServer: true });
    const alive = new WeakMap<WebSocket, boolean>();

    async function admit(req: IncomingMessage): Promise<Admitted | { status: number; message: string }> {
        const url = new URL(req.url || '', `http://${req.headers.host || 'localhost'}`);
        const postId = roomIdFromPath(url.pathname);
        if (postId === null) {
            return { status: 400, message: 'Expected /rooms/:postId' };
        }

        const identity = verifyWebSocketToken(url.searchParams.get('token'), options.auth);
        if (!identity) {
            return { status: 401, message: 'Missing or invalid token' };
        }
        if (!can(identity.role, 'comments.join')) {
            return { status: 403, message: `Role ${identity.role} may not join comment rooms` };
        }

        if (!(await store.getPost(postId))) {
            return { status: 404, message: `Post ${postId} not found` };
        }
        return { postId, identity };
    }

    function join(ws: WebSocket, { postId, identity }: Admitted): CommentStream | null {
        try {
            return rooms.join(postId, uuidv4(), identity.userId);
        } catch (error) {
            const message = error instanceof Error ? error.message : 'Join failed';
            ws.close(isAppError(error) && error.status === 503 ? 1013 : 1011, message);
            return null;
        }
    }

    function serve(ws: WebSocket, admitted: Admitted): void {
        const { postId, identity } = admitted;
        const joined = join(ws, admitted);
        if (!joined) return;
        alive.set(ws, true);

        const writer = async () => {
            let closing = false;
            for (;;) {
                const result = await joined.next();
                if (result.done) break;
                if (ws.readyState !== WebSocket.OPEN) break;
                closing = result.value.type === RoomFrameType.CLOSING;
                await send(ws, JSON.stringify(result.value));
            }
            if (ws.readyState === WebSocket.OPEN) {
                ws.close(closing ? 1001 : 1000);
            }
        };
        writer().catch(error => {
            console.error(`Comment socket ${joined.connectionId} failed:`, error);
            joined.close();
            ws.terminate();
        });

        ws.on('message', data => {
            joined.touch();
            let parsed: unknown;
            try {
                parsed = JSON.parse(data.toString());
            } catch {
                joined.reportError('INVALID_INPUT', 'Frames must be JSON');
                return;
            }

            const frame = ClientCommentFrameSchema.safeParse(parsed);
            if (!frame.success) {
                joined.reportError('INVALID_INPUT', 'Expected {"text": string}');
                return;
            }

            try {
                rooms.post(postId, identity.userId, frame.data.text);
            } catch (error) {
                if (isAppError(error)) {
                    joined.reportError(error.code, error.message);
                } else {
                    console.error(`Comment from ${identity.userId} in ${postId} failed:`, error);
                    joined.reportError('INTERNAL_ERROR', 'Comment could not be posted');
                }
            }
        });

        ws.on('pong', () => {
            alive.set(ws, true);
            joined.touch();
        });

        ws.on('close', () => {
            joined.close();
        });

        ws.on('error', error => {
            console.error(`Comment socket ${joined.connectionId} error:`, error);
        });
    }

    server.on('upgrade', (req: IncomingMessage, socket: Duplex, head: Buffer) => {
        admit(req)
            .then(outcome => {
                if ('status' in outcome) {
                    reject(socket, outcome.status, outcome.message);
                    return;
                }
                wss.handleUpgrade(req, socket, head, ws => {
                    wss.emit('connection', ws, req);
                    serve(ws, outcome);
                });
            })
            .catch(error => {
                console.error('Comment socket upgrade failed:', error);
                reject(socket, 500, 'Upgrade failed');
            });
    });

    // Ping every socket; one that missed the last pong is dropped
    const pinger = setInterval(() => {
        for (const ws of wss.clients) {
            if (alive.get(ws) === false) {
                ws.terminate();
                continue;
            }
            alive.set(ws, false);
            ws.ping();
        }
    }, options.pingIntervalMs);
    pinger.unref();
    wss.on('close', () => clearInterval(pinger));

    return wss;
}
