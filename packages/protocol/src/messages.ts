import { z } from 'zod';

/**
 * Frame types sent to comment room members
 */
export enum RoomFrameType {
    COMMENT = 'Comment',
    JOINED = 'Joined',
    LEFT = 'Left',
    ERROR = 'Error',
    CLOSING = 'Closing',
}

/**
 * Server-to-client frame on a comment socket
 */
export interface RoomFrame {
    type: RoomFrameType;
    author?: string;
    text?: string;
    messageId?: string;
    reason?: string; // Left only, when the server removed the viewer
    code?: string; // Error only
    message?: string; // Error only
    sequenceNumber: number;
    timestamp: string;
}

/**
 * Client-to-server frame on a comment socket
 */
export const ClientCommentFrameSchema = z.object({
    text: z.string(),
});

export type ClientCommentFrame = z.infer<typeof ClientCommentFrameSchema>;

/**
 * Body of a reviewer decision request
 */
export const DecisionBodySchema = z.object({
    decision: z.enum(['approved', 'rejected']),
    reason: z.string().optional(),
});

export type DecisionBody = z.infer<typeof DecisionBodySchema>;
