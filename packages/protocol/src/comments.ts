/**
 * Live comment broadcast inside a post room
 */
export interface CommentMessage {
    messageId: string; // ULID
    roomId: string; // same as the post id
    authorId: string;
    text: string;
    sequenceNumber: number; // room-scoped, starts at 1
    timestamp: string; // ISO timestamp
}

export type MembershipChange = 'joined' | 'left';

/**
 * Events carried on the comments topic. `position` orders every event of a room,
 * membership changes included; only comments consume a sequence number.
 */
export type RoomEvent =
    | {
        kind: 'comment';
        position: number;
        message: CommentMessage;
    }
    | {
        kind: 'membership';
        position: number;
        change: MembershipChange;
        roomId: string;
        viewerId: string;
        connectionId: string;
        sequenceNumber: number; // room sequence at the time of the change
        timestamp: string;
        reason?: string;
    };
