/**
 * Frame types on the reviewer push stream
 */
export enum NotificationType {
    SUBMITTED = 'Submitted',
    APPROVED = 'Approved',
    REJECTED = 'Rejected',
    HEARTBEAT = 'Heartbeat',
    SNAPSHOT = 'Snapshot',
    CLOSING = 'Closing',
}

/**
 * Server-to-client frame on the notification stream.
 * Frames not tied to a post carry sequenceNumber 0.
 */
export interface NotificationFrame {
    type: NotificationType;
    postId?: string;
    actor?: string;
    reason?: string;
    resubmission?: boolean;
    pending?: string[]; // Snapshot only
    count?: number; // Snapshot only
    sequenceNumber: number;
    timestamp: string;
}
