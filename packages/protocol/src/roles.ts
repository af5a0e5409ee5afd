/**
 * Closed set of roles a verified identity can carry
 */
export enum Role {
    USER = 'user',
    ADMIN = 'admin',
    L1_APPROVER = 'l1_approver',
}

/**
 * Actions guarded by role at each entry point
 */
export type Action =
    | 'post.create'
    | 'post.submit'
    | 'post.resubmit'
    | 'post.decide'
    | 'post.read'
    | 'notifications.subscribe'
    | 'comments.join'
    | 'comments.post'
    | 'admin.operate';

export function isRole(value: unknown): value is Role {
    return Object.values(Role).some(role => role === value);
}

/**
 * Reviewer roles: may decide pending posts and watch the approval stream
 */
export function isReviewer(role: Role): boolean {
    return role === Role.ADMIN || role === Role.L1_APPROVER;
}

/**
 * Verified caller handed to the core by the identity provider
 */
export interface Identity {
    userId: string;
    role: Role;
}
