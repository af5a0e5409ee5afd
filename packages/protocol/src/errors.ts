export type ErrorCode =
    | 'UNAUTHENTICATED'
    | 'UNAUTHORIZED'
    | 'FORBIDDEN'
    | 'INVALID_TRANSITION'
    | 'STALE_STATE'
    | 'INVALID_INPUT'
    | 'NOT_FOUND'
    | 'CAPACITY_EXCEEDED'
    | 'SERVICE_UNAVAILABLE'
    | 'DELIVERY_DEGRADED';

/**
 * Base class for errors that map onto a wire code and an HTTP status
 */
export class AppError extends Error {
    constructor(
        readonly code: ErrorCode,
        message: string,
        readonly status: number,
        readonly details: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class UnauthenticatedError extends AppError {
    constructor(message = 'Authentication required', details?: Record<string, unknown>) {
        super('UNAUTHENTICATED', message, 401, details);
    }
}

export class UnauthorizedError extends AppError {
    constructor(message = 'Insufficient permissions', details?: Record<string, unknown>) {
        super('UNAUTHORIZED', message, 403, details);
    }
}

export class ForbiddenError extends AppError {
    constructor(message = 'Forbidden', details?: Record<string, unknown>) {
        super('FORBIDDEN', message, 403, details);
    }
}

export class InvalidTransitionError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('INVALID_TRANSITION', message, 409, details);
    }
}

/**
 * Lost a compare-and-set race; the caller should refetch and may retry
 */
export class StaleStateError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('STALE_STATE', message, 409, details);
    }
}

export class InvalidInputError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('INVALID_INPUT', message, 400, details);
    }
}

export class NotFoundError extends AppError {
    constructor(message = 'Resource not found', details?: Record<string, unknown>) {
        super('NOT_FOUND', message, 404, details);
    }
}

export class CapacityExceededError extends AppError {
    constructor(message = 'Connection limit reached', details?: Record<string, unknown>) {
        super('CAPACITY_EXCEEDED', message, 503, details);
    }
}

export class ServiceUnavailableError extends AppError {
    constructor(message = 'Service temporarily unavailable', details?: Record<string, unknown>) {
        super('SERVICE_UNAVAILABLE', message, 503, details);
    }
}

/**
 * Recorded when a committed change could not reach every subscriber.
 * Logged and counted, never returned to the caller as a failure.
 */
export class DeliveryDegradedError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('DELIVERY_DEGRADED', message, 202, details);
    }
}

export function isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
}
