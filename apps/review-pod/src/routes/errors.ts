import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import {
    InvalidInputError,
    NotFoundError,
    UnauthenticatedError,
    isAppError,
    type Identity,
} from '@blogflow/protocol';

/**
 * Forward rejections from async handlers to the error middleware
 */
export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        handler(req, res).catch(next);
    };
}

/**
 * Validate input against a zod schema
 * @throws InvalidInputError listing each failing field
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(issue => ({
            field: issue.path.join('.') || '(root)',
            message: issue.message,
        }));
        throw new InvalidInputError(
            issues.map(issue => `${issue.field}: ${issue.message}`).join('; '),
            { issues }
        );
    }
    return result.data;
}

export function requireIdentity(req: Request): Identity {
    if (!req.identity) {
        throw new UnauthenticatedError();
    }
    return req.identity;
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`));
};

/**
 * Map application errors onto `{ error: { code, message } }`; anything else is a 500
 */
export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
    if (res.headersSent) {
        next(error);
        return;
    }

    if (isAppError(error)) {
        if (error.status >= 500) {
            console.warn(`${req.method} ${req.path} -> ${error.code}: ${error.message}`);
        }
        res.status(error.status).json({ error: { code: error.code, message: error.message } });
        return;
    }

    if (error instanceof SyntaxError && 'body' in error) {
        res.status(400).json({ error: { code: 'INVALID_INPUT', message: 'Malformed JSON body' } });
        return;
    }

    console.error(`Unhandled error on ${req.method} ${req.path}:`, error);
    res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
};
