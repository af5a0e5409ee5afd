import jwt, { SignOptions, VerifyOptions, Algorithm, JwtPayload } from 'jsonwebtoken';
import fs from 'fs';
import path from 'path';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import {
    Action,
    Identity,
    Role,
    UnauthenticatedError,
    UnauthorizedError,
    isRole,
} from '@blogflow/protocol';

declare global {
    namespace Express {
        interface Request {
            identity?: Identity;
        }
    }
}

// Claims carried by access tokens
export interface TokenClaims {
    userId: string;
    role?: Role;
}

export interface AuthConfig {
    algorithm: 'HS256' | 'RS256';
    secret?: string;
    privateKeyPath?: string;
    publicKeyPath?: string;
    expiresInSeconds?: number;
}

function envAlgorithm(): AuthConfig['algorithm'] {
    return process.env.JWT_ALGORITHM === 'RS256' ? 'RS256' : 'HS256';
}

// Read on every call so tests and late dotenv loads are picked up
function defaultConfig(): AuthConfig {
    return {
        algorithm: envAlgorithm(),
        secret: process.env.JWT_SECRET || process.env.DEV_SECRET,
        privateKeyPath: process.env.JWT_PRIVATE_KEY_PATH,
        publicKeyPath: process.env.JWT_PUBLIC_KEY_PATH,
        expiresInSeconds: Number.parseInt(process.env.JWT_EXPIRES_IN_SECONDS || '86400', 10),
    };
}

/**
 * Get the secret key or read the private/public key files based on the algorithm
 * @param forSigning - Whether the key is for signing (true) or verification (false)
 */
function getKey(config: AuthConfig, forSigning: boolean): string | Buffer {
    const { algorithm, secret, privateKeyPath, publicKeyPath } = config;

    if (algorithm === 'HS256') {
        if (!secret) throw new Error('JWT_SECRET not set for HS256 algorithm');
        return secret;
    }

    if (forSigning) {
        if (!privateKeyPath) throw new Error('JWT_PRIVATE_KEY_PATH not set for RS256 algorithm');
        return fs.readFileSync(path.resolve(privateKeyPath));
    }
    if (!publicKeyPath) throw new Error('JWT_PUBLIC_KEY_PATH not set for RS256 algorithm');
    return fs.readFileSync(path.resolve(publicKeyPath));
}

/**
 * Sign a payload and return a JWT string
 */
export function sign(payload: TokenClaims, configOverride?: Partial<AuthConfig>): string {
    const config = { ...defaultConfig(), ...configOverride };
    const key = getKey(config, true);

    const options: SignOptions = {
        algorithm: config.algorithm satisfies Algorithm,
    };

    if (config.expiresInSeconds !== undefined && Number.isFinite(config.expiresInSeconds)) {
        options.expiresIn = config.expiresInSeconds;
    }

    return jwt.sign({ ...payload }, key, options);
}

/**
 * Verify a JWT and return its claims
 * @throws UnauthenticatedError when the token is invalid, expired or malformed
 */
export function verify(token: string, configOverride?: Partial<AuthConfig>): TokenClaims {
    const config = { ...defaultConfig(), ...configOverride };
    const key = getKey(config, false);

    const options: VerifyOptions = {
        algorithms: [config.algorithm],
    };

    let decoded: string | JwtPayload;
    try {
        decoded = jwt.verify(token, key, options);
    } catch (error) {
        throw new UnauthenticatedError('Invalid or expired token', {
            cause: error instanceof Error ? error.message : String(error),
        });
    }

    if (typeof decoded === 'string' || typeof decoded.userId !== 'string' || !decoded.userId) {
        throw new UnauthenticatedError('Token must carry a userId claim');
    }
    if (decoded.role !== undefined && !isRole(decoded.role)) {
        throw new UnauthenticatedError(`Unknown role claim: ${String(decoded.role)}`);
    }

    return { userId: decoded.userId, role: decoded.role };
}

/**
 * Generate a new token for a user
 */
export function generateToken(
    userId: string,
    role: Role = Role.USER,
    configOverride?: Partial<AuthConfig>
): string {
    return sign({ userId, role }, configOverride);
}

/**
 * Identity provider: turns a bearer token into a verified (identity, role) pair.
 * Tokens without a role claim are plain users.
 */
export function resolveIdentity(token: string | undefined | null, configOverride?: Partial<AuthConfig>): Identity {
    if (!token) {
        throw new UnauthenticatedError('No token provided');
    }
    const claims = verify(token, configOverride);
    return { userId: claims.userId, role: claims.role ?? Role.USER };
}

/**
 * Pull the token out of an `Authorization: Bearer` header, falling back to `?token=`
 * for clients such as EventSource that cannot set headers
 */
export function extractToken(req: Request): string | undefined {
    const authHeader = req.headers.authorization;
    if (authHeader) {
        const [scheme, token] = authHeader.split(' ');
        return scheme === 'Bearer' && token ? token : undefined;
    }
    const queryToken = req.query.token;
    return typeof queryToken === 'string' && queryToken ? queryToken : undefined;
}

const permissions: Record<Action, readonly Role[]> = {
    'post.create': [Role.USER, Role.ADMIN, Role.L1_APPROVER],
    'post.submit': [Role.USER, Role.ADMIN, Role.L1_APPROVER],
    'post.resubmit': [Role.USER, Role.ADMIN, Role.L1_APPROVER],
    'post.read': [Role.USER, Role.ADMIN, Role.L1_APPROVER],
    'post.decide': [Role.ADMIN, Role.L1_APPROVER],
    'notifications.subscribe': [Role.ADMIN, Role.L1_APPROVER],
    'comments.join': [Role.USER, Role.ADMIN, Role.L1_APPROVER],
    'comments.post': [Role.USER, Role.ADMIN, Role.L1_APPROVER],
    'admin.operate': [Role.ADMIN],
};

export function can(role: Role, action: Action): boolean {
    return permissions[action].includes(role);
}

/**
 * Single authorization check used at every entry point
 * @throws UnauthorizedError when the role may not perform the action
 */
export function authorize(role: Role, action: Action): void {
    if (!can(role, action)) {
        throw new UnauthorizedError(`Role ${role} may not perform ${action}`, { role, action });
    }
}

/**
 * Express middleware for authenticating requests; sets `req.identity`
 */
export function authMiddleware(configOverride?: Partial<AuthConfig>): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
        try {
            req.identity = resolveIdentity(extractToken(req), configOverride);
            next();
        } catch (error) {
            next(error);
        }
    };
}

/**
 * Verify a token from WebSocket query parameters
 * @returns The identity, or null if the token is missing or invalid
 */
export function verifyWebSocketToken(token: string | null, configOverride?: Partial<AuthConfig>): Identity | null {
    try {
        return resolveIdentity(token, configOverride);
    } catch (error) {
        return null;
    }
}
