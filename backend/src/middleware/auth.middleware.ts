import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuthService } from '../services/auth/auth.service';
import { AuthError } from '../services/auth/errors';
import type { Identity } from '../types/auth';
import { sendError } from '../utils/reply';

// Extend Fastify with the auth service and the resolved caller
declare module 'fastify' {
    interface FastifyInstance {
        auth: AuthService;
    }
    interface FastifyRequest {
        identity?: Identity;
    }
}

export const SESSION_HEADER = 'x-session-id';

export type RegisteredIdentity = Extract<Identity, { kind: 'registered' }>;

/**
 * Returns the bearer token of an Authorization header. A header in any other
 * shape is returned as-is so that it fails verification instead of being
 * mistaken for "no credentials".
 */
export function extractBearerToken(header: string | undefined): string | undefined {
    if (header === undefined) return undefined;
    return header.startsWith('Bearer ') ? header.slice(7).trim() : header;
}

export function extractSessionId(request: FastifyRequest): string | undefined {
    const header = request.headers[SESSION_HEADER];
    if (typeof header === 'string' && header.length > 0) return header;

    const q = request.query;
    if (typeof q === 'object' && q !== null && 'sessionId' in q && typeof q.sessionId === 'string') {
        return q.sessionId;
    }
    return undefined;
}

/**
 * Fastify preHandler that resolves the caller from the bearer token or the
 * anonymous session id and attaches it as `request.identity`.
 * Requests without any credentials pass through with no identity; requests
 * with credentials that do not verify get 401.
 */
export async function resolveIdentity(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    const accessToken = extractBearerToken(request.headers.authorization);
    const sessionId = extractSessionId(request);
    if (accessToken === undefined && sessionId === undefined) return;

    try {
        request.identity = await request.server.auth.resolveCurrent({ accessToken, sessionId });
    } catch (err) {
        return sendError(reply, err, 'Identity resolution');
    }
}

/** Requires a resolved caller, registered or anonymous. Use after `resolveIdentity`. */
export async function authenticate(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    if (!request.identity) {
        return sendError(reply, new AuthError('UNAUTHENTICATED'), 'Authenticate');
    }
}

/** Requires a registered user; anonymous sessions get 403. Use after `resolveIdentity`. */
export async function requireRegistered(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
    const identity = request.identity;
    if (!identity) {
        return sendError(reply, new AuthError('UNAUTHENTICATED'), 'Authenticate');
    }
    if (identity.kind !== 'registered') {
        return sendError(reply, new AuthError('FORBIDDEN', 'A registered account is required'), 'Authorize');
    }
}

/** For handlers behind `requireRegistered` */
export function registeredIdentity(request: FastifyRequest): RegisteredIdentity {
    const identity = request.identity;
    if (!identity || identity.kind !== 'registered') {
        throw new AuthError('UNAUTHENTICATED');
    }
    return identity;
}
