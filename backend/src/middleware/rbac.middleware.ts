import type { FastifyReply, FastifyRequest } from 'fastify';
import { authorize, authorizeOwnership } from '../services/auth/authorization';
import { AuthError } from '../services/auth/errors';
import type { ResourceOwner, UserRole } from '../types/auth';
import { sendError } from '../utils/reply';

/**
 * Factory that returns a Fastify preHandler hook enforcing role-based access.
 * Must be used AFTER `resolveIdentity` so `request.identity` is available.
 *
 * @param allowedRoles - Roles that are permitted to access this route
 *
 * @example
 *   fastify.post('/api/users/:userId/revoke-sessions', {
 *     preHandler: [resolveIdentity, requireRole(['ADMIN'])],
 *   }, handler);
 */
export function requireRole(allowedRoles: readonly UserRole[]) {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
        const identity = request.identity;
        if (!identity) {
            return sendError(reply, new AuthError('UNAUTHENTICATED'), 'Authorize');
        }

        const decision = authorize(identity, allowedRoles);
        if (!decision.allowed) {
            return sendError(reply, new AuthError('FORBIDDEN', decision.reason), 'Authorize');
        }
    };
}

/**
 * Factory for a preHandler that allows the owner of the addressed resource,
 * or an ADMIN. `ownerOf` returns null when the resource cannot be addressed,
 * which answers 404.
 */
export function requireOwnership(ownerOf: (request: FastifyRequest) => ResourceOwner | null) {
    return async function (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | void> {
        const identity = request.identity;
        if (!identity) {
            return sendError(reply, new AuthError('UNAUTHENTICATED'), 'Authorize');
        }

        const owner = ownerOf(request);
        if (!owner) {
            return sendError(reply, new AuthError('NOT_FOUND'), 'Authorize');
        }

        const decision = authorizeOwnership(identity, owner);
        if (!decision.allowed) {
            return sendError(reply, new AuthError('FORBIDDEN', decision.reason), 'Authorize');
        }
    };
}
