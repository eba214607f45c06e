import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { resolveIdentity } from '../middleware/auth.middleware';
import { requireOwnership, requireRole } from '../middleware/rbac.middleware';
import type { ResourceOwner } from '../types/auth';
import { sendError, sendValidationError } from '../utils/reply';

const userParamsSchema = z.object({
    userId: z.coerce.number().int().positive(),
});

function userOwner(request: FastifyRequest): ResourceOwner | null {
    const parsed = userParamsSchema.safeParse(request.params);
    return parsed.success ? { kind: 'user', userId: parsed.data.userId } : null;
}

export async function userRoutes(fastify: FastifyInstance) {

    // ─── GET /api/users/:userId ─── (self or ADMIN)
    fastify.get(
        '/api/users/:userId',
        { preHandler: [resolveIdentity, requireOwnership(userOwner)] },
        async (request, reply) => {
            const parsed = userParamsSchema.safeParse(request.params);
            if (!parsed.success) return sendValidationError(reply, parsed.error);

            try {
                const user = await fastify.auth.getUser(parsed.data.userId);
                return { user };
            } catch (err) {
                return sendError(reply, err, 'Get user');
            }
        }
    );

    // ─── POST /api/users/:userId/revoke-sessions ─── (ADMIN only)
    fastify.post(
        '/api/users/:userId/revoke-sessions',
        { preHandler: [resolveIdentity, requireRole(['ADMIN'])] },
        async (request, reply) => {
            const parsed = userParamsSchema.safeParse(request.params);
            if (!parsed.success) return sendValidationError(reply, parsed.error);

            try {
                const revoked = await fastify.auth.logoutEverywhere(parsed.data.userId);
                return { revoked };
            } catch (err) {
                return sendError(reply, err, 'Revoke sessions');
            }
        }
    );
}
