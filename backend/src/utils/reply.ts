import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { isAuthError } from '../services/auth/errors';
import { logger } from './logger';

/** Maps an error to its stable status/code pair; anything unexpected is a logged 500 */
export function sendError(reply: FastifyReply, err: unknown, context: string): FastifyReply {
    if (isAuthError(err)) {
        return reply.code(err.statusCode).send({ error: err.message, code: err.code });
    }
    logger.error({ err }, `${context} error`);
    return reply.code(500).send({ error: 'Internal server error' });
}

export function sendValidationError(reply: FastifyReply, error: ZodError): FastifyReply {
    return reply.code(400).send({ error: 'Invalid input', code: 'VALIDATION_FAILED', details: error.flatten() });
}
