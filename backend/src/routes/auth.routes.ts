import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { config } from '../config';
import { authenticate, registeredIdentity, requireRegistered, resolveIdentity } from '../middleware/auth.middleware';
import type { ClientMeta } from '../types/auth';
import { isAuthError } from '../services/auth/errors';
import { sendError, sendValidationError } from '../utils/reply';

// ─── Validation Schemas ───

const sessionIdField = z.string().min(1).max(128);

const registerSchema = z.object({
    email: z.string().trim().email().max(255),
    // Length rules live in the password policy so they surface as WEAK_PASSWORD
    password: z.string(),
    name: z.string().trim().min(1).max(255),
    socialName: z.string().trim().max(255).nullish(),
    pronoun: z.string().trim().max(50).nullish(),
    // Digits are checked by the service after punctuation is stripped
    cpf: z.string().max(20).nullish(),
    sessionId: sessionIdField.optional(),
});

const loginSchema = z.object({
    email: z.string().trim().email(),
    password: z.string().min(1),
    sessionId: sessionIdField.optional(),
});

const refreshSchema = z.object({
    refreshToken: z.string().min(1).optional(),
});

const changePasswordSchema = z.object({
    currentPassword: z.string().min(1),
    newPassword: z.string(),
});

const anonymousSessionSchema = z.object({
    sessionId: sessionIdField.optional(),
});

const promoteSchema = z.object({
    sessionId: sessionIdField,
});

const REFRESH_COOKIE_PATH = '/api/auth';
const REFRESH_MAX_AGE = config.refreshTokenTtlDays * 24 * 60 * 60;

function clientMeta(request: FastifyRequest): ClientMeta {
    return { userAgent: request.headers['user-agent'], ip: request.ip };
}

function setRefreshCookie(reply: FastifyReply, refreshToken: string): void {
    reply.setCookie(config.refreshCookieName, refreshToken, {
        httpOnly: true,
        secure: config.nodeEnv === 'production',
        sameSite: 'strict',
        path: REFRESH_COOKIE_PATH,
        maxAge: REFRESH_MAX_AGE,
    });
}

function clearRefreshCookie(reply: FastifyReply): void {
    reply.clearCookie(config.refreshCookieName, { path: REFRESH_COOKIE_PATH });
}

/** Body field first, then the HTTP-only cookie */
function refreshTokenFrom(request: FastifyRequest, bodyToken: string | undefined): string | undefined {
    return bodyToken ?? request.cookies[config.refreshCookieName];
}

export async function authRoutes(fastify: FastifyInstance) {

    // ─── POST /api/auth/register ───
    fastify.post('/api/auth/register', async (request, reply) => {
        const parsed = registerSchema.safeParse(request.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);

        try {
            const { sessionId, ...profile } = parsed.data;
            const result = await fastify.auth.register({
                ...profile,
                anonymousSessionId: sessionId,
                meta: clientMeta(request),
            });

            setRefreshCookie(reply, result.refreshToken);
            reply.code(201);
            return {
                user: result.user,
                accessToken: result.accessToken,
                refreshToken: result.refreshToken,
                tokenType: 'bearer',
                expiresIn: result.expiresIn,
                promotion: result.promotion,
            };
        } catch (err) {
            return sendError(reply, err, 'Registration');
        }
    });

    // ─── POST /api/auth/login ───
    fastify.post('/api/auth/login', async (request, reply) => {
        const parsed = loginSchema.safeParse(request.body);
        if (!parsed.success) return sendValidationError(reply, parsed.error);

        try {
            const result = await fastify.auth.login({
                email: parsed.data.email,
                password: parsed.data.password,
                anonymousSessionId: parsed.data.sessionId,
                meta: clientMeta(request),
            });

            setRefreshCookie(reply, result.refreshToken);
            return {
                user: result.user,
                accessToken: result.accessToken,
                refreshToken: result.refreshToken,
                tokenType: 'bearer',
                expiresIn: result.expiresIn,
                promotion: result.promotion,
            };
        } catch (err) {
            return sendError(reply, err, 'Login');
        }
    });

    // ─── POST /api/auth/refresh ───
    fastify.post('/api/auth/refresh', async (request, reply) => {
        const parsed = refreshSchema.safeParse(request.body ?? {});
        if (!parsed.success) return sendValidationError(reply, parsed.error);

        const refreshToken = refreshTokenFrom(request, parsed.data.refreshToken);
        if (!refreshToken) {
            return reply.code(401).send({ error: 'No refresh token provided', code: 'INVALID_CREDENTIALS' });
        }

        try {
            const result = await fastify.auth.refresh(refreshToken, clientMeta(request));

            // Rotate cookie
            setRefreshCookie(reply, result.refreshToken);
            return {
                accessToken: result.accessToken,
                refreshToken: result.refreshToken,
                tokenType: 'bearer',
                expiresIn: result.expiresIn,
            };
        } catch (err) {
            // Only a rejected token is dropped; during an outage the client keeps it for a retry
            if (isAuthError(err) && err.code === 'INVALID_CREDENTIALS') {
                clearRefreshCookie(reply);
            }
            return sendError(reply, err, 'Refresh');
        }
    });

    // ─── POST /api/auth/logout ───
    fastify.post('/api/auth/logout', async (request, reply) => {
        const parsed = refreshSchema.safeParse(request.body ?? {});
        if (!parsed.success) return sendValidationError(reply, parsed.error);

        const refreshToken = refreshTokenFrom(request, parsed.data.refreshToken);
        try {
            if (refreshToken) {
                await fastify.auth.logout(refreshToken);
            }
            clearRefreshCookie(reply);
            return reply.code(204).send();
        } catch (err) {
            return sendError(reply, err, 'Logout');
        }
    });

    // ─── POST /api/auth/logout-all ───
    fastify.post(
        '/api/auth/logout-all',
        { preHandler: [resolveIdentity, requireRegistered] },
        async (request, reply) => {
            try {
                const revoked = await fastify.auth.logoutEverywhere(registeredIdentity(request).userId);
                clearRefreshCookie(reply);
                return { revoked };
            } catch (err) {
                return sendError(reply, err, 'Logout everywhere');
            }
        }
    );

    // ─── GET /api/auth/me ───
    fastify.get(
        '/api/auth/me',
        { preHandler: [resolveIdentity, requireRegistered] },
        async (request, reply) => {
            try {
                const user = await fastify.auth.getCurrentUser(registeredIdentity(request).userId);
                return { user };
            } catch (err) {
                return sendError(reply, err, 'Current user');
            }
        }
    );

    // ─── PUT /api/auth/password ───
    fastify.put(
        '/api/auth/password',
        { preHandler: [resolveIdentity, requireRegistered] },
        async (request, reply) => {
            const parsed = changePasswordSchema.safeParse(request.body);
            if (!parsed.success) return sendValidationError(reply, parsed.error);

            try {
                await fastify.auth.changePassword(
                    registeredIdentity(request).userId,
                    parsed.data.currentPassword,
                    parsed.data.newPassword
                );
                clearRefreshCookie(reply);
                return reply.code(204).send();
            } catch (err) {
                return sendError(reply, err, 'Password change');
            }
        }
    );

    // ─── GET /api/auth/identity ───
    fastify.get(
        '/api/auth/identity',
        { preHandler: [resolveIdentity, authenticate] },
        async (request) => {
            return { identity: request.identity };
        }
    );

    // ─── POST /api/auth/anonymous-session ───
    fastify.post('/api/auth/anonymous-session', async (request, reply) => {
        const parsed = anonymousSessionSchema.safeParse(request.body ?? {});
        if (!parsed.success) return sendValidationError(reply, parsed.error);

        try {
            const { session, created, chatId } = await fastify.auth.createAnonymousSession(parsed.data.sessionId);
            reply.code(created ? 201 : 200);
            return { sessionId: session.id, chatId, createdAt: session.created_at, resumed: !created };
        } catch (err) {
            return sendError(reply, err, 'Anonymous session');
        }
    });

    // ─── POST /api/auth/anonymous-session/promote ───
    fastify.post(
        '/api/auth/anonymous-session/promote',
        { preHandler: [resolveIdentity, requireRegistered] },
        async (request, reply) => {
            const parsed = promoteSchema.safeParse(request.body);
            if (!parsed.success) return sendValidationError(reply, parsed.error);

            try {
                const resourcesMoved = await fastify.auth.promoteSession(
                    parsed.data.sessionId,
                    registeredIdentity(request).userId
                );
                return { sessionId: parsed.data.sessionId, resourcesMoved };
            } catch (err) {
                return sendError(reply, err, 'Session promotion');
            }
        }
    );
}
