import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import cookie from '@fastify/cookie';
import type { AuthService } from './services/auth/auth.service';

// Routes
import { authRoutes } from './routes/auth.routes';
import { userRoutes } from './routes/user.routes';

export interface AppDeps {
    authService: AuthService;
    /** Allowed CORS origins; empty allows any origin */
    corsOrigins?: readonly string[];
    /** Backs GET /health/ready; without it readiness equals liveness */
    checkDatabase?: () => Promise<boolean>;
}

/**
 * Builds the Fastify app without listening, so tests can drive it with `inject`.
 */
export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
    const app = Fastify({
        logger: false, // We use pino directly
    });

    // ─── Plugins ───
    const origins = deps.corsOrigins ?? [];
    await app.register(cors, {
        origin: origins.length > 0 ? [...origins] : true,
        credentials: true,
    });
    await app.register(cookie);

    // ─── Decorate Fastify with services ───
    app.decorate('auth', deps.authService);

    // ─── Register Routes ───
    await app.register(authRoutes);
    await app.register(userRoutes);

    // ─── Health Check ───
    app.get('/health', async () => {
        return {
            status: 'ok',
            timestamp: new Date().toISOString(),
        };
    });

    app.get('/health/ready', async (_request, reply) => {
        const database = deps.checkDatabase ? await deps.checkDatabase() : true;
        reply.code(database ? 200 : 503);
        return { status: database ? 'ready' : 'unavailable', database: database ? 'up' : 'down' };
    });

    return app;
}
