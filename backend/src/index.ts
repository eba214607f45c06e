import { buildApp } from './app';
import { config } from './config';
import { closePool, pingDatabase } from './db';
import { PgAuthRepository } from './db/auth.repository';
import { createAuthService } from './services/auth';
import { logger } from './utils/logger';

async function main() {
    // ─── Initialize Services ───
    logger.info('Initializing services...');
    const authService = createAuthService(config, new PgAuthRepository());

    const app = await buildApp({
        authService,
        corsOrigins: config.corsOrigins,
        checkDatabase: pingDatabase,
    });

    // ─── Start Server ───
    try {
        await app.listen({ port: config.port, host: '0.0.0.0' });
        logger.info({ port: config.port, env: config.nodeEnv }, 'Support auth server started');
    } catch (err) {
        logger.error({ err }, 'Failed to start server');
        process.exit(1);
    }

    // ─── Graceful Shutdown ───
    const shutdown = async () => {
        logger.info('Shutting down...');
        await app.close();
        await closePool();
        process.exit(0);
    };
    process.on('SIGINT', () => {
        shutdown().catch((err) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    });
    process.on('SIGTERM', () => {
        shutdown().catch((err) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    });
}

main().catch((err) => {
    logger.error({ err }, 'Fatal error');
    process.exit(1);
});
