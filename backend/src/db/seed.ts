import 'dotenv/config';
import { config } from '../config';
import { normalizeEmail } from '../services/auth/auth.service';
import { assertPasswordPolicy, hashPassword } from '../services/auth/password';
import { logger } from '../utils/logger';
import { closePool, queryOne } from './index';

/**
 * Creates the first ADMIN account from SEED_ADMIN_EMAIL / SEED_ADMIN_PASSWORD.
 * Roles cannot be raised through the API, so this is how an installation gets one.
 */
async function seed() {
    if (!config.seedAdminEmail || !config.seedAdminPassword) {
        logger.info('SEED_ADMIN_EMAIL / SEED_ADMIN_PASSWORD not set, nothing to seed');
        return;
    }

    assertPasswordPolicy(config.seedAdminPassword, config.passwordMinLength);
    const passwordHash = await hashPassword(config.seedAdminPassword, config.bcryptRounds);

    const created = await queryOne<{ id: number }>(
        `INSERT INTO users (email, password_hash, name, role)
         VALUES ($1, $2, $3, 'ADMIN')
         ON CONFLICT (email) DO NOTHING
         RETURNING id`,
        [normalizeEmail(config.seedAdminEmail), passwordHash, 'Administrator']
    );

    if (created) {
        logger.info({ userId: created.id }, 'Admin account created');
    } else {
        logger.info('Admin account already exists, left unchanged');
    }
}

seed()
    .then(() => closePool())
    .catch((err) => {
        logger.error({ err }, 'Seed error');
        process.exit(1);
    });
