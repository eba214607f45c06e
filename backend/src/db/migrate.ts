import 'dotenv/config';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { closePool, getPool, transaction } from './index';
import { logger } from '../utils/logger';

async function migrate() {
    const pool = getPool();
    const migrationsDir = join(__dirname, 'migrations');
    const files = readdirSync(migrationsDir)
        .filter((f) => f.endsWith('.sql'))
        .sort(); // lexicographic sort ensures 001 < 002 < 003...

    logger.info(`Found ${files.length} migration files`);

    // Ensure migrations_history table exists before checking it
    await pool.query(`
        CREATE TABLE IF NOT EXISTS migrations_history (
            id SERIAL PRIMARY KEY,
            filename VARCHAR(255) UNIQUE NOT NULL,
            applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        );
    `);

    for (const file of files) {
        const sql = readFileSync(join(migrationsDir, file), 'utf-8');

        const { rows } = await pool.query('SELECT id FROM migrations_history WHERE filename = $1', [file]);
        if (rows.length > 0) {
            logger.info(`${file} already applied, skipping`);
            continue;
        }

        try {
            // Execute the migration AND log it in the history table inside ONE transaction
            await transaction(async (client) => {
                await client.query(sql);
                await client.query('INSERT INTO migrations_history (filename) VALUES ($1)', [file]);
            });
            logger.info(`${file} applied`);
        } catch (err) {
            logger.error({ err, file }, `${file} failed, transaction rolled back`);
            throw err; // Stop on first failure
        }
    }

    logger.info('All migrations complete');
    await closePool();
}

migrate().catch((err) => {
    logger.error({ err }, 'Migration error');
    process.exit(1);
});
