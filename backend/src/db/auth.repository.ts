import { DatabaseError } from 'pg';
import { query, queryOne, transaction } from './index';
import type {
    AnonymousSession,
    NewUser,
    PendingRefreshToken,
    RefreshTokenRecord,
    SafeUser,
    StartedSession,
    User,
} from '../types/auth';

export type CreateUserResult =
    | { ok: true; user: SafeUser }
    | { ok: false; conflict: 'email' | 'cpf' };

/**
 * Persistence needed by the auth core. Every method that changes more than
 * one row is atomic: it either applies completely or not at all.
 */
export interface AuthRepository {
    // ─── Users ───
    findUserByEmail(email: string): Promise<User | null>;
    findUserById(id: number): Promise<User | null>;
    findUserByCpf(cpf: string): Promise<User | null>;
    /** Inserts the user and its first refresh credential together, or reports which unique field is taken */
    createUserWithRefreshToken(user: NewUser, token: PendingRefreshToken): Promise<CreateUserResult>;
    updatePasswordHash(userId: number, passwordHash: string): Promise<void>;
    touchLastLogin(userId: number, at: Date): Promise<void>;

    // ─── Refresh tokens ───
    findRefreshTokenByHash(tokenHash: string): Promise<RefreshTokenRecord | null>;
    insertRefreshToken(userId: number, token: PendingRefreshToken): Promise<void>;
    /**
     * Revokes `oldId` only if it is still active at `at`, and inserts `next`
     * in the same transaction. Returns false when another caller got there first.
     */
    replaceRefreshToken(oldId: string, userId: number, next: PendingRefreshToken, at: Date): Promise<boolean>;
    revokeRefreshTokenByHash(tokenHash: string, at: Date): Promise<void>;
    revokeAllRefreshTokens(userId: number, at: Date): Promise<number>;

    // ─── Anonymous sessions ───
    findAnonymousSession(id: string): Promise<AnonymousSession | null>;
    /**
     * Inserts the session and opens its first chat in one transaction.
     * Returns null when a session with that id already exists.
     */
    insertAnonymousSession(id: string, at: Date): Promise<StartedSession | null>;
    /** Oldest active chat owned by the session */
    findSessionChat(sessionId: string): Promise<number | null>;
    /**
     * Re-keys every resource owned by the live session to `userId` and marks
     * the session promoted. Returns the number of resources moved, or null
     * when the session does not exist or was already promoted.
     */
    promoteAnonymousSession(sessionId: string, userId: number, at: Date): Promise<number | null>;
}

const SAFE_USER_COLUMNS =
    'id, email, name, social_name, pronoun, cpf, role, is_active, last_login_at, created_at, updated_at';

const CPF_CONSTRAINT = 'users_cpf_key';

/** Tables whose rows are owned by either a user_id or a session_id */
const SESSION_OWNED_TABLES = ['chats'] as const;

const UNIQUE_VIOLATION = '23505';

function uniqueViolation(err: unknown): DatabaseError | null {
    return err instanceof DatabaseError && err.code === UNIQUE_VIOLATION ? err : null;
}

const INSERT_REFRESH_TOKEN = `INSERT INTO refresh_tokens (id, user_id, token_hash, user_agent, ip_address, issued_at, expires_at)
     VALUES ($1, $2, $3, $4, $5::inet, $6, $7)`;

function refreshTokenParams(userId: number, token: PendingRefreshToken): unknown[] {
    return [token.id, userId, token.tokenHash, token.userAgent, token.ipAddress, token.issuedAt, token.expiresAt];
}

export class PgAuthRepository implements AuthRepository {
    // ─── Users ───

    async findUserByEmail(email: string): Promise<User | null> {
        return queryOne<User>('SELECT * FROM users WHERE email = $1', [email]);
    }

    async findUserById(id: number): Promise<User | null> {
        return queryOne<User>('SELECT * FROM users WHERE id = $1', [id]);
    }

    async findUserByCpf(cpf: string): Promise<User | null> {
        return queryOne<User>('SELECT * FROM users WHERE cpf = $1', [cpf]);
    }

    async createUserWithRefreshToken(user: NewUser, token: PendingRefreshToken): Promise<CreateUserResult> {
        try {
            const created = await transaction(async (client) => {
                const { rows } = await client.query(
                    `INSERT INTO users (email, password_hash, name, social_name, pronoun, cpf, role)
                     VALUES ($1, $2, $3, $4, $5, $6, $7)
                     RETURNING ${SAFE_USER_COLUMNS}`,
                    [user.email, user.passwordHash, user.name, user.socialName, user.pronoun, user.cpf, user.role]
                );
                const inserted: SafeUser = rows[0];
                await client.query(INSERT_REFRESH_TOKEN, refreshTokenParams(inserted.id, token));
                return inserted;
            });
            return { ok: true, user: created };
        } catch (err) {
            const violation = uniqueViolation(err);
            if (!violation) throw err;
            return { ok: false, conflict: violation.constraint === CPF_CONSTRAINT ? 'cpf' : 'email' };
        }
    }

    async updatePasswordHash(userId: number, passwordHash: string): Promise<void> {
        await query('UPDATE users SET password_hash = $2, updated_at = NOW() WHERE id = $1', [userId, passwordHash]);
    }

    async touchLastLogin(userId: number, at: Date): Promise<void> {
        await query('UPDATE users SET last_login_at = $2 WHERE id = $1', [userId, at]);
    }

    // ─── Refresh tokens ───

    async findRefreshTokenByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
        return queryOne<RefreshTokenRecord>(
            `SELECT id, user_id, token_hash, user_agent, host(ip_address) AS ip_address, issued_at, expires_at, revoked_at
             FROM refresh_tokens WHERE token_hash = $1`,
            [tokenHash]
        );
    }

    async insertRefreshToken(userId: number, token: PendingRefreshToken): Promise<void> {
        await query(INSERT_REFRESH_TOKEN, refreshTokenParams(userId, token));
    }

    async replaceRefreshToken(oldId: string, userId: number, next: PendingRefreshToken, at: Date): Promise<boolean> {
        return transaction(async (client) => {
            // Compare-and-set: the row lock makes a concurrent rotation wait,
            // then re-check revoked_at and match nothing.
            const revoked = await client.query(
                `UPDATE refresh_tokens SET revoked_at = $2
                 WHERE id = $1 AND revoked_at IS NULL AND expires_at > $2
                 RETURNING id`,
                [oldId, at]
            );
            if (revoked.rowCount === 0) return false;

            await client.query(INSERT_REFRESH_TOKEN, refreshTokenParams(userId, next));
            return true;
        });
    }

    async revokeRefreshTokenByHash(tokenHash: string, at: Date): Promise<void> {
        await query(
            'UPDATE refresh_tokens SET revoked_at = $2 WHERE token_hash = $1 AND revoked_at IS NULL',
            [tokenHash, at]
        );
    }

    async revokeAllRefreshTokens(userId: number, at: Date): Promise<number> {
        const rows = await query<{ id: string }>(
            'UPDATE refresh_tokens SET revoked_at = $2 WHERE user_id = $1 AND revoked_at IS NULL RETURNING id',
            [userId, at]
        );
        return rows.length;
    }

    // ─── Anonymous sessions ───

    async findAnonymousSession(id: string): Promise<AnonymousSession | null> {
        return queryOne<AnonymousSession>(
            'SELECT id, created_at, promoted_at, promoted_to FROM anonymous_sessions WHERE id = $1',
            [id]
        );
    }

    async insertAnonymousSession(id: string, at: Date): Promise<StartedSession | null> {
        return transaction(async (client) => {
            const inserted = await client.query(
                `INSERT INTO anonymous_sessions (id, created_at) VALUES ($1, $2)
                 ON CONFLICT (id) DO NOTHING
                 RETURNING id, created_at, promoted_at, promoted_to`,
                [id, at]
            );
            if (inserted.rowCount === 0) return null;

            const chat = await client.query(
                'INSERT INTO chats (session_id, created_at, updated_at) VALUES ($1, $2, $2) RETURNING id',
                [id, at]
            );
            const session: AnonymousSession = inserted.rows[0];
            const chatId: number = chat.rows[0].id;
            return { session, chatId };
        });
    }

    async findSessionChat(sessionId: string): Promise<number | null> {
        const chat = await queryOne<{ id: number }>(
            'SELECT id FROM chats WHERE session_id = $1 AND is_active ORDER BY created_at, id LIMIT 1',
            [sessionId]
        );
        return chat ? chat.id : null;
    }

    async promoteAnonymousSession(sessionId: string, userId: number, at: Date): Promise<number | null> {
        return transaction(async (client) => {
            const locked = await client.query(
                'SELECT id FROM anonymous_sessions WHERE id = $1 AND promoted_at IS NULL FOR UPDATE',
                [sessionId]
            );
            if (locked.rowCount === 0) return null;

            let moved = 0;
            for (const table of SESSION_OWNED_TABLES) {
                const result = await client.query(
                    `UPDATE ${table} SET user_id = $2, session_id = NULL, updated_at = NOW() WHERE session_id = $1`,
                    [sessionId, userId]
                );
                moved += result.rowCount ?? 0;
            }

            await client.query(
                'UPDATE anonymous_sessions SET promoted_at = $3, promoted_to = $2 WHERE id = $1',
                [sessionId, userId, at]
            );
            return moved;
        });
    }
}
