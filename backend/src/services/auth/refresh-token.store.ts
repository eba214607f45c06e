import crypto from 'crypto';
import type { AuthRepository } from '../../db/auth.repository';
import type { ClientMeta, PendingRefreshToken } from '../../types/auth';
import { addSeconds, systemClock } from '../../utils/time';
import type { Clock } from '../../utils/time';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger('refresh-token-store');

const TOKEN_BYTES = 48;

export type RotateError = 'NotFound' | 'Revoked' | 'Expired';

export type RotateResult =
    | { ok: true; refreshToken: string; userId: number; expiresAt: Date }
    | { ok: false; error: RotateError };

export interface RefreshTokenStoreOptions {
    ttlDays: number;
    clock?: Clock;
}

/** Only this digest is stored; the raw token exists only on the client */
export function hashToken(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
}

/**
 * Durable, revocable refresh credentials with single-use rotation.
 */
export class RefreshTokenStore {
    private readonly ttlSeconds: number;
    private readonly clock: Clock;

    constructor(private readonly repository: AuthRepository, options: RefreshTokenStoreOptions) {
        this.ttlSeconds = options.ttlDays * 86400;
        this.clock = options.clock ?? systemClock;
    }

    /** Mints a credential without writing it */
    prepare(meta: ClientMeta = {}): PendingRefreshToken {
        const rawToken = crypto.randomBytes(TOKEN_BYTES).toString('base64url');
        const issuedAt = this.clock();
        return {
            id: crypto.randomUUID(),
            rawToken,
            tokenHash: hashToken(rawToken),
            userAgent: meta.userAgent ?? null,
            ipAddress: meta.ip ?? null,
            issuedAt,
            expiresAt: addSeconds(issuedAt, this.ttlSeconds),
        };
    }

    async issue(userId: number, meta?: ClientMeta): Promise<string> {
        const pending = this.prepare(meta);
        await this.repository.insertRefreshToken(userId, pending);
        return pending.rawToken;
    }

    async rotate(rawToken: string, meta?: ClientMeta): Promise<RotateResult> {
        const record = await this.repository.findRefreshTokenByHash(hashToken(rawToken));
        if (!record) return { ok: false, error: 'NotFound' };
        if (record.revoked_at) return { ok: false, error: 'Revoked' };

        const now = this.clock();
        if (record.expires_at.getTime() <= now.getTime()) return { ok: false, error: 'Expired' };

        const next = this.prepare(meta);
        const replaced = await this.repository.replaceRefreshToken(record.id, record.user_id, next, now);
        if (!replaced) {
            // Lost the race to a concurrent rotation (or a logout) of the same token
            log.warn({ tokenId: record.id, userId: record.user_id }, 'Refresh token already consumed');
            return { ok: false, error: 'Revoked' };
        }

        return { ok: true, refreshToken: next.rawToken, userId: record.user_id, expiresAt: next.expiresAt };
    }

    async revoke(rawToken: string): Promise<void> {
        await this.repository.revokeRefreshTokenByHash(hashToken(rawToken), this.clock());
    }

    async revokeAll(userId: number): Promise<number> {
        const count = await this.repository.revokeAllRefreshTokens(userId, this.clock());
        log.info({ userId, count }, 'Revoked all refresh tokens');
        return count;
    }
}
