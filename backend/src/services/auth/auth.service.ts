import type { AuthRepository } from '../../db/auth.repository';
import type { ClientMeta, Identity, SafeUser, User } from '../../types/auth';
import { createChildLogger } from '../../utils/logger';
import { systemClock } from '../../utils/time';
import type { Clock } from '../../utils/time';
import { AuthError, isAuthError } from './errors';
import { assertPasswordPolicy, burnPasswordCheck, hashPassword, verifyPassword } from './password';
import type { RefreshTokenStore } from './refresh-token.store';
import type { AnonymousSessionManager, CreateAnonymousResult } from './session-manager';
import type { TokenCodec } from './token-codec';

const log = createChildLogger('auth-service');

const REFRESH_FAILED = 'Invalid or expired refresh token';

export interface PasswordPolicy {
    minLength: number;
    bcryptRounds: number;
}

export interface AuthServiceDeps {
    repository: AuthRepository;
    codec: TokenCodec;
    refreshTokens: RefreshTokenStore;
    sessions: AnonymousSessionManager;
    passwordPolicy: PasswordPolicy;
    clock?: Clock;
}

export interface RegisterParams {
    email: string;
    password: string;
    name: string;
    socialName?: string | null;
    pronoun?: string | null;
    /** Any punctuation is stripped; 11 digits must remain */
    cpf?: string | null;
    /** Anonymous session whose chats move to the new account */
    anonymousSessionId?: string;
    meta?: ClientMeta;
}

export interface LoginParams {
    email: string;
    password: string;
    anonymousSessionId?: string;
    meta?: ClientMeta;
}

export interface TokenPair {
    accessToken: string;
    refreshToken: string;
    /** Access token lifetime in seconds */
    expiresIn: number;
}

/** A skipped promotion says why, so the client knows whether retrying can help */
export type PromotionOutcome =
    | { sessionId: string; promoted: true; resourcesMoved: number }
    | { sessionId: string; promoted: false; resourcesMoved: 0; reason: 'NOT_FOUND' | 'UNAVAILABLE' };

export interface AuthResult extends TokenPair {
    user: SafeUser;
    promotion: PromotionOutcome | null;
}

export interface CredentialsInput {
    accessToken?: string;
    sessionId?: string;
}

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

/** Strips formatting from a CPF; null when none was given */
export function normalizeCpf(cpf: string | null | undefined): string | null {
    if (!cpf) return null;
    const digits = cpf.replace(/\D/g, '');
    if (digits.length !== 11) throw new AuthError('INVALID_CPF');
    return digits;
}

export function toSafeUser(user: User): SafeUser {
    return {
        id: user.id,
        email: user.email,
        name: user.name,
        social_name: user.social_name,
        pronoun: user.pronoun,
        cpf: user.cpf,
        role: user.role,
        is_active: user.is_active,
        last_login_at: user.last_login_at,
        created_at: user.created_at,
        updated_at: user.updated_at,
    };
}

/**
 * Entry point for request handlers: register, login, refresh, logout and
 * identity resolution, plus the account operations built on them.
 */
export class AuthService {
    private readonly repository: AuthRepository;
    private readonly codec: TokenCodec;
    private readonly refreshTokens: RefreshTokenStore;
    private readonly sessions: AnonymousSessionManager;
    private readonly passwordPolicy: PasswordPolicy;
    private readonly clock: Clock;

    constructor(deps: AuthServiceDeps) {
        this.repository = deps.repository;
        this.codec = deps.codec;
        this.refreshTokens = deps.refreshTokens;
        this.sessions = deps.sessions;
        this.passwordPolicy = deps.passwordPolicy;
        this.clock = deps.clock ?? systemClock;
    }

    // ─── Register ───

    async register(params: RegisterParams): Promise<AuthResult> {
        assertPasswordPolicy(params.password, this.passwordPolicy.minLength);

        const email = normalizeEmail(params.email);
        const cpf = normalizeCpf(params.cpf);
        const existing = await this.storage('findUserByEmail', () => this.repository.findUserByEmail(email));
        if (existing) throw new AuthError('EMAIL_TAKEN');
        if (cpf !== null) {
            const holder = await this.storage('findUserByCpf', () => this.repository.findUserByCpf(cpf));
            if (holder) throw new AuthError('CPF_TAKEN');
        }

        const passwordHash = await hashPassword(params.password, this.passwordPolicy.bcryptRounds);
        const pending = this.refreshTokens.prepare(params.meta);

        // The unique indexes still decide when two registrations race
        const created = await this.storage('createUser', () =>
            this.repository.createUserWithRefreshToken(
                {
                    email,
                    passwordHash,
                    name: params.name,
                    socialName: params.socialName ?? null,
                    pronoun: params.pronoun ?? null,
                    cpf,
                    role: 'BENEFICIARY',
                },
                pending
            )
        );
        if (!created.ok) throw new AuthError(created.conflict === 'cpf' ? 'CPF_TAKEN' : 'EMAIL_TAKEN');
        const user = created.user;

        const access = this.codec.issueAccess(user.id, user.role);
        const promotion = await this.promoteIfRequested(params.anonymousSessionId, user.id);

        log.info({ userId: user.id, role: user.role }, 'User registered');
        return {
            user,
            accessToken: access.token,
            refreshToken: pending.rawToken,
            expiresIn: access.expiresIn,
            promotion,
        };
    }

    // ─── Login ───

    async login(params: LoginParams): Promise<AuthResult> {
        const email = normalizeEmail(params.email);
        const user = await this.storage('findUserByEmail', () => this.repository.findUserByEmail(email));
        if (!user) {
            await burnPasswordCheck(params.password);
            throw new AuthError('INVALID_CREDENTIALS');
        }

        const valid = await verifyPassword(params.password, user.password_hash);
        if (!valid || !user.is_active) {
            log.info({ userId: user.id, active: user.is_active }, 'Login rejected');
            throw new AuthError('INVALID_CREDENTIALS');
        }

        // Record the login first: a failed write must not leave an issued credential behind
        const now = this.clock();
        await this.storage('touchLastLogin', () => this.repository.touchLastLogin(user.id, now));
        const refreshToken = await this.storage('issueRefreshToken', () =>
            this.refreshTokens.issue(user.id, params.meta)
        );

        const access = this.codec.issueAccess(user.id, user.role);
        const promotion = await this.promoteIfRequested(params.anonymousSessionId, user.id);

        log.info({ userId: user.id, role: user.role }, 'User logged in');
        return {
            user: { ...toSafeUser(user), last_login_at: now },
            accessToken: access.token,
            refreshToken,
            expiresIn: access.expiresIn,
            promotion,
        };
    }

    // ─── Refresh ───

    async refresh(rawRefreshToken: string, meta?: ClientMeta): Promise<TokenPair> {
        const rotated = await this.storage('rotateRefreshToken', () =>
            this.refreshTokens.rotate(rawRefreshToken, meta)
        );
        if (!rotated.ok) {
            log.info({ reason: rotated.error }, 'Refresh rejected');
            throw new AuthError('INVALID_CREDENTIALS', REFRESH_FAILED);
        }

        // Role comes from the current row, so a role change takes effect on the next refresh
        const user = await this.storage('findUserById', () => this.repository.findUserById(rotated.userId));
        if (!user || !user.is_active) {
            await this.storage('revokeRefreshToken', () => this.refreshTokens.revoke(rotated.refreshToken));
            log.info({ userId: rotated.userId }, 'Refresh rejected for missing or inactive user');
            throw new AuthError('INVALID_CREDENTIALS', REFRESH_FAILED);
        }

        const access = this.codec.issueAccess(user.id, user.role);
        return { accessToken: access.token, refreshToken: rotated.refreshToken, expiresIn: access.expiresIn };
    }

    // ─── Logout ───

    async logout(rawRefreshToken: string): Promise<void> {
        await this.storage('revokeRefreshToken', () => this.refreshTokens.revoke(rawRefreshToken));
    }

    async logoutEverywhere(userId: number): Promise<number> {
        return this.storage('revokeAllRefreshTokens', () => this.refreshTokens.revokeAll(userId));
    }

    // ─── Identity ───

    /**
     * Resolves the caller. A supplied access token always decides the
     * outcome: if it fails verification the caller is rejected, even when a
     * valid anonymous session id accompanies it.
     */
    async resolveCurrent(input: CredentialsInput): Promise<Identity> {
        if (input.accessToken !== undefined) {
            const parsed = this.codec.parseAccess(input.accessToken);
            if (!parsed.ok) {
                log.debug({ reason: parsed.error }, 'Access token rejected');
                throw new AuthError(
                    'UNAUTHENTICATED',
                    parsed.error === 'Expired' ? 'Access token expired' : 'Invalid access token'
                );
            }
            return { kind: 'registered', userId: parsed.claims.userId, role: parsed.claims.role };
        }

        if (input.sessionId !== undefined) {
            const sessionId = input.sessionId;
            const session = await this.storage('resolveSession', () => this.sessions.resolve(sessionId));
            if (!session) throw new AuthError('UNAUTHENTICATED', 'Unknown anonymous session');
            return { kind: 'anonymous', sessionId: session.id };
        }

        throw new AuthError('UNAUTHENTICATED');
    }

    async getCurrentUser(userId: number): Promise<SafeUser> {
        const user = await this.storage('findUserById', () => this.repository.findUserById(userId));
        if (!user || !user.is_active) throw new AuthError('UNAUTHENTICATED');
        return toSafeUser(user);
    }

    async getUser(userId: number): Promise<SafeUser> {
        const user = await this.storage('findUserById', () => this.repository.findUserById(userId));
        if (!user) throw new AuthError('NOT_FOUND', 'User not found');
        return toSafeUser(user);
    }

    // ─── Password change ───

    /** Changes the password and revokes every refresh token of the account */
    async changePassword(userId: number, currentPassword: string, newPassword: string): Promise<number> {
        assertPasswordPolicy(newPassword, this.passwordPolicy.minLength);

        const user = await this.storage('findUserById', () => this.repository.findUserById(userId));
        if (!user || !user.is_active) throw new AuthError('UNAUTHENTICATED');

        const valid = await verifyPassword(currentPassword, user.password_hash);
        if (!valid) throw new AuthError('INVALID_CREDENTIALS', 'Current password is incorrect');

        const passwordHash = await hashPassword(newPassword, this.passwordPolicy.bcryptRounds);
        await this.storage('updatePasswordHash', () => this.repository.updatePasswordHash(userId, passwordHash));
        const revoked = await this.logoutEverywhere(userId);

        log.info({ userId, revoked }, 'Password changed');
        return revoked;
    }

    // ─── Anonymous sessions ───

    async createAnonymousSession(requestedId?: string): Promise<CreateAnonymousResult> {
        return this.storage('createAnonymousSession', () => this.sessions.createAnonymous(requestedId));
    }

    async promoteSession(sessionId: string, userId: number): Promise<number> {
        const result = await this.storage('promoteSession', () => this.sessions.promote(sessionId, userId));
        if (!result.ok) throw new AuthError('NOT_FOUND', 'Anonymous session not found');
        return result.resourcesMoved;
    }

    private async promoteIfRequested(sessionId: string | undefined, userId: number): Promise<PromotionOutcome | null> {
        if (sessionId === undefined) return null;
        try {
            const resourcesMoved = await this.promoteSession(sessionId, userId);
            return { sessionId, promoted: true, resourcesMoved };
        } catch (err) {
            if (!isAuthError(err)) throw err;
            const reason = err.code;
            if (reason !== 'NOT_FOUND' && reason !== 'UNAVAILABLE') throw err;
            // Credentials are already issued; the client can retry promotion on its own
            log.warn({ sessionId, userId, reason }, 'Session promotion skipped');
            return { sessionId, promoted: false, resourcesMoved: 0, reason };
        }
    }

    /**
     * Runs a persistence call. Failures that are not auth outcomes become
     * UNAVAILABLE so an outage is never reported as bad credentials.
     */
    private async storage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (err) {
            if (isAuthError(err)) throw err;
            log.error({ err, operation }, 'Auth storage call failed');
            throw new AuthError('UNAVAILABLE', undefined, { cause: err });
        }
    }
}
