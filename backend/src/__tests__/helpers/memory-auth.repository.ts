import type { AuthRepository, CreateUserResult } from '../../db/auth.repository';
import type {
    AnonymousSession,
    NewUser,
    PendingRefreshToken,
    RefreshTokenRecord,
    ResourceOwner,
    StartedSession,
    User,
} from '../../types/auth';

export interface ChatRow {
    id: number;
    user_id: number | null;
    session_id: string | null;
    title: string | null;
}

/**
 * In-process stand-in for PostgreSQL. Every method yields once before it
 * touches state, so concurrent callers interleave the way they would against
 * a real database, and each multi-row change runs without a yield in between.
 */
export class MemoryAuthRepository implements AuthRepository {
    private users = new Map<number, User>();
    private refreshTokens = new Map<string, RefreshTokenRecord>();
    private sessions = new Map<string, AnonymousSession>();
    private chats = new Map<number, ChatRow>();
    private nextUserId = 1;
    private nextChatId = 1;
    private offline = false;

    /** Makes every call reject, as if the database were unreachable */
    setOffline(offline: boolean): void {
        this.offline = offline;
    }

    private async tick(): Promise<void> {
        await new Promise<void>((resolve) => setImmediate(resolve));
        if (this.offline) {
            throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
        }
    }

    // ─── Users ───

    async findUserByEmail(email: string): Promise<User | null> {
        await this.tick();
        for (const user of this.users.values()) {
            if (user.email === email) return { ...user };
        }
        return null;
    }

    async findUserById(id: number): Promise<User | null> {
        await this.tick();
        const user = this.users.get(id);
        return user ? { ...user } : null;
    }

    async findUserByCpf(cpf: string): Promise<User | null> {
        await this.tick();
        for (const user of this.users.values()) {
            if (user.cpf === cpf) return { ...user };
        }
        return null;
    }

    async createUserWithRefreshToken(user: NewUser, token: PendingRefreshToken): Promise<CreateUserResult> {
        await this.tick();
        for (const existing of this.users.values()) {
            if (existing.email === user.email) return { ok: false, conflict: 'email' };
            if (user.cpf !== null && existing.cpf === user.cpf) return { ok: false, conflict: 'cpf' };
        }
        const now = new Date(token.issuedAt.getTime());
        const row: User = {
            id: this.nextUserId++,
            email: user.email,
            password_hash: user.passwordHash,
            name: user.name,
            social_name: user.socialName,
            pronoun: user.pronoun,
            cpf: user.cpf,
            role: user.role,
            is_active: true,
            last_login_at: null,
            created_at: now,
            updated_at: now,
        };
        this.users.set(row.id, row);
        this.storeRefreshToken(row.id, token);
        const { password_hash: _hash, ...safe } = row;
        return { ok: true, user: safe };
    }

    async updatePasswordHash(userId: number, passwordHash: string): Promise<void> {
        await this.tick();
        const user = this.users.get(userId);
        if (user) user.password_hash = passwordHash;
    }

    async touchLastLogin(userId: number, at: Date): Promise<void> {
        await this.tick();
        const user = this.users.get(userId);
        if (user) user.last_login_at = at;
    }

    // ─── Refresh tokens ───

    async findRefreshTokenByHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
        await this.tick();
        for (const record of this.refreshTokens.values()) {
            if (record.token_hash === tokenHash) return { ...record };
        }
        return null;
    }

    async insertRefreshToken(userId: number, token: PendingRefreshToken): Promise<void> {
        await this.tick();
        this.storeRefreshToken(userId, token);
    }

    async replaceRefreshToken(oldId: string, userId: number, next: PendingRefreshToken, at: Date): Promise<boolean> {
        await this.tick();
        const old = this.refreshTokens.get(oldId);
        if (!old || old.revoked_at || old.expires_at.getTime() <= at.getTime()) return false;
        old.revoked_at = at;
        this.storeRefreshToken(userId, next);
        return true;
    }

    async revokeRefreshTokenByHash(tokenHash: string, at: Date): Promise<void> {
        await this.tick();
        for (const record of this.refreshTokens.values()) {
            if (record.token_hash === tokenHash && !record.revoked_at) record.revoked_at = at;
        }
    }

    async revokeAllRefreshTokens(userId: number, at: Date): Promise<number> {
        await this.tick();
        let count = 0;
        for (const record of this.refreshTokens.values()) {
            if (record.user_id === userId && !record.revoked_at) {
                record.revoked_at = at;
                count++;
            }
        }
        return count;
    }

    // ─── Anonymous sessions ───

    async findAnonymousSession(id: string): Promise<AnonymousSession | null> {
        await this.tick();
        const session = this.sessions.get(id);
        return session ? { ...session } : null;
    }

    async insertAnonymousSession(id: string, at: Date): Promise<StartedSession | null> {
        await this.tick();
        if (this.sessions.has(id)) return null;
        const session: AnonymousSession = { id, created_at: at, promoted_at: null, promoted_to: null };
        this.sessions.set(id, session);
        const chat = this.createChat({ kind: 'session', sessionId: id });
        return { session: { ...session }, chatId: chat.id };
    }

    async findSessionChat(sessionId: string): Promise<number | null> {
        await this.tick();
        for (const chat of this.chats.values()) {
            if (chat.session_id === sessionId) return chat.id;
        }
        return null;
    }

    async promoteAnonymousSession(sessionId: string, userId: number, at: Date): Promise<number | null> {
        await this.tick();
        const session = this.sessions.get(sessionId);
        if (!session || session.promoted_at) return null;

        let moved = 0;
        for (const chat of this.chats.values()) {
            if (chat.session_id === sessionId) {
                chat.session_id = null;
                chat.user_id = userId;
                moved++;
            }
        }
        session.promoted_at = at;
        session.promoted_to = userId;
        return moved;
    }

    // ─── Test helpers ───

    createChat(owner: ResourceOwner, title: string | null = null): ChatRow {
        const chat: ChatRow = {
            id: this.nextChatId++,
            user_id: owner.kind === 'user' ? owner.userId : null,
            session_id: owner.kind === 'session' ? owner.sessionId : null,
            title,
        };
        this.chats.set(chat.id, chat);
        return { ...chat };
    }

    getChat(id: number): ChatRow | undefined {
        const chat = this.chats.get(id);
        return chat ? { ...chat } : undefined;
    }

    chatsOwnedBy(owner: ResourceOwner): ChatRow[] {
        return [...this.chats.values()]
            .filter((chat) =>
                owner.kind === 'user' ? chat.user_id === owner.userId : chat.session_id === owner.sessionId
            )
            .map((chat) => ({ ...chat }));
    }

    refreshTokensOf(userId: number): RefreshTokenRecord[] {
        return [...this.refreshTokens.values()]
            .filter((record) => record.user_id === userId)
            .map((record) => ({ ...record }));
    }

    setUserActive(userId: number, active: boolean): void {
        const user = this.users.get(userId);
        if (user) user.is_active = active;
    }

    setUserRole(userId: number, role: User['role']): void {
        const user = this.users.get(userId);
        if (user) user.role = role;
    }

    setPasswordHash(userId: number, passwordHash: string): void {
        const user = this.users.get(userId);
        if (user) user.password_hash = passwordHash;
    }

    private storeRefreshToken(userId: number, token: PendingRefreshToken): void {
        this.refreshTokens.set(token.id, {
            id: token.id,
            user_id: userId,
            token_hash: token.tokenHash,
            user_agent: token.userAgent,
            ip_address: token.ipAddress,
            issued_at: token.issuedAt,
            expires_at: token.expiresAt,
            revoked_at: null,
        });
    }
}
