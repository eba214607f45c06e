// ─── Auth & RBAC Types ───

export const ROLES = ['BENEFICIARY', 'ASSISTANT', 'ADMIN'] as const;

export type UserRole = (typeof ROLES)[number];

export interface User {
    id: number;
    email: string;
    password_hash: string;
    name: string;
    social_name: string | null;
    pronoun: string | null;
    /** Brazilian taxpayer id, digits only */
    cpf: string | null;
    role: UserRole;
    is_active: boolean;
    last_login_at: Date | null;
    created_at: Date;
    updated_at: Date;
}

/** Safe user object — never expose password_hash */
export type SafeUser = Omit<User, 'password_hash'>;

export interface NewUser {
    email: string;
    passwordHash: string;
    name: string;
    socialName: string | null;
    pronoun: string | null;
    cpf: string | null;
    role: UserRole;
}

export interface RefreshTokenRecord {
    id: string;
    user_id: number;
    token_hash: string;
    user_agent: string | null;
    ip_address: string | null;
    issued_at: Date;
    expires_at: Date;
    revoked_at: Date | null;
}

/** Where a refresh credential was issued from; recorded alongside it */
export interface ClientMeta {
    userAgent?: string;
    ip?: string;
}

/** A minted refresh credential that has not been written yet */
export interface PendingRefreshToken {
    id: string;
    rawToken: string;
    tokenHash: string;
    userAgent: string | null;
    ipAddress: string | null;
    issuedAt: Date;
    expiresAt: Date;
}

export interface AnonymousSession {
    id: string;
    created_at: Date;
    promoted_at: Date | null;
    promoted_to: number | null;
}

/** A new anonymous session together with the chat opened for it */
export interface StartedSession {
    session: AnonymousSession;
    chatId: number;
}

/** JWT access token payload */
export interface AccessTokenPayload {
    sub: string;       // user.id
    role: UserRole;
    typ: 'access';
    iat: number;
    exp: number;
}

export interface AccessClaims {
    userId: number;
    role: UserRole;
    issuedAt: Date;
    expiresAt: Date;
}

/** What gets attached to Fastify request after identity resolution */
export type Identity =
    | { kind: 'registered'; userId: number; role: UserRole }
    | { kind: 'anonymous'; sessionId: string };

/** Owner key of a resource such as a chat: a user or an anonymous session, never both */
export type ResourceOwner =
    | { kind: 'user'; userId: number }
    | { kind: 'session'; sessionId: string };
