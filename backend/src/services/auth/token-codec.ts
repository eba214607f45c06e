import jwt from 'jsonwebtoken';
import type { JwtPayload } from 'jsonwebtoken';
import { z } from 'zod';
import { ROLES } from '../../types/auth';
import type { AccessClaims, AccessTokenPayload, UserRole } from '../../types/auth';
import { systemClock, toEpochSeconds } from '../../utils/time';
import type { Clock } from '../../utils/time';

const ALGORITHM = 'HS256';

export type AccessTokenError = 'InvalidSignature' | 'Expired' | 'Malformed';

export type ParseAccessResult =
    | { ok: true; claims: AccessClaims }
    | { ok: false; error: AccessTokenError };

export interface IssuedAccessToken {
    token: string;
    /** Seconds until the token expires */
    expiresIn: number;
}

export interface TokenCodecOptions {
    secret: string;
    accessTtlSeconds: number;
    clock?: Clock;
}

const accessClaimsSchema = z.object({
    sub: z.string().regex(/^[1-9]\d*$/),
    role: z.enum(ROLES),
    typ: z.literal('access'),
    iat: z.number().int(),
    exp: z.number().int(),
});

// jsonwebtoken reports every failure as a JsonWebTokenError; these messages
// are the ones that mean the signature itself did not check out.
const SIGNATURE_FAILURES = new Set([
    'invalid signature',
    'jwt signature is required',
    'invalid algorithm',
]);

/**
 * Signs and verifies access tokens with a symmetric key.
 * The key is fixed at construction; instances are frozen and safe to share.
 */
export class TokenCodec {
    private readonly secret: string;
    private readonly accessTtlSeconds: number;
    private readonly clock: Clock;

    constructor(options: TokenCodecOptions) {
        if (!options.secret) {
            throw new Error('TokenCodec requires a signing secret');
        }
        this.secret = options.secret;
        this.accessTtlSeconds = options.accessTtlSeconds;
        this.clock = options.clock ?? systemClock;
        Object.freeze(this);
    }

    issueAccess(userId: number, role: UserRole, ttlSeconds: number = this.accessTtlSeconds): IssuedAccessToken {
        const iat = toEpochSeconds(this.clock());
        const payload: AccessTokenPayload = {
            sub: String(userId),
            role,
            typ: 'access',
            iat,
            exp: iat + ttlSeconds,
        };
        const token = jwt.sign(payload, this.secret, { algorithm: ALGORITHM });
        return { token, expiresIn: ttlSeconds };
    }

    parseAccess(token: string): ParseAccessResult {
        let decoded: string | JwtPayload;
        try {
            decoded = jwt.verify(token, this.secret, {
                algorithms: [ALGORITHM],
                clockTimestamp: toEpochSeconds(this.clock()),
            });
        } catch (err) {
            return { ok: false, error: classifyVerifyError(err) };
        }

        const parsed = accessClaimsSchema.safeParse(decoded);
        if (!parsed.success) {
            return { ok: false, error: 'Malformed' };
        }

        return {
            ok: true,
            claims: {
                userId: parseInt(parsed.data.sub, 10),
                role: parsed.data.role,
                issuedAt: new Date(parsed.data.iat * 1000),
                expiresAt: new Date(parsed.data.exp * 1000),
            },
        };
    }
}

function classifyVerifyError(err: unknown): AccessTokenError {
    if (err instanceof jwt.TokenExpiredError) return 'Expired';
    if (err instanceof jwt.JsonWebTokenError && SIGNATURE_FAILURES.has(err.message)) {
        return 'InvalidSignature';
    }
    return 'Malformed';
}
