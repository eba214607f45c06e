import type { AppConfig } from '../../config';
import type { AuthRepository } from '../../db/auth.repository';
import { parseDuration } from '../../utils/time';
import type { Clock } from '../../utils/time';
import { AuthService } from './auth.service';
import { RefreshTokenStore } from './refresh-token.store';
import { AnonymousSessionManager } from './session-manager';
import { TokenCodec } from './token-codec';

export { AuthService } from './auth.service';
export { AuthError } from './errors';
export type { AuthErrorCode } from './errors';
export { TokenCodec } from './token-codec';
export { RefreshTokenStore } from './refresh-token.store';
export { AnonymousSessionManager } from './session-manager';
export { authorize, authorizeOwnership } from './authorization';

export type AuthSettings = Pick<
    AppConfig,
    'jwtSecret' | 'jwtAccessExpiresIn' | 'refreshTokenTtlDays' | 'bcryptRounds' | 'passwordMinLength'
>;

/**
 * Wires the auth components around one repository. The signing key is read
 * here, once, and handed to the codec.
 */
export function createAuthService(settings: AuthSettings, repository: AuthRepository, clock?: Clock): AuthService {
    const codec = new TokenCodec({
        secret: settings.jwtSecret,
        accessTtlSeconds: parseDuration(settings.jwtAccessExpiresIn),
        clock,
    });
    const refreshTokens = new RefreshTokenStore(repository, { ttlDays: settings.refreshTokenTtlDays, clock });
    const sessions = new AnonymousSessionManager(repository, { clock });

    return new AuthService({
        repository,
        codec,
        refreshTokens,
        sessions,
        passwordPolicy: { minLength: settings.passwordMinLength, bcryptRounds: settings.bcryptRounds },
        clock,
    });
}
