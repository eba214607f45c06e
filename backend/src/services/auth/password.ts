import bcrypt from 'bcryptjs';
import { AuthError } from './errors';
import { logger } from '../../utils/logger';

/** bcrypt silently ignores input past this many bytes */
export const MAX_PASSWORD_BYTES = 72;

// Hash of a random string nobody knows. Compared against when the email is
// unknown so both login failures spend the same bcrypt time.
const DUMMY_HASH = '$2a$10$CwTycUXWue0Thq9StjUM0uJ8.QZ6xg2jVTe3ayXPXz9/jjRbqr5kW';

// ─── Password Hashing ───

export async function hashPassword(password: string, rounds: number): Promise<string> {
    return bcrypt.hash(password, rounds);
}

/**
 * Compares a plain password with a stored bcrypt hash.
 * A corrupted or non-bcrypt stored hash counts as a mismatch.
 */
export async function verifyPassword(password: string, hash: string): Promise<boolean> {
    try {
        return await bcrypt.compare(password, hash);
    } catch (err) {
        logger.warn({ err }, 'Stored password hash could not be compared');
        return false;
    }
}

export async function burnPasswordCheck(password: string): Promise<void> {
    await verifyPassword(password, DUMMY_HASH);
}

// ─── Policy ───

export function assertPasswordPolicy(password: string, minLength: number): void {
    if (password.length < minLength) {
        throw new AuthError('WEAK_PASSWORD', `Password must be at least ${minLength} characters`);
    }
    if (Buffer.byteLength(password, 'utf8') > MAX_PASSWORD_BYTES) {
        throw new AuthError('WEAK_PASSWORD', `Password must be at most ${MAX_PASSWORD_BYTES} bytes`);
    }
}
