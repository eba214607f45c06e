import { describe, it, expect } from 'vitest';
import { AuthError } from '../services/auth/errors';
import { assertPasswordPolicy, hashPassword, verifyPassword } from '../services/auth/password';

describe('Credential verifier', () => {
    it('accepts the password a hash was made from', async () => {
        const hash = await hashPassword('Secret123', 4);

        expect(hash).not.toBe('Secret123');
        expect(await verifyPassword('Secret123', hash)).toBe(true);
    });

    it('rejects a different password', async () => {
        const hash = await hashPassword('Secret123', 4);

        expect(await verifyPassword('secret123', hash)).toBe(false);
    });

    it('salts every hash', async () => {
        const first = await hashPassword('Secret123', 4);
        const second = await hashPassword('Secret123', 4);

        expect(first).not.toBe(second);
    });

    it('treats a malformed stored hash as a mismatch instead of throwing', async () => {
        await expect(verifyPassword('Secret123', 'not-a-bcrypt-hash')).resolves.toBe(false);
        await expect(verifyPassword('Secret123', '')).resolves.toBe(false);
        await expect(verifyPassword('Secret123', '$2a$10$' + '!'.repeat(53))).resolves.toBe(false);
    });

    describe('password policy', () => {
        it('rejects passwords below the minimum length with WEAK_PASSWORD', () => {
            let caught: unknown;
            try {
                assertPasswordPolicy('12345', 6);
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(AuthError);
            expect(caught).toMatchObject({
                code: 'WEAK_PASSWORD',
                statusCode: 400,
                message: 'Password must be at least 6 characters',
            });
        });

        it('accepts a password of exactly the minimum length', () => {
            expect(() => assertPasswordPolicy('123456', 6)).not.toThrow();
        });

        it('rejects passwords longer than bcrypt can hash', () => {
            expect(() => assertPasswordPolicy('a'.repeat(73), 6)).toThrow('Password must be at most 72 bytes');
            expect(() => assertPasswordPolicy('a'.repeat(72), 6)).not.toThrow();
        });
    });
});
