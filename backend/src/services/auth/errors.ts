export type AuthErrorCode =
    | 'INVALID_CREDENTIALS'
    | 'UNAUTHENTICATED'
    | 'WEAK_PASSWORD'
    | 'EMAIL_TAKEN'
    | 'INVALID_CPF'
    | 'CPF_TAKEN'
    | 'FORBIDDEN'
    | 'NOT_FOUND'
    | 'UNAVAILABLE';

const STATUS_BY_CODE: Record<AuthErrorCode, number> = {
    INVALID_CREDENTIALS: 401,
    UNAUTHENTICATED: 401,
    WEAK_PASSWORD: 400,
    EMAIL_TAKEN: 409,
    INVALID_CPF: 400,
    CPF_TAKEN: 409,
    FORBIDDEN: 403,
    NOT_FOUND: 404,
    UNAVAILABLE: 503,
};

const DEFAULT_MESSAGES: Record<AuthErrorCode, string> = {
    INVALID_CREDENTIALS: 'Invalid email or password',
    UNAUTHENTICATED: 'Authentication required',
    WEAK_PASSWORD: 'Password does not meet the password policy',
    EMAIL_TAKEN: 'Email already registered',
    INVALID_CPF: 'CPF must have 11 digits',
    CPF_TAKEN: 'CPF already registered',
    FORBIDDEN: 'Insufficient permissions',
    NOT_FOUND: 'Not found',
    UNAVAILABLE: 'Service temporarily unavailable',
};

export class AuthError extends Error {
    public readonly code: AuthErrorCode;
    public readonly statusCode: number;

    constructor(code: AuthErrorCode, message: string = DEFAULT_MESSAGES[code], options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'AuthError';
        this.code = code;
        this.statusCode = STATUS_BY_CODE[code];
    }
}

export function isAuthError(err: unknown): err is AuthError {
    return err instanceof AuthError;
}
