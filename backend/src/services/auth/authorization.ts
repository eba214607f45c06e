import type { Identity, ResourceOwner, UserRole } from '../../types/auth';

export type AuthorizationDecision =
    | { allowed: true }
    | { allowed: false; reason: string };

const ALLOW: AuthorizationDecision = { allowed: true };

/**
 * Role check. `required` may be a single role or a list of acceptable roles.
 * Anonymous identities never satisfy a role requirement.
 */
export function authorize(identity: Identity, required: UserRole | readonly UserRole[]): AuthorizationDecision {
    if (identity.kind === 'anonymous') {
        return { allowed: false, reason: 'Anonymous sessions cannot access role-protected operations' };
    }
    const roles: readonly UserRole[] = typeof required === 'string' ? [required] : required;
    if (!roles.includes(identity.role)) {
        return { allowed: false, reason: `Requires role ${roles.join(' or ')}` };
    }
    return ALLOW;
}

/**
 * Ownership check: the identity owns the resource, or is an ADMIN.
 */
export function authorizeOwnership(identity: Identity, owner: ResourceOwner): AuthorizationDecision {
    if (identity.kind === 'registered') {
        if (identity.role === 'ADMIN') return ALLOW;
        if (owner.kind === 'user' && owner.userId === identity.userId) return ALLOW;
    } else if (owner.kind === 'session' && owner.sessionId === identity.sessionId) {
        return ALLOW;
    }
    return { allowed: false, reason: 'Not the owner of this resource' };
}
